// src/cli/convert.ts
// CLI と REPL で共有する変換処理。入力形式の判定、パース、出力形式ごとの整形を行う。

import type { BooleanExpression } from '../ast/types.ts';
import { parseText } from '../parser/index.ts';
import { parseJson } from '../json/parser.ts';
import { serializeJson } from '../json/serializer.ts';
import { serializeText } from '../serializer/text.ts';
import { flattenConjunction, subjectProperty } from '../transform/flatten.ts';
import { operatorName } from '../json/operators.ts';
import { translate } from '../transform/translate.ts';
import { toSelect } from '../adapters/sqlite/index.ts';
import { odataDialect } from '../adapters/odata/index.ts';

export const INPUT_FORMATS = ['text', 'json'] as const;
export type InputFormat = (typeof INPUT_FORMATS)[number];

export const OUTPUT_FORMATS = ['text', 'json', 'ast', 'sql', 'odata', 'flatten'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const isInputFormat = (s: string): s is InputFormat => INPUT_FORMATS.some((f) => f === s);
export const isOutputFormat = (s: string): s is OutputFormat => OUTPUT_FORMATS.some((f) => f === s);

export interface ConvertOptions {
  /** 省略時は先頭が '{' なら json、それ以外は text */
  from?: InputFormat;
  to: OutputFormat;
  pretty?: boolean;
  /** sql 出力のテーブル名 */
  table?: string;
}

export function detectFormat(source: string): InputFormat {
  return source.trimStart().startsWith('{') ? 'json' : 'text';
}

export function parseSource(source: string, from: InputFormat = detectFormat(source)): BooleanExpression {
  return from === 'json' ? parseJson(source) : parseText(source.trim());
}

export function convert(source: string, options: ConvertOptions): string {
  const expr = parseSource(source, options.from);
  const space = options.pretty ? 2 : undefined;
  switch (options.to) {
    case 'text':
      return serializeText(expr);
    case 'json':
      return JSON.stringify(serializeJson(expr), null, space);
    case 'ast':
      return JSON.stringify(expr, null, space);
    case 'sql': {
      const { sql, params } = toSelect(expr, options.table ?? 'items');
      return `${sql}\n-- params: ${JSON.stringify(params)}`;
    }
    case 'odata':
      return `$filter=${translate(expr, odataDialect).query}`;
    case 'flatten':
      return flattenConjunction(expr)
        .map((t) => `${subjectProperty(t) || '(none)'}\t${operatorName(t)}\t${serializeText(t)}`)
        .join('\n');
  }
}
