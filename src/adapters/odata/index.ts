// src/adapters/odata/index.ts
// AST を OData の $filter 式に変換する方言。値はすべてインラインで書く（パラメータは使わない）。
// LIKE と ACCENTI に相当するものは無いため未対応。

import type { Dialect, OperatorTemplate } from '../../transform/translate.ts';
import { toWkt } from '../../serializer/wkt.ts';
import { bboxToPolygon } from '../../ast/geometry.ts';
import { failUnsupportedProperty } from '../adapterErrors.ts';

const operators: Record<string, OperatorTemplate> = {
  '=': '{0} eq {1}',
  '<>': '{0} ne {1}',
  '<': '{0} lt {1}',
  '<=': '{0} le {1}',
  '>': '{0} gt {1}',
  '>=': '{0} ge {1}',
  and: { template: '({all})', separator: ' and ' },
  or: { template: '({all})', separator: ' or ' },
  not: 'not ({0})',
  between: '({0} ge {1} and {0} le {2})',
  in: { template: '{0} in ({rest})', separator: ', ' },
  isNull: '{0} eq null',
  s_intersects: 'geo.intersects({0}, {1})',
  t_after: '{0} gt {1.end}',
  t_before: '{0} lt {1.start}',
  t_equals: '{0} eq {1}',
  t_during: '({0} gt {1.start} and {0} lt {1.end})',
  t_intersects: '({0} ge {1.start} and {0} le {1.end})',
  casei: 'tolower({0})',
};

// 文字列はシングルクォート、内部の ' は '' に
const quote = (s: string): string => `'${s.replace(/'/g, "''")}'`;

// OData の識別子。式の中へそのまま書くので、これ以外の名前は受けない
const ODATA_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function propertyPath(name: string): string {
  const segments = name.split('.');
  if (!segments.every((s) => ODATA_IDENTIFIER.test(s))) failUnsupportedProperty('odata', name);
  return segments.join('/');
}

export const odataDialect: Dialect = {
  name: 'odata',
  operators,
  // ドット区切りのプロパティはパス区切り（/）にする
  property: propertyPath,
  literal(node) {
    switch (node.type) {
      case 'StringLiteral':
        return quote(node.value);
      case 'NumberLiteral':
        return Number.isFinite(node.value) ? String(node.value) : undefined;
      case 'BooleanLiteral':
        return node.value ? 'true' : 'false';
      case 'NullLiteral':
        return 'null';
      case 'TimestampLiteral':
      case 'DateLiteral':
        return node.value;
      case 'GeometryLiteral':
        return `geography'SRID=4326;${toWkt(node.value)}'`;
      case 'BBoxLiteral':
        return `geography'SRID=4326;${toWkt(bboxToPolygon(node.extent))}'`;
    }
  },
};
