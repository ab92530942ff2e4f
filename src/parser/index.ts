// src/parser/index.ts
// 公開API: CQL2 テキストを AST へ変換します（CSTは内部実装に隠蔽）。

import { Lexer, tokenMatcher } from 'chevrotain';
import type { IToken } from 'chevrotain';
import { allTokens, LParen, RParen } from './tokens.ts';
import { textParser } from './parser.ts';
import { astBuilderVisitor } from './visitor.ts';
import type { BooleanExpression } from '../ast/types.ts';
import { LexError, TextSyntaxError, attempt, formatLocation } from '../errors/errors.ts';
import type { Result } from '../errors/errors.ts';

const lexer = new Lexer(allTokens);

export function tokenize(input: string): IToken[] {
  // 1) Lexer エラーの標準化。ライブラリ内ロギングはせず LexError に正規化
  const lexResult = lexer.tokenize(input);
  const [le] = lexResult.errors;
  if (le) {
    const snippet = input.slice(le.offset, le.offset + le.length);
    const loc = formatLocation(le.line, le.column);
    throw new LexError(
      loc ? `Unexpected character '${snippet}' at ${loc}` : `Unexpected character '${snippet}'`,
      le.offset,
      le.line,
      le.column,
      snippet,
    );
  }
  return lexResult.tokens;
}

// 入力末尾で失敗し、開き括弧が閉じられていないもの
function isUnclosedGroup(tokens: IToken[], failedAt: IToken): boolean {
  if (!Number.isNaN(failedAt.startOffset)) return false;
  let depth = 0;
  for (const t of tokens) {
    if (tokenMatcher(t, LParen)) depth++;
    else if (tokenMatcher(t, RParen)) depth--;
  }
  return depth > 0;
}

export function parseText(input: string): BooleanExpression {
  const tokens = tokenize(input);

  // 2) Parsing (CST)
  textParser.input = tokens;
  const cst = textParser.expression();

  const [firstError] = textParser.errors;
  if (firstError) {
    // Chevrotainのエラーメッセージが複数行にわたる可能性を考慮し、第一文のみ採用
    const firstSentence = firstError.message.split('\n')[0] ?? firstError.message;
    const token = firstError.token;
    // EOF トークンは位置を持たない（NaN）
    const atEnd = Number.isNaN(token.startOffset);
    const offset = atEnd ? input.length : token.startOffset;
    const line = atEnd ? undefined : token.startLine;
    const column = atEnd ? undefined : token.startColumn;
    const loc = formatLocation(line, column);
    // 候補を列挙するメッセージ（1行目が ':' で終わる）は失敗したトークンで言い換える
    const generic = firstSentence.trimEnd().endsWith(':');
    const summary = !generic ? firstSentence : atEnd ? 'Unexpected end of input' : `Unexpected token '${token.image}'`;
    if (isUnclosedGroup(tokens, token)) {
      throw new TextSyntaxError(
        `Unclosed group: expected ')' before end of input`,
        '',
        offset,
        undefined,
        undefined,
        'E_SYNTAX_UNCLOSED_GROUP',
      );
    }
    throw new TextSyntaxError(
      atEnd ? (generic ? summary : `${summary} (at end of input)`) : loc ? `${summary} (at ${loc})` : summary,
      token.image,
      offset,
      line,
      column,
      'E_SYNTAX_UNEXPECTED_TOKEN',
    );
  }

  // 3) CST -> AST（Visitor）
  return astBuilderVisitor.expression(cst.children);
}

// 例外ではなく値で受け取りたい呼び出し側向け
export function tryParseText(input: string): Result<BooleanExpression> {
  return attempt(() => parseText(input));
}
