// src/parser/parserErrors.ts
import { TextSyntaxError, formatLocation } from '../errors/errors.ts';

// chevrotain の IToken と互換。EOF トークンは位置が NaN になる
export interface TokenLike {
  image: string;
  startOffset: number;
  startLine?: number;
  startColumn?: number;
}

const finite = (n: number | undefined): number | undefined =>
  n === undefined || Number.isNaN(n) ? undefined : n;

function at(token: TokenLike): string {
  const loc = formatLocation(finite(token.startLine), finite(token.startColumn));
  return loc ? ` at ${loc}` : '';
}

// 代表ケース: 期待外トークン
export function failUnexpectedToken(token: TokenLike, expected: string): never {
  throw new TextSyntaxError(
    `Unexpected token '${token.image}'${at(token)}. Expected ${expected}.`,
    token.image,
    token.startOffset,
    finite(token.startLine),
    finite(token.startColumn),
    'E_SYNTAX_UNEXPECTED_TOKEN',
  );
}

// TIMESTAMP("...") の中身が RFC 3339 でない、数値が有限でない、など
export function failInvalidLiteral(token: TokenLike, reason: string): never {
  throw new TextSyntaxError(
    `Invalid literal ${token.image}${at(token)}: ${reason}`,
    token.image,
    token.startOffset,
    finite(token.startLine),
    finite(token.startColumn),
    'E_SYNTAX_INVALID_LITERAL',
  );
}

// CST の形が想定と異なる（パーサと visitor の不整合）
export function failGenericSyntax(message: string, offset = 0): never {
  throw new TextSyntaxError(message, '', offset, undefined, undefined, 'E_SYNTAX_GENERIC');
}
