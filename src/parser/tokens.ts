// src/parser/tokens.ts
import { createToken, Lexer } from 'chevrotain';
import type { TokenType } from 'chevrotain';
import {
  Keyword,
  ComparisonOperator,
  SpatialOperator,
  TemporalOperator,
  FunctionName,
  Separator,
  Literal,
} from './categories.ts';
import { SPATIAL_OPERATORS, TEMPORAL_OPERATORS } from '../ast/types.ts';

// WhiteSpace は Lexer.SKIPPED とし、パーサーに渡さない。
export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

// ----- Identifiers -----
// 予約語の longer_alt に使うため先に定義する（allTokens では最後に並べる）。
// eo:cloud_cover や properties.datetime のような名前をそのまま受ける。
export const Identifier = createToken({
  name: 'Identifier',
  pattern: /[a-zA-Z_][a-zA-Z0-9_.:]*/,
});

// ----- Keywords -----
// longer_alt: Identifier により "android" が AND + roid に、"datetime" が DATE + time に
// 分割されるのを防ぐ。
function keyword(name: string, word: string, category: TokenType = Keyword): TokenType {
  return createToken({
    name,
    pattern: new RegExp(word, 'i'),
    categories: category,
    longer_alt: Identifier,
  });
}

export const And = keyword('And', 'AND');
export const Or = keyword('Or', 'OR');
export const Not = keyword('Not', 'NOT');
export const Like = keyword('Like', 'LIKE');
export const In = keyword('In', 'IN');
export const Is = keyword('Is', 'IS');
export const Null = keyword('Null', 'NULL');
export const Between = keyword('Between', 'BETWEEN');
export const True = keyword('True', 'TRUE');
export const False = keyword('False', 'FALSE');
export const Timestamp = keyword('Timestamp', 'TIMESTAMP');
export const DateKeyword = keyword('Date', 'DATE');

// テキスト関数（CASEI / ACCENTI）
export const CaseI = keyword('CaseI', 'CASEI', FunctionName);
export const AccentI = keyword('AccentI', 'ACCENTI', FunctionName);

// 空間演算子: S_INTERSECTS, S_CONTAINS, ...
export const spatialOperatorTokens: TokenType[] = SPATIAL_OPERATORS.map((op) =>
  keyword(`S_${op.toUpperCase()}`, `S_${op}`, SpatialOperator),
);

// 時間演算子: T_AFTER, T_METBY, T_OVERLAPPEDBY, ...
// T_STARTS / T_STARTEDBY のように接頭辞を共有するものは、正規表現が全体一致しない限り
// 誤マッチしない（T_START + S / E で分岐）。
export const temporalOperatorTokens: TokenType[] = TEMPORAL_OPERATORS.map((op) =>
  keyword(`T_${op.toUpperCase()}`, `T_${op}`, TemporalOperator),
);

// ----- WKT geometry tags -----
export const Point = keyword('Point', 'POINT');
export const LineString = keyword('LineString', 'LINESTRING');
export const Polygon = keyword('Polygon', 'POLYGON');
export const MultiPoint = keyword('MultiPoint', 'MULTIPOINT');
export const MultiLineString = keyword('MultiLineString', 'MULTILINESTRING');
export const MultiPolygon = keyword('MultiPolygon', 'MULTIPOLYGON');
export const GeometryCollectionTag = keyword('GeometryCollection', 'GEOMETRYCOLLECTION');
// BBOX(minx, miny, maxx, maxy) / 6 値の 3 次元版
export const BBox = keyword('BBox', 'BBOX');

// ----- Operators -----
// 複合演算子（2文字）を単一演算子より先に並べるのが重要。
export const NotEquals = createToken({
  name: 'NotEquals',
  pattern: /<>/,
  categories: ComparisonOperator,
  start_chars_hint: ['<'],
});
export const LessThanOrEqual = createToken({
  name: 'LessThanOrEqual',
  pattern: /<=/,
  categories: ComparisonOperator,
  start_chars_hint: ['<'],
});
export const GreaterThanOrEqual = createToken({
  name: 'GreaterThanOrEqual',
  pattern: />=/,
  categories: ComparisonOperator,
  start_chars_hint: ['>'],
});
export const LessThan = createToken({ name: 'LessThan', pattern: /</, categories: ComparisonOperator });
export const GreaterThan = createToken({ name: 'GreaterThan', pattern: />/, categories: ComparisonOperator });
export const Equals = createToken({ name: 'Equals', pattern: /=/, categories: ComparisonOperator });

// ----- Separators -----
export const LParen = createToken({ name: 'LParen', pattern: /\(/, categories: Separator });
export const RParen = createToken({ name: 'RParen', pattern: /\)/, categories: Separator });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/, categories: Separator });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/, categories: Separator });
export const Comma = createToken({ name: 'Comma', pattern: /,/, categories: Separator });
export const Slash = createToken({ name: 'Slash', pattern: /\//, categories: Separator });

// ----- Literals -----
// StringLiteral はダブルクォート。\" \\ \n \r \t を復元する（visitor 側）。
export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /"(?:[^"\\]|\\.)*"/,
  categories: Literal,
  line_breaks: true,
});

// NumberLiteral は符号/小数/指数をサポート。
export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
  categories: Literal,
});

// ----- Token order (priority) -----
// 重要: Chevrotain は配列順にマッチを試みます。
// 1) WhiteSpace（SKIPPED）
// 2) Keywords（予約語を Identifier より先に）
// 3) Operators: まず2文字（<>, <=, >=）、次に1文字
// 4) Separators
// 5) Literals
// 6) Identifiers（最後）
export const allTokens: TokenType[] = [
  WhiteSpace,

  // Keywords
  And, Or, Not, Like, In, Is, Null, Between, True, False, Timestamp, DateKeyword,
  CaseI, AccentI,
  ...spatialOperatorTokens,
  ...temporalOperatorTokens,
  MultiPoint, MultiLineString, MultiPolygon, GeometryCollectionTag, Point, LineString, Polygon, BBox,

  // Operators (multi-char first)
  NotEquals, LessThanOrEqual, GreaterThanOrEqual,

  // Operators (single-char)
  LessThan, GreaterThan, Equals,

  // Separators
  LParen, RParen, LBracket, RBracket, Comma, Slash,

  // Literals
  StringLiteral, NumberLiteral,

  // Categories（パターンを持たないがパーサに登録する必要がある）
  Keyword, ComparisonOperator, SpatialOperator, TemporalOperator, FunctionName, Separator, Literal,

  // Identifiers
  Identifier,
];
