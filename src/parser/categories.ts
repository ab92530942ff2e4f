// src/parser/categories.ts
import { createToken, Lexer } from 'chevrotain';

// すべてのトークンの基底カテゴリ。
// Chevrotainのカテゴリはフィルタリング用途であり、実行時に直接消費されるものではありません。
export const Token = createToken({ name: 'Token', pattern: Lexer.NA });

// 予約語/関数名など、Identifier より優先されるべきトークン。
// 注意: 優先順位は tokens.ts の allTokens 配列順で最終決定されます。
export const Keyword = createToken({ name: 'Keyword', pattern: Lexer.NA, categories: Token });

// 比較演算子（= <> < <= > >=）。パーサはカテゴリ単位で CONSUME する。
export const ComparisonOperator = createToken({ name: 'ComparisonOperator', pattern: Lexer.NA, categories: Token });

// 空間演算子（S_INTERSECTS など）。カテゴリで一括して受ける。
export const SpatialOperator = createToken({ name: 'SpatialOperator', pattern: Lexer.NA, categories: Keyword });

// 時間演算子（T_AFTER など）。
export const TemporalOperator = createToken({ name: 'TemporalOperator', pattern: Lexer.NA, categories: Keyword });

// テキスト用の関数名（CASEI, ACCENTI）。
export const FunctionName = createToken({ name: 'FunctionName', pattern: Lexer.NA, categories: Keyword });

// 括弧、カンマ、角括弧、スラッシュ用カテゴリ。
export const Separator = createToken({ name: 'Separator', pattern: Lexer.NA, categories: Token });

// リテラル値（文字列・数値）カテゴリ。
export const Literal = createToken({ name: 'Literal', pattern: Lexer.NA, categories: Token });
