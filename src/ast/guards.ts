// src/ast/guards.ts
// 型ガードと字句形式のチェック。パーサ・ビルダー・シリアライザで共有する。

import type {
  AstNode,
  BooleanExpression,
  ComparisonOperator,
  InstantLiteral,
  LiteralNode,
  Operand,
  SpatialOperator,
  TemporalOperator,
  TerminalPredicate,
} from './types.ts';
import { COMPARISON_OPERATORS, SPATIAL_OPERATORS, TEMPORAL_OPERATORS } from './types.ts';

export const isPlainObject = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

// RFC 3339 date-time（秒は必須、小数秒は任意、オフセット必須）
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:[Zz]|[+-](\d{2}):(\d{2}))$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// 2021-02-30 のような繰り上がる日付は拒否する
function isCalendarDate(year: number, month: number, day: number): boolean {
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

const inRange = (text: string | undefined, max: number): boolean => text === undefined || Number(text) <= max;

export function isTimestampText(s: string): boolean {
  const m = TIMESTAMP_PATTERN.exec(s);
  if (!m) return false;
  const [, year, month, day, hour, minute, second, offsetHour, offsetMinute] = m;
  return (
    isCalendarDate(Number(year), Number(month), Number(day)) &&
    inRange(hour, 23) &&
    inRange(minute, 59) &&
    inRange(second, 59) &&
    inRange(offsetHour, 23) &&
    inRange(offsetMinute, 59)
  );
}

export function isDateText(s: string): boolean {
  const m = DATE_PATTERN.exec(s);
  if (!m) return false;
  const [, year, month, day] = m;
  return isCalendarDate(Number(year), Number(month), Number(day));
}

// 区間の開端（..）
export const OPEN_BOUND = '..';

export function isComparisonOperator(s: string): s is ComparisonOperator {
  return COMPARISON_OPERATORS.some((op) => op === s);
}
export function isSpatialOperator(s: string): s is SpatialOperator {
  return SPATIAL_OPERATORS.some((op) => op === s);
}
export function isTemporalOperator(s: string): s is TemporalOperator {
  return TEMPORAL_OPERATORS.some((op) => op === s);
}

export function isLiteral(node: AstNode): node is LiteralNode {
  switch (node.type) {
    case 'StringLiteral':
    case 'NumberLiteral':
    case 'BooleanLiteral':
    case 'NullLiteral':
    case 'TimestampLiteral':
    case 'DateLiteral':
    case 'GeometryLiteral':
    case 'BBoxLiteral':
      return true;
    default:
      return false;
  }
}

export function isInstant(node: AstNode): node is InstantLiteral {
  return node.type === 'TimestampLiteral' || node.type === 'DateLiteral';
}

export function isOperand(node: AstNode): node is Operand {
  return node.type === 'Property' || node.type === 'FunctionCall' || isLiteral(node);
}

export function isTerminalPredicate(node: AstNode): node is TerminalPredicate {
  switch (node.type) {
    case 'Comparison':
    case 'Between':
    case 'Like':
    case 'In':
    case 'IsNull':
    case 'SpatialPredicate':
    case 'TemporalPredicate':
      return true;
    default:
      return false;
  }
}

export function isBooleanExpression(node: AstNode): node is BooleanExpression {
  return isTerminalPredicate(node) || node.type === 'Logical' || node.type === 'Not' || node.type === 'FunctionCall';
}
