// src/ast/factory.ts
// AST ノードの生成関数。text/json パーサとビルダーはすべてここを経由してノードを作る。
// 論理式の方針: n-ary。同じ演算子の子は親へ平坦化し、子が1つだけなら子そのものを返す。

import type {
  BBoxLiteral,
  Between,
  BooleanExpression,
  Comparison,
  ComparisonOperator,
  DateLiteral,
  FunctionCall,
  Geometry,
  GeometryLiteral,
  In,
  InstantLiteral,
  IntervalLiteral,
  IsNull,
  Like,
  LiteralNode,
  LogicalOperator,
  Not,
  Operand,
  PropertyNode,
  SpatialLiteral,
  SpatialOperator,
  SpatialPredicate,
  TemporalOperand,
  TemporalOperator,
  TemporalPredicate,
  TimestampLiteral,
} from './types.ts';
import { isDateText, isTimestampText } from './guards.ts';
import { toGeometry } from './geometry.ts';
import { failInvalidOperand } from './factoryErrors.ts';
import { JSON_OPERATORS } from '../json/operators.ts';

export type ScalarValue = string | number | boolean | null;

export function property(name: string): PropertyNode {
  if (name.length === 0) failInvalidOperand('property name must not be empty', 'property');
  return { type: 'Property', name };
}

export function literal(value: ScalarValue): LiteralNode {
  if (value === null) return { type: 'NullLiteral' };
  if (typeof value === 'string') return { type: 'StringLiteral', value };
  if (typeof value === 'boolean') return { type: 'BooleanLiteral', value };
  if (!Number.isFinite(value)) failInvalidOperand(`number literal must be finite, got ${value}`, 'number');
  return { type: 'NumberLiteral', value };
}

export function timestamp(value: string | Date): TimestampLiteral {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) failInvalidOperand('timestamp is an invalid Date', 'timestamp');
    return { type: 'TimestampLiteral', value: value.toISOString() };
  }
  if (!isTimestampText(value)) failInvalidOperand(`invalid RFC 3339 timestamp '${value}'`, 'timestamp');
  return { type: 'TimestampLiteral', value };
}

export function date(value: string): DateLiteral {
  if (!isDateText(value)) failInvalidOperand(`invalid date '${value}' (expected YYYY-MM-DD)`, 'date');
  return { type: 'DateLiteral', value };
}

export function interval(start: InstantLiteral | null, end: InstantLiteral | null): IntervalLiteral {
  return { type: 'IntervalLiteral', start, end };
}

export function geometry(value: Geometry | Record<string, unknown>): GeometryLiteral {
  const g = toGeometry(value);
  if (!g) failInvalidOperand('value is not a GeoJSON geometry', 'geometry');
  return { type: 'GeometryLiteral', value: g };
}

export function bbox(extent: readonly number[]): BBoxLiteral {
  if (extent.length !== 4 && extent.length !== 6) {
    failInvalidOperand(`bbox needs 4 or 6 numbers, got ${extent.length}`, 'bbox');
  }
  if (!extent.every((n) => Number.isFinite(n))) failInvalidOperand('bbox values must be finite numbers', 'bbox');
  return { type: 'BBoxLiteral', extent: [...extent] };
}

export function comparison(operator: ComparisonOperator, left: Operand, right: Operand): Comparison {
  return { type: 'Comparison', operator, left, right };
}

export function logical(
  operator: LogicalOperator,
  first: BooleanExpression,
  ...rest: BooleanExpression[]
): BooleanExpression {
  const children: BooleanExpression[] = [];
  for (const child of [first, ...rest]) {
    if (child.type === 'Logical' && child.operator === operator) children.push(...child.children);
    else children.push(child);
  }
  const [only] = children;
  if (children.length === 1 && only) return only;
  return { type: 'Logical', operator, children };
}

export function not(child: BooleanExpression): Not {
  return { type: 'Not', child };
}

export function between(value: Operand, lower: Operand, upper: Operand): Between {
  return { type: 'Between', value, lower, upper };
}

export function like(value: Operand, pattern: string): Like {
  return { type: 'Like', value, pattern };
}

export function inList(value: Operand, candidates: Operand[]): In {
  return { type: 'In', value, candidates: [...candidates] };
}

export function isNull(value: Operand): IsNull {
  return { type: 'IsNull', value };
}

export function spatial(operator: SpatialOperator, left: PropertyNode, right: SpatialLiteral): SpatialPredicate {
  return { type: 'SpatialPredicate', operator, left, right };
}

export function temporal(operator: TemporalOperator, left: PropertyNode, right: TemporalOperand): TemporalPredicate {
  return { type: 'TemporalPredicate', operator, left, right };
}

export function fn(name: string, args: Operand[]): FunctionCall {
  if (name.length === 0) failInvalidOperand('function name must not be empty', 'function');
  // and / s_intersects などの演算子名は関数名にできない（JSON で演算子と区別がつかなくなる）
  const reserved = JSON_OPERATORS.get(name);
  if (reserved && reserved.kind !== 'function') {
    failInvalidOperand(`'${name}' is an operator, not a function name`, 'function');
  }
  return { type: 'FunctionCall', name, args: [...args] };
}
