// src/json/operators.ts
// CQL2-JSON の op 名と AST ノード種別の対応表。パース時の検査とシリアライズ時の op 名決定に使う。

import type { BooleanExpression } from '../ast/types.ts';
import { COMPARISON_OPERATORS, SPATIAL_OPERATORS, TEMPORAL_OPERATORS } from '../ast/types.ts';

export type OperatorKind =
  | 'logical'
  | 'not'
  | 'comparison'
  | 'between'
  | 'like'
  | 'in'
  | 'isNull'
  | 'spatial'
  | 'temporal'
  | 'function';

// 数値は固定長、min は下限のみ
export type Arity = number | { min: number };

export interface OperatorSpec {
  kind: OperatorKind;
  arity: Arity;
}

// 組み込みで受け付ける関数
export const BUILTIN_FUNCTIONS = ['casei', 'accenti'] as const;

export const JSON_OPERATORS: ReadonlyMap<string, OperatorSpec> = new Map<string, OperatorSpec>([
  ['and', { kind: 'logical', arity: { min: 1 } }],
  ['or', { kind: 'logical', arity: { min: 1 } }],
  ['not', { kind: 'not', arity: 1 }],
  ...COMPARISON_OPERATORS.map((op): [string, OperatorSpec] => [op, { kind: 'comparison', arity: 2 }]),
  ['between', { kind: 'between', arity: 3 }],
  ['like', { kind: 'like', arity: 2 }],
  ['in', { kind: 'in', arity: 2 }],
  ['isNull', { kind: 'isNull', arity: 1 }],
  ...SPATIAL_OPERATORS.map((op): [string, OperatorSpec] => [`s_${op}`, { kind: 'spatial', arity: 2 }]),
  ...TEMPORAL_OPERATORS.map((op): [string, OperatorSpec] => [`t_${op}`, { kind: 'temporal', arity: 2 }]),
  ...BUILTIN_FUNCTIONS.map((name): [string, OperatorSpec] => [name, { kind: 'function', arity: 1 }]),
]);

export function arityMatches(arity: Arity, count: number): boolean {
  return typeof arity === 'number' ? count === arity : count >= arity.min;
}

export function describeArity(arity: Arity): string {
  return typeof arity === 'number' ? String(arity) : `at least ${arity.min}`;
}

/** 述語ノードに対応する CQL2-JSON の op 名（例: `s_intersects`, `t_metBy`, `isNull`） */
export function operatorName(e: BooleanExpression): string {
  switch (e.type) {
    case 'Comparison':
      return e.operator;
    case 'Logical':
      return e.operator === 'AND' ? 'and' : 'or';
    case 'Not':
      return 'not';
    case 'Between':
      return 'between';
    case 'Like':
      return 'like';
    case 'In':
      return 'in';
    case 'IsNull':
      return 'isNull';
    case 'SpatialPredicate':
      return `s_${e.operator}`;
    case 'TemporalPredicate':
      return `t_${e.operator}`;
    case 'FunctionCall':
      return e.name;
  }
}
