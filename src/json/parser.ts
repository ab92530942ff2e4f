// src/json/parser.ts
// CQL2-JSON -> AST。op 名で JSON_OPERATORS を引き、引数の数と形を検査してからノードを作る。
// オペランドはキーを一度見て種類を決める（property / op / timestamp / date / interval / GeoJSON / bbox）。

import type {
  BBoxLiteral,
  BooleanExpression,
  ComparisonOperator,
  FunctionCall,
  InstantLiteral,
  IntervalLiteral,
  Operand,
  PropertyNode,
  SpatialLiteral,
  SpatialOperator,
  TemporalOperand,
  TemporalOperator,
} from '../ast/types.ts';
import {
  OPEN_BOUND,
  isComparisonOperator,
  isDateText,
  isPlainObject,
  isSpatialOperator,
  isTemporalOperator,
  isTimestampText,
} from '../ast/guards.ts';
import { isGeometryType, toGeometry } from '../ast/geometry.ts';
import * as ast from '../ast/factory.ts';
import { attempt } from '../errors/errors.ts';
import type { Result } from '../errors/errors.ts';
import { JSON_OPERATORS, arityMatches, describeArity } from './operators.ts';
import type { OperatorSpec } from './operators.ts';
import { describeValue, failArity, failInvalidJson, failOperand, failUnknownOp } from './jsonErrors.ts';

export interface JsonParseOptions {
  /** 組み込み（casei, accenti）以外に受け付ける関数名。引数の数は問わない */
  functions?: readonly string[];
}

interface Ctx {
  functions: ReadonlySet<string>;
}

const ANY_ARITY: OperatorSpec = { kind: 'function', arity: { min: 0 } };

/**
 * CQL2-JSON を AST に変換する。文字列を渡した場合は先に JSON.parse する。
 *
 * @throws SemanticError 不正な JSON、未知の op、引数の数や形が合わない場合
 */
export function parseJson(input: unknown, options: JsonParseOptions = {}): BooleanExpression {
  let value: unknown = input;
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      return failInvalidJson(`Input is not valid JSON: ${reason}`);
    }
  }
  const ctx: Ctx = { functions: new Set(options.functions ?? []) };
  if (!isPlainObject(value) || !('op' in value)) {
    return failInvalidJson(`Expected an {"op", "args"} object at the root, got ${describeValue(value)}`);
  }
  return parseExpression(value, ctx);
}

export function tryParseJson(input: unknown, options?: JsonParseOptions): Result<BooleanExpression> {
  return attempt(() => parseJson(input, options));
}

function lookup(op: string, ctx: Ctx): OperatorSpec {
  const spec = JSON_OPERATORS.get(op);
  if (spec) return spec;
  if (ctx.functions.has(op)) return ANY_ARITY;
  return failUnknownOp(op);
}

function parseExpression(obj: Record<string, unknown>, ctx: Ctx): BooleanExpression {
  const { op } = obj;
  if (typeof op !== 'string') return failInvalidJson(`"op" must be a string, got ${describeValue(op)}`);
  const spec = lookup(op, ctx);
  if (!Array.isArray(obj.args)) {
    return failInvalidJson(`"args" of '${op}' must be an array, got ${describeValue(obj.args)}`);
  }
  const args: unknown[] = obj.args;
  if (!arityMatches(spec.arity, args.length)) return failArity(op, describeArity(spec.arity), args.length);

  switch (spec.kind) {
    case 'logical': {
      const [first, ...rest] = args.map((a) => booleanArg(op, a, ctx));
      if (!first) return failArity(op, describeArity(spec.arity), 0);
      return ast.logical(op === 'and' ? 'AND' : 'OR', first, ...rest);
    }
    case 'not':
      return ast.not(booleanArg(op, args[0], ctx));
    case 'comparison':
      return ast.comparison(comparisonOp(op), subject(op, args[0], ctx), operand(op, args[1], ctx));
    case 'between':
      return ast.between(subject(op, args[0], ctx), operand(op, args[1], ctx), operand(op, args[2], ctx));
    case 'like': {
      const pattern = args[1];
      if (typeof pattern !== 'string') return failOperand(op, 'a string pattern', describeValue(pattern));
      return ast.like(subject(op, args[0], ctx), pattern);
    }
    case 'in': {
      const list = args[1];
      if (!Array.isArray(list)) return failOperand(op, 'an array of candidates', describeValue(list));
      const candidates: unknown[] = list;
      return ast.inList(
        subject(op, args[0], ctx),
        candidates.map((c) => operand(op, c, ctx)),
      );
    }
    case 'isNull':
      return ast.isNull(subject(op, args[0], ctx));
    case 'spatial':
      return ast.spatial(spatialOp(op), propertyArg(op, args[0]), spatialArg(op, args[1]));
    case 'temporal':
      return ast.temporal(temporalOp(op), propertyArg(op, args[0]), temporalArg(op, args[1]));
    case 'function':
      return functionCall(op, args, ctx);
  }
}

function comparisonOp(op: string): ComparisonOperator {
  return isComparisonOperator(op) ? op : failUnknownOp(op);
}

function spatialOp(op: string): SpatialOperator {
  const name = op.slice('s_'.length);
  return isSpatialOperator(name) ? name : failUnknownOp(op);
}

function temporalOp(op: string): TemporalOperator {
  const name = op.slice('t_'.length);
  return isTemporalOperator(name) ? name : failUnknownOp(op);
}

function functionCall(name: string, args: unknown[], ctx: Ctx): FunctionCall {
  return ast.fn(
    name,
    args.map((a) => operand(name, a, ctx)),
  );
}

// and/or/not の引数: 入れ子の式
function booleanArg(op: string, value: unknown, ctx: Ctx): BooleanExpression {
  if (isPlainObject(value) && 'op' in value) return parseExpression(value, ctx);
  return failOperand(op, 'a nested expression', describeValue(value));
}

// 述語の第1引数: プロパティ参照か関数呼び出し
function subject(op: string, value: unknown, ctx: Ctx): PropertyNode | FunctionCall {
  const node = operand(op, value, ctx);
  if (node.type === 'Property' || node.type === 'FunctionCall') return node;
  return failOperand(op, 'a property reference or a function call as the first argument', describeValue(value));
}

function propertyArg(op: string, value: unknown): PropertyNode {
  if (isPlainObject(value) && typeof value.property === 'string' && value.property.length > 0) {
    return ast.property(value.property);
  }
  return failOperand(op, 'a property reference as the first argument', describeValue(value));
}

// {"bbox": [minx, miny, maxx, maxy]}（6 値の 3 次元版も可）
function bboxOf(op: string, value: Record<string, unknown>): BBoxLiteral {
  const extent = value.bbox;
  if (
    !Array.isArray(extent) ||
    (extent.length !== 4 && extent.length !== 6) ||
    !extent.every((n): n is number => typeof n === 'number' && Number.isFinite(n))
  ) {
    return failOperand(op, 'a bbox of 4 or 6 finite numbers', describeValue(extent));
  }
  return ast.bbox(extent);
}

function spatialArg(op: string, value: unknown): SpatialLiteral {
  if (isPlainObject(value) && 'bbox' in value && !('type' in value)) return bboxOf(op, value);
  const g = toGeometry(value);
  if (!g) return failOperand(op, 'a GeoJSON geometry or a bbox as the second argument', describeValue(value));
  return ast.geometry(g);
}

function instantOf(value: Record<string, unknown>): InstantLiteral | undefined {
  const { timestamp, date } = value;
  if (typeof timestamp === 'string' && isTimestampText(timestamp)) return ast.timestamp(timestamp);
  if (typeof date === 'string' && isDateText(date)) return ast.date(date);
  return undefined;
}

// 区間の端: null / ".." は開端、文字列は日付か日時、{timestamp} / {date} も可
function intervalBound(op: string, value: unknown): InstantLiteral | null {
  if (value === null || value === OPEN_BOUND) return null;
  if (typeof value === 'string') {
    if (isDateText(value)) return ast.date(value);
    if (isTimestampText(value)) return ast.timestamp(value);
  } else if (isPlainObject(value)) {
    const instant = instantOf(value);
    if (instant) return instant;
  }
  return failOperand(op, `an interval bound (timestamp, date, null or "${OPEN_BOUND}")`, describeValue(value));
}

function intervalOf(op: string, value: unknown): IntervalLiteral | undefined {
  if (!isPlainObject(value) || !('interval' in value)) return undefined;
  if (!Array.isArray(value.interval) || value.interval.length !== 2) {
    return failOperand(op, 'an interval of exactly two bounds', describeValue(value.interval));
  }
  const bounds: unknown[] = value.interval;
  return ast.interval(intervalBound(op, bounds[0]), intervalBound(op, bounds[1]));
}

function temporalArg(op: string, value: unknown): TemporalOperand {
  const interval = intervalOf(op, value);
  if (interval) return interval;
  if (isPlainObject(value)) {
    const instant = instantOf(value);
    if (instant) return instant;
  }
  return failOperand(op, 'a timestamp, date or interval as the second argument', describeValue(value));
}

// スカラー位置の値。配列は in の候補リスト以外では受けない
function operand(op: string, value: unknown, ctx: Ctx): Operand {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return ast.literal(value);
  if (typeof value === 'number') return ast.literal(value);
  if (!isPlainObject(value)) return failOperand(op, 'a scalar, property, literal or nested expression', describeValue(value));

  if ('op' in value) {
    const nested = parseExpression(value, ctx);
    if (nested.type === 'FunctionCall') return nested;
    return failOperand(op, 'a function call in an operand position', `'${String(value.op)}'`);
  }
  if ('property' in value) return propertyArg(op, value);
  if ('timestamp' in value || 'date' in value) {
    const instant = instantOf(value);
    if (instant) return instant;
    return failOperand(op, 'an RFC 3339 timestamp or a YYYY-MM-DD date', describeValue(value));
  }
  if ('interval' in value) {
    return failOperand(op, 'an interval only as the second argument of a temporal operator', 'an interval');
  }
  if (isGeometryType(value.type)) return spatialArg(op, value);
  if ('bbox' in value) return bboxOf(op, value);
  return failOperand(op, 'a scalar, property, literal or nested expression', describeValue(value));
}
