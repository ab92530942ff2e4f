// src/json/serializer.ts
// AST -> CQL2-JSON。parseJson の左逆変換。
// キー順は固定（op -> args、GeoJSON は type が先頭）なので JSON.stringify の結果も安定する。

import type {
  AstNode,
  BooleanExpression,
  Geometry,
  InstantLiteral,
  IntervalLiteral,
  Operand,
  SpatialLiteral,
} from '../ast/types.ts';
import { operatorName } from './operators.ts';
import { failEmpty, failUnsupportedNode } from '../serializer/serializerErrors.ts';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function geometryToJson(g: Geometry): JsonValue {
  if (g.type === 'GeometryCollection') {
    return { type: g.type, geometries: g.geometries.map(geometryToJson) };
  }
  return { type: g.type, coordinates: structuredClone(g.coordinates) };
}

function spatialToJson(s: SpatialLiteral): JsonValue {
  return s.type === 'BBoxLiteral' ? { bbox: [...s.extent] } : geometryToJson(s.value);
}

function instantToJson(i: InstantLiteral): JsonValue {
  return i.type === 'TimestampLiteral' ? { timestamp: i.value } : { date: i.value };
}

// 区間の端は裸の文字列、開端は null
function intervalToJson(i: IntervalLiteral): JsonValue {
  return { interval: [i.start ? i.start.value : null, i.end ? i.end.value : null] };
}

function operandToJson(o: Operand): JsonValue {
  switch (o.type) {
    case 'Property':
      return { property: o.name };
    case 'FunctionCall':
      return expressionToJson(o);
    case 'StringLiteral':
    case 'BooleanLiteral':
      return o.value;
    case 'NumberLiteral':
      if (!Number.isFinite(o.value)) return failUnsupportedNode(`number must be finite, got ${o.value}`, o.type);
      return o.value;
    case 'NullLiteral':
      return null;
    case 'TimestampLiteral':
    case 'DateLiteral':
      return instantToJson(o);
    case 'GeometryLiteral':
    case 'BBoxLiteral':
      return spatialToJson(o);
  }
}

function argsOf(e: BooleanExpression): JsonValue[] {
  switch (e.type) {
    case 'Logical':
      return e.children.map(expressionToJson);
    case 'Not':
      return [expressionToJson(e.child)];
    case 'Comparison':
      return [operandToJson(e.left), operandToJson(e.right)];
    case 'Between':
      return [operandToJson(e.value), operandToJson(e.lower), operandToJson(e.upper)];
    case 'Like':
      return [operandToJson(e.value), e.pattern];
    case 'In':
      return [operandToJson(e.value), e.candidates.map(operandToJson)];
    case 'IsNull':
      return [operandToJson(e.value)];
    case 'SpatialPredicate':
      return [operandToJson(e.left), spatialToJson(e.right)];
    case 'TemporalPredicate':
      return [
        operandToJson(e.left),
        e.right.type === 'IntervalLiteral' ? intervalToJson(e.right) : instantToJson(e.right),
      ];
    case 'FunctionCall':
      return e.args.map(operandToJson);
  }
}

function expressionToJson(e: BooleanExpression): JsonValue {
  return { op: operatorName(e), args: argsOf(e) };
}

/** AST を CQL2-JSON の値に変換する */
export function serializeJson(expr: AstNode | null | undefined): JsonValue {
  if (expr == null) return failEmpty('JSON');
  switch (expr.type) {
    case 'Property':
    case 'StringLiteral':
    case 'NumberLiteral':
    case 'BooleanLiteral':
    case 'NullLiteral':
    case 'TimestampLiteral':
    case 'DateLiteral':
    case 'GeometryLiteral':
    case 'BBoxLiteral':
      return operandToJson(expr);
    case 'IntervalLiteral':
      return intervalToJson(expr);
    default:
      return expressionToJson(expr);
  }
}

/** serializeJson の結果を文字列にする。space は JSON.stringify と同じ */
export function stringifyJson(expr: AstNode | null | undefined, space?: number | string): string {
  return JSON.stringify(serializeJson(expr), null, space);
}
