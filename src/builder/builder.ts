// src/builder/builder.ts
// UI などから条件を1つずつ積み上げて AST を組み立てるビルダー。
// 述語メソッドは既存の式と AND で結合し（同種の AND は平坦化）、or() / not() は積み上げた式全体を包む。

import type {
  BooleanExpression,
  ComparisonOperator,
  FunctionCall,
  Geometry,
  InstantLiteral,
  IntervalLiteral,
  Operand,
  PropertyNode,
  SpatialLiteral,
  SpatialOperator,
  TemporalOperand,
  TemporalOperator,
} from '../ast/types.ts';
import type { ScalarValue } from '../ast/factory.ts';
import * as ast from '../ast/factory.ts';
import { OPEN_BOUND, isDateText } from '../ast/guards.ts';
import { isGeometryType } from '../ast/geometry.ts';
import { serializeText } from '../serializer/text.ts';
import { serializeJson } from '../json/serializer.ts';
import type { JsonValue } from '../json/serializer.ts';

export type BuilderValue = ScalarValue | Date | Geometry | Operand;
export type Subject = string | PropertyNode | FunctionCall;
export type InstantValue = string | Date | InstantLiteral;
export type TemporalValue = InstantValue | IntervalLiteral | [InstantValue | null, InstantValue | null];

// Operand ノードと GeoJSON はどちらも type を持つが、値の集合は重ならない
const isOperandNode = (v: Operand | Geometry): v is Operand => !isGeometryType(v.type);

export function toOperand(value: BuilderValue): Operand {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return ast.literal(value);
  }
  if (value instanceof Date) return ast.timestamp(value);
  if (isOperandNode(value)) return value;
  return ast.geometry(value);
}

function toSubject(subject: Subject): PropertyNode | FunctionCall {
  return typeof subject === 'string' ? ast.property(subject) : subject;
}

// 文字列は YYYY-MM-DD なら日付、それ以外は RFC 3339 の日時として検査する
export function toInstant(value: InstantValue): InstantLiteral {
  if (value instanceof Date) return ast.timestamp(value);
  if (typeof value === 'string') return isDateText(value) ? ast.date(value) : ast.timestamp(value);
  return value;
}

function toBound(value: InstantValue | null): InstantLiteral | null {
  return value === null || value === OPEN_BOUND ? null : toInstant(value);
}

function toTemporalOperand(value: TemporalValue): TemporalOperand {
  if (Array.isArray(value)) {
    const [start, end] = value;
    return ast.interval(toBound(start), toBound(end));
  }
  if (typeof value === 'string' || value instanceof Date) return toInstant(value);
  return value;
}

function toSpatialLiteral(value: Geometry | SpatialLiteral): SpatialLiteral {
  return value.type === 'GeometryLiteral' || value.type === 'BBoxLiteral' ? value : ast.geometry(value);
}

type Part = BooleanExpression | FilterBuilder;

export class FilterBuilder {
  private expr: BooleanExpression | undefined;

  // 既存の式と AND で結合する
  private push(node: BooleanExpression): this {
    this.expr = this.expr ? ast.logical('AND', this.expr, node) : node;
    return this;
  }

  private compare(operator: ComparisonOperator, subject: Subject, value: BuilderValue): this {
    return this.push(ast.comparison(operator, toSubject(subject), toOperand(value)));
  }

  equal(subject: Subject, value: BuilderValue): this {
    return this.compare('=', subject, value);
  }

  notEqual(subject: Subject, value: BuilderValue): this {
    return this.compare('<>', subject, value);
  }

  lessThan(subject: Subject, value: BuilderValue): this {
    return this.compare('<', subject, value);
  }

  lessThanOrEqual(subject: Subject, value: BuilderValue): this {
    return this.compare('<=', subject, value);
  }

  greaterThan(subject: Subject, value: BuilderValue): this {
    return this.compare('>', subject, value);
  }

  greaterThanOrEqual(subject: Subject, value: BuilderValue): this {
    return this.compare('>=', subject, value);
  }

  between(subject: Subject, lower: BuilderValue, upper: BuilderValue): this {
    return this.push(ast.between(toSubject(subject), toOperand(lower), toOperand(upper)));
  }

  like(subject: Subject, pattern: string): this {
    return this.push(ast.like(toSubject(subject), pattern));
  }

  in(subject: Subject, values: readonly BuilderValue[]): this {
    return this.push(ast.inList(toSubject(subject), values.map(toOperand)));
  }

  isNull(subject: Subject): this {
    return this.push(ast.isNull(toSubject(subject)));
  }

  isNotNull(subject: Subject): this {
    return this.push(ast.not(ast.isNull(toSubject(subject))));
  }

  spatial(operator: SpatialOperator, property: string, geometry: Geometry | SpatialLiteral): this {
    return this.push(ast.spatial(operator, ast.property(property), toSpatialLiteral(geometry)));
  }

  intersects(property: string, geometry: Geometry | SpatialLiteral): this {
    return this.spatial('intersects', property, geometry);
  }

  // 矩形 [minx, miny, maxx, maxy]（6 値なら高さ込み）と交わる
  bbox(property: string, ...extent: number[]): this {
    return this.spatial('intersects', property, ast.bbox(extent));
  }

  temporal(operator: TemporalOperator, property: string, value: TemporalValue): this {
    return this.push(ast.temporal(operator, ast.property(property), toTemporalOperand(value)));
  }

  // 区間 [start, end] と少しでも重なる（t_intersects）。null / '..' は開端
  anyInteracts(property: string, start: InstantValue | null, end: InstantValue | null): this {
    return this.temporal('intersects', property, [start, end]);
  }

  // 真偽値を返す関数を述語として追加する
  function(name: string, ...args: BuilderValue[]): this {
    return this.push(ast.fn(name, args.map(toOperand)));
  }

  // パース済みの式などをそのまま AND で追加する
  where(expr: BooleanExpression): this {
    return this.push(expr);
  }

  and(...parts: Part[]): this {
    for (const e of expressionsOf(parts)) this.push(e);
    return this;
  }

  or(...parts: Part[]): this {
    const [first, ...rest] = [...(this.expr ? [this.expr] : []), ...expressionsOf(parts)];
    if (first) this.expr = ast.logical('OR', first, ...rest);
    return this;
  }

  // 積み上げた式全体を否定する。空なら何もしない
  not(): this {
    if (this.expr) this.expr = ast.not(this.expr);
    return this;
  }

  build(): BooleanExpression | undefined {
    return this.expr;
  }

  isEmpty(): boolean {
    return this.expr === undefined;
  }

  // 空のときは SerializeError (E_SERIALIZE_EMPTY)
  toText(): string {
    return serializeText(this.expr);
  }

  toJson(): JsonValue {
    return serializeJson(this.expr);
  }
}

function expressionsOf(parts: readonly Part[]): BooleanExpression[] {
  const out: BooleanExpression[] = [];
  for (const p of parts) {
    const e = p instanceof FilterBuilder ? p.build() : p;
    if (e) out.push(e);
  }
  return out;
}
