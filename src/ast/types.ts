// src/ast/types.ts
// 本ファイルは AST の唯一の正です。パーサ（text/json）・ビルダーはここで定義した型を生成し、
// シリアライザ・flatten・translate はこの型だけを読みます。
// ノードは構築後に変更しません（親参照も持たない木構造）。

// ---- Operators ----

export const COMPARISON_OPERATORS = ['=', '<>', '<', '<=', '>', '>='] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type LogicalOperator = 'AND' | 'OR';

export const SPATIAL_OPERATORS = [
  'intersects',
  'contains',
  'within',
  'equals',
  'disjoint',
  'touches',
  'overlaps',
  'crosses',
] as const;
export type SpatialOperator = (typeof SPATIAL_OPERATORS)[number];

export const TEMPORAL_OPERATORS = [
  'after',
  'before',
  'during',
  'contains',
  'disjoint',
  'equals',
  'meets',
  'metBy',
  'overlaps',
  'overlappedBy',
  'startedBy',
  'starts',
  'finishedBy',
  'finishes',
  'intersects',
] as const;
export type TemporalOperator = (typeof TEMPORAL_OPERATORS)[number];

// ---- Geometry (GeoJSON 形状。評価はしない) ----

// [x, y] または [x, y, z]
export type Position = number[];

export interface PointGeometry {
  type: 'Point';
  coordinates: Position;
}
export interface LineStringGeometry {
  type: 'LineString';
  coordinates: Position[];
}
export interface PolygonGeometry {
  type: 'Polygon';
  coordinates: Position[][];
}
export interface MultiPointGeometry {
  type: 'MultiPoint';
  coordinates: Position[];
}
export interface MultiLineStringGeometry {
  type: 'MultiLineString';
  coordinates: Position[][];
}
export interface MultiPolygonGeometry {
  type: 'MultiPolygon';
  coordinates: Position[][][];
}
export interface GeometryCollection {
  type: 'GeometryCollection';
  geometries: Geometry[];
}

export type Geometry =
  | PointGeometry
  | LineStringGeometry
  | PolygonGeometry
  | MultiPointGeometry
  | MultiLineStringGeometry
  | MultiPolygonGeometry
  | GeometryCollection;

export type GeometryType = Geometry['type'];

// ---- Leaves ----

export interface PropertyNode {
  type: 'Property';
  name: string;
}

export interface StringLiteral {
  type: 'StringLiteral';
  value: string;
}
export interface NumberLiteral {
  type: 'NumberLiteral';
  value: number;
}
export interface BooleanLiteral {
  type: 'BooleanLiteral';
  value: boolean;
}
export interface NullLiteral {
  type: 'NullLiteral';
}
// RFC 3339 の文字列をそのまま保持（往復で表記が変わらないように）
export interface TimestampLiteral {
  type: 'TimestampLiteral';
  value: string;
}
// YYYY-MM-DD
export interface DateLiteral {
  type: 'DateLiteral';
  value: string;
}
export interface GeometryLiteral {
  type: 'GeometryLiteral';
  value: Geometry;
}
// [minx, miny, maxx, maxy] または [minx, miny, minz, maxx, maxy, maxz]（GeoJSON の bbox と同じ並び）
export interface BBoxLiteral {
  type: 'BBoxLiteral';
  extent: number[];
}

// 空間述語の右辺
export type SpatialLiteral = GeometryLiteral | BBoxLiteral;

export type InstantLiteral = TimestampLiteral | DateLiteral;

export type LiteralNode =
  | StringLiteral
  | NumberLiteral
  | BooleanLiteral
  | NullLiteral
  | TimestampLiteral
  | DateLiteral
  | GeometryLiteral
  | BBoxLiteral;

// null は開区間（..）
// 時間述語の右辺にのみ現れる
export interface IntervalLiteral {
  type: 'IntervalLiteral';
  start: InstantLiteral | null;
  end: InstantLiteral | null;
}

export type TemporalOperand = InstantLiteral | IntervalLiteral;

// ---- Expressions ----

// スカラー位置に置けるもの
export type Operand = PropertyNode | LiteralNode | FunctionCall;

export interface Comparison {
  type: 'Comparison';
  operator: ComparisonOperator;
  left: Operand;
  right: Operand;
}

// n-ary。生成側は ast/factory.ts の logical() を通して同種の入れ子を平坦化する
export interface Logical {
  type: 'Logical';
  operator: LogicalOperator;
  children: BooleanExpression[];
}

export interface Not {
  type: 'Not';
  child: BooleanExpression;
}

export interface Between {
  type: 'Between';
  value: Operand;
  lower: Operand;
  upper: Operand;
}

// pattern は % / _ ワイルドカードを含む文字列
export interface Like {
  type: 'Like';
  value: Operand;
  pattern: string;
}

export interface In {
  type: 'In';
  value: Operand;
  candidates: Operand[];
}

export interface IsNull {
  type: 'IsNull';
  value: Operand;
}

export interface SpatialPredicate {
  type: 'SpatialPredicate';
  operator: SpatialOperator;
  left: PropertyNode;
  right: SpatialLiteral;
}

export interface TemporalPredicate {
  type: 'TemporalPredicate';
  operator: TemporalOperator;
  left: PropertyNode;
  right: TemporalOperand;
}

// 固定の演算子集合にない拡張（casei, accenti など）
export interface FunctionCall {
  type: 'FunctionCall';
  name: string;
  args: Operand[];
}

// 末端の述語（論理結合子ではないもの）
export type TerminalPredicate =
  | Comparison
  | Between
  | Like
  | In
  | IsNull
  | SpatialPredicate
  | TemporalPredicate;

// 真偽値を返す位置に置けるもの（フィルタのルート）
export type BooleanExpression = TerminalPredicate | Logical | Not | FunctionCall;

export type Expression = BooleanExpression | PropertyNode | LiteralNode;

export type AstNode = Expression | IntervalLiteral;

export type AstNodeType = AstNode['type'];
