// src/parser/visitor.ts
// 目的: ChevrotainのCSTをASTへ変換するVisitor実装
// 命名規約: メソッド名はCSTルール名に一致。
// ctx は CstChildrenDictionary のまま受け、各メソッドを直接呼び出して型付きの値を返す
// （this.visit の戻り値は型を持たないため使わない）。

import type { CstChildrenDictionary, CstElement, CstNode, IToken } from 'chevrotain';
import type {
  BBoxLiteral,
  BooleanExpression,
  FunctionCall,
  Geometry,
  InstantLiteral,
  IntervalLiteral,
  LiteralNode,
  Operand,
  Position,
  PropertyNode,
  SpatialLiteral,
  SpatialOperator,
  TemporalOperand,
  TemporalOperator,
} from '../ast/types.ts';
import { SPATIAL_OPERATORS, TEMPORAL_OPERATORS } from '../ast/types.ts';
import { OPEN_BOUND, isComparisonOperator, isDateText, isTimestampText } from '../ast/guards.ts';
import * as ast from '../ast/factory.ts';
import { textParser } from './parser.ts';
import { failGenericSyntax, failInvalidLiteral, failUnexpectedToken } from './parserErrors.ts';

// ---- CST アクセス用の小さなヘルパー ----

const isCstNode = (el: CstElement): el is CstNode => 'children' in el;

function nodesOf(ctx: CstChildrenDictionary, key: string): CstNode[] {
  return (ctx[key] ?? []).filter(isCstNode);
}

function tokensOf(ctx: CstChildrenDictionary, key: string): IToken[] {
  return (ctx[key] ?? []).filter((el): el is IToken => !isCstNode(el));
}

function firstNode(ctx: CstChildrenDictionary, key: string): CstChildrenDictionary {
  const [node] = nodesOf(ctx, key);
  if (!node) return failGenericSyntax(`CST node '${key}' not found`);
  return node.children;
}

function optionalNode(ctx: CstChildrenDictionary, key: string): CstChildrenDictionary | undefined {
  return nodesOf(ctx, key)[0]?.children;
}

function firstToken(ctx: CstChildrenDictionary, key: string): IToken | undefined {
  return tokensOf(ctx, key)[0];
}

function requireToken(ctx: CstChildrenDictionary, key: string): IToken {
  const token = firstToken(ctx, key);
  if (!token) return failGenericSyntax(`CST token '${key}' not found`);
  return token;
}

// ---- トークン値の復元 ----

const ESCAPES: Record<string, string> = { n: '\n', r: '\r', t: '\t' };

// トークンのimage（"..."）から両端のダブルクオートを外し、エスケープを復元
// \" \\ \n \r \t。それ以外の \x は x として扱う
function unquote(token: IToken): string {
  return token.image.slice(1, -1).replace(/\\([\s\S])/g, (_, ch: string) => ESCAPES[ch] ?? ch);
}

function toNumber(token: IToken): number {
  const value = Number(token.image);
  if (!Number.isFinite(value)) failInvalidLiteral(token, 'number is out of range');
  return value;
}

// 'S_INTERSECTS' -> 'intersects'
function spatialOperatorOf(token: IToken): SpatialOperator {
  const op = SPATIAL_OPERATORS.find((o) => `s_${o}`.toLowerCase() === token.image.toLowerCase());
  return op ?? failUnexpectedToken(token, 'a spatial operator');
}

// 'T_METBY' -> 'metBy'
function temporalOperatorOf(token: IToken): TemporalOperator {
  const op = TEMPORAL_OPERATORS.find((o) => `t_${o}`.toLowerCase() === token.image.toLowerCase());
  return op ?? failUnexpectedToken(token, 'a temporal operator');
}

// パーサーのインスタンスからビジターのベースクラスを取得
const BaseCstVisitor = textParser.getBaseCstVisitorConstructor();

export class AstBuilderVisitor extends BaseCstVisitor {
  constructor() {
    super();
    // 実装されたVisitorメソッドがパーサーの全ルールをカバーしているか検証
    this.validateVisitor();
  }

  expression(ctx: CstChildrenDictionary): BooleanExpression {
    return this.orExpression(firstNode(ctx, 'orExpression'));
  }

  orExpression(ctx: CstChildrenDictionary): BooleanExpression {
    const [first, ...rest] = [...nodesOf(ctx, 'lhs'), ...nodesOf(ctx, 'rhs')].map((n) =>
      this.andExpression(n.children),
    );
    if (!first) return failGenericSyntax('orExpression without operands');
    return ast.logical('OR', first, ...rest);
  }

  andExpression(ctx: CstChildrenDictionary): BooleanExpression {
    const [first, ...rest] = [...nodesOf(ctx, 'lhs'), ...nodesOf(ctx, 'rhs')].map((n) =>
      this.notExpression(n.children),
    );
    if (!first) return failGenericSyntax('andExpression without operands');
    return ast.logical('AND', first, ...rest);
  }

  notExpression(ctx: CstChildrenDictionary): BooleanExpression {
    const argument = optionalNode(ctx, 'argument');
    if (argument) return ast.not(this.notExpression(argument));
    return this.atomicExpression(firstNode(ctx, 'atomicExpression'));
  }

  atomicExpression(ctx: CstChildrenDictionary): BooleanExpression {
    const group = optionalNode(ctx, 'groupExpression');
    if (group) return this.groupExpression(group);
    return this.predicate(firstNode(ctx, 'predicate'));
  }

  groupExpression(ctx: CstChildrenDictionary): BooleanExpression {
    return this.expression(firstNode(ctx, 'expression'));
  }

  predicate(ctx: CstChildrenDictionary): BooleanExpression {
    const subject = this.subject(firstNode(ctx, 'subject'));

    // subject <op> operand
    const opToken = firstToken(ctx, 'ComparisonOperator');
    if (opToken) {
      const op = opToken.image;
      if (!isComparisonOperator(op)) return failUnexpectedToken(opToken, 'a comparison operator');
      return ast.comparison(op, subject, this.operand(firstNode(ctx, 'right')));
    }

    // subject IS [NOT] NULL
    if (firstToken(ctx, 'Is')) {
      const node = ast.isNull(subject);
      return firstToken(ctx, 'notNull') ? ast.not(node) : node;
    }

    const spatialToken = firstToken(ctx, 'SpatialOperator');
    if (spatialToken) {
      if (subject.type !== 'Property') return failUnexpectedToken(spatialToken, 'a property name before it');
      return ast.spatial(
        spatialOperatorOf(spatialToken),
        subject,
        this.spatialLiteral(firstNode(ctx, 'spatialLiteral')),
      );
    }

    const temporalToken = firstToken(ctx, 'TemporalOperator');
    if (temporalToken) {
      if (subject.type !== 'Property') return failUnexpectedToken(temporalToken, 'a property name before it');
      return ast.temporal(
        temporalOperatorOf(temporalToken),
        subject,
        this.temporalOperand(firstNode(ctx, 'temporalOperand')),
      );
    }

    // subject [NOT] BETWEEN / LIKE / IN
    const node = this.rangePredicate(ctx, subject);
    return firstToken(ctx, 'negated') ? ast.not(node) : node;
  }

  private rangePredicate(ctx: CstChildrenDictionary, subject: PropertyNode | FunctionCall): BooleanExpression {
    const between = optionalNode(ctx, 'betweenTail');
    if (between) {
      const [lower, upper] = this.betweenTail(between);
      return ast.between(subject, lower, upper);
    }
    const like = optionalNode(ctx, 'likeTail');
    if (like) return ast.like(subject, this.likeTail(like));
    return ast.inList(subject, this.inTail(firstNode(ctx, 'inTail')));
  }

  betweenTail(ctx: CstChildrenDictionary): [Operand, Operand] {
    return [this.operand(firstNode(ctx, 'lower')), this.operand(firstNode(ctx, 'upper'))];
  }

  likeTail(ctx: CstChildrenDictionary): string {
    return unquote(requireToken(ctx, 'StringLiteral'));
  }

  inTail(ctx: CstChildrenDictionary): Operand[] {
    return nodesOf(ctx, 'operand').map((n) => this.operand(n.children));
  }

  subject(ctx: CstChildrenDictionary): PropertyNode | FunctionCall {
    const id = firstToken(ctx, 'Identifier');
    if (id) return ast.property(id.image);
    return this.functionCall(firstNode(ctx, 'functionCall'));
  }

  operand(ctx: CstChildrenDictionary): Operand {
    const id = firstToken(ctx, 'Identifier');
    if (id) return ast.property(id.image);
    const call = optionalNode(ctx, 'functionCall');
    if (call) return this.functionCall(call);
    return this.literal(firstNode(ctx, 'literal'));
  }

  // 関数名は JSON 形式に合わせて小文字で保持する（CASEI -> casei）
  functionCall(ctx: CstChildrenDictionary): FunctionCall {
    const name = requireToken(ctx, 'FunctionName').image.toLowerCase();
    return ast.fn(
      name,
      nodesOf(ctx, 'operand').map((n) => this.operand(n.children)),
    );
  }

  literal(ctx: CstChildrenDictionary): LiteralNode {
    const str = firstToken(ctx, 'StringLiteral');
    if (str) return ast.literal(unquote(str));
    const num = firstToken(ctx, 'NumberLiteral');
    if (num) return ast.literal(toNumber(num));
    if (firstToken(ctx, 'True')) return ast.literal(true);
    if (firstToken(ctx, 'False')) return ast.literal(false);
    if (firstToken(ctx, 'Null')) return ast.literal(null);
    const instant = optionalNode(ctx, 'instantLiteral');
    if (instant) return this.instantLiteral(instant);
    const bbox = optionalNode(ctx, 'bboxLiteral');
    if (bbox) return this.bboxLiteral(bbox);
    return ast.geometry(this.geometryLiteral(firstNode(ctx, 'geometryLiteral')));
  }

  instantLiteral(ctx: CstChildrenDictionary): InstantLiteral {
    const token = requireToken(ctx, 'StringLiteral');
    const text = unquote(token);
    if (firstToken(ctx, 'Timestamp')) {
      if (!isTimestampText(text)) failInvalidLiteral(token, 'expected an RFC 3339 timestamp');
      return ast.timestamp(text);
    }
    if (!isDateText(text)) failInvalidLiteral(token, 'expected a date (YYYY-MM-DD)');
    return ast.date(text);
  }

  temporalOperand(ctx: CstChildrenDictionary): TemporalOperand {
    const interval = optionalNode(ctx, 'intervalLiteral');
    if (interval) return this.intervalLiteral(interval);
    return this.instantLiteral(firstNode(ctx, 'instantLiteral'));
  }

  intervalLiteral(ctx: CstChildrenDictionary): IntervalLiteral {
    return ast.interval(this.intervalBound(firstNode(ctx, 'start')), this.intervalBound(firstNode(ctx, 'end')));
  }

  intervalBound(ctx: CstChildrenDictionary): InstantLiteral | null {
    const instant = optionalNode(ctx, 'instantLiteral');
    if (instant) return this.instantLiteral(instant);
    const token = requireToken(ctx, 'StringLiteral');
    const text = unquote(token);
    if (text === OPEN_BOUND) return null;
    if (isDateText(text)) return ast.date(text);
    if (isTimestampText(text)) return ast.timestamp(text);
    return failInvalidLiteral(token, `expected a timestamp, a date or "${OPEN_BOUND}"`);
  }

  // ---- WKT ----

  spatialLiteral(ctx: CstChildrenDictionary): SpatialLiteral {
    const bbox = optionalNode(ctx, 'bboxLiteral');
    if (bbox) return this.bboxLiteral(bbox);
    return ast.geometry(this.geometryLiteral(firstNode(ctx, 'geometryLiteral')));
  }

  bboxLiteral(ctx: CstChildrenDictionary): BBoxLiteral {
    const values = tokensOf(ctx, 'NumberLiteral');
    if (values.length !== 4 && values.length !== 6) {
      failInvalidLiteral(requireToken(ctx, 'BBox'), `expected 4 or 6 numbers, got ${values.length}`);
    }
    return ast.bbox(values.map(toNumber));
  }

  geometryLiteral(ctx: CstChildrenDictionary): Geometry {
    const point = optionalNode(ctx, 'point');
    if (point) return this.point(point);
    const lineString = optionalNode(ctx, 'lineString');
    if (lineString) return this.lineString(lineString);
    const polygon = optionalNode(ctx, 'polygon');
    if (polygon) return this.polygon(polygon);
    const multiPoint = optionalNode(ctx, 'multiPoint');
    if (multiPoint) return this.multiPoint(multiPoint);
    const multiLineString = optionalNode(ctx, 'multiLineString');
    if (multiLineString) return this.multiLineString(multiLineString);
    const multiPolygon = optionalNode(ctx, 'multiPolygon');
    if (multiPolygon) return this.multiPolygon(multiPolygon);
    return this.geometryCollection(firstNode(ctx, 'geometryCollection'));
  }

  point(ctx: CstChildrenDictionary): Geometry {
    return { type: 'Point', coordinates: this.position(firstNode(ctx, 'position')) };
  }

  lineString(ctx: CstChildrenDictionary): Geometry {
    return { type: 'LineString', coordinates: this.coordinateSeq(firstNode(ctx, 'coordinateSeq')) };
  }

  polygon(ctx: CstChildrenDictionary): Geometry {
    return { type: 'Polygon', coordinates: this.coordinateSeqList(firstNode(ctx, 'coordinateSeqList')) };
  }

  multiPoint(ctx: CstChildrenDictionary): Geometry {
    return { type: 'MultiPoint', coordinates: nodesOf(ctx, 'position').map((n) => this.position(n.children)) };
  }

  multiLineString(ctx: CstChildrenDictionary): Geometry {
    return { type: 'MultiLineString', coordinates: this.coordinateSeqList(firstNode(ctx, 'coordinateSeqList')) };
  }

  multiPolygon(ctx: CstChildrenDictionary): Geometry {
    return {
      type: 'MultiPolygon',
      coordinates: nodesOf(ctx, 'coordinateSeqList').map((n) => this.coordinateSeqList(n.children)),
    };
  }

  geometryCollection(ctx: CstChildrenDictionary): Geometry {
    return {
      type: 'GeometryCollection',
      geometries: nodesOf(ctx, 'geometryLiteral').map((n) => this.geometryLiteral(n.children)),
    };
  }

  position(ctx: CstChildrenDictionary): Position {
    return tokensOf(ctx, 'NumberLiteral').map(toNumber);
  }

  coordinateSeq(ctx: CstChildrenDictionary): Position[] {
    return nodesOf(ctx, 'position').map((n) => this.position(n.children));
  }

  coordinateSeqList(ctx: CstChildrenDictionary): Position[][] {
    return nodesOf(ctx, 'coordinateSeq').map((n) => this.coordinateSeq(n.children));
  }
}

// ビジターのシングルトンインスタンスをエクスポート
export const astBuilderVisitor = new AstBuilderVisitor();
