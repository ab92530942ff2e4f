// src/parser/parser.ts
// 目的: tokens.ts のトークンを用いてCSTを生成するChevrotainパーサーを提供。
// 優先順位: NOT > AND > OR（いずれも左結合）。

import { CstParser } from 'chevrotain';
import {
  allTokens,
  And,
  Or,
  Not,
  Like,
  In,
  Is,
  Null,
  Between,
  True,
  False,
  Timestamp,
  DateKeyword,
  Point,
  LineString,
  Polygon,
  MultiPoint,
  MultiLineString,
  MultiPolygon,
  GeometryCollectionTag,
  BBox,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Comma,
  Slash,
  Identifier,
  StringLiteral,
  NumberLiteral,
} from './tokens.ts';
import { ComparisonOperator, SpatialOperator, TemporalOperator, FunctionName } from './categories.ts';

// パーサー本体
export class Cql2TextParser extends CstParser {
  constructor() {
    super(allTokens, {
      // 部分的な木は返さないため回復は無効
      recoveryEnabled: false,
      nodeLocationTracking: 'full',
    });
    this.performSelfAnalysis();
  }

  // トップレベル
  public expression = this.RULE('expression', () => {
    this.SUBRULE(this.orExpression);
  });

  // ORは最も低い優先順位。左結合。
  public orExpression = this.RULE('orExpression', () => {
    this.SUBRULE(this.andExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.andExpression, { LABEL: 'rhs' });
    });
  });

  // AND は OR より高い。左結合。
  public andExpression = this.RULE('andExpression', () => {
    this.SUBRULE(this.notExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.notExpression, { LABEL: 'rhs' });
    });
  });

  // NOT は単項。NOT NOT A のような多重否定も再帰で受ける
  public notExpression = this.RULE('notExpression', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Not);
          this.SUBRULE(this.notExpression, { LABEL: 'argument' });
        },
      },
      { ALT: () => this.SUBRULE(this.atomicExpression) },
    ]);
  });

  public atomicExpression = this.RULE('atomicExpression', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.groupExpression) },
      { ALT: () => this.SUBRULE(this.predicate) },
    ]);
  });

  // ( expr )
  public groupExpression = this.RULE('groupExpression', () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
  });

  // subject の後ろに来る述語の種類で分岐する（左共通部分の括りだし）。
  // 空間/時間述語の subject が Identifier であることは visitor 側で検査する。
  public predicate = this.RULE('predicate', () => {
    this.SUBRULE(this.subject);
    this.OR([
      {
        ALT: () => {
          this.CONSUME(ComparisonOperator);
          this.SUBRULE(this.operand, { LABEL: 'right' });
        },
      },
      {
        ALT: () => {
          this.OPTION(() => this.CONSUME(Not, { LABEL: 'negated' }));
          this.OR2([
            { ALT: () => this.SUBRULE(this.betweenTail) },
            { ALT: () => this.SUBRULE(this.likeTail) },
            { ALT: () => this.SUBRULE(this.inTail) },
          ]);
        },
      },
      {
        ALT: () => {
          this.CONSUME(Is);
          this.OPTION2(() => this.CONSUME2(Not, { LABEL: 'notNull' }));
          this.CONSUME(Null);
        },
      },
      {
        ALT: () => {
          this.CONSUME(SpatialOperator);
          this.SUBRULE(this.spatialLiteral);
        },
      },
      {
        ALT: () => {
          this.CONSUME(TemporalOperator);
          this.SUBRULE(this.temporalOperand);
        },
      },
    ]);
  });

  // BETWEEN lower AND upper
  public betweenTail = this.RULE('betweenTail', () => {
    this.CONSUME(Between);
    this.SUBRULE(this.operand, { LABEL: 'lower' });
    this.CONSUME(And);
    this.SUBRULE2(this.operand, { LABEL: 'upper' });
  });

  // LIKE "pattern"
  public likeTail = this.RULE('likeTail', () => {
    this.CONSUME(Like);
    this.CONSUME(StringLiteral);
  });

  // IN ( a, b, ... )。空リストも受ける
  public inTail = this.RULE('inTail', () => {
    this.CONSUME(In);
    this.CONSUME(LParen);
    this.MANY_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.operand),
    });
    this.CONSUME(RParen);
  });

  // 述語の左辺: Identifier か関数呼び出し
  public subject = this.RULE('subject', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier) },
      { ALT: () => this.SUBRULE(this.functionCall) },
    ]);
  });

  public operand = this.RULE('operand', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier) },
      { ALT: () => this.SUBRULE(this.functionCall) },
      { ALT: () => this.SUBRULE(this.literal) },
    ]);
  });

  // CASEI(x) / ACCENTI(x)
  public functionCall = this.RULE('functionCall', () => {
    this.CONSUME(FunctionName);
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.operand),
    });
    this.CONSUME(RParen);
  });

  // literal: string | number | true | false | null | instant | geometry | bbox
  public literal = this.RULE('literal', () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(NumberLiteral) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Null) },
      { ALT: () => this.SUBRULE(this.instantLiteral) },
      { ALT: () => this.SUBRULE(this.geometryLiteral) },
      { ALT: () => this.SUBRULE(this.bboxLiteral) },
    ]);
  });

  // TIMESTAMP("...") / DATE("...")
  public instantLiteral = this.RULE('instantLiteral', () => {
    this.OR([
      { ALT: () => this.CONSUME(Timestamp) },
      { ALT: () => this.CONSUME(DateKeyword) },
    ]);
    this.CONSUME(LParen);
    this.CONSUME(StringLiteral);
    this.CONSUME(RParen);
  });

  public temporalOperand = this.RULE('temporalOperand', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.intervalLiteral) },
      { ALT: () => this.SUBRULE(this.instantLiteral) },
    ]);
  });

  // [ start / end ]
  public intervalLiteral = this.RULE('intervalLiteral', () => {
    this.CONSUME(LBracket);
    this.SUBRULE(this.intervalBound, { LABEL: 'start' });
    this.CONSUME(Slash);
    this.SUBRULE2(this.intervalBound, { LABEL: 'end' });
    this.CONSUME(RBracket);
  });

  // 区間の端: TIMESTAMP(...) / DATE(...) または裸の文字列（".." は開端）
  public intervalBound = this.RULE('intervalBound', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.instantLiteral) },
      { ALT: () => this.CONSUME(StringLiteral) },
    ]);
  });

  // ---- WKT ----

  // 空間述語の右辺
  public spatialLiteral = this.RULE('spatialLiteral', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.geometryLiteral) },
      { ALT: () => this.SUBRULE(this.bboxLiteral) },
    ]);
  });

  // BBOX(x1, y1, x2, y2)。値の個数（4 か 6）は visitor で検査する
  public bboxLiteral = this.RULE('bboxLiteral', () => {
    this.CONSUME(BBox);
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.CONSUME(NumberLiteral),
    });
    this.CONSUME(RParen);
  });

  public geometryLiteral = this.RULE('geometryLiteral', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.point) },
      { ALT: () => this.SUBRULE(this.lineString) },
      { ALT: () => this.SUBRULE(this.polygon) },
      { ALT: () => this.SUBRULE(this.multiPoint) },
      { ALT: () => this.SUBRULE(this.multiLineString) },
      { ALT: () => this.SUBRULE(this.multiPolygon) },
      { ALT: () => this.SUBRULE(this.geometryCollection) },
    ]);
  });

  public point = this.RULE('point', () => {
    this.CONSUME(Point);
    this.CONSUME(LParen);
    this.SUBRULE(this.position);
    this.CONSUME(RParen);
  });

  public lineString = this.RULE('lineString', () => {
    this.CONSUME(LineString);
    this.SUBRULE(this.coordinateSeq);
  });

  public polygon = this.RULE('polygon', () => {
    this.CONSUME(Polygon);
    this.SUBRULE(this.coordinateSeqList);
  });

  // MULTIPOINT(1 2, 3 4) と MULTIPOINT((1 2), (3 4)) の両方を受ける
  public multiPoint = this.RULE('multiPoint', () => {
    this.CONSUME(MultiPoint);
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => {
        this.OR([
          { ALT: () => this.SUBRULE(this.position) },
          {
            ALT: () => {
              this.CONSUME2(LParen);
              this.SUBRULE2(this.position);
              this.CONSUME2(RParen);
            },
          },
        ]);
      },
    });
    this.CONSUME(RParen);
  });

  public multiLineString = this.RULE('multiLineString', () => {
    this.CONSUME(MultiLineString);
    this.SUBRULE(this.coordinateSeqList);
  });

  public multiPolygon = this.RULE('multiPolygon', () => {
    this.CONSUME(MultiPolygon);
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.coordinateSeqList),
    });
    this.CONSUME(RParen);
  });

  public geometryCollection = this.RULE('geometryCollection', () => {
    this.CONSUME(GeometryCollectionTag);
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.geometryLiteral),
    });
    this.CONSUME(RParen);
  });

  // x y [z]
  public position = this.RULE('position', () => {
    this.CONSUME(NumberLiteral);
    this.CONSUME2(NumberLiteral);
    this.OPTION(() => this.CONSUME3(NumberLiteral));
  });

  // ( x y, x y, ... )
  public coordinateSeq = this.RULE('coordinateSeq', () => {
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.position),
    });
    this.CONSUME(RParen);
  });

  // ( (..), (..) )
  public coordinateSeqList = this.RULE('coordinateSeqList', () => {
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.coordinateSeq),
    });
    this.CONSUME(RParen);
  });
}

// 呼び出しごとに input を差し替えて使い回す（Chevrotain は input 代入で状態をリセットする）
export const textParser = new Cql2TextParser();
