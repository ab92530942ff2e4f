// src/adapters/sqlite/index.ts

// 目的: AST を SQLite (SpatiaLite) の WHERE 句に変換する方言定義を提供します。
//
// - 値はすべて ? プレースホルダで渡す（NULL のみインライン）。
// - 真偽値は 1 / 0。
// - ジオメトリは GeoJSON 文字列をパラメータにし、GeomFromGeoJSON() で復元する。bbox は矩形ポリゴンにして同じく渡す。
// - ACCENTI は SQLite に相当する関数が無いため未対応。

import type { BooleanExpression } from '../../ast/types.ts';
import { translate } from '../../transform/translate.ts';
import type { Dialect, OperatorTemplate, ParamValue } from '../../transform/translate.ts';
import { serializeJson } from '../../json/serializer.ts';
import { bboxToPolygon } from '../../ast/geometry.ts';

const spatial = (fn: string): string => `${fn}({0}, GeomFromGeoJSON({1}))`;

const operators: Record<string, OperatorTemplate> = {
  '=': '{0} = {1}',
  '<>': '{0} <> {1}',
  '<': '{0} < {1}',
  '<=': '{0} <= {1}',
  '>': '{0} > {1}',
  '>=': '{0} >= {1}',
  and: { template: '({all})', separator: ' AND ' },
  or: { template: '({all})', separator: ' OR ' },
  not: 'NOT ({0})',
  between: '{0} BETWEEN {1} AND {2}',
  like: '{0} LIKE {1}',
  in: { template: '{0} IN ({rest})', separator: ', ' },
  isNull: '{0} IS NULL',
  s_intersects: spatial('ST_Intersects'),
  s_contains: spatial('ST_Contains'),
  s_within: spatial('ST_Within'),
  s_equals: spatial('ST_Equals'),
  s_disjoint: spatial('ST_Disjoint'),
  s_touches: spatial('ST_Touches'),
  s_overlaps: spatial('ST_Overlaps'),
  s_crosses: spatial('ST_Crosses'),
  // 日時は ISO 文字列のまま比較する（列も ISO 文字列で保存されている前提）
  t_after: '{0} > {1.end}',
  t_before: '{0} < {1.start}',
  t_equals: '{0} = {1}',
  t_during: '({0} > {1.start} AND {0} < {1.end})',
  t_intersects: '({0} >= {1.start} AND {0} <= {1.end})',
  t_disjoint: '({0} < {1.start} OR {0} > {1.end})',
  casei: 'LOWER({0})',
};

export const sqliteDialect: Dialect = {
  name: 'sqlite',
  operators,
  // ダブルクォートで識別子を囲む
  property: (name) => `"${name.replace(/"/g, '""')}"`,
  literal(node, ctx) {
    switch (node.type) {
      case 'StringLiteral':
      case 'NumberLiteral':
      case 'TimestampLiteral':
      case 'DateLiteral':
        return ctx.bind(node.value);
      case 'BooleanLiteral':
        return ctx.bind(node.value ? 1 : 0);
      case 'NullLiteral':
        return 'NULL';
      case 'GeometryLiteral':
        return ctx.bind(JSON.stringify(serializeJson(node)));
      case 'BBoxLiteral':
        return ctx.bind(JSON.stringify(serializeJson({ type: 'GeometryLiteral', value: bboxToPolygon(node.extent) })));
    }
  },
};

export interface SqlQuery {
  sql: string;
  params: ParamValue[];
}

// テーブル全体に対する SELECT 文を組み立てる
export function toSelect(expr: BooleanExpression, table: string): SqlQuery {
  const { query, params } = translate(expr, sqliteDialect);
  const sql = `SELECT * FROM ${sqliteDialect.property(table)} WHERE ${query};`;
  return { sql, params };
}
