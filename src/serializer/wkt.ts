// src/serializer/wkt.ts
// GeoJSON ジオメトリを WKT 文字列にする。テキスト形式と OData 方言で共有。

import type { Geometry, Position } from '../ast/types.ts';
import { failUnsupportedNode } from './serializerErrors.ts';

function num(n: number): string {
  if (!Number.isFinite(n)) failUnsupportedNode(`coordinate must be finite, got ${n}`, 'GeometryLiteral');
  return String(n);
}

const position = (p: Position): string => p.map(num).join(' ');
const sequence = (ps: Position[]): string => `(${ps.map(position).join(', ')})`;
const sequences = (pss: Position[][]): string => `(${pss.map(sequence).join(', ')})`;

export function toWkt(g: Geometry): string {
  switch (g.type) {
    case 'Point':
      return `POINT(${position(g.coordinates)})`;
    case 'LineString':
      return `LINESTRING${sequence(g.coordinates)}`;
    case 'Polygon':
      return `POLYGON${sequences(g.coordinates)}`;
    case 'MultiPoint':
      return `MULTIPOINT(${g.coordinates.map((p) => `(${position(p)})`).join(', ')})`;
    case 'MultiLineString':
      return `MULTILINESTRING${sequences(g.coordinates)}`;
    case 'MultiPolygon':
      return `MULTIPOLYGON(${g.coordinates.map(sequences).join(', ')})`;
    case 'GeometryCollection':
      return `GEOMETRYCOLLECTION(${g.geometries.map(toWkt).join(', ')})`;
  }
}
