// src/ast/geometry.ts
// GeoJSON 形状の構造チェック。幾何演算は行わず、type と座標配列の入れ子の深さだけを検証する。
// 入力をそのまま保持せず、必ず新しい配列へコピーして返す。

import type { Geometry, PolygonGeometry, Position } from './types.ts';
import { isPlainObject } from './guards.ts';
import { failInvalidOperand } from './factoryErrors.ts';

export const GEOMETRY_TYPES = [
  'Point',
  'LineString',
  'Polygon',
  'MultiPoint',
  'MultiLineString',
  'MultiPolygon',
  'GeometryCollection',
] as const;

export function isGeometryType(s: unknown): s is Geometry['type'] {
  return typeof s === 'string' && GEOMETRY_TYPES.some((t) => t === s);
}

function toPosition(v: unknown): Position | undefined {
  if (!Array.isArray(v) || (v.length !== 2 && v.length !== 3)) return undefined;
  const out: number[] = [];
  for (const n of v) {
    if (typeof n !== 'number' || !Number.isFinite(n)) return undefined;
    out.push(n);
  }
  return out;
}

// 空でない配列の各要素を変換。1つでも失敗したら undefined
function listOf<T>(v: unknown, item: (x: unknown) => T | undefined): T[] | undefined {
  if (!Array.isArray(v) || v.length === 0) return undefined;
  const out: T[] = [];
  for (const x of v) {
    const converted = item(x);
    if (converted === undefined) return undefined;
    out.push(converted);
  }
  return out;
}

const toPositions = (v: unknown) => listOf(v, toPosition);
const toRings = (v: unknown) => listOf(v, toPositions);
const toPolygons = (v: unknown) => listOf(v, toRings);

/**
 * 値が GeoJSON ジオメトリの形をしていればコピーを返す。そうでなければ undefined。
 * Feature / FeatureCollection / bbox は対象外。
 */
export function toGeometry(value: unknown): Geometry | undefined {
  if (!isPlainObject(value)) return undefined;
  const coordinates = value.coordinates;
  switch (value.type) {
    case 'Point': {
      const c = toPosition(coordinates);
      return c ? { type: 'Point', coordinates: c } : undefined;
    }
    case 'LineString': {
      const c = toPositions(coordinates);
      return c ? { type: 'LineString', coordinates: c } : undefined;
    }
    case 'MultiPoint': {
      const c = toPositions(coordinates);
      return c ? { type: 'MultiPoint', coordinates: c } : undefined;
    }
    case 'Polygon': {
      const c = toRings(coordinates);
      return c ? { type: 'Polygon', coordinates: c } : undefined;
    }
    case 'MultiLineString': {
      const c = toRings(coordinates);
      return c ? { type: 'MultiLineString', coordinates: c } : undefined;
    }
    case 'MultiPolygon': {
      const c = toPolygons(coordinates);
      return c ? { type: 'MultiPolygon', coordinates: c } : undefined;
    }
    case 'GeometryCollection': {
      const geometries = listOf(value.geometries, toGeometry);
      return geometries ? { type: 'GeometryCollection', geometries } : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * bbox を反時計回りの矩形ポリゴンにする。6 値（3 次元）の場合は高さを捨てる。
 * bbox を直接扱えない出力先（GeoJSON パラメータ、WKT）で使う。
 */
export function bboxToPolygon(extent: readonly number[]): PolygonGeometry {
  const [minx, miny, maxx, maxy] = extent.length === 6 ? [extent[0], extent[1], extent[3], extent[4]] : extent;
  if (minx === undefined || miny === undefined || maxx === undefined || maxy === undefined) {
    return failInvalidOperand(`bbox needs 4 or 6 numbers, got ${extent.length}`, 'bbox');
  }
  return {
    type: 'Polygon',
    coordinates: [
      [
        [minx, miny],
        [maxx, miny],
        [maxx, maxy],
        [minx, maxy],
        [minx, miny],
      ],
    ],
  };
}
