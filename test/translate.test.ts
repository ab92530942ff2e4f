// test/translate.test.ts
import { describe, it, expect } from 'vitest';
import { parseText } from '../src/parser/index.ts';
import { parseJson } from '../src/json/parser.ts';
import { translate } from '../src/transform/translate.ts';
import type { Dialect } from '../src/transform/translate.ts';
import { sqliteDialect, toSelect } from '../src/adapters/sqlite/index.ts';
import { odataDialect } from '../src/adapters/odata/index.ts';
import { UnsupportedOperatorError } from '../src/errors/errors.ts';
import { thrownBy } from './helpers.ts';

const sql = (text: string) => translate(parseText(text), sqliteDialect);
const odata = (text: string) => translate(parseText(text), odataDialect).query;

describe('sqlite dialect', () => {
  it('should build a parameterized SELECT', () => {
    expect(toSelect(parseText('cloud_cover < 20 AND platform = "sentinel-2a"'), 'items')).toEqual({
      sql: 'SELECT * FROM "items" WHERE ("cloud_cover" < ? AND "platform" = ?);',
      params: [20, 'sentinel-2a'],
    });
  });

  it('should bind values in placeholder order', () => {
    expect(sql('depth BETWEEN 10 AND 20 OR id IN (1, 2)')).toEqual({
      query: '("depth" BETWEEN ? AND ? OR "id" IN (?, ?))',
      params: [10, 20, 1, 2],
    });
  });

  it('should write booleans as 1/0 and NULL inline', () => {
    expect(sql('flag = TRUE')).toEqual({ query: '"flag" = ?', params: [1] });
    expect(sql('x = NULL')).toEqual({ query: '"x" = NULL', params: [] });
    expect(sql('NOT x IS NULL')).toEqual({ query: 'NOT ("x" IS NULL)', params: [] });
  });

  it('should translate LIKE and CASEI', () => {
    expect(sql('CASEI(name) LIKE "a%"')).toEqual({ query: 'LOWER("name") LIKE ?', params: ['a%'] });
  });

  it('should pass geometries as GeoJSON', () => {
    expect(sql('footprint S_INTERSECTS POINT(1 2)')).toEqual({
      query: 'ST_Intersects("footprint", GeomFromGeoJSON(?))',
      params: ['{"type":"Point","coordinates":[1,2]}'],
    });
  });

  it('should pass a bbox as a rectangular GeoJSON polygon', () => {
    expect(sql('footprint S_INTERSECTS BBOX(0, 0, 2, 1)')).toEqual({
      query: 'ST_Intersects("footprint", GeomFromGeoJSON(?))',
      params: ['{"type":"Polygon","coordinates":[[[0,0],[2,0],[2,1],[0,1],[0,0]]]}'],
    });
  });

  it('should expand temporal operators over interval bounds', () => {
    expect(sql('datetime T_DURING ["2021-01-01" / "2021-12-31"]')).toEqual({
      query: '("datetime" > ? AND "datetime" < ?)',
      params: ['2021-01-01', '2021-12-31'],
    });
    expect(sql('datetime T_AFTER TIMESTAMP("2021-01-01T00:00:00Z")')).toEqual({
      query: '"datetime" > ?',
      params: ['2021-01-01T00:00:00Z'],
    });
  });

  it('should refuse an open bound the template needs', () => {
    const e = thrownBy(() => sql('datetime T_BEFORE [".." / "2021-12-31"]'), UnsupportedOperatorError);
    expect(e.message).toBe("[sqlite] Unsupported operator 't_before': open interval bound cannot be rendered for {1.start}");
  });

  it('should refuse operators it has no template for', () => {
    const e = thrownBy(() => sql('ACCENTI(city) = "Zurich"'), UnsupportedOperatorError);
    expect(e.code).toBe('E_TRANSLATE_UNSUPPORTED_OPERATOR');
    expect(e.dialect).toBe('sqlite');
    expect(e.operator).toBe('accenti');
    expect(e.message).toBe("[sqlite] Unsupported operator 'accenti'.");
    expect(thrownBy(() => sql('datetime T_MEETS DATE("2021-01-01")'), UnsupportedOperatorError).operator).toBe('t_meets');
  });
});

describe('odata dialect', () => {
  it('should write values inline', () => {
    expect(odata('eo.cloud_cover <= 20 AND platform = "s2"')).toBe("(eo/cloud_cover le 20 and platform eq 's2')");
    expect(odata('name = "O\'Hara"')).toBe("name eq 'O''Hara'");
    expect(odata('x IS NULL')).toBe('x eq null');
    expect(odata('depth BETWEEN 10 AND 20')).toBe('(depth ge 10 and depth le 20)');
    expect(translate(parseText('a = 1'), odataDialect).params).toEqual([]);
  });

  it('should write geometries as geography literals', () => {
    expect(odata('footprint S_INTERSECTS POINT(1 2)')).toBe("geo.intersects(footprint, geography'SRID=4326;POINT(1 2)')");
  });

  it('should write a bbox as a polygon and drop its heights', () => {
    expect(odata('footprint S_INTERSECTS BBOX(0, 0, 2, 1)')).toBe(
      "geo.intersects(footprint, geography'SRID=4326;POLYGON((0 0, 2 0, 2 1, 0 1, 0 0))')",
    );
    expect(odata('footprint S_INTERSECTS BBOX(0, 0, -5, 2, 1, 5)')).toBe(
      "geo.intersects(footprint, geography'SRID=4326;POLYGON((0 0, 2 0, 2 1, 0 1, 0 0))')",
    );
  });

  it('should refuse property names that are not OData identifiers', () => {
    const injected = parseJson({ op: '=', args: [{ property: 'a eq 1 or b' }, 2] });
    const e = thrownBy(() => translate(injected, odataDialect), UnsupportedOperatorError);
    expect(e.message).toBe("[odata] Cannot render property name 'a eq 1 or b'.");
    expect(e.dialect).toBe('odata');

    expect(thrownBy(() => odata('eo:cloud_cover < 20'), UnsupportedOperatorError).message).toBe(
      "[odata] Cannot render property name 'eo:cloud_cover'.",
    );
    expect(thrownBy(() => odata('a..b = 1'), UnsupportedOperatorError).code).toBe('E_TRANSLATE_UNSUPPORTED_OPERATOR');
  });

  it('should refuse LIKE', () => {
    expect(thrownBy(() => odata('name LIKE "a%"'), UnsupportedOperatorError).message).toBe(
      "[odata] Unsupported operator 'like'.",
    );
  });
});

describe('custom dialects', () => {
  it('should use the dialect placeholder', () => {
    const pg: Dialect = { ...sqliteDialect, name: 'pg', placeholder: (i) => `$${i}` };
    expect(translate(parseText('a = 1 AND b = "x"'), pg)).toEqual({
      query: '("a" = $1 AND "b" = $2)',
      params: [1, 'x'],
    });
  });

  it('should report templates that refer to missing arguments', () => {
    const broken: Dialect = { ...sqliteDialect, name: 'broken', operators: { '=': '{0} = {2}' } };
    expect(thrownBy(() => translate(parseText('a = 1'), broken), UnsupportedOperatorError).message).toBe(
      "[broken] Unsupported operator '=': template refers to missing argument {2}",
    );
  });

  it('should refuse an interval used without .start or .end', () => {
    const loose: Dialect = { ...sqliteDialect, name: 'loose', operators: { t_during: '{0} IN {1}' } };
    expect(
      thrownBy(() => translate(parseText('datetime T_DURING ["2021-01-01" / "2021-02-01"]'), loose), UnsupportedOperatorError).message,
    ).toBe("[loose] Unsupported operator 't_during': {1} is an interval; refer to its .start or .end");
  });
});
