// test/parser.test.ts
import { describe, it, expect } from 'vitest';
import { parseText, tokenize, tryParseText } from '../src/parser/index.ts';
import { LexError, TextSyntaxError } from '../src/errors/errors.ts';
import { isDateText, isTimestampText } from '../src/ast/guards.ts';
import { thrownBy } from './helpers.ts';

describe('text parser', () => {
  it('should parse a single comparison', () => {
    expect(parseText('temperature > 30.5')).toEqual({
      type: 'Comparison',
      operator: '>',
      left: { type: 'Property', name: 'temperature' },
      right: { type: 'NumberLiteral', value: 30.5 },
    });
  });

  it('should respect NOT > AND > OR precedence', () => {
    expect(parseText('a = 1 OR b = 2 AND NOT c = 3')).toEqual({
      type: 'Logical',
      operator: 'OR',
      children: [
        { type: 'Comparison', operator: '=', left: { type: 'Property', name: 'a' }, right: { type: 'NumberLiteral', value: 1 } },
        {
          type: 'Logical',
          operator: 'AND',
          children: [
            { type: 'Comparison', operator: '=', left: { type: 'Property', name: 'b' }, right: { type: 'NumberLiteral', value: 2 } },
            {
              type: 'Not',
              child: { type: 'Comparison', operator: '=', left: { type: 'Property', name: 'c' }, right: { type: 'NumberLiteral', value: 3 } },
            },
          ],
        },
      ],
    });
  });

  it('should flatten chains and nested groups of the same operator', () => {
    const chain = parseText('a = 1 AND b = 2 AND c = 3');
    expect(chain.type === 'Logical' && chain.children.length).toBe(3);

    const nested = parseText('a = 1 AND (b = 2 AND c = 3)');
    expect(nested).toEqual(chain);
  });

  it('should keep a parenthesized OR under AND', () => {
    const e = parseText('(a = 1 OR b = 2) AND c = 3');
    expect(e.type).toBe('Logical');
    if (e.type !== 'Logical') return;
    expect(e.operator).toBe('AND');
    expect(e.children[0]?.type).toBe('Logical');
  });

  it('should match keywords case-insensitively', () => {
    expect(parseText('x = 1 and y = 2')).toEqual(parseText('x = 1 AND y = 2'));
  });

  it('should not split identifiers that start with a keyword', () => {
    expect(parseText('android = "x"')).toEqual({
      type: 'Comparison',
      operator: '=',
      left: { type: 'Property', name: 'android' },
      right: { type: 'StringLiteral', value: 'x' },
    });
    const e = parseText('order_no = 1 AND index = 2');
    expect(e.type === 'Logical' && e.children.map((c) => c.type === 'Comparison' && c.left)).toEqual([
      { type: 'Property', name: 'order_no' },
      { type: 'Property', name: 'index' },
    ]);
  });

  it('should accept prefixed and dotted property names', () => {
    const e = parseText('eo:cloud_cover < 20');
    expect(e.type === 'Comparison' && e.left).toEqual({ type: 'Property', name: 'eo:cloud_cover' });
  });

  it('should restore escapes in string literals', () => {
    const e = parseText('name = "say \\"hi\\"\\n"');
    expect(e.type === 'Comparison' && e.right).toEqual({ type: 'StringLiteral', value: 'say "hi"\n' });
  });

  it('should parse signed numbers, booleans and NULL', () => {
    expect(parseText('x > -5')).toMatchObject({ right: { type: 'NumberLiteral', value: -5 } });
    expect(parseText('flag = TRUE')).toMatchObject({ right: { type: 'BooleanLiteral', value: true } });
    expect(parseText('x = NULL')).toMatchObject({ right: { type: 'NullLiteral' } });
  });

  it('should parse BETWEEN, LIKE and IN with optional NOT', () => {
    expect(parseText('depth BETWEEN 10 AND 20')).toEqual({
      type: 'Between',
      value: { type: 'Property', name: 'depth' },
      lower: { type: 'NumberLiteral', value: 10 },
      upper: { type: 'NumberLiteral', value: 20 },
    });
    expect(parseText('name NOT LIKE "A%"')).toEqual({
      type: 'Not',
      child: { type: 'Like', value: { type: 'Property', name: 'name' }, pattern: 'A%' },
    });
    expect(parseText('id IN (1, 2, 3)')).toEqual({
      type: 'In',
      value: { type: 'Property', name: 'id' },
      candidates: [
        { type: 'NumberLiteral', value: 1 },
        { type: 'NumberLiteral', value: 2 },
        { type: 'NumberLiteral', value: 3 },
      ],
    });
  });

  it('should parse IS NULL and IS NOT NULL', () => {
    expect(parseText('cloud_cover IS NULL')).toEqual({ type: 'IsNull', value: { type: 'Property', name: 'cloud_cover' } });
    expect(parseText('cloud_cover IS NOT NULL')).toEqual({
      type: 'Not',
      child: { type: 'IsNull', value: { type: 'Property', name: 'cloud_cover' } },
    });
  });

  it('should parse CASEI on both sides of a comparison', () => {
    expect(parseText('CASEI(name) = CASEI("Gin")')).toEqual({
      type: 'Comparison',
      operator: '=',
      left: { type: 'FunctionCall', name: 'casei', args: [{ type: 'Property', name: 'name' }] },
      right: { type: 'FunctionCall', name: 'casei', args: [{ type: 'StringLiteral', value: 'Gin' }] },
    });
  });

  it('should parse spatial predicates with WKT geometries', () => {
    expect(parseText('footprint S_INTERSECTS POINT(10.5 20.5)')).toEqual({
      type: 'SpatialPredicate',
      operator: 'intersects',
      left: { type: 'Property', name: 'footprint' },
      right: { type: 'GeometryLiteral', value: { type: 'Point', coordinates: [10.5, 20.5] } },
    });
    expect(parseText('geom S_WITHIN POLYGON((0 0, 1 0, 1 1, 0 0))')).toMatchObject({
      operator: 'within',
      right: { value: { type: 'Polygon', coordinates: [[[0, 0], [1, 0], [1, 1], [0, 0]]] } },
    });
  });

  it('should accept both MULTIPOINT forms', () => {
    const bare = parseText('geom S_INTERSECTS MULTIPOINT(1 2, 3 4)');
    const wrapped = parseText('geom S_INTERSECTS MULTIPOINT((1 2), (3 4))');
    expect(bare).toEqual(wrapped);
    expect(bare).toMatchObject({ right: { value: { type: 'MultiPoint', coordinates: [[1, 2], [3, 4]] } } });
  });

  it('should parse temporal predicates with instants and intervals', () => {
    expect(parseText('datetime T_AFTER TIMESTAMP("2021-01-01T00:00:00Z")')).toEqual({
      type: 'TemporalPredicate',
      operator: 'after',
      left: { type: 'Property', name: 'datetime' },
      right: { type: 'TimestampLiteral', value: '2021-01-01T00:00:00Z' },
    });
    expect(parseText('datetime T_DURING ["2021-01-01" / ".."]')).toMatchObject({
      operator: 'during',
      right: { type: 'IntervalLiteral', start: { type: 'DateLiteral', value: '2021-01-01' }, end: null },
    });
    expect(parseText('updated T_METBY DATE("2021-06-01")')).toMatchObject({ operator: 'metBy' });
  });

  it('should parse BBOX as a spatial operand', () => {
    expect(parseText('footprint S_INTERSECTS BBOX(-10, 40, 10.5, 50)')).toEqual({
      type: 'SpatialPredicate',
      operator: 'intersects',
      left: { type: 'Property', name: 'footprint' },
      right: { type: 'BBoxLiteral', extent: [-10, 40, 10.5, 50] },
    });
    expect(parseText('footprint S_WITHIN bbox(0, 0, -5, 1, 1, 5)')).toMatchObject({
      right: { type: 'BBoxLiteral', extent: [0, 0, -5, 1, 1, 5] },
    });
  });

  it('should keep identifiers that start with BBOX', () => {
    expect(parseText('bbox_area > 3')).toMatchObject({ left: { type: 'Property', name: 'bbox_area' } });
  });

  it('should parse DATE literals in comparisons', () => {
    expect(parseText('updated > DATE("2021-06-01")')).toMatchObject({
      right: { type: 'DateLiteral', value: '2021-06-01' },
    });
  });
});

describe('text parser errors', () => {
  it('should reject characters no token matches', () => {
    const e = thrownBy(() => tokenize('x = #'), LexError);
    expect(e.code).toBe('E_LEX_INVALID_CHARACTER');
    expect(e.message).toBe("Unexpected character '#' at 1:5");
    expect(e.offset).toBe(4);
  });

  it('should report a missing operand at the end of input', () => {
    const e = thrownBy(() => parseText('x = '), TextSyntaxError);
    expect(e.code).toBe('E_SYNTAX_UNEXPECTED_TOKEN');
    expect(e.offset).toBe(4);
  });

  it('should report an unclosed group', () => {
    const e = thrownBy(() => parseText('(a = 1 AND b = 2'), TextSyntaxError);
    expect(e.code).toBe('E_SYNTAX_UNCLOSED_GROUP');
    expect(e.message).toBe("Unclosed group: expected ')' before end of input");
  });

  it('should reject trailing input', () => {
    const e = thrownBy(() => parseText('a = 1 b = 2'), TextSyntaxError);
    expect(e.code).toBe('E_SYNTAX_UNEXPECTED_TOKEN');
    expect(e.token).toBe('b');
    expect(e.offset).toBe(6);
  });

  it('should reject malformed timestamps', () => {
    const e = thrownBy(() => parseText('updated > TIMESTAMP("yesterday")'), TextSyntaxError);
    expect(e.code).toBe('E_SYNTAX_INVALID_LITERAL');
  });

  it('should reject calendar dates that do not exist', () => {
    const date = thrownBy(() => parseText('updated > DATE("2021-02-30")'), TextSyntaxError);
    expect(date.code).toBe('E_SYNTAX_INVALID_LITERAL');
    const month = thrownBy(() => parseText('datetime T_AFTER TIMESTAMP("2021-13-01T00:00:00Z")'), TextSyntaxError);
    expect(month.code).toBe('E_SYNTAX_INVALID_LITERAL');
    const bound = thrownBy(() => parseText('datetime T_DURING ["2021-02-30" / ".."]'), TextSyntaxError);
    expect(bound.code).toBe('E_SYNTAX_INVALID_LITERAL');
  });

  it('should require 4 or 6 numbers in BBOX', () => {
    const e = thrownBy(() => parseText('footprint S_INTERSECTS BBOX(1, 2, 3)'), TextSyntaxError);
    expect(e.code).toBe('E_SYNTAX_INVALID_LITERAL');
    expect(e.token).toBe('BBOX');
    expect(e.offset).toBe(23);
    expect(e.message).toBe('Invalid literal BBOX at 1:24: expected 4 or 6 numbers, got 3');
  });

  it.each([
    'a BETWEEN 1',
    'a BETWEEN 1 AND',
    'a IS',
    'a IS NOT',
    'a IN (1',
    'a LIKE',
    'CASEI() = "x"',
    'footprint S_INTERSECTS',
    'footprint S_INTERSECTS BBOX()',
    'datetime T_AFTER',
  ])('should reject the incomplete predicate %s', (text) => {
    thrownBy(() => parseText(text), TextSyntaxError);
  });

  it('should describe the failing token instead of listing alternatives', () => {
    const atEnd = thrownBy(() => parseText('a = 1 OR b'), TextSyntaxError);
    expect(atEnd.message).toBe('Unexpected end of input');
    expect(atEnd.offset).toBe(10);

    const inside = thrownBy(() => parseText('a = 1 OR b )'), TextSyntaxError);
    expect(inside.message).toBe("Unexpected token ')' (at 1:12)");
    expect(inside.token).toBe(')');
  });

  it('should require a property before spatial operators', () => {
    const e = thrownBy(() => parseText('CASEI(a) S_INTERSECTS POINT(1 2)'), TextSyntaxError);
    expect(e.code).toBe('E_SYNTAX_UNEXPECTED_TOKEN');
    expect(e.token).toBe('S_INTERSECTS');
  });

  it('should return errors as values from tryParseText', () => {
    const bad = tryParseText('a =');
    expect(bad.ok).toBe(false);
    const good = tryParseText('a = 1');
    expect(good.ok && good.value.type).toBe('Comparison');
  });
});

describe('date and timestamp text', () => {
  it('should accept real calendar dates only', () => {
    expect(isDateText('2024-02-29')).toBe(true);
    expect(isDateText('2023-02-29')).toBe(false);
    expect(isDateText('2021-02-30')).toBe(false);
    expect(isDateText('2021-13-01')).toBe(false);
    expect(isDateText('2021-00-10')).toBe(false);
  });

  it('should check the date and clock fields of timestamps', () => {
    expect(isTimestampText('2021-01-01T23:59:59.5+09:00')).toBe(true);
    expect(isTimestampText('2021-02-30T00:00:00Z')).toBe(false);
    expect(isTimestampText('2021-13-01T00:00:00Z')).toBe(false);
    expect(isTimestampText('2021-01-01T24:00:00Z')).toBe(false);
    expect(isTimestampText('2021-01-01T00:60:00Z')).toBe(false);
    expect(isTimestampText('2021-01-01T00:00:00+24:00')).toBe(false);
  });
});
