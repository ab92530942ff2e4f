// test/builder.test.ts
import { describe, it, expect } from 'vitest';
import * as ast from '../src/ast/factory.ts';
import { FilterBuilder } from '../src/builder/builder.ts';
import { parseText } from '../src/parser/index.ts';
import { parseJson } from '../src/json/parser.ts';
import { serializeJson } from '../src/json/serializer.ts';
import { SemanticError, SerializeError } from '../src/errors/errors.ts';
import { thrownBy } from './helpers.ts';

describe('FilterBuilder', () => {
  it('should AND predicates in call order', () => {
    const b = new FilterBuilder().equal('type', 'satellite').lessThan('cloud_cover', 20);
    expect(b.toText()).toBe('type = "satellite" AND cloud_cover < 20');
    expect(b.toJson()).toEqual({
      op: 'and',
      args: [
        { op: '=', args: [{ property: 'type' }, 'satellite'] },
        { op: '<', args: [{ property: 'cloud_cover' }, 20] },
      ],
    });
  });

  it('should cover every comparison operator', () => {
    const b = new FilterBuilder()
      .notEqual('a', 1)
      .lessThanOrEqual('b', 2)
      .greaterThan('c', 3)
      .greaterThanOrEqual('d', 4);
    expect(b.toText()).toBe('a <> 1 AND b <= 2 AND c > 3 AND d >= 4');
  });

  it('should build range, pattern and null predicates', () => {
    const b = new FilterBuilder()
      .between('depth', 10, 20)
      .like('name', 'A%')
      .in('kind', ['a', 'b'])
      .isNull('deleted_at')
      .isNotNull('owner');
    expect(b.toText()).toBe(
      'depth BETWEEN 10 AND 20 AND name LIKE "A%" AND kind IN ("a", "b") AND deleted_at IS NULL AND owner IS NOT NULL',
    );
  });

  it('should wrap the accumulated expression with or() and not()', () => {
    const b = new FilterBuilder().equal('a', 1).or(new FilterBuilder().equal('b', 2)).equal('c', 3);
    expect(b.toText()).toBe('(a = 1 OR b = 2) AND c = 3');
    expect(new FilterBuilder().equal('a', 1).not().toText()).toBe('NOT a = 1');
  });

  it('should skip empty parts and leave an empty builder alone on not()', () => {
    const b = new FilterBuilder().not().and(new FilterBuilder());
    expect(b.isEmpty()).toBe(true);
    expect(b.build()).toBeUndefined();
    b.and(parseText('x = 1'), new FilterBuilder().equal('y', 2));
    expect(b.toText()).toBe('x = 1 AND y = 2');
  });

  it('should build spatial and temporal predicates', () => {
    const b = new FilterBuilder()
      .intersects('footprint', { type: 'Point', coordinates: [1, 2] })
      .anyInteracts('datetime', '2021-01-01', null)
      .temporal('before', 'updated', '2022-01-01T00:00:00Z');
    expect(b.toText()).toBe(
      'footprint S_INTERSECTS POINT(1 2) AND datetime T_INTERSECTS ["2021-01-01" / ".."] AND updated T_BEFORE TIMESTAMP("2022-01-01T00:00:00Z")',
    );
  });

  it('should turn Date values into timestamps', () => {
    const b = new FilterBuilder().equal('updated', new Date(Date.UTC(2021, 0, 1)));
    expect(b.toText()).toBe('updated = TIMESTAMP("2021-01-01T00:00:00.000Z")');
  });

  it('should accept AST operands and function subjects', () => {
    const b = new FilterBuilder().equal(ast.fn('casei', [ast.property('name')]), ast.fn('casei', [ast.literal('Gin')]));
    expect(b.toText()).toBe('CASEI(name) = CASEI("Gin")');
  });

  it('should add custom functions as predicates', () => {
    expect(new FilterBuilder().function('my_check', 'x', 2).toJson()).toEqual({ op: 'my_check', args: ['x', 2] });
  });

  it('should read custom functions back when they are registered', () => {
    const built = new FilterBuilder().function('my_check', ast.property('x'), 2).build();
    expect(parseJson(serializeJson(built), { functions: ['my_check'] })).toEqual(built);
  });

  it('should refuse operator names as function names', () => {
    for (const name of ['and', 's_intersects', 't_after', 'isNull', '=']) {
      const e = thrownBy(() => new FilterBuilder().function(name, ast.property('x')), SemanticError);
      expect(e.code).toBe('E_SEMANTIC_OPERAND');
      expect(e.message).toBe(`'${name}' is an operator, not a function name`);
    }
    expect(new FilterBuilder().function('casei', ast.property('x')).toJson()).toEqual({
      op: 'casei',
      args: [{ property: 'x' }],
    });
  });

  it('should build bbox predicates', () => {
    const b = new FilterBuilder().bbox('footprint', -10, 40, 10, 50).spatial('within', 'area', ast.bbox([0, 0, 1, 1]));
    expect(b.toText()).toBe('footprint S_INTERSECTS BBOX(-10, 40, 10, 50) AND area S_WITHIN BBOX(0, 0, 1, 1)');
    expect(b.toJson()).toEqual({
      op: 'and',
      args: [
        { op: 's_intersects', args: [{ property: 'footprint' }, { bbox: [-10, 40, 10, 50] }] },
        { op: 's_within', args: [{ property: 'area' }, { bbox: [0, 0, 1, 1] }] },
      ],
    });
    const e = thrownBy(() => new FilterBuilder().bbox('footprint', 1, 2, 3), SemanticError);
    expect(e.message).toBe('bbox needs 4 or 6 numbers, got 3');
  });

  it('should reject malformed instants', () => {
    const e = thrownBy(() => new FilterBuilder().temporal('after', 'datetime', 'not a date'), SemanticError);
    expect(e.code).toBe('E_SEMANTIC_OPERAND');
  });

  it('should refuse to serialize while empty', () => {
    expect(thrownBy(() => new FilterBuilder().toText(), SerializeError).code).toBe('E_SERIALIZE_EMPTY');
    expect(thrownBy(() => new FilterBuilder().toJson(), SerializeError).code).toBe('E_SERIALIZE_EMPTY');
  });
});
