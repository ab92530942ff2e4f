// test/flatten.test.ts
import { describe, it, expect } from 'vitest';
import * as ast from '../src/ast/factory.ts';
import { parseText } from '../src/parser/index.ts';
import { FilterBuilder } from '../src/builder/builder.ts';
import { flattenConjunction, groupByOperator, groupByProperty, subjectProperty } from '../src/transform/flatten.ts';
import { PolicyError } from '../src/errors/errors.ts';
import { thrownBy } from './helpers.ts';

describe('flattenConjunction', () => {
  it('should list the predicates of a builder conjunction in order', () => {
    const expr = new FilterBuilder().equal('type', 'satellite').lessThan('cloud_cover', 20).build();
    if (!expr) return expect.fail('builder is empty');
    expect(flattenConjunction(expr)).toEqual([
      ast.comparison('=', ast.property('type'), ast.literal('satellite')),
      ast.comparison('<', ast.property('cloud_cover'), ast.literal(20)),
    ]);
  });

  it('should return a lone predicate as a single item', () => {
    expect(flattenConjunction(parseText('a = 1'))).toHaveLength(1);
  });

  it('should walk nested AND groups left to right', () => {
    const terms = flattenConjunction(parseText('a = 1 AND (b = 2 AND c = 3)'));
    expect(terms.map(subjectProperty)).toEqual(['a', 'b', 'c']);
  });

  it('should refuse OR', () => {
    const e = thrownBy(() => flattenConjunction(parseText('a = 1 OR b = 2')), PolicyError);
    expect(e.code).toBe('E_POLICY_ONLY_AND');
    expect(e.message).toBe('Only AND is supported when flattening, found OR');
  });

  it('should refuse NOT, including negated range predicates', () => {
    expect(thrownBy(() => flattenConjunction(parseText('a = 1 AND NOT b = 2')), PolicyError).message).toBe(
      'Only AND is supported when flattening, found NOT',
    );
    expect(thrownBy(() => flattenConjunction(parseText('x IS NOT NULL')), PolicyError).nodeType).toBe('Not');
  });
});

describe('grouping', () => {
  const terms = flattenConjunction(
    parseText('cloud_cover < 20 AND cloud_cover > 5 AND platform = "s2" AND CASEI(name) LIKE "a%"'),
  );

  it('should group by the property a predicate targets', () => {
    const groups = groupByProperty(terms);
    expect([...groups.keys()]).toEqual(['cloud_cover', 'platform', 'name']);
    expect(groups.get('cloud_cover')).toHaveLength(2);
  });

  it('should group by CQL2-JSON operator name', () => {
    const groups = groupByOperator(terms);
    expect([...groups.keys()]).toEqual(['<', '>', '=', 'like']);
  });

  it('should find the property on either side of a comparison', () => {
    expect(subjectProperty(ast.comparison('<', ast.literal(5), ast.property('depth')))).toBe('depth');
    expect(subjectProperty(ast.comparison('=', ast.literal(1), ast.literal(1)))).toBe('');
  });
});
