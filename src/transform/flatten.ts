// src/transform/flatten.ts
// AND だけで組まれた式を末端の述語の列に展開する。OR / NOT は方針違反として拒否する。

import type { BooleanExpression, Operand, TerminalPredicate } from '../ast/types.ts';
import { operatorName } from '../json/operators.ts';
import { failOnlyAnd } from './transformErrors.ts';

/**
 * 左から右の順で末端の述語を返す。
 *
 * @throws PolicyError OR / NOT / 述語位置の関数呼び出しを含む場合
 */
export function flattenConjunction(expr: BooleanExpression): TerminalPredicate[] {
  const out: TerminalPredicate[] = [];
  const walk = (e: BooleanExpression): void => {
    switch (e.type) {
      case 'Logical':
        if (e.operator !== 'AND') failOnlyAnd(e.type, e.operator);
        e.children.forEach(walk);
        return;
      case 'Not':
        return failOnlyAnd(e.type, 'NOT');
      case 'FunctionCall':
        return failOnlyAnd(e.type, e.name);
      default:
        out.push(e);
    }
  };
  walk(expr);
  return out;
}

// 関数呼び出しの中は最初に見つかったプロパティを採用
function propertyOf(o: Operand): string | undefined {
  if (o.type === 'Property') return o.name;
  if (o.type === 'FunctionCall') {
    for (const arg of o.args) {
      const name = propertyOf(arg);
      if (name !== undefined) return name;
    }
  }
  return undefined;
}

/** 述語が対象とするプロパティ名。見つからなければ空文字 */
export function subjectProperty(t: TerminalPredicate): string {
  switch (t.type) {
    case 'Comparison':
      return propertyOf(t.left) ?? propertyOf(t.right) ?? '';
    case 'SpatialPredicate':
    case 'TemporalPredicate':
      return t.left.name;
    default:
      return propertyOf(t.value) ?? '';
  }
}

function groupBy(terminals: readonly TerminalPredicate[], key: (t: TerminalPredicate) => string) {
  const groups = new Map<string, TerminalPredicate[]>();
  for (const t of terminals) {
    const k = key(t);
    const bucket = groups.get(k);
    if (bucket) bucket.push(t);
    else groups.set(k, [t]);
  }
  return groups;
}

export function groupByProperty(terminals: readonly TerminalPredicate[]): Map<string, TerminalPredicate[]> {
  return groupBy(terminals, subjectProperty);
}

// キーは CQL2-JSON の op 名（'=', 'between', 's_intersects' など）
export function groupByOperator(terminals: readonly TerminalPredicate[]): Map<string, TerminalPredicate[]> {
  return groupBy(terminals, operatorName);
}
