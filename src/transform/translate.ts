// src/transform/translate.ts
// AST を外部から与えた方言（演算子テンプレート表 + プロパティ/リテラルの描画関数）で文字列化する。
// この層が持つのは走査だけで、個々の方言の文法は adapters/ 側の表に置く。
//
// テンプレート記法:
//   {0} {1} ...        位置引数
//   {1.start} {1.end}  区間の端（瞬間値の場合はその値自身）
//   {all} {rest}       全引数 / 2番目以降を separator で連結
//
// 引数はテンプレート中に現れた順に描画する。bind() で積むパラメータの順序は
// 常にクエリ文字列中のプレースホルダの順序と一致する。

import type { BooleanExpression, InstantLiteral, LiteralNode, Operand } from '../ast/types.ts';
import { literal as stringLiteral } from '../ast/factory.ts';
import { operatorName } from '../json/operators.ts';
import { failUnsupportedLiteral, failUnsupportedOperator } from '../adapters/adapterErrors.ts';

export type ParamValue = string | number | boolean | null;

export type OperatorTemplate = string | { template: string; separator: string };

export interface RenderContext {
  /** 値をパラメータに積み、方言のプレースホルダを返す */
  bind(value: ParamValue): string;
}

export interface Dialect {
  name: string;
  /** キーは CQL2-JSON の op 名（'=', 'and', 's_intersects', 't_during', 'casei' など） */
  operators: Readonly<Partial<Record<string, OperatorTemplate>>>;
  property(name: string): string;
  /** 描画できないリテラルには undefined を返す */
  literal(node: LiteralNode, ctx: RenderContext): string | undefined;
  /** 省略時は '?'。index は 1 始まり */
  placeholder?(index: number): string;
}

export interface Translation {
  query: string;
  params: ParamValue[];
}

type Render = () => string;

type Part = { kind: 'value'; render: Render } | { kind: 'interval'; start: Render | null; end: Render | null };

interface State {
  dialect: Dialect;
  ctx: RenderContext;
}

const PLACEHOLDER = /\{(?:(\d+)(?:\.(start|end))?|(all|rest))\}/g;

function substitute(s: State, op: string, entry: OperatorTemplate, parts: Part[]): string {
  const { template, separator } = typeof entry === 'string' ? { template: entry, separator: ', ' } : entry;
  const name = s.dialect.name;

  const valueOf = (part: Part, ref: string): string => {
    if (part.kind === 'value') return part.render();
    return failUnsupportedOperator(name, op, `${ref} is an interval; refer to its .start or .end`);
  };

  return template.replace(
    PLACEHOLDER,
    (ref: string, index: string | undefined, bound: string | undefined, group: string | undefined) => {
      if (group !== undefined) {
        const selected = group === 'all' ? parts : parts.slice(1);
        return selected.map((p) => valueOf(p, ref)).join(separator);
      }
      const part = parts[Number(index)];
      if (!part) return failUnsupportedOperator(name, op, `template refers to missing argument ${ref}`);
      if (bound === undefined) return valueOf(part, ref);
      if (part.kind === 'value') return part.render();
      const render = bound === 'start' ? part.start : part.end;
      if (!render) return failUnsupportedOperator(name, op, `open interval bound cannot be rendered for ${ref}`);
      return render();
    },
  );
}

function renderLiteral(node: LiteralNode, s: State): string {
  return s.dialect.literal(node, s.ctx) ?? failUnsupportedLiteral(s.dialect.name, node.type);
}

function renderOperand(o: Operand, s: State): string {
  if (o.type === 'Property') return s.dialect.property(o.name);
  if (o.type === 'FunctionCall') return renderExpression(o, s);
  return renderLiteral(o, s);
}

const value = (render: Render): Part => ({ kind: 'value', render });
const operandPart = (o: Operand, s: State): Part => value(() => renderOperand(o, s));
const instantRender = (i: InstantLiteral | null, s: State): Render | null =>
  i ? () => renderLiteral(i, s) : null;

function partsOf(e: BooleanExpression, s: State): Part[] {
  switch (e.type) {
    case 'Logical':
      return e.children.map((c) => value(() => renderExpression(c, s)));
    case 'Not':
      return [value(() => renderExpression(e.child, s))];
    case 'Comparison':
      return [operandPart(e.left, s), operandPart(e.right, s)];
    case 'Between':
      return [operandPart(e.value, s), operandPart(e.lower, s), operandPart(e.upper, s)];
    case 'Like':
      return [operandPart(e.value, s), operandPart(stringLiteral(e.pattern), s)];
    case 'In':
      return [operandPart(e.value, s), ...e.candidates.map((c) => operandPart(c, s))];
    case 'IsNull':
      return [operandPart(e.value, s)];
    case 'SpatialPredicate':
      return [operandPart(e.left, s), operandPart(e.right, s)];
    case 'TemporalPredicate': {
      const right = e.right;
      const rightPart: Part =
        right.type === 'IntervalLiteral'
          ? { kind: 'interval', start: instantRender(right.start, s), end: instantRender(right.end, s) }
          : operandPart(right, s);
      return [operandPart(e.left, s), rightPart];
    }
    case 'FunctionCall':
      return e.args.map((a) => operandPart(a, s));
  }
}

function renderExpression(e: BooleanExpression, s: State): string {
  const op = operatorName(e);
  const entry = s.dialect.operators[op];
  if (entry === undefined) return failUnsupportedOperator(s.dialect.name, op);
  return substitute(s, op, entry, partsOf(e, s));
}

/**
 * 式を方言のクエリ文字列に変換する。
 *
 * @throws UnsupportedOperatorError 方言に無い演算子、描画できないリテラル、開いた区間端を参照するテンプレート
 */
export function translate(expr: BooleanExpression, dialect: Dialect): Translation {
  const params: ParamValue[] = [];
  const ctx: RenderContext = {
    bind(v) {
      params.push(v);
      return dialect.placeholder ? dialect.placeholder(params.length) : '?';
    },
  };
  const query = renderExpression(expr, { dialect, ctx });
  return { query, params };
}
