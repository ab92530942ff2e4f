// src/serializer/text.ts
// AST -> CQL2 テキスト。
// 括弧は「子の優先順位 < 親から渡された優先順位」のときだけ付ける（最小括弧）。
// 優先順位: OR=1, AND=2, NOT=3, 述語=4

import type {
  AstNode,
  BooleanExpression,
  FunctionCall,
  InstantLiteral,
  IntervalLiteral,
  Operand,
  PropertyNode,
  SpatialLiteral,
  TemporalOperand,
} from '../ast/types.ts';
import { SPATIAL_OPERATORS, TEMPORAL_OPERATORS } from '../ast/types.ts';
import { GEOMETRY_TYPES } from '../ast/geometry.ts';
import { OPEN_BOUND } from '../ast/guards.ts';
import { toWkt } from './wkt.ts';
import { failEmpty, failUnsupportedNode } from './serializerErrors.ts';

const PREC_OR = 1;
const PREC_AND = 2;
const PREC_NOT = 3;
const PREC_PREDICATE = 4;

// テキスト形式で書ける関数（AST 上は小文字）
export const TEXT_FUNCTIONS: ReadonlySet<string> = new Set(['casei', 'accenti']);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_.:]*$/;

const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'AND', 'OR', 'NOT', 'LIKE', 'IN', 'IS', 'NULL', 'BETWEEN', 'TRUE', 'FALSE', 'TIMESTAMP', 'DATE', 'BBOX',
  ...[...TEXT_FUNCTIONS].map((f) => f.toUpperCase()),
  ...SPATIAL_OPERATORS.map((op) => `S_${op.toUpperCase()}`),
  ...TEMPORAL_OPERATORS.map((op) => `T_${op.toUpperCase()}`),
  ...GEOMETRY_TYPES.map((t) => t.toUpperCase()),
]);

export function quoteString(s: string): string {
  const escaped = s
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

function formatNumber(n: number): string {
  if (!Number.isFinite(n)) failUnsupportedNode(`number must be finite, got ${n}`, 'NumberLiteral');
  // String() は往復可能な最短表記を返す。ただし -0 は '0' になるので別扱い
  return Object.is(n, -0) ? '-0' : String(n);
}

function renderProperty(p: PropertyNode): string {
  if (!IDENTIFIER.test(p.name)) {
    failUnsupportedNode(`property name '${p.name}' is not a valid identifier`, 'Property');
  }
  if (RESERVED_WORDS.has(p.name.toUpperCase())) {
    failUnsupportedNode(`property name '${p.name}' is a reserved word`, 'Property');
  }
  return p.name;
}

function renderFunction(f: FunctionCall): string {
  if (!TEXT_FUNCTIONS.has(f.name)) {
    failUnsupportedNode(`function '${f.name}' has no text form`, 'FunctionCall');
  }
  return `${f.name.toUpperCase()}(${f.args.map(renderOperand).join(', ')})`;
}

function renderInstant(i: InstantLiteral): string {
  return i.type === 'TimestampLiteral' ? `TIMESTAMP(${quoteString(i.value)})` : `DATE(${quoteString(i.value)})`;
}

function renderInterval(i: IntervalLiteral): string {
  const bound = (b: InstantLiteral | null) => quoteString(b ? b.value : OPEN_BOUND);
  return `[${bound(i.start)} / ${bound(i.end)}]`;
}

function renderTemporalOperand(t: TemporalOperand): string {
  return t.type === 'IntervalLiteral' ? renderInterval(t) : renderInstant(t);
}

function renderSpatial(s: SpatialLiteral): string {
  return s.type === 'BBoxLiteral' ? `BBOX(${s.extent.map(formatNumber).join(', ')})` : toWkt(s.value);
}

function renderOperand(o: Operand): string {
  switch (o.type) {
    case 'Property':
      return renderProperty(o);
    case 'FunctionCall':
      return renderFunction(o);
    case 'StringLiteral':
      return quoteString(o.value);
    case 'NumberLiteral':
      return formatNumber(o.value);
    case 'BooleanLiteral':
      return o.value ? 'TRUE' : 'FALSE';
    case 'NullLiteral':
      return 'NULL';
    case 'TimestampLiteral':
    case 'DateLiteral':
      return renderInstant(o);
    case 'GeometryLiteral':
    case 'BBoxLiteral':
      return renderSpatial(o);
  }
}

// NOT を述語の内側に書ける形（a NOT LIKE ..., a IS NOT NULL）
function renderNegatedPredicate(child: BooleanExpression): string | undefined {
  switch (child.type) {
    case 'Between':
      return `${renderOperand(child.value)} NOT BETWEEN ${renderOperand(child.lower)} AND ${renderOperand(child.upper)}`;
    case 'Like':
      return `${renderOperand(child.value)} NOT LIKE ${quoteString(child.pattern)}`;
    case 'In':
      return `${renderOperand(child.value)} NOT IN (${child.candidates.map(renderOperand).join(', ')})`;
    case 'IsNull':
      return `${renderOperand(child.value)} IS NOT NULL`;
    default:
      return undefined;
  }
}

function wrap(text: string, own: number, enclosing: number): string {
  return own < enclosing ? `(${text})` : text;
}

function render(e: BooleanExpression, enclosing: number): string {
  switch (e.type) {
    case 'Logical': {
      const own = e.operator === 'OR' ? PREC_OR : PREC_AND;
      const text = e.children.map((c) => render(c, own)).join(` ${e.operator} `);
      return wrap(text, own, enclosing);
    }
    case 'Not': {
      const inline = renderNegatedPredicate(e.child);
      if (inline !== undefined) return inline;
      return wrap(`NOT ${render(e.child, PREC_NOT)}`, PREC_NOT, enclosing);
    }
    case 'Comparison':
      return `${renderOperand(e.left)} ${e.operator} ${renderOperand(e.right)}`;
    case 'Between':
      return `${renderOperand(e.value)} BETWEEN ${renderOperand(e.lower)} AND ${renderOperand(e.upper)}`;
    case 'Like':
      return `${renderOperand(e.value)} LIKE ${quoteString(e.pattern)}`;
    case 'In':
      return `${renderOperand(e.value)} IN (${e.candidates.map(renderOperand).join(', ')})`;
    case 'IsNull':
      return `${renderOperand(e.value)} IS NULL`;
    case 'SpatialPredicate':
      return `${renderProperty(e.left)} S_${e.operator.toUpperCase()} ${renderSpatial(e.right)}`;
    case 'TemporalPredicate':
      return `${renderProperty(e.left)} T_${e.operator.toUpperCase()} ${renderTemporalOperand(e.right)}`;
    case 'FunctionCall':
      return failUnsupportedNode(`function '${e.name}' cannot be used as a predicate in text form`, 'FunctionCall');
  }
}

/**
 * AST を CQL2 テキストへ変換する。`parseText` の逆変換。
 * 述語以外（プロパティやリテラル単体）を渡した場合はその値の表記を返す。
 */
export function serializeText(expr: AstNode | null | undefined): string {
  if (expr == null) return failEmpty('text');
  switch (expr.type) {
    case 'Property':
    case 'StringLiteral':
    case 'NumberLiteral':
    case 'BooleanLiteral':
    case 'NullLiteral':
    case 'TimestampLiteral':
    case 'DateLiteral':
    case 'GeometryLiteral':
    case 'BBoxLiteral':
      return renderOperand(expr);
    case 'IntervalLiteral':
      return renderInterval(expr);
    default:
      return render(expr, PREC_OR);
  }
}
