// src/queryables/conditions.ts
// フォーム入力（プロパティ・演算子・文字列の値）を queryables の型に合わせて述語に変換し、ビルダーへ積む。

import { z } from 'zod';
import type { LiteralNode } from '../ast/types.ts';
import * as ast from '../ast/factory.ts';
import { isDateText, isTimestampText } from '../ast/guards.ts';
import type { FilterBuilder } from '../builder/builder.ts';
import type { QueryableProperty, Queryables } from './schema.ts';
import { primaryType } from './schema.ts';
import { failInvalidDocument, failValueCount } from './queryablesErrors.ts';

const INTEGER = /^[+-]?\d+$/;
// 10 進表記のみ（0x10 や 0b11 は Number() が通してしまう）
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const TRUE_WORDS = new Set(['true', '1', 'yes']);
const FALSE_WORDS = new Set(['false', '0', 'no']);

function isDateTimeField(field: QueryableProperty): boolean {
  return field.format === 'date-time' || (field.$ref?.includes('datetime') ?? false);
}

/**
 * 入力文字列を queryable の型に合わせてリテラルにする。
 * 変換できないとき（型不明を含む）は文字列リテラルのまま返す。
 */
export function coerceValue(raw: string, field?: QueryableProperty): LiteralNode {
  const value = raw.trim();
  if (!field) return ast.literal(value);
  switch (primaryType(field)) {
    case 'integer':
      if (INTEGER.test(value)) return ast.literal(Number(value));
      break;
    case 'number': {
      if (!DECIMAL.test(value)) break;
      const n = Number(value);
      if (Number.isFinite(n)) return ast.literal(n);
      break;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (TRUE_WORDS.has(lower)) return ast.literal(true);
      if (FALSE_WORDS.has(lower)) return ast.literal(false);
      break;
    }
    case 'string':
      if (isDateTimeField(field) && isTimestampText(value)) return ast.timestamp(value);
      if (field.format === 'date' && isDateText(value)) return ast.date(value);
      break;
    default:
      if (isDateTimeField(field) && isTimestampText(value)) return ast.timestamp(value);
  }
  return ast.literal(value);
}

/** 入力欄に出すヒント */
export function valueHint(field?: QueryableProperty): string {
  if (!field) return 'value';
  if (field.enum && field.enum.length > 0) return `one of: ${field.enum.map(String).join(', ')}`;
  if (isDateTimeField(field)) return 'RFC 3339 timestamp, e.g. 2021-01-01T00:00:00Z';
  switch (primaryType(field)) {
    case 'integer':
    case 'number': {
      const range = [field.minimum, field.maximum].map((v) => (v === undefined ? '' : String(v)));
      return range.some((v) => v !== '') ? `number (${range.join('..')})` : 'number';
    }
    case 'boolean':
      return 'true / false';
    case 'array':
      return 'comma-separated values';
    default:
      return 'text';
  }
}

export const CONDITION_OPERATORS = ['=', '<>', '<', '<=', '>', '>=', 'like', 'in', 'between', 'isNull', 'isNotNull'] as const;

export const conditionInputSchema = z.object({
  property: z.string().min(1),
  operator: z.enum(CONDITION_OPERATORS),
  value: z.string().default(''),
});

export type ConditionInput = z.input<typeof conditionInputSchema>;

const splitValues = (value: string): string[] =>
  value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);

/**
 * 1件の入力をビルダーに AND で追加する。
 *
 * @throws SemanticError 入力の形が不正（E_SEMANTIC_INVALID_JSON）、between の値が2つでない（E_SEMANTIC_ARITY）
 */
export function conditionFromInput(builder: FilterBuilder, input: unknown, queryables?: Queryables): FilterBuilder {
  const parsed = conditionInputSchema.safeParse(input);
  if (!parsed.success) return failInvalidDocument('condition', parsed.error);
  const { property, operator, value } = parsed.data;
  const field = queryables?.properties[property];

  switch (operator) {
    case 'isNull':
      return builder.isNull(property);
    case 'isNotNull':
      return builder.isNotNull(property);
    case 'like':
      return builder.like(property, value);
    case 'in':
      return builder.in(
        property,
        splitValues(value).map((v) => coerceValue(v, field)),
      );
    case 'between': {
      const parts = splitValues(value);
      const [lower, upper] = parts;
      if (parts.length !== 2 || lower === undefined || upper === undefined) {
        return failValueCount(operator, '2', parts.length);
      }
      return builder.between(property, coerceValue(lower, field), coerceValue(upper, field));
    }
    default:
      return builder.where(ast.comparison(operator, ast.property(property), coerceValue(value, field)));
  }
}
