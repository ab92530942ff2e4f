// src/queryables/schema.ts
// STAC / OGC API の queryables 文書（JSON Schema のサブセット）を zod で検証する。
// 未知のキーは捨てずに残す（passthrough）。

import { z } from 'zod';
import { failInvalidDocument, failInvalidJsonText } from './queryablesErrors.ts';

export const queryablePropertySchema = z
  .object({
    title: z.string().optional(),
    description: z.string().optional(),
    $ref: z.string().optional(),
    type: z.union([z.string(), z.array(z.string())]).optional(),
    format: z.string().optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    enum: z.array(z.unknown()).optional(),
  })
  .passthrough();

export const queryablesSchema = z
  .object({
    $schema: z.string().optional(),
    $id: z.string().optional(),
    type: z.literal('object'),
    title: z.string().optional(),
    description: z.string().optional(),
    properties: z.record(queryablePropertySchema),
    additionalProperties: z.boolean().optional(),
  })
  .passthrough();

export type QueryableProperty = z.infer<typeof queryablePropertySchema>;
export type Queryables = z.infer<typeof queryablesSchema>;

/**
 * queryables 文書を検証して返す。文字列を渡した場合は先に JSON.parse する。
 *
 * @throws SemanticError (E_SEMANTIC_INVALID_JSON) 形が合わない場合
 */
export function parseQueryables(input: unknown): Queryables {
  const doc = typeof input === 'string' ? parseDocument(input) : input;
  const result = queryablesSchema.safeParse(doc);
  if (!result.success) return failInvalidDocument('queryables', result.error);
  return result.data;
}

function parseDocument(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (e) {
    return failInvalidJsonText('queryables', e instanceof Error ? e.message : String(e));
  }
}

// type が配列（["string", "null"] など）の場合は null 以外の最初のもの
export function primaryType(field: QueryableProperty): string | undefined {
  const { type } = field;
  if (Array.isArray(type)) return type.find((t) => t !== 'null');
  return type;
}
