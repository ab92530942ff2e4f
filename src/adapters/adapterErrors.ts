// src/adapters/adapterErrors.ts
import { UnsupportedOperatorError } from '../errors/errors.ts';

// 方言の演算子表に無い op
export function failUnsupportedOperator(dialect: string, operator: string, detail?: string): never {
  const msg = detail
    ? `[${dialect}] Unsupported operator '${operator}': ${detail}`
    : `[${dialect}] Unsupported operator '${operator}'.`;
  throw new UnsupportedOperatorError(msg, dialect, operator);
}

// 方言の識別子として書けないプロパティ名
export function failUnsupportedProperty(dialect: string, name: string): never {
  throw new UnsupportedOperatorError(`[${dialect}] Cannot render property name '${name}'.`, dialect, name);
}

// 方言が描画できないリテラル（OData の LIKE パターンなど）
export function failUnsupportedLiteral(dialect: string, literalType: string): never {
  throw new UnsupportedOperatorError(`[${dialect}] Cannot render literal of type '${literalType}'.`, dialect, literalType);
}
