// src/json/jsonErrors.ts
import { SemanticError } from '../errors/errors.ts';

export function failInvalidJson(message: string): never {
  throw new SemanticError(message, undefined, undefined, undefined, 'E_SEMANTIC_INVALID_JSON');
}

export function failUnknownOp(op: string): never {
  throw new SemanticError(`Unknown operator '${op}'`, op, undefined, undefined, 'E_SEMANTIC_UNKNOWN_OP');
}

export function failArity(op: string, expected: string, actual: number): never {
  throw new SemanticError(
    `Operator '${op}' expects ${expected} argument(s), got ${actual}`,
    op,
    expected,
    String(actual),
    'E_SEMANTIC_ARITY',
  );
}

export function failOperand(op: string, expected: string, actual: string): never {
  throw new SemanticError(
    `Operator '${op}' expects ${expected}, got ${actual}`,
    op,
    expected,
    actual,
    'E_SEMANTIC_OPERAND',
  );
}

// エラーメッセージ用に JSON 値の形を短く表す
export function describeValue(v: unknown): string {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'an array';
  if (typeof v === 'object') {
    const keys = Object.keys(v);
    return keys.length ? `an object with keys ${keys.join(', ')}` : 'an empty object';
  }
  return `a ${typeof v}`;
}
