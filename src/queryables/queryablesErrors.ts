// src/queryables/queryablesErrors.ts
import type { ZodError } from 'zod';
import { SemanticError } from '../errors/errors.ts';

// zod の issue を "path: message" の列にまとめる
export function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function failInvalidDocument(what: string, error: ZodError): never {
  throw new SemanticError(`Invalid ${what}: ${formatIssues(error)}`, what, undefined, undefined, 'E_SEMANTIC_INVALID_JSON');
}

export function failValueCount(operator: string, expected: string, actual: number): never {
  throw new SemanticError(
    `Operator '${operator}' expects ${expected} comma-separated value(s), got ${actual}`,
    operator,
    expected,
    String(actual),
    'E_SEMANTIC_ARITY',
  );
}

export function failInvalidJsonText(what: string, reason: string): never {
  throw new SemanticError(`Invalid ${what}: ${reason}`, what, undefined, undefined, 'E_SEMANTIC_INVALID_JSON');
}
