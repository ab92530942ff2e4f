import { SemanticError } from '../errors/errors.ts';

// 生成関数に不正な値が渡された（ビルダー経由の入力など）
export function failInvalidOperand(message: string, kind: string): never {
  throw new SemanticError(message, kind, undefined, undefined, 'E_SEMANTIC_OPERAND');
}
