// cql2kit - error types and helpers
// 目的: 層ごとに例外型を分離し、呼び出し側が分類しやすい構造を提供
// ログはライブラリ層では行わず、呼び出し側で処理する方針

export type ErrorCode =
  | 'E_LEX_INVALID_CHARACTER'
  | 'E_SYNTAX_UNEXPECTED_TOKEN'
  | 'E_SYNTAX_UNCLOSED_GROUP'
  | 'E_SYNTAX_INVALID_LITERAL'
  | 'E_SYNTAX_GENERIC'
  | 'E_SEMANTIC_INVALID_JSON'
  | 'E_SEMANTIC_UNKNOWN_OP'
  | 'E_SEMANTIC_ARITY'
  | 'E_SEMANTIC_OPERAND'
  | 'E_SERIALIZE_EMPTY'
  | 'E_SERIALIZE_UNSUPPORTED'
  | 'E_TRANSLATE_UNSUPPORTED_OPERATOR'
  | 'E_POLICY_ONLY_AND';

export abstract class Cql2Error extends Error {
  public abstract readonly code: ErrorCode;
  constructor(message: string) {
    super(message);
    // Errorのプロトタイプ連鎖調整（Babel/TS互換）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Lexer: どのトークンにもマッチしない文字
export class LexError extends Cql2Error {
  public readonly code: ErrorCode = 'E_LEX_INVALID_CHARACTER';
  constructor(
    message: string,
    public readonly offset: number,
    public readonly line?: number,
    public readonly column?: number,
    public readonly snippet?: string,
  ) {
    super(message);
    this.name = 'LexError';
  }
}

// Parser: テキスト構文の文法違反
// グローバルの SyntaxError と衝突を避ける命名
export class TextSyntaxError extends Cql2Error {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly token: string,
    public readonly offset: number,
    public readonly line?: number,
    public readonly column?: number,
    code: Extract<
      ErrorCode,
      'E_SYNTAX_UNEXPECTED_TOKEN' | 'E_SYNTAX_UNCLOSED_GROUP' | 'E_SYNTAX_INVALID_LITERAL' | 'E_SYNTAX_GENERIC'
    > = 'E_SYNTAX_GENERIC',
  ) {
    super(message);
    this.name = 'TextSyntaxError';
    this.code = code;
  }
}

// JSON パーサ: 未知の op / 引数の数 / オペランド形状
export class SemanticError extends Cql2Error {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly op?: string,
    public readonly expected?: string,
    public readonly actual?: string,
    code: Extract<
      ErrorCode,
      'E_SEMANTIC_INVALID_JSON' | 'E_SEMANTIC_UNKNOWN_OP' | 'E_SEMANTIC_ARITY' | 'E_SEMANTIC_OPERAND'
    > = 'E_SEMANTIC_OPERAND',
  ) {
    super(message);
    this.name = 'SemanticError';
    this.code = code;
  }
}

// Serializer: 空入力、表現できないノード
export class SerializeError extends Cql2Error {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly nodeType?: string,
    code: Extract<ErrorCode, 'E_SERIALIZE_EMPTY' | 'E_SERIALIZE_UNSUPPORTED'> = 'E_SERIALIZE_UNSUPPORTED',
  ) {
    super(message);
    this.name = 'SerializeError';
    this.code = code;
  }
}

// Translator: 方言が表現できない演算子
export class UnsupportedOperatorError extends Cql2Error {
  public readonly code: ErrorCode = 'E_TRANSLATE_UNSUPPORTED_OPERATOR';
  constructor(
    message: string,
    public readonly dialect: string, // 例: 'sqlite' / 'odata'
    public readonly operator: string,
  ) {
    super(message);
    this.name = 'UnsupportedOperatorError';
  }
}

// flattenConjunction: AND 以外の論理演算子
export class PolicyError extends Cql2Error {
  public readonly code: ErrorCode = 'E_POLICY_ONLY_AND';
  constructor(
    message: string,
    public readonly nodeType: string,
  ) {
    super(message);
    this.name = 'PolicyError';
  }
}

// スニペット整形（必要に応じて使用）
export function formatLocation(line?: number, column?: number): string {
  if (line == null || column == null) return '';
  return `${line}:${column}`;
}

// 例外を値として受け取りたい呼び出し側向け
export type Result<T> = { ok: true; value: T } | { ok: false; error: Cql2Error };

export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof Cql2Error) return { ok: false, error: e };
    throw e;
  }
}
