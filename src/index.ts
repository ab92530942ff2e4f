// src/index.ts
export * from './ast/types.ts';
export * as ast from './ast/factory.ts';
export * from './ast/guards.ts';
export { toGeometry, isGeometryType, bboxToPolygon } from './ast/geometry.ts';
export { tokenize, parseText, tryParseText } from './parser/index.ts';
export { serializeText, quoteString } from './serializer/text.ts';
export { toWkt } from './serializer/wkt.ts';
export * from './json/parser.ts';
export * from './json/serializer.ts';
export { JSON_OPERATORS, operatorName } from './json/operators.ts';
export * from './transform/flatten.ts';
export * from './transform/translate.ts';
export { sqliteDialect, toSelect } from './adapters/sqlite/index.ts';
export type { SqlQuery } from './adapters/sqlite/index.ts';
export { odataDialect } from './adapters/odata/index.ts';
export * from './builder/builder.ts';
export * from './queryables/index.ts';
export {
  Cql2Error,
  LexError,
  TextSyntaxError,
  SemanticError,
  SerializeError,
  UnsupportedOperatorError,
  PolicyError,
  attempt,
} from './errors/errors.ts';
export type { ErrorCode, Result } from './errors/errors.ts';
