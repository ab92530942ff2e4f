// src/serializer/serializerErrors.ts
import { SerializeError } from '../errors/errors.ts';

// 式が無い（ビルダーが空など）
export function failEmpty(target: string): never {
  throw new SerializeError(`Nothing to serialize to ${target}: expression is empty`, undefined, 'E_SERIALIZE_EMPTY');
}

// 出力先の構文で表現できないノード
export function failUnsupportedNode(message: string, nodeType: string): never {
  throw new SerializeError(message, nodeType, 'E_SERIALIZE_UNSUPPORTED');
}
