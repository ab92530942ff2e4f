// src/transform/transformErrors.ts
import { PolicyError } from '../errors/errors.ts';

export function failOnlyAnd(nodeType: string, found: string): never {
  throw new PolicyError(`Only AND is supported when flattening, found ${found}`, nodeType);
}
