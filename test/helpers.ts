// test/helpers.ts
import { expect } from 'vitest';

// fn が ctor の例外を投げることを確認し、その例外を返す
export function thrownBy<T extends Error>(fn: () => unknown, ctor: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (e) {
    expect(e).toBeInstanceOf(ctor);
    if (e instanceof ctor) return e;
  }
  return expect.fail(`${ctor.name} was not thrown`);
}
