import { stableStringify } from './ledger/hash';

export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(message);
  }
}

export function assertEqual<T>(actual: T, expected: T, message: string): void {
  const left = stableStringify(actual);
  const right = stableStringify(expected);
  if (left !== right) {
    throw new Error(`${message}\n  expected: ${right}\n  actual:   ${left}`);
  }
}

export function expectThrows(fn: () => void, message: string, code?: string) {
  let threw = false;
  try {
    fn();
  } catch (error) {
    threw = true;
    if (code !== undefined) {
      const actual = error && typeof error === 'object' && 'code' in error ? error.code : undefined;
      assert(actual === code, `${message} (expected code ${code}, got ${String(actual)})`);
    }
  }
  assert(threw, message);
}

export async function expectRejects(fn: () => Promise<unknown>, message: string) {
  let threw = false;
  try {
    await fn();
  } catch {
    threw = true;
  }
  assert(threw, message);
}
