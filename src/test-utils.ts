/**
 * Shared Test Utilities
 *
 * Lightweight test framework used by all module tests.
 * NaN-guarded: numeric assertions fail explicitly on NaN instead of silently passing.
 */

let passed = 0;
let failed = 0;

function report(name: string, error: unknown) {
  console.error(`✗ ${name}`);
  console.error(`  ${error instanceof Error ? error.message : String(error)}`);
  failed++;
}

export function test(name: string, fn: () => void) {
  try {
    fn();
    console.log(`✓ ${name}`);
    passed++;
  } catch (e) {
    report(name, e);
  }
}

/**
 * Async variant; await each call so output stays in order.
 */
export async function testAsync(name: string, fn: () => Promise<void>) {
  try {
    await fn();
    console.log(`✓ ${name}`);
    passed++;
  } catch (e) {
    report(name, e);
  }
}

type ErrorClass = abstract new (...args: never[]) => Error;

function assertThrown(fn: unknown, check: (err: unknown) => void) {
  if (typeof fn !== 'function') {
    throw new Error('Expected a function');
  }
  let threw = false;
  try {
    fn();
  } catch (err) {
    threw = true;
    check(err);
  }
  if (!threw) {
    throw new Error('Expected function to throw');
  }
}

export function expect<T>(actual: T) {
  const asNumber = (): number => {
    if (typeof actual !== 'number') {
      throw new Error(`Expected a number, got ${typeof actual}`);
    }
    return actual;
  };

  return {
    toBe(expected: T) {
      if (actual !== expected) {
        throw new Error(`Expected ${String(expected)}, got ${String(actual)}`);
      }
    },
    toEqual(expected: T) {
      if (JSON.stringify(actual) !== JSON.stringify(expected)) {
        throw new Error(`Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
      }
    },
    toBeCloseTo(expected: number, precision: number = 2) {
      const value = asNumber();
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ~${expected}, got ${value} (NaN detected)`);
      }
      const diff = Math.abs(value - expected);
      const threshold = Math.pow(10, -precision);
      if (diff > threshold) {
        throw new Error(`Expected ~${expected}, got ${value} (diff: ${diff.toFixed(4)})`);
      }
    },
    toBeGreaterThan(expected: number) {
      const value = asNumber();
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ${value} > ${expected} (NaN detected)`);
      }
      if (value <= expected) {
        throw new Error(`Expected ${value} > ${expected}`);
      }
    },
    toBeLessThan(expected: number) {
      const value = asNumber();
      if (Number.isNaN(value) || Number.isNaN(expected)) {
        throw new Error(`Expected ${value} < ${expected} (NaN detected)`);
      }
      if (value >= expected) {
        throw new Error(`Expected ${value} < ${expected}`);
      }
    },
    toBeBetween(min: number, max: number) {
      const value = asNumber();
      if (Number.isNaN(value) || Number.isNaN(min) || Number.isNaN(max)) {
        throw new Error(`Expected ${value} to be between ${min} and ${max} (NaN detected)`);
      }
      if (value < min || value > max) {
        throw new Error(`Expected ${value} to be between ${min} and ${max}`);
      }
    },
    toBeTrue() {
      if (actual !== true) {
        throw new Error(`Expected true, got ${String(actual)}`);
      }
    },
    toBeFalse() {
      if (actual !== false) {
        throw new Error(`Expected false, got ${String(actual)}`);
      }
    },
    toThrow(message?: string) {
      assertThrown(actual, err => {
        if (message && err instanceof Error && !err.message.includes(message)) {
          throw new Error(`Expected error containing "${message}", got "${err.message}"`);
        }
      });
    },
    toThrowError(errorClass: ErrorClass, message?: string) {
      assertThrown(actual, err => {
        if (!(err instanceof errorClass)) {
          const got = err instanceof Error ? err.name : String(err);
          throw new Error(`Expected ${errorClass.name}, got ${got}`);
        }
        if (message && !err.message.includes(message)) {
          throw new Error(`Expected error containing "${message}", got "${err.message}"`);
        }
      });
    },
    toHaveLength(expected: number) {
      if (!Array.isArray(actual) || actual.length !== expected) {
        throw new Error(`Expected length ${expected}, got ${Array.isArray(actual) ? actual.length : 'not an array'}`);
      }
    },
    toContain(expected: unknown) {
      if (!Array.isArray(actual) || !actual.includes(expected)) {
        throw new Error(`Expected ${JSON.stringify(actual)} to contain ${JSON.stringify(expected)}`);
      }
    },
  };
}

/**
 * Await a promise expected to reject with `errorClass`
 */
export async function expectRejects(
  promise: Promise<unknown>,
  errorClass: ErrorClass,
  message?: string
) {
  try {
    await promise;
  } catch (err) {
    if (!(err instanceof errorClass)) {
      const got = err instanceof Error ? err.name : String(err);
      throw new Error(`Expected ${errorClass.name}, got ${got}`);
    }
    if (message && !err.message.includes(message)) {
      throw new Error(`Expected error containing "${message}", got "${err.message}"`);
    }
    return;
  }
  throw new Error('Expected promise to reject');
}

/**
 * Run `fn`, returning whatever it sent to console.warn
 */
export function captureWarnings(fn: () => void): string[] {
  const warnings: string[] = [];
  const original = console.warn;
  console.warn = (...args: unknown[]) => {
    warnings.push(args.map(String).join(' '));
  };
  try {
    fn();
  } finally {
    console.warn = original;
  }
  return warnings;
}

export function printSummary() {
  console.log('\n=== Summary ===\n');
  console.log(`Passed: ${passed}`);
  console.log(`Failed: ${failed}`);
  console.log(`Total:  ${passed + failed}`);
  if (failed > 0) {
    process.exit(1);
  }
}
