/**
 * ID generation utilities with support for deterministic testing.
 *
 * By default, uses timestamp + crypto.randomUUID() for unique IDs.
 * For deterministic testing, pass a custom IdGenerator.
 */

/**
 * IdGenerator interface for injectable ID generation.
 */
export interface IdGenerator {
  /** Generate a unique identifier */
  generate(prefix?: string): string;
}

/**
 * Default ID generator using timestamp + crypto random.
 */
export const defaultIdGenerator: IdGenerator = {
  generate: (prefix?: string) => {
    const timestamp = Date.now().toString(36);
    const random = globalThis.crypto.randomUUID().slice(0, 8);
    return prefix ? `${prefix}-${timestamp}-${random}` : `${timestamp}-${random}`;
  },
};

/**
 * Generator yielding `${prefix}-1`, `${prefix}-2`, ... Handy in tests.
 */
export function createSequentialIdGenerator(): IdGenerator {
  let counter = 0;
  return {
    generate: (prefix?: string) => {
      counter++;
      return prefix ? `${prefix}-${counter}` : String(counter);
    },
  };
}

/**
 * Generate a handle for one parsed invoice record.
 */
export function generateRecordId(idGenerator: IdGenerator = defaultIdGenerator): string {
  return idGenerator.generate('rec');
}

/**
 * Generate an ID for a review/build session.
 */
export function generateSessionId(idGenerator: IdGenerator = defaultIdGenerator): string {
  return idGenerator.generate('ses');
}
