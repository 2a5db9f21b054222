/**
 * Branded type for reference identities.
 * Prevents accidental use of raw numbers (counts, indices) as references.
 */
export type RefId = number & { __brand: 'RefId' };

/** Identity of the root reference in every machine. */
export const ROOT_REF = 0 as RefId;

/**
 * Brand a small non-negative integer as a reference identity.
 *
 * Identities are allocated by the registry; this is for tests, trace replay
 * and callers that persisted an id from a previous {@link snapshot}.
 *
 * @param id - Non-negative integer
 * @throws RangeError if `id` is not a non-negative safe integer
 */
export function refId(id: number): RefId {
  if (!Number.isSafeInteger(id) || id < 0) {
    throw new RangeError(`Reference identity must be a non-negative integer, got ${id}`);
  }
  return id as RefId;
}

/**
 * Runtime type guard for values that may be used as reference identities.
 */
export function isRefId(x: unknown): x is RefId {
  return typeof x === 'number' && Number.isSafeInteger(x) && x >= 0;
}

/** `#3` style label used in dumps and error messages. */
export function formatRef(ref: RefId): string {
  return `#${ref}`;
}
