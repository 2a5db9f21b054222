/*
 * Access validator
 * ----------------
 * The permission lattice. Given a reference record, the requested access and
 * the live (exclusivity, access mode) pair, decide whether the access is
 * admissible and, if not, which rule it breaks.
 *
 *                     | Read                          | Write
 *   ------------------+-------------------------------+------------------------------
 *   SharedReadOnly    | Exclusive or (Shared, RO)     | never
 *   SharedReadWrite   | always                        | mode RW
 *   Unique            | Exclusive or (Shared, RO)     | (Exclusive, RW)
 *
 * Before the lattice applies, the reference must hold a unit and be alive.
 * This module is pure: it never mutates. It throws only for tags outside
 * their enumeration, which is a caller bug rather than a verdict.
 */
import {
  InvalidArgumentError,
  ViolationCode,
  type AccessViolation,
  type ViolationCodeType,
} from '../errors/errors.js';
import {
  AccessKind,
  AccessMode,
  Exclusivity,
  RefKind,
  RefState,
  type AccessKindType,
  type PermissionState,
  type ReferenceSnapshot,
} from '../types/types.js';

export const isOneOf = <T extends string>(values: Record<string, T>, x: unknown): x is T =>
  typeof x === 'string' && Object.values<unknown>(values).includes(x);

/**
 * Reject a run-time tag that is not one of `values`.
 *
 * @throws InvalidArgumentError
 */
export function assertOneOf<T extends string>(
  argument: string,
  values: Record<string, T>,
  x: unknown
): asserts x is T {
  if (!isOneOf(values, x)) {
    throw new InvalidArgumentError(argument, x, Object.values(values));
  }
}

export type AccessDecision =
  | { readonly allowed: true; readonly permissions: PermissionState }
  | { readonly allowed: false; readonly violation: AccessViolation };

/**
 * Reading is safe whenever no writer can be active concurrently: either the
 * reader's unit is the only one, or the shared token is frozen read-only.
 */
function readIsSafe(p: PermissionState): boolean {
  return (
    p.exclusivity === Exclusivity.Exclusive ||
    (p.exclusivity === Exclusivity.Shared && p.accessMode === AccessMode.ReadOnly)
  );
}

/**
 * Apply the lattice to a reference that holds a live unit.
 *
 * @returns the broken rule, or `undefined` when the access is admissible
 * @throws InvalidArgumentError for an unknown kind or access
 */
export function latticeViolation(
  kind: ReferenceSnapshot['kind'],
  access: AccessKindType,
  p: PermissionState
): ViolationCodeType | undefined {
  assertOneOf('access kind', AccessKind, access);

  switch (kind) {
    case RefKind.SharedReadOnly:
      if (access === AccessKind.Write) return ViolationCode.ReadOnlyViolation;
      return readIsSafe(p) ? undefined : ViolationCode.ReadOnlyReadUnderWriter;

    case RefKind.SharedReadWrite:
      if (access === AccessKind.Read) return undefined;
      return p.accessMode === AccessMode.ReadWrite ? undefined : ViolationCode.WriteToReadOnlyToken;

    case RefKind.Unique:
      if (access === AccessKind.Read) {
        return readIsSafe(p) ? undefined : ViolationCode.UniqueReadUnderWriter;
      }
      if (p.accessMode !== AccessMode.ReadWrite) return ViolationCode.WriteToReadOnlyToken;
      return p.exclusivity === Exclusivity.Exclusive
        ? undefined
        : ViolationCode.UniqueWriteNotExclusive;

    default: {
      const unexpected: never = kind;
      throw new InvalidArgumentError('reference kind', unexpected, Object.values(RefKind));
    }
  }
}

/**
 * Holding and liveness checks shared by accesses and access mode changes.
 */
export function holderViolation(ref: ReferenceSnapshot): ViolationCodeType | undefined {
  if (ref.units === 0) return ViolationCode.NoToken;
  if (ref.state === RefState.Dead) return ViolationCode.DeadReference;
  return undefined;
}

/**
 * Decide whether `ref` may perform `access` under `permissions`.
 */
export function decideAccess(
  ref: ReferenceSnapshot,
  access: AccessKindType,
  permissions: PermissionState
): AccessDecision {
  const code = holderViolation(ref) ?? latticeViolation(ref.kind, access, permissions);
  if (code === undefined) {
    return { allowed: true, permissions };
  }
  return {
    allowed: false,
    violation: {
      code,
      ref: ref.id,
      kind: ref.kind,
      access,
      exclusivity: permissions.exclusivity,
      accessMode: permissions.accessMode,
    },
  };
}
