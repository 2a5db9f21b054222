import { formatRef, type RefId } from '../core/reference.js';
import type {
  AccessKindType,
  AccessModeType,
  ExclusivityType,
  RefKindType,
} from '../types/types.js';

const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Tags for every rule the machine can see broken.
 *
 * The tag is stable and meant for programmatic matching (trace `expect`
 * fields, `instanceof`-free checks across module copies); the message is not.
 */
export const ViolationCode = {
  UnknownReference: 'UnknownReference',
  KindViolation: 'KindViolation',
  InsufficientTokens: 'InsufficientTokens',
  DeadTarget: 'DeadTarget',
  AlreadyBorrowing: 'AlreadyBorrowing',
  NoTokenToReturn: 'NoTokenToReturn',
  PartialReturnForbidden: 'PartialReturnForbidden',
  NothingToMerge: 'NothingToMerge',
  NotExclusive: 'NotExclusive',
  NoToken: 'NoToken',
  DeadReference: 'DeadReference',
  ReadOnlyViolation: 'ReadOnlyViolation',
  ReadOnlyReadUnderWriter: 'ReadOnlyReadUnderWriter',
  UniqueReadUnderWriter: 'UniqueReadUnderWriter',
  WriteToReadOnlyToken: 'WriteToReadOnlyToken',
  UniqueWriteNotExclusive: 'UniqueWriteNotExclusive',
} as const;

export type ViolationCodeType = (typeof ViolationCode)[keyof typeof ViolationCode];
export type ViolationCode = ViolationCodeType;

export const VIOLATION_CODES = Object.values(ViolationCode) as [
  ViolationCodeType,
  ...ViolationCodeType[],
];

/**
 * Base class of every aliasing fault.
 *
 * A fault means the traced program broke the aliasing discipline. The
 * machine state is left exactly as it was before the failing call.
 */
export class AliasingFault extends Error {
  constructor(
    public readonly code: ViolationCodeType,
    message: string
  ) {
    super(message);
    this.name = 'AliasingFault';
  }
}

export function isAliasingFault(err: unknown): err is AliasingFault {
  return err instanceof AliasingFault;
}

export class UnknownReferenceError extends AliasingFault {
  constructor(
    public ref: number,
    public machineName: string,
    public referenceCount: number
  ) {
    const dev = [
      `Unknown reference #${ref} in machine '${machineName}'.`,
      '',
      `This machine has allocated ${referenceCount} reference(s): #0 to #${referenceCount - 1}.`,
      '',
      'To fix this:',
      `  1. Only pass references returned by create() or init() of the same machine`,
      `  2. Run independent traces on independent machines and do not mix their references`,
    ];
    super(ViolationCode.UnknownReference, format(`Unknown reference #${ref}.`, dev));
    this.name = 'UnknownReferenceError';
  }
}

export class KindViolationError extends AliasingFault {
  constructor(
    public parent: RefId,
    public parentKind: RefKindType,
    public requestedKind: RefKindType
  ) {
    const dev = [
      'Kind violation',
      '',
      `Reference ${formatRef(parent)} is ${parentKind} and cannot derive a ${requestedKind} reference.`,
      '',
      'A read-only reference can only spawn read-only references; anything else would',
      'escalate its capability through derivation.',
    ];
    super(
      ViolationCode.KindViolation,
      format(`${parentKind} reference ${formatRef(parent)} cannot derive ${requestedKind}.`, dev)
    );
    this.name = 'KindViolationError';
  }
}

export class InsufficientTokensError extends AliasingFault {
  constructor(
    public operation: 'lend' | 'split',
    public holder: RefId,
    public beneficiary?: RefId
  ) {
    const action =
      operation === 'lend' && beneficiary !== undefined
        ? `lend a unit to ${formatRef(beneficiary)}`
        : 'split a unit';
    const dev = [
      'Insufficient tokens',
      '',
      `Reference ${formatRef(holder)} holds no unit and cannot ${action}.`,
      '',
      'A unit must be lent to this reference (or returned to it by a child) first.',
    ];
    super(
      ViolationCode.InsufficientTokens,
      format(`Reference ${formatRef(holder)} cannot ${action} without holding one.`, dev)
    );
    this.name = 'InsufficientTokensError';
  }
}

export class DeadTargetError extends AliasingFault {
  constructor(
    public target: RefId,
    public parent: RefId
  ) {
    const dev = [
      'Dead target',
      '',
      `Reference ${formatRef(parent)} cannot lend to ${formatRef(target)}: ${formatRef(target)} is dead.`,
      '',
      'A reference dies when it returns its last unit to its parent.',
      'Create a new reference from the parent instead.',
    ];
    super(ViolationCode.DeadTarget, format(`Reference ${formatRef(target)} is dead.`, dev));
    this.name = 'DeadTargetError';
  }
}

export class AlreadyBorrowingError extends AliasingFault {
  constructor(
    public target: RefId,
    public units: number
  ) {
    const dev = [
      'Already borrowing',
      '',
      `Reference ${formatRef(target)} still holds ${units} unit(s) and the machine forbids re-lending.`,
      '',
      `Return the unit held by ${formatRef(target)} first, or use relendPolicy 'allow'.`,
    ];
    super(
      ViolationCode.AlreadyBorrowing,
      format(`Reference ${formatRef(target)} is already borrowing.`, dev)
    );
    this.name = 'AlreadyBorrowingError';
  }
}

export class NoTokenToReturnError extends AliasingFault {
  constructor(public source: RefId) {
    const dev = [
      'No token to return',
      '',
      `Reference ${formatRef(source)} holds no unit, so it has nothing to give back.`,
    ];
    super(
      ViolationCode.NoTokenToReturn,
      format(`Reference ${formatRef(source)} has no unit to return.`, dev)
    );
    this.name = 'NoTokenToReturnError';
  }
}

export class PartialReturnForbiddenError extends AliasingFault {
  constructor(
    public source: RefId,
    public splits: number
  ) {
    const dev = [
      'Partial return forbidden',
      '',
      `Reference ${formatRef(source)} has ${splits} split unit(s) outstanding.`,
      '',
      'Only a whole unit can go back to the parent.',
      `Merge the split units (merge() ${splits} time(s)) before returning.`,
    ];
    super(
      ViolationCode.PartialReturnForbidden,
      format(`Reference ${formatRef(source)} must merge ${splits} split unit(s) before returning.`, dev)
    );
    this.name = 'PartialReturnForbiddenError';
  }
}

export class NothingToMergeError extends AliasingFault {
  constructor(
    public source: RefId,
    public units: number,
    public splits: number
  ) {
    const dev = [
      'Nothing to merge',
      '',
      `Reference ${formatRef(source)} holds ${units} unit(s) with ${splits} split(s) outstanding.`,
      '',
      'Merging needs at least two held units and an outstanding split of this reference.',
    ];
    super(
      ViolationCode.NothingToMerge,
      format(`Reference ${formatRef(source)} has nothing to merge.`, dev)
    );
    this.name = 'NothingToMergeError';
  }
}

export class NotExclusiveError extends AliasingFault {
  constructor(
    public source: RefId,
    public unitCount: number
  ) {
    const dev = [
      'Not exclusive',
      '',
      `Reference ${formatRef(source)} cannot change the access mode while ${unitCount} units exist.`,
      '',
      'The access mode can only change while a single unit exists.',
      'Merge split units and collect them back into one reference first.',
    ];
    super(
      ViolationCode.NotExclusive,
      format(`Access mode change needs exclusivity (${unitCount} units exist).`, dev)
    );
    this.name = 'NotExclusiveError';
  }
}

/**
 * A rejected access as computed by the validator, before it is thrown.
 */
export interface AccessViolation {
  readonly code: ViolationCodeType;
  readonly ref: RefId;
  readonly kind: RefKindType;
  /** `mode` when the rejected operation is an access mode change. */
  readonly access: AccessKindType | 'mode';
  readonly exclusivity: ExclusivityType;
  readonly accessMode: AccessModeType;
}

const describeAccess = (v: AccessViolation): string =>
  v.access === 'mode' ? 'change the access mode' : v.access === 'Read' ? 'read' : 'write';

const describeRegime = (v: AccessViolation): string => `(${v.exclusivity}, ${v.accessMode})`;

const subject = (v: AccessViolation): string =>
  `${v.kind} ${formatRef(v.ref)} cannot ${describeAccess(v)}`;

/**
 * Base class of faults raised by the access validator.
 */
export class AccessViolationError extends AliasingFault {
  constructor(
    public violation: AccessViolation,
    summary: string,
    detail: string[]
  ) {
    const head = `${subject(violation)}: ${summary}`;
    super(
      violation.code,
      format(head, [head, '', `Token regime: ${describeRegime(violation)}.`, ...detail])
    );
    this.name = 'AccessViolationError';
  }
}

export class NoTokenError extends AccessViolationError {
  constructor(violation: AccessViolation) {
    super(violation, 'it holds no unit', [
      '',
      'A reference needs a unit lent to it before it can access memory.',
    ]);
    this.name = 'NoTokenError';
  }
}

export class DeadReferenceError extends AccessViolationError {
  constructor(violation: AccessViolation) {
    super(violation, 'it is dead', [
      '',
      'A reference that returned its last unit can never access memory again,',
      'even if units returned by its children pass through it.',
    ]);
    this.name = 'DeadReferenceError';
  }
}

export class ReadOnlyViolationError extends AccessViolationError {
  constructor(violation: AccessViolation) {
    super(violation, 'it is read-only', ['', 'SharedReadOnly references never write.']);
    this.name = 'ReadOnlyViolationError';
  }
}

export class ReadOnlyReadUnderWriterError extends AccessViolationError {
  constructor(violation: AccessViolation) {
    super(violation, 'a writer may be active', [
      '',
      'A read-only reference reads only when it is the sole unit holder,',
      'or when the shared token is in ReadOnly mode.',
    ]);
    this.name = 'ReadOnlyReadUnderWriterError';
  }
}

export class UniqueReadUnderWriterError extends AccessViolationError {
  constructor(violation: AccessViolation) {
    super(violation, 'a writer may be active', [
      '',
      'A unique reference reads only when it is the sole unit holder,',
      'or when the shared token is in ReadOnly mode.',
    ]);
    this.name = 'UniqueReadUnderWriterError';
  }
}

export class WriteToReadOnlyTokenError extends AccessViolationError {
  constructor(violation: AccessViolation) {
    super(violation, 'the token is read-only', [
      '',
      'Switch the access mode to ReadWrite from the sole unit holder before writing.',
    ]);
    this.name = 'WriteToReadOnlyTokenError';
  }
}

export class UniqueWriteNotExclusiveError extends AccessViolationError {
  constructor(violation: AccessViolation) {
    super(violation, 'other units exist', [
      '',
      'A unique reference writes only as the sole holder of a write-capable unit.',
      'Merge split units and collect them back before writing.',
    ]);
    this.name = 'UniqueWriteNotExclusiveError';
  }
}

/**
 * Build the throwable error for a violation computed by the validator.
 */
export function toAccessViolationError(violation: AccessViolation): AccessViolationError {
  switch (violation.code) {
    case ViolationCode.NoToken:
      return new NoTokenError(violation);
    case ViolationCode.DeadReference:
      return new DeadReferenceError(violation);
    case ViolationCode.ReadOnlyViolation:
      return new ReadOnlyViolationError(violation);
    case ViolationCode.ReadOnlyReadUnderWriter:
      return new ReadOnlyReadUnderWriterError(violation);
    case ViolationCode.UniqueReadUnderWriter:
      return new UniqueReadUnderWriterError(violation);
    case ViolationCode.WriteToReadOnlyToken:
      return new WriteToReadOnlyTokenError(violation);
    case ViolationCode.UniqueWriteNotExclusive:
      return new UniqueWriteNotExclusiveError(violation);
    default:
      return new AccessViolationError(violation, violation.code, []);
  }
}

/**
 * A tag argument (reference kind, access kind, access mode) outside its
 * enumeration. This is a caller bug, not an aliasing fault.
 */
export class InvalidArgumentError extends Error {
  constructor(
    public argument: string,
    public value: unknown,
    public expected: readonly string[]
  ) {
    let shown: string;
    try {
      shown = JSON.stringify(value) ?? String(value);
    } catch {
      shown = String(value);
    }

    const dev = [
      'Invalid argument',
      '',
      `Received ${argument} ${shown}.`,
      '',
      `Expected one of: ${expected.join(', ')}`,
    ];
    super(format(`Invalid ${argument} ${shown}.`, dev));
    this.name = 'InvalidArgumentError';
  }
}

/**
 * An `onEvent` listener threw. The transition it was notified about has
 * already committed; the original error is the `cause`.
 */
export class EventListenerError extends Error {
  constructor(
    public machineName: string,
    public eventType: string,
    cause: unknown
  ) {
    const dev = [
      'Event listener failed',
      '',
      `The onEvent listener of machine '${machineName}' threw on a '${eventType}' event. See 'cause' for details.`,
      '',
      'The transition had already committed and is not rolled back.',
    ];
    super(format(`onEvent listener threw on '${eventType}' (committed).`, dev), {
      cause: cause,
    });
    this.name = 'EventListenerError';
  }
}

export class InvalidMachineConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid machine configuration', '', `Invalid machine configuration: ${reason}`];
    super(format(`Invalid machine configuration: ${reason}`, dev));
    this.name = 'InvalidMachineConfigError';
  }
}

/**
 * Raised when the bookkeeping itself is inconsistent. Operations never
 * produce this state; seeing it means a bug in the machine, not in the trace.
 */
export class InvariantViolationError extends Error {
  constructor(
    public machineName: string,
    public problems: string[]
  ) {
    const dev = [
      `Machine '${machineName}' is in an inconsistent state:`,
      '',
      ...problems.map((p) => `  - ${p}`),
    ];
    super(format(`Machine '${machineName}' broke ${problems.length} invariant(s).`, dev));
    this.name = 'InvariantViolationError';
  }
}

export class InvalidTraceError extends Error {
  constructor(
    public traceName: string,
    public issues: string[]
  ) {
    const dev = [
      `Invalid trace '${traceName}'`,
      '',
      ...issues.map((i) => `  - ${i}`),
      '',
      'A trace is { "name": string, "config"?: {...}, "steps": [...] } where every step',
      "names references bound by an earlier 'create' step (or 'root').",
    ];
    super(format(`Invalid trace '${traceName}': ${issues.length} issue(s).`, dev));
    this.name = 'InvalidTraceError';
  }
}
