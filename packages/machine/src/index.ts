export { TokenMachine, initMachine, formatSnapshot, resolveMachineConfig } from './core/machine.js';
export { ROOT_REF, formatRef, isRefId, refId } from './core/reference.js';
export type { RefId } from './core/reference.js';
export { decideAccess, latticeViolation } from './core/validator.js';
export type { AccessDecision } from './core/validator.js';

export { AccessKind, AccessMode, Exclusivity, RefKind, RefState, RelendPolicy } from './types/types.js';
export type {
  MachineConfig,
  MachineEvent,
  MachineEventListener,
  MachineSnapshot,
  PermissionState,
  ReferenceSnapshot,
  ResolvedMachineConfig,
} from './types/types.js';

// Traces
export { parseTrace, traceSchema, ROOT_NAME } from './trace/schema.js';
export type { Trace, TraceConfig, TraceStep } from './trace/schema.js';
export { describeStep, runTrace } from './trace/runner.js';
export type { RunTraceOptions, StepOutcome, TraceFault, TraceReport, TraceVerdict } from './trace/runner.js';

// Errors
export {
  AccessViolationError,
  AliasingFault,
  AlreadyBorrowingError,
  DeadReferenceError,
  DeadTargetError,
  EventListenerError,
  InsufficientTokensError,
  InvalidArgumentError,
  InvalidMachineConfigError,
  InvalidTraceError,
  InvariantViolationError,
  KindViolationError,
  NoTokenError,
  NoTokenToReturnError,
  NotExclusiveError,
  NothingToMergeError,
  PartialReturnForbiddenError,
  ReadOnlyReadUnderWriterError,
  ReadOnlyViolationError,
  UniqueReadUnderWriterError,
  UniqueWriteNotExclusiveError,
  UnknownReferenceError,
  ViolationCode,
  WriteToReadOnlyTokenError,
  isAliasingFault,
} from './errors/errors.js';
export type { AccessViolation } from './errors/errors.js';
