import type { RefId } from '../core/reference.js';

/**
 * Kinds of reference a program can derive from the root.
 *
 * The kind is fixed when the reference is created and decides which
 * combinations of exclusivity and access mode allow it to read or write:
 *   - **Unique**: exclusive, read-write (`&mut T`-like)
 *   - **SharedReadWrite**: shared with interior mutability (`&Cell<T>`-like)
 *   - **SharedReadOnly**: shared, never writes (`&T`-like)
 *
 * A constant object instead of a string union keeps autocomplete and lets
 * plain JavaScript callers use the same names.
 *
 * @example
 * ```typescript
 * const view = machine.create(root, RefKind.SharedReadOnly);
 * ```
 */
export const RefKind = {
  Unique: 'Unique',
  SharedReadWrite: 'SharedReadWrite',
  SharedReadOnly: 'SharedReadOnly',
} as const;

export type RefKindType = (typeof RefKind)[keyof typeof RefKind];
export type RefKind = RefKindType;

/**
 * Lifecycle of a reference. Transitions only move forward:
 * Created → Borrowing → Dead.
 */
export const RefState = {
  /** Never held a unit. */
  Created: 'Created',
  /** Received at least one unit (it may have passed all of it along since). */
  Borrowing: 'Borrowing',
  /** Returned its last unit to its parent; can never be lent to again. */
  Dead: 'Dead',
} as const;

export type RefStateType = (typeof RefState)[keyof typeof RefState];
export type RefState = RefStateType;

export const AccessMode = {
  ReadOnly: 'ReadOnly',
  ReadWrite: 'ReadWrite',
} as const;

export type AccessModeType = (typeof AccessMode)[keyof typeof AccessMode];
export type AccessMode = AccessModeType;

export const AccessKind = {
  Read: 'Read',
  Write: 'Write',
} as const;

export type AccessKindType = (typeof AccessKind)[keyof typeof AccessKind];
export type AccessKind = AccessKindType;

/**
 * Derived from the global unit count: `Exclusive` when exactly one unit
 * exists, `Shared` otherwise. Never stored.
 */
export const Exclusivity = {
  Exclusive: 'Exclusive',
  Shared: 'Shared',
} as const;

export type ExclusivityType = (typeof Exclusivity)[keyof typeof Exclusivity];
export type Exclusivity = ExclusivityType;

/**
 * What the machine does when a parent lends to a child that is already
 * borrowing and still holds a unit.
 */
export const RelendPolicy = {
  Allow: 'allow',
  Forbid: 'forbid',
} as const;

export type RelendPolicyType = (typeof RelendPolicy)[keyof typeof RelendPolicy];
export type RelendPolicy = RelendPolicyType;

/**
 * Mutable bookkeeping for one reference. Owned by the registry; callers only
 * ever see frozen {@link ReferenceSnapshot} copies.
 */
export interface ReferenceRecord {
  readonly id: RefId;
  readonly kind: RefKindType;
  /** Derivation parent. The root is its own parent. */
  readonly parent: RefId;
  state: RefStateType;
  /** Units currently owned. */
  units: number;
  /** Units this reference split off and has not merged back yet. */
  splits: number;
}

export type ReferenceSnapshot = Readonly<ReferenceRecord>;

/** Global permission state as observed at one instant. */
export interface PermissionState {
  readonly exclusivity: ExclusivityType;
  readonly accessMode: AccessModeType;
}

export interface MachineSnapshot extends PermissionState {
  readonly name: string;
  readonly root: RefId;
  readonly unitCount: number;
  readonly references: readonly ReferenceSnapshot[];
}

/**
 * Transitions reported to {@link MachineConfig.onEvent}. Events are emitted
 * only after the transition has committed.
 */
export type MachineEvent =
  | { readonly type: 'create'; readonly ref: RefId; readonly parent: RefId; readonly kind: RefKindType }
  | { readonly type: 'lend'; readonly from: RefId; readonly to: RefId }
  | { readonly type: 'return'; readonly from: RefId; readonly to: RefId; readonly died: boolean }
  | { readonly type: 'split'; readonly ref: RefId; readonly unitCount: number }
  | { readonly type: 'merge'; readonly ref: RefId; readonly unitCount: number }
  | { readonly type: 'mode'; readonly ref: RefId; readonly accessMode: AccessModeType }
  | { readonly type: 'access'; readonly ref: RefId; readonly access: AccessKindType };

export type MachineEventListener = (event: MachineEvent) => void;

/**
 * Options accepted by {@link TokenMachine.init}.
 *
 * @example
 * ```typescript
 * const { root, machine } = TokenMachine.init({
 *   name: 'swap-trace',
 *   relendPolicy: RelendPolicy.Forbid,
 *   onEvent: (e) => events.push(e),
 * });
 * ```
 */
export interface MachineConfig {
  /** Label used in dumps and error messages. Defaults to `machine`. */
  name?: string;
  /** Kind of the root reference. Defaults to `Unique`. */
  rootKind?: RefKindType;
  /** Initial access mode. Defaults to `ReadWrite`. */
  accessMode?: AccessModeType;
  /** Re-lend behaviour. Defaults to `allow`. */
  relendPolicy?: RelendPolicyType;
  onEvent?: MachineEventListener;
}

/** Configuration after defaults are applied. */
export interface ResolvedMachineConfig {
  readonly name: string;
  readonly rootKind: RefKindType;
  readonly accessMode: AccessModeType;
  readonly relendPolicy: RelendPolicyType;
  readonly onEvent: MachineEventListener | undefined;
}
