/* TokenMachine
 *
 * Facade over the four pieces that model one memory location:
 *
 *   ReferenceRegistry   identities, kinds, parents, lifecycle states
 *   TokenLedger         held units, split counts, global unit count
 *   PermissionRegister  access mode (exclusivity is derived)
 *   validator           the permission lattice
 *
 * Usage example:
 * ```typescript
 * const { root, machine } = TokenMachine.init();
 *
 * const view = machine.create(root, RefKind.SharedReadOnly);
 * machine.lend(view);
 * machine.useToken(view, AccessKind.Read);
 * machine.returnUnit(view); // view is now dead
 *
 * machine.useToken(root, AccessKind.Write);
 * ```
 *
 * Every operation is synchronous and atomic: it either commits its whole
 * transition and then notifies `onEvent`, or throws an AliasingFault and
 * leaves the state untouched. A listener that throws surfaces as an
 * EventListenerError, raised after the commit. Tags that are not one of
 * their constants (`'unique'`, `'write'`) throw InvalidArgumentError before
 * anything is read or changed. Faults are not meant to be recovered from;
 * an embedding interpreter should stop the traced execution.
 *
 * One machine models one linear call sequence. Run independent traces on
 * independent machines.
 */

import {
  EventListenerError,
  InvalidMachineConfigError,
  InvariantViolationError,
  NotExclusiveError,
  toAccessViolationError,
} from '../errors/errors.js';
import {
  AccessKind,
  AccessMode,
  RefKind,
  RefState,
  RelendPolicy,
  type AccessKindType,
  type AccessModeType,
  type ExclusivityType,
  type MachineConfig,
  type MachineEvent,
  type MachineSnapshot,
  type PermissionState,
  type RefKindType,
  type ReferenceSnapshot,
  type ResolvedMachineConfig,
} from '../types/types.js';
import { TokenLedger } from './ledger.js';
import { PermissionRegister } from './permissions.js';
import { formatRef, ROOT_REF, type RefId } from './reference.js';
import { ReferenceRegistry } from './registry.js';
import {
  assertOneOf,
  decideAccess,
  holderViolation,
  isOneOf,
  type AccessDecision,
} from './validator.js';

const DEFAULT_NAME = 'machine';

/**
 * Apply defaults and reject malformed options.
 *
 * @throws InvalidMachineConfigError
 */
export function resolveMachineConfig(config: MachineConfig = {}): ResolvedMachineConfig {
  if (typeof config !== 'object' || config === null) {
    throw new InvalidMachineConfigError('config must be an object');
  }

  const name = config.name ?? DEFAULT_NAME;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new InvalidMachineConfigError('name must be a non-empty string');
  }

  const rootKind = config.rootKind ?? RefKind.Unique;
  if (!isOneOf(RefKind, rootKind)) {
    throw new InvalidMachineConfigError(`unknown rootKind '${String(rootKind)}'`);
  }

  const accessMode = config.accessMode ?? AccessMode.ReadWrite;
  if (!isOneOf(AccessMode, accessMode)) {
    throw new InvalidMachineConfigError(`unknown accessMode '${String(accessMode)}'`);
  }

  const relendPolicy = config.relendPolicy ?? RelendPolicy.Allow;
  if (!isOneOf(RelendPolicy, relendPolicy)) {
    throw new InvalidMachineConfigError(`unknown relendPolicy '${String(relendPolicy)}'`);
  }

  if (config.onEvent !== undefined && typeof config.onEvent !== 'function') {
    throw new InvalidMachineConfigError('onEvent must be a function');
  }

  return { name, rootKind, accessMode, relendPolicy, onEvent: config.onEvent };
}

export class TokenMachine {
  readonly name: string;
  readonly root: RefId = ROOT_REF;

  private readonly registry: ReferenceRegistry;
  private readonly ledger: TokenLedger;
  private readonly permissions: PermissionRegister;
  private readonly config: ResolvedMachineConfig;

  private constructor(config: ResolvedMachineConfig) {
    this.config = config;
    this.name = config.name;
    this.registry = new ReferenceRegistry(config.name, config.rootKind);
    this.ledger = new TokenLedger(this.registry, config.relendPolicy);
    this.permissions = new PermissionRegister(this.ledger, config.accessMode);
  }

  /**
   * Create a machine whose root reference holds the whole token.
   *
   * @throws InvalidMachineConfigError
   */
  static init(config?: MachineConfig): { root: RefId; machine: TokenMachine } {
    const machine = new TokenMachine(resolveMachineConfig(config));
    return { root: machine.root, machine };
  }

  // ---------------------------------------------------------------------------
  // Registry
  // ---------------------------------------------------------------------------

  /**
   * Derive a new reference from `parent`. The new reference holds nothing
   * until `parent` lends it a unit.
   *
   * @throws InvalidArgumentError for an unknown kind
   * @throws UnknownReferenceError
   * @throws KindViolationError if a read-only parent would spawn a mutable child
   */
  create(parent: RefId, kind: RefKindType): RefId {
    assertOneOf('reference kind', RefKind, kind);
    const record = this.registry.create(parent, kind);
    this.emit({ type: 'create', ref: record.id, parent, kind });
    return record.id;
  }

  // ---------------------------------------------------------------------------
  // Ledger
  // ---------------------------------------------------------------------------

  /**
   * Move one unit from `target`'s parent to `target`.
   *
   * @throws InsufficientTokensError
   * @throws DeadTargetError
   * @throws AlreadyBorrowingError under relendPolicy `forbid`
   */
  lend(target: RefId): void {
    const { from, to } = this.ledger.lend(target);
    this.emit({ type: 'lend', from, to });
  }

  /**
   * Give one whole unit back to the parent; the source dies when it has
   * none left.
   *
   * @throws NoTokenToReturnError
   * @throws PartialReturnForbiddenError
   */
  returnUnit(source: RefId): void {
    const { from, to, died } = this.ledger.returnUnit(source);
    this.emit({ type: 'return', from, to, died });
  }

  /**
   * @throws InsufficientTokensError
   */
  split(source: RefId): void {
    const unitCount = this.ledger.split(source);
    this.emit({ type: 'split', ref: source, unitCount });
  }

  /**
   * Undo one of `source`'s own splits.
   *
   * @throws NothingToMergeError if `source` holds fewer than two units, or
   *   holds two lent units but split none itself (merging those would make
   *   its split count negative)
   */
  merge(source: RefId): void {
    const unitCount = this.ledger.merge(source);
    this.emit({ type: 'merge', ref: source, unitCount });
  }

  // ---------------------------------------------------------------------------
  // Permission register
  // ---------------------------------------------------------------------------

  /**
   * Change the global access mode. Only the sole holder of the only unit may
   * do this; the change goes through the same holder checks as a write.
   *
   * @throws InvalidArgumentError for an unknown mode
   * @throws NoTokenError
   * @throws DeadReferenceError
   * @throws NotExclusiveError
   */
  setAccessMode(source: RefId, mode: AccessModeType): void {
    assertOneOf('access mode', AccessMode, mode);
    const record = this.registry.get(source);
    const code = holderViolation(record);
    if (code !== undefined) {
      const { exclusivity, accessMode } = this.permissions.state();
      throw toAccessViolationError({
        code,
        ref: record.id,
        kind: record.kind,
        access: 'mode',
        exclusivity,
        accessMode,
      });
    }
    if (!this.permissions.isExclusive()) {
      throw new NotExclusiveError(record.id, this.ledger.unitCount);
    }

    this.permissions.set(mode);
    this.emit({ type: 'mode', ref: record.id, accessMode: mode });
  }

  get accessMode(): AccessModeType {
    return this.permissions.accessMode;
  }

  exclusivity(): ExclusivityType {
    return this.permissions.exclusivity();
  }

  permissionState(): PermissionState {
    return this.permissions.state();
  }

  // ---------------------------------------------------------------------------
  // Access validation
  // ---------------------------------------------------------------------------

  /**
   * Decide an access without performing it.
   *
   * @throws InvalidArgumentError for an unknown access kind
   * @throws UnknownReferenceError
   */
  checkAccess(source: RefId, access: AccessKindType): AccessDecision {
    assertOneOf('access kind', AccessKind, access);
    return decideAccess(this.registry.get(source), access, this.permissions.state());
  }

  /**
   * Perform an access through `source`.
   *
   * @throws AccessViolationError subclass naming the broken rule
   */
  useToken(source: RefId, access: AccessKindType): void {
    const decision = this.checkAccess(source, access);
    if (!decision.allowed) {
      throw toAccessViolationError(decision.violation);
    }
    this.emit({ type: 'access', ref: source, access });
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  get unitCount(): number {
    return this.ledger.unitCount;
  }

  get referenceCount(): number {
    return this.registry.size;
  }

  has(ref: RefId): boolean {
    return this.registry.has(ref);
  }

  inspect(ref: RefId): ReferenceSnapshot {
    return this.registry.snapshot(ref);
  }

  snapshot(): MachineSnapshot {
    const { exclusivity, accessMode } = this.permissions.state();
    return Object.freeze({
      name: this.name,
      root: this.root,
      unitCount: this.ledger.unitCount,
      exclusivity,
      accessMode,
      references: Object.freeze(this.registry.snapshotAll()),
    });
  }

  /**
   * Debug dump: one header line, then one line per reference.
   *
   * ```
   * TokenMachine 'machine' units=1 exclusivity=Exclusive mode=ReadWrite
   *   #0   Unique          Borrowing units=1 splits=0 parent=#0
   * ```
   */
  describe(): string {
    return formatSnapshot(this.snapshot());
  }

  /**
   * Recount the bookkeeping from scratch.
   *
   * @throws InvariantViolationError listing every broken invariant
   */
  checkInvariants(): void {
    const problems: string[] = [];
    let held = 0;

    for (const r of this.registry.values()) {
      held += r.units;
      if (!Number.isInteger(r.units) || r.units < 0) {
        problems.push(`${formatRef(r.id)} holds ${r.units} units`);
      }
      if (!Number.isInteger(r.splits) || r.splits < 0) {
        problems.push(`${formatRef(r.id)} has ${r.splits} splits`);
      }
      if (!this.registry.has(r.parent) || (r.parent >= r.id && r.id !== ROOT_REF)) {
        problems.push(`${formatRef(r.id)} has invalid parent ${formatRef(r.parent)}`);
      }
      if (r.state === RefState.Created && r.units > 0) {
        problems.push(`${formatRef(r.id)} holds units but never borrowed`);
      }
    }

    if (held !== this.ledger.unitCount) {
      problems.push(`references hold ${held} units but the unit count is ${this.ledger.unitCount}`);
    }
    if (this.ledger.unitCount < 1) {
      problems.push(`unit count is ${this.ledger.unitCount}`);
    }

    if (problems.length > 0) {
      throw new InvariantViolationError(this.name, problems);
    }
  }

  private emit(event: MachineEvent): void {
    const listener = this.config.onEvent;
    if (listener === undefined) return;
    try {
      listener(event);
    } catch (err) {
      throw new EventListenerError(this.name, event.type, err);
    }
  }
}

/**
 * Render a machine snapshot in the {@link TokenMachine.describe} format.
 */
export function formatSnapshot(s: MachineSnapshot): string {
  const lines = [
    `TokenMachine '${s.name}' units=${s.unitCount} exclusivity=${s.exclusivity} mode=${s.accessMode}`,
  ];
  for (const r of s.references) {
    lines.push(
      `  ${formatRef(r.id).padEnd(4)} ${r.kind.padEnd(15)} ${r.state.padEnd(9)} ` +
        `units=${r.units} splits=${r.splits} parent=${formatRef(r.parent)}`
    );
  }
  return lines.join('\n');
}

/**
 * Functional alias of {@link TokenMachine.init}.
 */
export function initMachine(config?: MachineConfig): { root: RefId; machine: TokenMachine } {
  return TokenMachine.init(config);
}
