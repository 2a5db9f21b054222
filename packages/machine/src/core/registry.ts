/*
 * ReferenceRegistry
 * -----------------
 * Arena of reference records for one machine, indexed by RefId.
 *
 * Responsibilities
 *  - allocate identities sequentially (the root is always #0)
 *  - keep each reference's kind, parent, lifecycle state and unit counters
 *  - enforce the derivation rule: read-only references only spawn read-only
 *    references
 *
 * Design notes
 *  - The hierarchy is stored as parent back-references only. The root's
 *    parent is itself, so every lookup treats it like any other node.
 *  - There is no removal API. `Dead` is a state flag; records live as long
 *    as the machine.
 *  - Records are mutated in place by the ledger. Anything leaving the
 *    machine is copied and frozen first.
 */
import { KindViolationError, UnknownReferenceError } from '../errors/errors.js';
import {
  RefKind,
  RefState,
  type RefKindType,
  type RefStateType,
  type ReferenceRecord,
  type ReferenceSnapshot,
} from '../types/types.js';
import { ROOT_REF, type RefId } from './reference.js';

const STATE_ORDER: Record<RefStateType, number> = {
  Created: 0,
  Borrowing: 1,
  Dead: 2,
};

export class ReferenceRegistry {
  /** Dense storage: index === RefId */
  private readonly records: ReferenceRecord[] = [];

  /**
   * @param machineName - Owning machine's name (for error messages)
   * @param rootKind - Kind of the root reference
   */
  constructor(
    private readonly machineName: string,
    rootKind: RefKindType
  ) {
    this.records.push({
      id: ROOT_REF,
      kind: rootKind,
      parent: ROOT_REF,
      state: RefState.Borrowing,
      units: 1,
      splits: 0,
    });
  }

  /**
   * Number of references allocated so far, the root included.
   */
  get size(): number {
    return this.records.length;
  }

  /**
   * Derive a new reference from `parent`.
   *
   * @throws UnknownReferenceError if `parent` was not allocated here
   * @throws KindViolationError if a read-only parent would spawn a mutable child
   */
  create(parent: RefId, kind: RefKindType): ReferenceRecord {
    const parentRecord = this.get(parent);
    if (parentRecord.kind === RefKind.SharedReadOnly && kind !== RefKind.SharedReadOnly) {
      throw new KindViolationError(parent, parentRecord.kind, kind);
    }

    const record: ReferenceRecord = {
      id: this.records.length as RefId,
      kind,
      parent,
      state: RefState.Created,
      units: 0,
      splits: 0,
    };
    this.records.push(record);
    return record;
  }

  /**
   * Look up the live record for a reference.
   *
   * @throws UnknownReferenceError if the identity was never allocated here
   */
  get(ref: RefId): ReferenceRecord {
    const record = this.records[ref];
    if (record === undefined) {
      throw new UnknownReferenceError(ref, this.machineName, this.records.length);
    }
    return record;
  }

  has(ref: RefId): boolean {
    return Number.isInteger(ref) && ref >= 0 && ref < this.records.length;
  }

  /**
   * Move a reference forward in its lifecycle. Moving backwards is a no-op,
   * which keeps `Dead` absorbing.
   */
  advance(record: ReferenceRecord, next: RefStateType): void {
    if (STATE_ORDER[next] > STATE_ORDER[record.state]) {
      record.state = next;
    }
  }

  /**
   * Frozen copy of one record.
   */
  snapshot(ref: RefId): ReferenceSnapshot {
    return Object.freeze({ ...this.get(ref) });
  }

  /**
   * Frozen copies of all records in identity order.
   */
  snapshotAll(): ReferenceSnapshot[] {
    return this.records.map((r) => Object.freeze({ ...r }));
  }

  /**
   * Iterator over the live records, for bookkeeping checks.
   */
  *values(): IterableIterator<ReferenceRecord> {
    yield* this.records;
  }
}
