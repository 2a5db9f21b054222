/*
 * TokenLedger
 * -----------
 * Unit bookkeeping along the reference hierarchy.
 *
 * Invariant: the sum of `units` over every record equals `unitCount`.
 * lend/return move units along a parent edge and leave `unitCount` alone;
 * split/merge are the only operations that change it.
 *
 * Every operation validates all of its preconditions before touching a
 * record, so a thrown fault leaves the ledger unchanged.
 */
import {
  AlreadyBorrowingError,
  DeadTargetError,
  InsufficientTokensError,
  NoTokenToReturnError,
  NothingToMergeError,
  PartialReturnForbiddenError,
} from '../errors/errors.js';
import { RefState, RelendPolicy, type RelendPolicyType } from '../types/types.js';
import type { RefId } from './reference.js';
import type { ReferenceRegistry } from './registry.js';

export interface Transfer {
  readonly from: RefId;
  readonly to: RefId;
}

export interface ReturnTransfer extends Transfer {
  /** True when this return took the source's last unit. */
  readonly died: boolean;
}

export class TokenLedger {
  private units = 1;

  constructor(
    private readonly registry: ReferenceRegistry,
    private readonly relendPolicy: RelendPolicyType
  ) {}

  /** Units in existence across the whole hierarchy. */
  get unitCount(): number {
    return this.units;
  }

  /**
   * Move one unit from `target`'s parent to `target`.
   *
   * @throws InsufficientTokensError if the parent holds no unit
   * @throws DeadTargetError if `target` already returned its last unit
   * @throws AlreadyBorrowingError under `forbid` when `target` still holds a unit
   */
  lend(target: RefId): Transfer {
    const child = this.registry.get(target);
    const parent = this.registry.get(child.parent);

    if (parent.units === 0) {
      throw new InsufficientTokensError('lend', parent.id, child.id);
    }
    if (child.state === RefState.Dead) {
      throw new DeadTargetError(child.id, parent.id);
    }
    if (
      this.relendPolicy === RelendPolicy.Forbid &&
      child.id !== parent.id &&
      child.state === RefState.Borrowing &&
      child.units > 0
    ) {
      throw new AlreadyBorrowingError(child.id, child.units);
    }

    parent.units -= 1;
    child.units += 1;
    this.registry.advance(child, RefState.Borrowing);
    return { from: parent.id, to: child.id };
  }

  /**
   * Hand one whole unit from `source` back to its parent. The source dies
   * when it has no unit left. Dead references may still relay units their
   * children returned to them.
   *
   * @throws NoTokenToReturnError if `source` holds no unit
   * @throws PartialReturnForbiddenError if `source` has split units outstanding
   */
  returnUnit(source: RefId): ReturnTransfer {
    const child = this.registry.get(source);
    const parent = this.registry.get(child.parent);

    if (child.units === 0) {
      throw new NoTokenToReturnError(child.id);
    }
    if (child.splits > 0) {
      throw new PartialReturnForbiddenError(child.id, child.splits);
    }

    child.units -= 1;
    parent.units += 1;

    const died = child.units === 0 && child.state !== RefState.Dead;
    if (child.units === 0) {
      this.registry.advance(child, RefState.Dead);
    }
    return { from: child.id, to: parent.id, died };
  }

  /**
   * Fragment one of `source`'s units into two, both kept by `source`.
   *
   * @throws InsufficientTokensError if `source` holds no unit
   */
  split(source: RefId): number {
    const record = this.registry.get(source);
    if (record.units === 0) {
      throw new InsufficientTokensError('split', record.id);
    }

    record.units += 1;
    record.splits += 1;
    this.units += 1;
    return this.units;
  }

  /**
   * Recombine two of `source`'s units, undoing one of its splits.
   *
   * @throws NothingToMergeError if `source` holds fewer than two units or has
   *   no split outstanding. Two lent units without an own split are refused
   *   on purpose: merging them would drive `splits` negative and the source
   *   could then never return.
   */
  merge(source: RefId): number {
    const record = this.registry.get(source);
    if (record.units < 2 || record.splits === 0) {
      throw new NothingToMergeError(record.id, record.units, record.splits);
    }

    record.units -= 1;
    record.splits -= 1;
    this.units -= 1;
    return this.units;
  }
}
