import {
  AccessMode,
  Exclusivity,
  type AccessModeType,
  type ExclusivityType,
  type PermissionState,
} from '../types/types.js';
import type { TokenLedger } from './ledger.js';

/**
 * Global permission state of the token.
 *
 * Only the access mode is stored. Exclusivity is read off the ledger's live
 * unit count on every call so it can never go stale.
 */
export class PermissionRegister {
  private mode: AccessModeType;

  constructor(
    private readonly ledger: TokenLedger,
    initialMode: AccessModeType = AccessMode.ReadWrite
  ) {
    this.mode = initialMode;
  }

  get accessMode(): AccessModeType {
    return this.mode;
  }

  exclusivity(): ExclusivityType {
    return this.ledger.unitCount === 1 ? Exclusivity.Exclusive : Exclusivity.Shared;
  }

  isExclusive(): boolean {
    return this.exclusivity() === Exclusivity.Exclusive;
  }

  state(): PermissionState {
    return { exclusivity: this.exclusivity(), accessMode: this.mode };
  }

  /**
   * Store a new access mode. The caller (the machine) has already checked
   * that the requester is the sole unit holder.
   */
  set(mode: AccessModeType): void {
    this.mode = mode;
  }
}
