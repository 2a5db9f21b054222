import { describe, expect, it } from 'vitest';

import {
  AccessKind,
  initMachine,
  parseTrace,
  RefKind,
  runTrace,
  TokenMachine,
  ViolationCode,
} from '../src/index.js';
import { TokenMachine as MachineImpl } from '../src/core/machine.js';
import { ViolationCode as CodeImpl } from '../src/errors/errors.js';
import { runTrace as runTraceImpl } from '../src/trace/runner.js';
import { RefKind as RefKindImpl } from '../src/types/types.js';

describe('package public index', () => {
  it('re-exports the api surface', () => {
    expect(TokenMachine).toBe(MachineImpl);
    expect(ViolationCode).toBe(CodeImpl);
    expect(runTrace).toBe(runTraceImpl);
    expect(RefKind).toBe(RefKindImpl);
    expect(typeof initMachine).toBe('function');
    expect(typeof parseTrace).toBe('function');
  });

  it('drives a machine through the public names only', () => {
    const { root, machine } = initMachine();
    const view = machine.create(root, RefKind.SharedReadOnly);
    machine.lend(view);

    expect(machine.checkAccess(view, AccessKind.Write)).toMatchObject({
      allowed: false,
      violation: { code: ViolationCode.ReadOnlyViolation },
    });
  });
});
