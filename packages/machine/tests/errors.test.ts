import { describe, expect, it } from 'vitest';

import { refId } from '../src/core/reference.js';
import {
  AccessViolationError,
  AliasingFault,
  AlreadyBorrowingError,
  DeadTargetError,
  EventListenerError,
  InsufficientTokensError,
  InvalidArgumentError,
  InvalidMachineConfigError,
  InvalidTraceError,
  InvariantViolationError,
  isAliasingFault,
  KindViolationError,
  NoTokenToReturnError,
  NotExclusiveError,
  NothingToMergeError,
  PartialReturnForbiddenError,
  toAccessViolationError,
  UnknownReferenceError,
  VIOLATION_CODES,
  type AccessViolation,
} from '../src/errors/errors.js';

const violation = (overrides: Partial<AccessViolation> = {}): AccessViolation => ({
  code: 'UniqueWriteNotExclusive',
  ref: refId(2),
  kind: 'Unique',
  access: 'Write',
  exclusivity: 'Shared',
  accessMode: 'ReadWrite',
  ...overrides,
});

describe('error classes', () => {
  it('provides contextual error messages, codes and properties', () => {
    const unknown = new UnknownReferenceError(9, 'demo', 3);
    expect(unknown.code).toBe('UnknownReference');
    expect(unknown.message).toContain('#0 to #2');
    expect(unknown.machineName).toBe('demo');

    const kind = new KindViolationError(refId(1), 'SharedReadOnly', 'Unique');
    expect(kind.code).toBe('KindViolation');
    expect(kind.message).toContain('Reference #1 is SharedReadOnly and cannot derive a Unique reference.');

    const lend = new InsufficientTokensError('lend', refId(0), refId(4));
    expect(lend.message).toContain('cannot lend a unit to #4');
    const split = new InsufficientTokensError('split', refId(3));
    expect(split.message).toContain('Reference #3 holds no unit and cannot split a unit.');

    expect(new DeadTargetError(refId(2), refId(0)).code).toBe('DeadTarget');
    expect(new AlreadyBorrowingError(refId(2), 1).units).toBe(1);
    expect(new NoTokenToReturnError(refId(5)).source).toBe(5);
    expect(new PartialReturnForbiddenError(refId(5), 2).message).toContain('merge() 2 time(s)');
    expect(new NothingToMergeError(refId(5), 1, 0).splits).toBe(0);
    expect(new NotExclusiveError(refId(0), 3).message).toContain('while 3 units exist');

    const config = new InvalidMachineConfigError('bad');
    expect(config.reason).toBe('bad');
    expect(isAliasingFault(config)).toBe(false);

    const invariant = new InvariantViolationError('demo', ['a', 'b']);
    expect(invariant.message).toContain('  - b');

    const argument = new InvalidArgumentError('access kind', 'write', ['Read', 'Write']);
    expect(argument.message).toContain('Received access kind "write".');
    expect(argument.message).toContain('Expected one of: Read, Write');
    expect(new InvalidArgumentError('access kind', undefined, ['Read']).message).toContain(
      'Received access kind undefined.'
    );

    const cause = new Error('x');
    const listener = new EventListenerError('demo', 'lend', cause);
    expect(listener.cause).toBe(cause);
    expect(listener.message).toContain("The onEvent listener of machine 'demo' threw on a 'lend' event.");
    expect(isAliasingFault(listener)).toBe(false);

    const trace = new InvalidTraceError('t.json', ['steps.0: nope']);
    expect(trace.issues).toEqual(['steps.0: nope']);
  });

  it('marks every fault as an AliasingFault', () => {
    const faults = [
      new UnknownReferenceError(1, 'm', 1),
      new DeadTargetError(refId(1), refId(0)),
      toAccessViolationError(violation()),
    ];

    for (const fault of faults) {
      expect(fault).toBeInstanceOf(AliasingFault);
      expect(isAliasingFault(fault)).toBe(true);
      expect(VIOLATION_CODES).toContain(fault.code);
    }
  });

  it('builds a distinct error class per access violation code', () => {
    const names = (
      [
        'NoToken',
        'DeadReference',
        'ReadOnlyViolation',
        'ReadOnlyReadUnderWriter',
        'UniqueReadUnderWriter',
        'WriteToReadOnlyToken',
        'UniqueWriteNotExclusive',
      ] as const
    ).map((code) => toAccessViolationError(violation({ code })).name);

    expect(names).toEqual([
      'NoTokenError',
      'DeadReferenceError',
      'ReadOnlyViolationError',
      'ReadOnlyReadUnderWriterError',
      'UniqueReadUnderWriterError',
      'WriteToReadOnlyTokenError',
      'UniqueWriteNotExclusiveError',
    ]);
  });

  it('describes the access and the token regime', () => {
    const err = toAccessViolationError(violation());

    expect(err).toBeInstanceOf(AccessViolationError);
    expect(err.message.split('\n').slice(0, 3)).toEqual([
      'Unique #2 cannot write: other units exist',
      '',
      'Token regime: (Shared, ReadWrite).',
    ]);

    const mode = toAccessViolationError(violation({ code: 'NoToken', access: 'mode' }));
    expect(mode.message.split('\n')[0]).toBe('Unique #2 cannot change the access mode: it holds no unit');
  });

  it('falls back to the base class for codes outside the validator', () => {
    const err = toAccessViolationError(violation({ code: 'NotExclusive' }));

    expect(err.name).toBe('AccessViolationError');
    expect(err.code).toBe('NotExclusive');
  });
});
