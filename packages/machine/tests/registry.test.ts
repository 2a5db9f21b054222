import { describe, expect, it } from 'vitest';

import { refId, ROOT_REF } from '../src/core/reference.js';
import { ReferenceRegistry } from '../src/core/registry.js';
import { KindViolationError, UnknownReferenceError } from '../src/errors/errors.js';
import { RefKind, RefState } from '../src/types/types.js';

describe('ReferenceRegistry', () => {
  it('starts with a root that borrows from itself and holds the token', () => {
    const registry = new ReferenceRegistry('test', RefKind.Unique);

    expect(registry.size).toBe(1);
    expect(registry.snapshot(ROOT_REF)).toEqual({
      id: 0,
      kind: 'Unique',
      parent: 0,
      state: 'Borrowing',
      units: 1,
      splits: 0,
    });
  });

  it('allocates sequential identities in the Created state', () => {
    const registry = new ReferenceRegistry('test', RefKind.Unique);

    const a = registry.create(ROOT_REF, RefKind.SharedReadWrite);
    const b = registry.create(a.id, RefKind.Unique);

    expect(a.id).toBe(1);
    expect(b.id).toBe(2);
    expect(b.parent).toBe(1);
    expect(b.state).toBe(RefState.Created);
    expect(b.units).toBe(0);
    expect(registry.size).toBe(3);
  });

  it('lets read-only references spawn only read-only references', () => {
    const registry = new ReferenceRegistry('test', RefKind.Unique);
    const view = registry.create(ROOT_REF, RefKind.SharedReadOnly);

    expect(() => registry.create(view.id, RefKind.Unique)).toThrow(KindViolationError);
    expect(() => registry.create(view.id, RefKind.SharedReadWrite)).toThrow(KindViolationError);
    expect(registry.create(view.id, RefKind.SharedReadOnly).id).toBe(2);
    expect(registry.size).toBe(3);
  });

  it('rejects identities it never allocated', () => {
    const registry = new ReferenceRegistry('test', RefKind.Unique);

    expect(registry.has(refId(1))).toBe(false);
    expect(() => registry.get(refId(1))).toThrow(UnknownReferenceError);
    expect(() => registry.create(refId(5), RefKind.Unique)).toThrow(UnknownReferenceError);
  });

  it('only moves lifecycle states forward', () => {
    const registry = new ReferenceRegistry('test', RefKind.Unique);
    const record = registry.create(ROOT_REF, RefKind.Unique);

    registry.advance(record, RefState.Dead);
    registry.advance(record, RefState.Borrowing);
    registry.advance(record, RefState.Created);

    expect(record.state).toBe(RefState.Dead);
  });

  it('hands out frozen copies', () => {
    const registry = new ReferenceRegistry('test', RefKind.Unique);
    const snap = registry.snapshot(ROOT_REF);

    expect(Object.isFrozen(snap)).toBe(true);
    expect(registry.get(ROOT_REF)).not.toBe(snap);
    expect(registry.snapshotAll()).toHaveLength(1);
  });
});
