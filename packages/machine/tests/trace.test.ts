import { describe, expect, it, vi } from 'vitest';

import { InvalidTraceError, InvariantViolationError } from '../src/errors/errors.js';
import { describeStep, runTrace } from '../src/trace/runner.js';
import { parseTrace, type Trace } from '../src/trace/schema.js';

const trace = (steps: unknown[], extra: Record<string, unknown> = {}): Trace =>
  parseTrace({ name: 'inline', steps, ...extra });

describe('parseTrace()', () => {
  it('accepts JSON text and parsed values', () => {
    const text = JSON.stringify({
      name: 'text',
      steps: [{ op: 'split', source: 'root' }],
    });

    expect(parseTrace(text).steps).toEqual([{ op: 'split', source: 'root' }]);
    expect(trace([{ op: 'merge', source: 'root' }]).name).toBe('inline');
  });

  it('reports malformed JSON with the source label', () => {
    expect(() => parseTrace('{ nope', 'broken.json')).toThrow(InvalidTraceError);
    expect(() => parseTrace('{ nope', 'broken.json')).toThrow("Invalid trace 'broken.json'");
  });

  it('lists schema issues by path', () => {
    try {
      parseTrace({ name: 'bad', steps: [{ op: 'use', source: 'root', access: 'Execute' }] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidTraceError);
      if (err instanceof InvalidTraceError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^steps\.0\.access: /);
      }
    }
  });

  it('rejects unknown config keys and unknown violation codes', () => {
    expect(() => trace([], { config: { onEvent: 'x' } })).toThrow(InvalidTraceError);
    expect(() => trace([{ op: 'split', source: 'root', expect: 'Oops' }])).toThrow(
      InvalidTraceError
    );
  });

  it('requires references to be bound before use and bound once', () => {
    try {
      trace([
        { op: 'lend', target: 'a' },
        { op: 'create', as: 'a', parent: 'root', kind: 'Unique' },
        { op: 'create', as: 'a', parent: 'root', kind: 'Unique' },
        { op: 'create', as: 'root', parent: 'a', kind: 'Unique' },
      ]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidTraceError);
      if (err instanceof InvalidTraceError) {
        expect(err.issues).toEqual([
          "steps.0: reference 'a' is not bound by an earlier step",
          "steps.2: reference 'a' is already bound",
          "steps.3: reference 'root' is already bound",
        ]);
      }
    }
  });
});

describe('describeStep()', () => {
  it('renders every operation on one line', () => {
    const { steps } = trace([
      { op: 'create', as: 'v', parent: 'root', kind: 'SharedReadOnly' },
      { op: 'lend', target: 'v' },
      { op: 'return', source: 'v' },
      { op: 'split', source: 'root' },
      { op: 'merge', source: 'root' },
      { op: 'setMode', source: 'root', mode: 'ReadOnly' },
      { op: 'use', source: 'root', access: 'Read', expect: 'NoToken' },
    ]);

    expect(steps.map(describeStep)).toEqual([
      'create v = SharedReadOnly from root',
      'lend v',
      'return v',
      'split root',
      'merge root',
      'setMode root ReadOnly',
      'use root Read (expect NoToken)',
    ]);
  });
});

describe('runTrace()', () => {
  it('replays a sound trace and records every event', () => {
    const report = runTrace(
      trace([
        { op: 'create', as: 'a', parent: 'root', kind: 'Unique' },
        { op: 'lend', target: 'a' },
        { op: 'use', source: 'a', access: 'Write' },
        { op: 'return', source: 'a' },
      ])
    );

    expect(report.verdict).toBe('sound');
    expect(report.expected).toBe(true);
    expect(report.stoppedAt).toBeUndefined();
    expect(report.steps.map((s) => s.status)).toEqual(['ok', 'ok', 'ok', 'ok']);
    expect(report.events.map((e) => e.type)).toEqual(['create', 'lend', 'access', 'return']);
    expect(report.final.references[1].state).toBe('Dead');
    expect(report.final.name).toBe('inline');
  });

  it('stops at the first fault and keeps the unchanged dump', () => {
    const report = runTrace(
      trace([
        { op: 'create', as: 'a', parent: 'root', kind: 'Unique' },
        { op: 'use', source: 'a', access: 'Read' },
        { op: 'split', source: 'root' },
      ])
    );

    expect(report.verdict).toBe('violation');
    expect(report.expected).toBe(false);
    expect(report.stoppedAt).toBe(2);
    expect(report.fault?.code).toBe('NoToken');
    expect(report.steps).toHaveLength(2);
    expect(report.steps[1].dump).toBe(report.steps[0].dump);
    expect(report.final.unitCount).toBe(1);
  });

  it('accepts a declared violation', () => {
    const report = runTrace(
      trace([
        { op: 'split', source: 'root' },
        { op: 'setMode', source: 'root', mode: 'ReadOnly', expect: 'NotExclusive' },
      ])
    );

    expect(report.verdict).toBe('violation');
    expect(report.expected).toBe(true);
    expect(report.fault?.code).toBe('NotExclusive');
  });

  it('flags a declared violation with a different code', () => {
    const report = runTrace(
      trace([{ op: 'merge', source: 'root', expect: 'PartialReturnForbidden' }])
    );

    expect(report.verdict).toBe('violation');
    expect(report.expected).toBe(false);
    expect(report.fault?.code).toBe('NothingToMerge');
  });

  it('flags a step that commits despite declaring a violation', () => {
    const report = runTrace(
      trace([
        { op: 'use', source: 'root', access: 'Write', expect: 'UniqueWriteNotExclusive' },
        { op: 'split', source: 'root' },
      ])
    );

    expect(report.verdict).toBe('unexpected-success');
    expect(report.expected).toBe(false);
    expect(report.stoppedAt).toBe(1);
    expect(report.steps).toHaveLength(1);
  });

  it('applies the trace configuration', () => {
    const report = runTrace(
      trace(
        [
          { op: 'create', as: 'v', parent: 'root', kind: 'SharedReadOnly' },
          { op: 'split', source: 'root' },
          { op: 'lend', target: 'v' },
          { op: 'lend', target: 'v', expect: 'AlreadyBorrowing' },
        ],
        { config: { relendPolicy: 'forbid' } }
      )
    );

    expect(report.verdict).toBe('violation');
    expect(report.expected).toBe(true);
  });

  it('calls onStep for each executed step', () => {
    const onStep = vi.fn();

    runTrace(
      trace([
        { op: 'split', source: 'root' },
        { op: 'use', source: 'root', access: 'Write' },
      ]),
      { onStep }
    );

    expect(onStep).toHaveBeenCalledTimes(2);
    expect(onStep.mock.calls[1][0]).toMatchObject({
      index: 2,
      label: 'use root Write',
      status: 'fault',
      fault: { code: 'UniqueWriteNotExclusive' },
    });
  });

  it('lets non-aliasing errors escape', () => {
    const boom = new InvariantViolationError('inline', ['boom']);
    const onStep = vi.fn(() => {
      throw boom;
    });

    expect(() => runTrace(trace([{ op: 'split', source: 'root' }]), { onStep })).toThrow(boom);
  });
});
