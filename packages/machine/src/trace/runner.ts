/*
 * Trace runner
 * ------------
 * Replays a parsed trace against a fresh TokenMachine, one step at a time,
 * and stops at the first aliasing fault.
 *
 * Verdicts
 *  - sound               every step committed
 *  - violation           a step faulted; `expected` tells whether the step
 *                        declared that exact code in its `expect` field
 *  - unexpected-success  a step declared `expect` but committed
 *
 * Only AliasingFaults end a trace with a verdict. Anything else (a broken
 * invariant, a throwing event listener) propagates to the caller.
 */
import { isAliasingFault, type ViolationCodeType } from '../errors/errors.js';
import { TokenMachine } from '../core/machine.js';
import type { RefId } from '../core/reference.js';
import type { MachineEvent, MachineSnapshot } from '../types/types.js';
import { ROOT_NAME, type Trace, type TraceStep } from './schema.js';

export type TraceVerdict = 'sound' | 'violation' | 'unexpected-success';

export interface TraceFault {
  readonly code: ViolationCodeType;
  readonly message: string;
}

export interface StepOutcome {
  /** 1-based position in the trace. */
  readonly index: number;
  readonly step: TraceStep;
  readonly label: string;
  readonly status: 'ok' | 'fault';
  readonly fault?: TraceFault;
  /** Machine dump after the step (unchanged state after a fault). */
  readonly dump: string;
}

export interface TraceReport {
  readonly name: string;
  readonly verdict: TraceVerdict;
  /** True when the trace ended the way its author declared. */
  readonly expected: boolean;
  readonly steps: readonly StepOutcome[];
  /** 1-based index of the step that ended the trace early. */
  readonly stoppedAt?: number;
  readonly fault?: TraceFault;
  readonly events: readonly MachineEvent[];
  readonly final: MachineSnapshot;
}

export interface RunTraceOptions {
  /** Called after every step, including the one that ends the trace. */
  onStep?: (outcome: StepOutcome) => void;
  /** Recount the bookkeeping after each step. Defaults to true. */
  checkInvariants?: boolean;
}

/**
 * One-line rendering of a step, e.g. `create view = SharedReadOnly from root`.
 */
export function describeStep(step: TraceStep): string {
  let text: string;
  switch (step.op) {
    case 'create':
      text = `create ${step.as} = ${step.kind} from ${step.parent}`;
      break;
    case 'lend':
      text = `lend ${step.target}`;
      break;
    case 'setMode':
      text = `setMode ${step.source} ${step.mode}`;
      break;
    case 'use':
      text = `use ${step.source} ${step.access}`;
      break;
    default:
      text = `${step.op} ${step.source}`;
  }
  return step.expect ? `${text} (expect ${step.expect})` : text;
}

function lookup(names: Map<string, RefId>, name: string): RefId {
  const ref = names.get(name);
  if (ref === undefined) {
    // parseTrace rejects unbound names; reaching this means the trace skipped it.
    throw new Error(`Reference '${name}' is not bound`);
  }
  return ref;
}

function apply(machine: TokenMachine, names: Map<string, RefId>, step: TraceStep): void {
  switch (step.op) {
    case 'create':
      names.set(step.as, machine.create(lookup(names, step.parent), step.kind));
      return;
    case 'lend':
      machine.lend(lookup(names, step.target));
      return;
    case 'return':
      machine.returnUnit(lookup(names, step.source));
      return;
    case 'split':
      machine.split(lookup(names, step.source));
      return;
    case 'merge':
      machine.merge(lookup(names, step.source));
      return;
    case 'setMode':
      machine.setAccessMode(lookup(names, step.source), step.mode);
      return;
    case 'use':
      machine.useToken(lookup(names, step.source), step.access);
      return;
  }
}

/**
 * Replay `trace` on a new machine.
 */
export function runTrace(trace: Trace, options: RunTraceOptions = {}): TraceReport {
  const events: MachineEvent[] = [];
  const { root, machine } = TokenMachine.init({
    ...trace.config,
    name: trace.name,
    onEvent: (e) => events.push(e),
  });
  const names = new Map<string, RefId>([[ROOT_NAME, root]]);
  const steps: StepOutcome[] = [];
  const checkInvariants = options.checkInvariants ?? true;

  const finish = (
    verdict: TraceVerdict,
    expected: boolean,
    stoppedAt?: number,
    fault?: TraceFault
  ): TraceReport => ({
    name: trace.name,
    verdict,
    expected,
    steps,
    stoppedAt,
    fault,
    events,
    final: machine.snapshot(),
  });

  for (const [i, step] of trace.steps.entries()) {
    const index = i + 1;
    const label = describeStep(step);

    try {
      apply(machine, names, step);
    } catch (err) {
      if (!isAliasingFault(err)) throw err;

      const fault: TraceFault = { code: err.code, message: err.message };
      const outcome: StepOutcome = {
        index,
        step,
        label,
        status: 'fault',
        fault,
        dump: machine.describe(),
      };
      steps.push(outcome);
      options.onStep?.(outcome);
      return finish('violation', step.expect === err.code, index, fault);
    }

    if (checkInvariants) machine.checkInvariants();

    const outcome: StepOutcome = { index, step, label, status: 'ok', dump: machine.describe() };
    steps.push(outcome);
    options.onStep?.(outcome);

    if (step.expect !== undefined) {
      return finish('unexpected-success', false, index);
    }
  }

  return finish('sound', true);
}
