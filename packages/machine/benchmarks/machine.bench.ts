import { Bench } from 'tinybench';

import { AccessKind, parseTrace, RefKind, refId, runTrace, TokenMachine } from '../src/index.js';

/**
 * Token Machine Benchmark
 *
 * Measures the per-operation cost of the hot paths an embedding interpreter
 * hits on every memory access: validation, lend/return round trips, and
 * split/merge. T4 replays a full trace including dumps and invariant checks.
 */

const DEPTH = 32;

function deepChain() {
  const { root, machine } = TokenMachine.init({ name: 'bench' });
  let tip = root;
  for (let i = 0; i < DEPTH; i++) {
    tip = machine.create(tip, RefKind.Unique);
  }
  return { root, tip, machine };
}

const demoTrace = parseTrace({
  name: 'bench-trace',
  steps: [
    { op: 'create', as: 'a', parent: 'root', kind: 'Unique' },
    { op: 'lend', target: 'a' },
    { op: 'use', source: 'a', access: 'Write' },
    { op: 'return', source: 'a' },
    { op: 'setMode', source: 'root', mode: 'ReadOnly' },
    { op: 'split', source: 'root' },
    { op: 'create', as: 'v', parent: 'root', kind: 'SharedReadOnly' },
    { op: 'lend', target: 'v' },
    { op: 'use', source: 'v', access: 'Read' },
    { op: 'use', source: 'root', access: 'Read' },
  ],
});

async function runMachineBenchmark() {
  console.log('=== Token Machine Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  const warm = TokenMachine.init();
  const shared = TokenMachine.init();
  shared.machine.split(shared.root);

  bench
    // T1: Validation only, exclusive write
    .add('T1: useToken (Exclusive Write)', () => {
      warm.machine.useToken(warm.root, AccessKind.Write);
    })

    // T2: Validation only, shared read that fails the lattice
    .add('T2: checkAccess (Shared Read, rejected)', () => {
      shared.machine.checkAccess(shared.root, AccessKind.Read);
    })

    // T3: Lend down a 32-deep chain and return all the way up
    .add('T3: lend/return round trip (depth 32)', () => {
      const { machine } = deepChain();
      for (let ref = 1; ref <= DEPTH; ref++) machine.lend(refId(ref));
      for (let ref = DEPTH; ref >= 1; ref--) machine.returnUnit(refId(ref));
    })

    // T4: Split/merge pair
    .add('T4: split + merge', () => {
      warm.machine.split(warm.root);
      warm.machine.merge(warm.root);
    })

    // T5: Whole trace replay
    .add('T5: runTrace (10 steps)', () => {
      runTrace(demoTrace);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period || 0) * 1_000_000;
  };

  console.log('\n=== Per-operation cost ===\n');
  console.log(`  useToken:               ${getNs('T1: useToken (Exclusive Write)').toFixed(0)} ns`);
  console.log(
    `  lend+return (per edge): ${(getNs('T3: lend/return round trip (depth 32)') / DEPTH).toFixed(0)} ns`
  );
  console.log(`  split+merge:            ${getNs('T4: split + merge').toFixed(0)} ns`);
}

runMachineBenchmark().catch(console.error);
