/**
 * Trace CLI
 *
 * Runs aliasing traces and narrates the machine state after every step.
 *
 * Usage:
 *   aliasing-trace run traces/demo.json
 *   aliasing-trace run a.json b.json --quiet   # verdicts only
 *   aliasing-trace run a.json --json           # machine-readable reports
 *   aliasing-trace demo                        # built-in demonstration trace
 *
 * Exit code is 1 when any trace ends differently from what it declares.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { runTrace, type StepOutcome, type TraceReport } from '../trace/runner.js';
import { parseTrace, type Trace } from '../trace/schema.js';

/** Where the CLI writes. Tests swap in a recorder. */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export const DEMO_TRACE_URL = new URL('../../traces/demo.json', import.meta.url);

interface RunOptions {
  quiet?: boolean;
  json?: boolean;
}

const indent = (text: string, prefix: string): string =>
  text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');

function printStep(io: CliIO, outcome: StepOutcome): void {
  const note = outcome.step.note ? `  # ${outcome.step.note}` : '';
  io.out(`  [${outcome.index}] ${outcome.label}${note}`);
  if (outcome.fault) {
    io.out(`      ! ${outcome.fault.code}: ${outcome.fault.message.split('\n')[0]}`);
  }
  io.out(indent(outcome.dump, '      '));
}

/**
 * One-line summary of a report, prefixed ✓ when the trace ended as declared.
 */
export function formatVerdict(report: TraceReport): string {
  const mark = report.expected ? '✓' : '✗';
  switch (report.verdict) {
    case 'sound':
      return `${mark} ${report.name}: sound (${report.steps.length} steps)`;
    case 'violation':
      return report.expected
        ? `${mark} ${report.name}: rejected as expected at step ${report.stoppedAt}: ${report.fault?.code}`
        : `${mark} ${report.name}: violation at step ${report.stoppedAt}: ${report.fault?.code}`;
    case 'unexpected-success': {
      const expected = report.steps[report.steps.length - 1]?.step.expect;
      return `${mark} ${report.name}: step ${report.stoppedAt} succeeded but expected ${expected}`;
    }
  }
}

async function runFiles(io: CliIO, files: string[], options: RunOptions): Promise<void> {
  const reports: TraceReport[] = [];

  for (const file of files) {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      io.err(`✗ Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
      io.setExitCode(1);
      continue;
    }

    let trace: Trace;
    try {
      trace = parseTrace(text, file);
    } catch (err) {
      io.err(`✗ ${err instanceof Error ? err.message : String(err)}`);
      io.setExitCode(1);
      continue;
    }

    const verbose = !options.quiet && !options.json;
    if (verbose) io.out(`Trace '${trace.name}' (${trace.steps.length} steps)`);

    const report = runTrace(trace, {
      onStep: verbose ? (outcome) => printStep(io, outcome) : undefined,
    });
    reports.push(report);

    if (!options.json) io.out(formatVerdict(report));
    if (!report.expected) io.setExitCode(1);
  }

  if (options.json) {
    io.out(JSON.stringify(reports, null, 2));
  }
}

/**
 * Build the `aliasing-trace` command.
 */
export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  program
    .name('aliasing-trace')
    .description('Replay reference aliasing traces on the token machine')
    .version('0.1.0');

  program
    .command('run')
    .description('Run one or more trace files')
    .argument('<files...>', 'Trace JSON files')
    .option('-q, --quiet', 'Print verdicts only', false)
    .option('--json', 'Print reports as JSON', false)
    .action(async (files: string[], options: RunOptions) => {
      await runFiles(io, files, options);
    });

  program
    .command('demo')
    .description('Run the built-in demonstration trace')
    .option('-q, --quiet', 'Print verdicts only', false)
    .option('--json', 'Print the report as JSON', false)
    .action(async (options: RunOptions) => {
      await runFiles(io, [fileURLToPath(DEMO_TRACE_URL)], options);
    });

  return program;
}
