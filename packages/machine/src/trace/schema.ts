import { z } from 'zod';

import { InvalidTraceError, VIOLATION_CODES } from '../errors/errors.js';
import { AccessKind, AccessMode, RefKind, RelendPolicy } from '../types/types.js';

/** Name every trace can use for the machine's root reference. */
export const ROOT_NAME = 'root';

const refName = z
  .string()
  .regex(/^[A-Za-z_][\w-]*$/, 'reference names are identifiers (letters, digits, _ and -)');

const enumOf = <T extends string>(values: Record<string, T>) =>
  z.enum(Object.values(values) as [T, ...T[]]);

const refKindSchema = enumOf(RefKind);
const accessModeSchema = enumOf(AccessMode);
const accessKindSchema = enumOf(AccessKind);

const stepBase = {
  /** Violation this step must fail with. */
  expect: z.enum(VIOLATION_CODES).optional(),
  /** Free-form narration printed next to the step. */
  note: z.string().optional(),
};

export const traceStepSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('create'), as: refName, parent: refName, kind: refKindSchema, ...stepBase }),
  z.object({ op: z.literal('lend'), target: refName, ...stepBase }),
  z.object({ op: z.literal('return'), source: refName, ...stepBase }),
  z.object({ op: z.literal('split'), source: refName, ...stepBase }),
  z.object({ op: z.literal('merge'), source: refName, ...stepBase }),
  z.object({ op: z.literal('setMode'), source: refName, mode: accessModeSchema, ...stepBase }),
  z.object({ op: z.literal('use'), source: refName, access: accessKindSchema, ...stepBase }),
]);

export const traceConfigSchema = z
  .object({
    rootKind: refKindSchema.optional(),
    accessMode: accessModeSchema.optional(),
    relendPolicy: enumOf(RelendPolicy).optional(),
  })
  .strict();

export const traceSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  config: traceConfigSchema.optional(),
  steps: z.array(traceStepSchema),
});

export type TraceStep = z.infer<typeof traceStepSchema>;
export type TraceConfig = z.infer<typeof traceConfigSchema>;
export type Trace = z.infer<typeof traceSchema>;

/**
 * Reference names a step reads (as opposed to the one it binds).
 */
export function referencedNames(step: TraceStep): string[] {
  switch (step.op) {
    case 'create':
      return [step.parent];
    case 'lend':
      return [step.target];
    default:
      return [step.source];
  }
}

/**
 * Check that every step names references bound by an earlier step.
 */
function bindingIssues(trace: Trace): string[] {
  const issues: string[] = [];
  const bound = new Set<string>([ROOT_NAME]);

  trace.steps.forEach((step, i) => {
    for (const name of referencedNames(step)) {
      if (!bound.has(name)) {
        issues.push(`steps.${i}: reference '${name}' is not bound by an earlier step`);
      }
    }
    if (step.op === 'create') {
      if (bound.has(step.as)) {
        issues.push(`steps.${i}: reference '${step.as}' is already bound`);
      }
      bound.add(step.as);
    }
  });

  return issues;
}

const formatIssue = (issue: z.ZodIssue): string =>
  issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

/**
 * Validate a trace. Strings are parsed as JSON first.
 *
 * @param input - JSON text or an already parsed value
 * @param source - Label for error messages (file name); defaults to the
 *   trace's own name when it has one
 * @throws InvalidTraceError listing every problem found
 */
export function parseTrace(input: unknown, source?: string): Trace {
  let value = input;
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidTraceError(source ?? 'trace', [`not valid JSON: ${reason}`]);
    }
  }

  const result = traceSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidTraceError(source ?? 'trace', result.error.issues.map(formatIssue));
  }

  const issues = bindingIssues(result.data);
  if (issues.length > 0) {
    throw new InvalidTraceError(source ?? result.data.name, issues);
  }
  return result.data;
}
