import { z } from 'zod';
import { FAULT_KINDS, RUN_STATUSES } from '@faultline/domain';
import type { RunResult } from '@faultline/domain';
import { experimentDefSchema, faultKindSchema } from '@faultline/engine';

const faultCountsSchema = z.record(faultKindSchema, z.number().int().min(0));

/** Shape of a run result written by `run --json-output`; dates arrive as ISO strings. */
export const runResultSchema = z.object({
  definition: experimentDefSchema,
  status: z.enum(RUN_STATUSES),
  startTime: z.coerce.date(),
  endTime: z.coerce.date().optional(),
  observations: z.array(
    z.object({
      timestamp: z.coerce.date(),
      target: z.string(),
      event: z.string(),
      details: z.record(z.string(), z.unknown()),
    }),
  ),
  summary: z.object({
    totalFaultsFired: z.number().int().min(0),
    faultsByKind: faultCountsSchema,
    errorsByKind: faultCountsSchema,
    durationSeconds: z.number().min(0),
  }),
});

export function parseRunResult(input: unknown): RunResult {
  return runResultSchema.parse(input);
}

export function formatRunReport(result: RunResult): string[] {
  const { definition, summary } = result;
  const lines = [
    `Experiment:   ${definition.name} (${definition.id})`,
    `Status:       ${result.status}`,
    `Started:      ${result.startTime.toISOString()}`,
    `Ended:        ${result.endTime ? result.endTime.toISOString() : '-'}`,
    `Duration:     ${summary.durationSeconds.toFixed(2)}s`,
    `Faults fired: ${summary.totalFaultsFired}`,
  ];

  for (const kind of FAULT_KINDS) {
    const fired = summary.faultsByKind[kind] ?? 0;
    if (fired === 0) continue;
    lines.push(`  ${kind}: ${fired} fired, ${summary.errorsByKind[kind] ?? 0} raised`);
  }

  lines.push(`Observations: ${result.observations.length}`);
  return lines;
}
