import { z } from 'zod';
import { FAULT_KINDS } from '@faultline/domain';
import type { ExperimentDef, FaultSpec } from '@faultline/domain';

export const faultKindSchema = z.enum(FAULT_KINDS);

export const faultSpecSchema = z.object({
  kind: faultKindSchema,
  probability: z.number().min(0).max(1).default(1.0),
  durationMs: z.number().int().min(0).optional(),
  errorCode: z.number().int().optional(),
  errorMessage: z.string().optional(),
  affectedTargets: z.array(z.string()).default([]),
});

export const experimentDefSchema = z.object({
  id: z.string().default(''),
  name: z.string().min(1),
  description: z.string().default(''),
  faultSpecs: z.array(faultSpecSchema).default([]),
  durationSeconds: z.number().int().positive().default(60),
  defaultTargets: z.array(z.string()).default([]),
});

/** Applies defaults and field constraints; throws a ZodError on violation. */
export function createFaultSpec(input: unknown): FaultSpec {
  return faultSpecSchema.parse(input);
}

export function parseExperimentDef(input: unknown): ExperimentDef {
  return experimentDefSchema.parse(input);
}
