import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  createFaultSpec,
  describeFailure,
  faultKindSchema,
  isSimulatedFailure,
} from '@faultline/engine';
import { ChaosRuntime } from '../services/chaos-runtime.js';

export const injectRouter = Router();

const injectBodySchema = z.object({
  kind: faultKindSchema,
  durationMs: z.number().int().min(0).default(500),
  errorCode: z.number().int().default(500),
  message: z.string().default('Injected fault'),
  target: z.string().min(1).default('*'),
});

/**
 * POST /api/inject: one-off injection at probability 1.
 * A simulated failure is the expected outcome and is reported in the body.
 */
injectRouter.post('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = injectBodySchema.parse(req.body);
    const spec = createFaultSpec({
      kind: body.kind,
      probability: 1,
      durationMs: body.durationMs,
      errorCode: body.errorCode,
      errorMessage: body.message,
      affectedTargets: [body.target],
    });
    const { injector } = ChaosRuntime.require();
    console.log(`[api] injecting ${body.kind} into ${body.target}`);

    try {
      await injector.inject(spec);
    } catch (err) {
      if (!isSimulatedFailure(err)) throw err;
      return res.json({
        fired: true,
        kind: body.kind,
        target: body.target,
        outcome: 'fault',
        fault: describeFailure(err),
      });
    }
    return res.json({ fired: true, kind: body.kind, target: body.target, outcome: 'completed' });
  } catch (err) {
    next(err);
  }
});
