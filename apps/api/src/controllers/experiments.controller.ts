import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ExperimentNotFoundError, experimentDefSchema } from '@faultline/engine';
import { ChaosRuntime } from '../services/chaos-runtime.js';

export const experimentsRouter = Router();

type ExperimentRequest = Request<{ experimentId: string }>;

const runQuerySchema = z.object({
  wait: z.enum(['true', 'false']).optional(),
});

/** GET /api/experiments: registered experiments and their status */
experimentsRouter.get('/', (_req: Request, res: Response, next: NextFunction) => {
  try {
    const listings = ChaosRuntime.require().scheduler.list();
    res.json({
      data: listings.map(({ definition, status }) => ({
        id: definition.id,
        name: definition.name,
        durationSeconds: definition.durationSeconds,
        status,
      })),
      total: listings.length,
    });
  } catch (err) {
    next(err);
  }
});

/** POST /api/experiments: register an experiment definition */
experimentsRouter.post('/', (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = experimentDefSchema.parse(req.body);
    const id = ChaosRuntime.require().scheduler.schedule(body);
    res.status(201).json({ id, status: 'pending' });
  } catch (err) {
    next(err);
  }
});

/** GET /api/experiments/:experimentId */
experimentsRouter.get('/:experimentId', (req: ExperimentRequest, res: Response, next: NextFunction) => {
  try {
    const { scheduler } = ChaosRuntime.require();
    const definition = scheduler.getDefinition(req.params.experimentId);
    if (!definition) throw new ExperimentNotFoundError(req.params.experimentId);
    res.json({ ...definition, status: scheduler.getStatus(definition.id) });
  } catch (err) {
    next(err);
  }
});

/**
 * POST /api/experiments/:experimentId/run
 * With `?wait=true` the response is the finished result; otherwise the run
 * continues in the background and the result is fetched from /result.
 */
experimentsRouter.post('/:experimentId/run', async (req: ExperimentRequest, res: Response, next: NextFunction) => {
  try {
    const { wait } = runQuerySchema.parse(req.query);
    const runtime = ChaosRuntime.require();
    const { experimentId } = req.params;

    if (wait === 'true') {
      const result = await runtime.scheduler.run(experimentId);
      return res.json(result);
    }

    runtime.startInBackground(experimentId);
    return res.status(202).json({ id: experimentId, status: 'running' });
  } catch (err) {
    next(err);
  }
});

/** POST /api/experiments/:experimentId/abort */
experimentsRouter.post('/:experimentId/abort', (req: ExperimentRequest, res: Response, next: NextFunction) => {
  try {
    ChaosRuntime.require().scheduler.abort(req.params.experimentId);
    res.status(202).json({ id: req.params.experimentId, abortRequested: true });
  } catch (err) {
    next(err);
  }
});

/** GET /api/experiments/:experimentId/result: latest finished run */
experimentsRouter.get('/:experimentId/result', (req: ExperimentRequest, res: Response, next: NextFunction) => {
  try {
    const result = ChaosRuntime.require().scheduler.getResult(req.params.experimentId);
    if (!result) return res.status(404).json({ error: 'result not found' });
    return res.json(result);
  } catch (err) {
    next(err);
  }
});
