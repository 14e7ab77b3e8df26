import { Router } from 'express';
import type { ResolvedConfig } from '../../config/loader.js';
import { isPolicy, runPolicy } from '../../scheduler/index.js';
import { computeMetrics } from '../../metrics/seek-metrics.js';
import { isSchedulerError } from '../../utils/errors.js';
import { inputFromBody } from '../request-input.js';

export function createScheduleRouter(config: ResolvedConfig): Router {
  const router = Router();

  /**
   * POST /api/schedule — Run one policy.
   *
   * Body: `{ policy, requests, head?, diskSize? }`. Metrics are null (with
   * `error` set) for an empty request list.
   */
  router.post('/', (req, res) => {
    const body: unknown = req.body;
    const policy = typeof body === 'object' && body !== null && 'policy' in body ? body.policy : undefined;
    if (!isPolicy(policy)) {
      res.status(400).json({ error: `Unknown policy: ${String(policy)}`, code: 'UNKNOWN_POLICY' });
      return;
    }

    const input = inputFromBody(body, config);
    if (!input.ok) {
      res.status(400).json({ error: input.error.message, code: input.error.code });
      return;
    }

    const { requests, head, diskSize } = input.value;
    const result = runPolicy(policy, requests, head, diskSize);

    try {
      const metrics = computeMetrics(result, requests.length);
      res.json({ policy, ...result, metrics, error: null });
    } catch (error) {
      if (!isSchedulerError(error)) throw error;
      res.json({
        policy,
        ...result,
        metrics: null,
        error: { code: error.code, message: error.message },
      });
    }
  });

  return router;
}
