import { Router } from 'express';
import type { ResolvedConfig } from '../../config/loader.js';
import { generateRandomRequests } from '../../input/random.js';
import { parseInteger } from '../../input/parse-requests.js';

export function createRandomRouter(config: ResolvedConfig): Router {
  const router = Router();

  /**
   * GET /api/random?count=8&diskSize=200&seed=7 — Distinct random requests.
   *
   * Out-of-range counts raise an InputError, which the error middleware
   * turns into a 400.
   */
  router.get('/', (req, res) => {
    const options: { count: number; diskSize: number; seed?: number } = {
      count: config.random.count,
      diskSize: config.disk.size,
      seed: config.random.seed,
    };

    for (const key of ['count', 'diskSize', 'seed'] as const) {
      const raw = req.query[key];
      if (typeof raw !== 'string') continue;
      const parsed = parseInteger(raw, key);
      if (!parsed.ok) {
        res.status(400).json({ error: parsed.error.message, code: parsed.error.code });
        return;
      }
      options[key] = parsed.value;
    }

    res.json({ requests: generateRandomRequests(options), diskSize: options.diskSize });
  });

  return router;
}
