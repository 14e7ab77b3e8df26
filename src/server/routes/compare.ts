import { Router } from 'express';
import type { ResolvedConfig } from '../../config/loader.js';
import { bestPolicy, compareAll, comparisonRows } from '../../compare/aggregator.js';
import { CSV_FILENAME, exportComparisonCsv } from '../../report/reporter.js';
import { inputFromBody, inputFromQuery } from '../request-input.js';

export function createCompareRouter(config: ResolvedConfig): Router {
  const router = Router();

  /**
   * POST /api/compare — All four policies over one input.
   */
  router.post('/', (req, res) => {
    const input = inputFromBody(req.body, config);
    if (!input.ok) {
      res.status(400).json({ error: input.error.message, code: input.error.code });
      return;
    }

    const { requests, head, diskSize } = input.value;
    const result = compareAll(requests, head, diskSize);
    res.json({
      input: result.input,
      entries: result.entries,
      rows: comparisonRows(result),
      best: bestPolicy(result),
    });
  });

  /**
   * GET /api/compare/csv?requests=82,170&head=50&diskSize=200 — CSV download.
   */
  router.get('/csv', (req, res) => {
    const input = inputFromQuery(req.query, config);
    if (!input.ok) {
      res.status(400).json({ error: input.error.message, code: input.error.code });
      return;
    }

    const { requests, head, diskSize } = input.value;
    const csv = exportComparisonCsv(compareAll(requests, head, diskSize));
    res.type('text/csv');
    res.attachment(CSV_FILENAME);
    res.send(csv);
  });

  return router;
}
