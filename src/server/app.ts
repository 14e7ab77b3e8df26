import express from 'express';
import { loadConfig, type ResolvedConfig } from '../config/loader.js';
import { createLogger } from '../utils/logger.js';
import policiesRouter from './routes/policies.js';
import { createScheduleRouter } from './routes/schedule.js';
import { createCompareRouter } from './routes/compare.js';
import { createRandomRouter } from './routes/random.js';
import { errorHandler } from './middleware/error-handler.js';

const log = createLogger('server');

export interface CreateAppOptions {
  /** Defaults for head, disk size and random draws. Loaded from disk when omitted. */
  config?: ResolvedConfig;
}

export function createApp(options: CreateAppOptions = {}) {
  const config = options.config ?? loadConfig();
  const app = express();

  app.use(express.json());

  app.use('/api/policies', policiesRouter);
  app.use('/api/schedule', createScheduleRouter(config));
  app.use('/api/compare', createCompareRouter(config));
  app.use('/api/random', createRandomRouter(config));

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // must come after the routes
  app.use(errorHandler);

  return app;
}

export async function startServer(port: number, config?: ResolvedConfig): Promise<void> {
  const app = createApp({ config });

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info(`Scheduling API listening on http://localhost:${port}`);

      const shutdown = () => {
        log.info('Shutting down...');
        server.close(() => {
          resolve();
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        log.error(`Port ${port} is already in use. Try: disksched serve --port ${port + 1}`);
      }
      reject(err);
    });
  });
}
