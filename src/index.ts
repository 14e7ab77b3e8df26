/**
 * disksched
 *
 * Disk-head scheduling engine: FCFS, SSTF, SCAN and C-SCAN visit orders,
 * seek-cost metrics and side-by-side comparison.
 *
 * @packageDocumentation
 */

// Scheduling policies
export * from './scheduler/index.js';

// Metrics
export { averageSeek, throughput, computeMetrics } from './metrics/seek-metrics.js';
export type { SeekMetrics } from './metrics/seek-metrics.js';

// Comparison
export { compareAll, comparisonRows, bestPolicy } from './compare/aggregator.js';
export type {
  ComparisonEntry,
  ComparisonInput,
  ComparisonResult,
  ComparisonRow,
  EntryError,
} from './compare/aggregator.js';

// Input
export {
  parseRequests,
  parseInteger,
  validateRequestArray,
} from './input/parse-requests.js';
export type { ParseResult, ScheduleInput } from './input/parse-requests.js';
export { generateRandomRequests } from './input/random.js';
export type { RandomRequestOptions } from './input/random.js';

// Reports
export {
  exportComparisonCsv,
  generateMarkdownReport,
  formatScheduleSummary,
  formatOrder,
  writeReports,
} from './report/reporter.js';

// Configuration
export {
  loadConfig,
  validateExternalConfig,
  assertValidConfig,
  EXTERNAL_DEFAULTS,
} from './config/loader.js';
export type { ExternalConfig, ResolvedConfig, LoadConfigOptions } from './config/loader.js';

// HTTP API
export { createApp, startServer } from './server/app.js';

// Utils
export * from './utils/errors.js';
export { createLogger, setLogLevel } from './utils/logger.js';
