/**
 * Decoding of scheduling inputs from JSON bodies and query strings.
 */

import type { ResolvedConfig } from '../config/loader.js';
import {
  parseInteger,
  parseRequests,
  validateRequestArray,
  type ParseResult,
  type ScheduleInput,
} from '../input/parse-requests.js';
import { InputError } from '../utils/errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function integerField(
  value: unknown,
  name: string,
  fallback: number,
  min: number,
): ParseResult<number> {
  if (value === undefined) return { ok: true, value: fallback };
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < min) {
    return {
      ok: false,
      error: new InputError(`${name} must be an integer >= ${min}`, 'INVALID_INPUT'),
    };
  }
  return { ok: true, value };
}

/**
 * Read `{ requests, head?, diskSize? }` from a JSON body.
 */
export function inputFromBody(body: unknown, config: ResolvedConfig): ParseResult<ScheduleInput> {
  if (!isRecord(body)) {
    return {
      ok: false,
      error: new InputError('Request body must be a JSON object', 'INVALID_INPUT'),
    };
  }

  const requests = validateRequestArray(body.requests);
  if (!requests.ok) return requests;
  const head = integerField(body.head, 'head', config.disk.head, 0);
  if (!head.ok) return head;
  const diskSize = integerField(body.diskSize, 'diskSize', config.disk.size, 1);
  if (!diskSize.ok) return diskSize;

  return {
    ok: true,
    value: { requests: requests.value, head: head.value, diskSize: diskSize.value },
  };
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalInteger(raw: string | undefined, name: string, fallback: number): ParseResult<number> {
  return raw === undefined ? { ok: true, value: fallback } : parseInteger(raw, name);
}

/**
 * Read `?requests=82,170&head=50&diskSize=200` from a query string.
 */
export function inputFromQuery(
  query: Record<string, unknown>,
  config: ResolvedConfig,
): ParseResult<ScheduleInput> {
  const requests = parseRequests(queryString(query.requests) ?? '');
  if (!requests.ok) return requests;

  const head = optionalInteger(queryString(query.head), 'head', config.disk.head);
  if (!head.ok) return head;
  const diskSize = optionalInteger(queryString(query.diskSize), 'diskSize', config.disk.size);
  if (!diskSize.ok) return diskSize;
  if (diskSize.value < 1) {
    return { ok: false, error: new InputError('diskSize must be at least 1', 'INVALID_INPUT') };
  }

  return {
    ok: true,
    value: { requests: requests.value, head: head.value, diskSize: diskSize.value },
  };
}
