/**
 * Parsing of user-entered request lists and integer options.
 *
 * Malformed input comes back as a result value rather than an exception,
 * so callers decide how to report it.
 */

import { InputError } from '../utils/errors.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: InputError };

/** A fully decoded scheduling input. */
export interface ScheduleInput {
  requests: number[];
  head: number;
  diskSize: number;
}

const INTEGER_PATTERN = /^\d+$/;

function invalid(message: string): { ok: false; error: InputError } {
  return { ok: false, error: new InputError(message, 'INVALID_INPUT') };
}

/**
 * Parse a single non-negative base-10 integer.
 *
 * @param name - Label used in the error message (e.g. "head")
 */
export function parseInteger(raw: string | undefined, name: string): ParseResult<number> {
  const trimmed = (raw ?? '').trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return invalid(`${name} must be a non-negative integer, got "${trimmed}"`);
  }
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    return invalid(`${name} is too large: ${trimmed}`);
  }
  return { ok: true, value };
}

/**
 * Parse a comma-separated list of cylinder numbers, e.g. "82, 170, 43".
 *
 * Whitespace around entries and empty entries are ignored. At least one
 * request is required.
 */
export function parseRequests(raw: string): ParseResult<number[]> {
  const entries = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    return invalid('Enter at least one request (numbers separated by commas)');
  }

  const requests: number[] = [];
  for (const entry of entries) {
    const parsed = parseInteger(entry, 'request');
    if (!parsed.ok) {
      return invalid(`Invalid request "${entry}": enter numbers separated by commas`);
    }
    requests.push(parsed.value);
  }

  return { ok: true, value: requests };
}

/**
 * Validate a request list that arrived already decoded (e.g. a JSON body).
 * Empty lists are allowed here; the metrics layer reports them.
 */
export function validateRequestArray(value: unknown): ParseResult<number[]> {
  if (!Array.isArray(value)) {
    return invalid('requests must be an array of non-negative integers');
  }
  const requests: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isSafeInteger(item) || item < 0) {
      return invalid(`Invalid request ${JSON.stringify(item)}: expected a non-negative integer`);
    }
    requests.push(item);
  }
  return { ok: true, value: requests };
}
