/**
 * Shared CLI utilities: input flags common to `run` and `compare`.
 */

import type { ResolvedConfig } from '../config/loader.js';
import {
  parseInteger,
  parseRequests,
  type ParseResult,
  type ScheduleInput,
} from '../input/parse-requests.js';
import { generateRandomRequests } from '../input/random.js';
import { InputError, isInputError } from '../utils/errors.js';

export interface InputFlags {
  requests?: string;
  head?: string;
  diskSize?: string;
  random: boolean;
  count?: string;
  seed?: string;
}

export const INPUT_OPTIONS_USAGE = `  --requests <list>     Comma-separated cylinders, e.g. "82, 170, 43"
  --head <n>            Starting head position (default from config: 50)
  --disk-size <n>       Number of cylinders (default from config: 200)
  --random              Draw random requests instead of --requests
  --count <n>           How many random requests to draw (default: 8)
  --seed <n>            Seed for --random`;

/**
 * Pull the input flags out of `args`. Anything else is returned in `rest`
 * for the command's own parsing.
 */
export function collectInputFlags(args: string[]): { flags: InputFlags; rest: string[] } {
  const flags: InputFlags = { random: false };
  const rest: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--requests':
        flags.requests = args[++i] ?? '';
        break;
      case '--head':
        flags.head = args[++i] ?? '';
        break;
      case '--disk-size':
        flags.diskSize = args[++i] ?? '';
        break;
      case '--random':
        flags.random = true;
        break;
      case '--count':
        flags.count = args[++i] ?? '';
        break;
      case '--seed':
        flags.seed = args[++i] ?? '';
        break;
      default:
        rest.push(arg);
    }
  }

  return { flags, rest };
}

function integerFlag(raw: string | undefined, name: string, fallback: number): ParseResult<number> {
  return raw === undefined ? { ok: true, value: fallback } : parseInteger(raw, name);
}

/**
 * Turn input flags into a scheduling input, filling gaps from config.
 */
export function resolveInput(flags: InputFlags, config: ResolvedConfig): ParseResult<ScheduleInput> {
  const head = integerFlag(flags.head, '--head', config.disk.head);
  if (!head.ok) return head;
  const diskSize = integerFlag(flags.diskSize, '--disk-size', config.disk.size);
  if (!diskSize.ok) return diskSize;
  if (diskSize.value < 1) {
    return { ok: false, error: new InputError('--disk-size must be at least 1', 'INVALID_INPUT') };
  }

  if (!flags.random) {
    const requests = parseRequests(flags.requests ?? '');
    if (!requests.ok) return requests;
    return {
      ok: true,
      value: { requests: requests.value, head: head.value, diskSize: diskSize.value },
    };
  }

  const count = integerFlag(flags.count, '--count', config.random.count);
  if (!count.ok) return count;
  let seed = config.random.seed;
  if (flags.seed !== undefined) {
    const parsedSeed = parseInteger(flags.seed, '--seed');
    if (!parsedSeed.ok) return parsedSeed;
    seed = parsedSeed.value;
  }

  try {
    const requests = generateRandomRequests({
      count: count.value,
      diskSize: diskSize.value,
      seed,
    });
    return { ok: true, value: { requests, head: head.value, diskSize: diskSize.value } };
  } catch (error) {
    if (isInputError(error)) return { ok: false, error };
    throw error;
  }
}

/**
 * Print an error (and optionally usage) and exit.
 */
export function exitWithError(message: string, code: number, usage?: string): void {
  console.error(`Error: ${message}`);
  if (usage) {
    console.log(`Usage: ${usage}`);
  }
  process.exit(code);
}
