import type { Command } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { collectInputFlags, exitWithError, resolveInput } from '../utils.js';

export const randomCommand: Command = {
  name: 'random',
  description: 'Generate a random request list',
  usage: 'disksched random [--count <n>] [--disk-size <n>] [--seed <n>]',
  handler: async (args) => {
    if (args.includes('--help') || args.includes('-h')) {
      console.log(randomCommand.usage);
      return;
    }

    const { flags } = collectInputFlags(args);
    const input = resolveInput({ ...flags, random: true }, loadConfig());
    if (!input.ok) {
      exitWithError(input.error.message, 2);
      return;
    }

    console.log(input.value.requests.join(', '));
  },
};
