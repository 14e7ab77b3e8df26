import type { Command } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { POLICIES, isPolicy, runPolicy } from '../../scheduler/index.js';
import { computeMetrics, type SeekMetrics } from '../../metrics/seek-metrics.js';
import { formatScheduleSummary } from '../../report/reporter.js';
import { isSchedulerError } from '../../utils/errors.js';
import { INPUT_OPTIONS_USAGE, collectInputFlags, exitWithError, resolveInput } from '../utils.js';

export const runCommand: Command = {
  name: 'run',
  description: 'Schedule requests under one policy',
  usage: `disksched run --policy <${POLICIES.join('|')}> [options]

Options:
  --policy <name>       Scheduling policy
${INPUT_OPTIONS_USAGE}
  --json                Print the result as JSON`,
  handler: async (args) => {
    const { flags, rest } = collectInputFlags(args);
    let policyName: string | undefined;
    let json = false;

    for (let i = 0; i < rest.length; i++) {
      switch (rest[i]) {
        case '--policy':
          policyName = rest[++i];
          break;
        case '--json':
          json = true;
          break;
        case '--help':
        case '-h':
          console.log(runCommand.usage);
          return;
      }
    }

    if (!isPolicy(policyName)) {
      exitWithError(
        `Unknown policy: ${policyName ?? '(none)'}. Choose one of ${POLICIES.join(', ')}`,
        2,
        'disksched run --policy <name> --requests <list>',
      );
      return;
    }

    const input = resolveInput(flags, loadConfig());
    if (!input.ok) {
      exitWithError(input.error.message, 2);
      return;
    }

    const { requests, head, diskSize } = input.value;
    const result = runPolicy(policyName, requests, head, diskSize);

    let metrics: SeekMetrics | null = null;
    try {
      metrics = computeMetrics(result, requests.length);
    } catch (error) {
      if (!isSchedulerError(error)) throw error;
    }

    if (json) {
      const payload = { policy: policyName, requests, head, diskSize, ...result, metrics };
      console.log(JSON.stringify(payload, null, 2));
      return;
    }

    if (flags.random) {
      console.log(`Random requests: ${requests.join(', ')}`);
    }
    console.log(formatScheduleSummary(policyName, result, metrics));
  },
};
