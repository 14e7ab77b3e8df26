import type { Command } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { compareAll } from '../../compare/aggregator.js';
import {
  exportComparisonCsv,
  generateMarkdownReport,
  writeReports,
} from '../../report/reporter.js';
import { INPUT_OPTIONS_USAGE, collectInputFlags, exitWithError, resolveInput } from '../utils.js';

export const compareCommand: Command = {
  name: 'compare',
  description: 'Compare all four policies on the same requests',
  usage: `disksched compare [options]

Options:
${INPUT_OPTIONS_USAGE}
  --output <dir>        Also write report.md, report.json and the CSV to <dir>
  --csv                 Print the comparison table as CSV
  --json                Print the comparison as JSON`,
  handler: async (args) => {
    const { flags, rest } = collectInputFlags(args);
    let outputDir: string | undefined;
    let format: 'markdown' | 'csv' | 'json' = 'markdown';

    for (let i = 0; i < rest.length; i++) {
      switch (rest[i]) {
        case '--output':
          outputDir = rest[++i];
          break;
        case '--csv':
          format = 'csv';
          break;
        case '--json':
          format = 'json';
          break;
        case '--help':
        case '-h':
          console.log(compareCommand.usage);
          return;
      }
    }

    const config = loadConfig();
    const input = resolveInput(flags, config);
    if (!input.ok) {
      exitWithError(input.error.message, 2);
      return;
    }

    const { requests, head, diskSize } = input.value;
    const result = compareAll(requests, head, diskSize);

    switch (format) {
      case 'csv':
        process.stdout.write(exportComparisonCsv(result));
        break;
      case 'json':
        console.log(JSON.stringify(result, null, 2));
        break;
      default:
        console.log(generateMarkdownReport(result));
    }

    if (outputDir) {
      const { markdownPath, jsonPath, csvPath } = await writeReports(result, outputDir);
      console.error('Reports written to:');
      console.error(`  ${markdownPath}`);
      console.error(`  ${jsonPath}`);
      console.error(`  ${csvPath}`);
    }
  },
};
