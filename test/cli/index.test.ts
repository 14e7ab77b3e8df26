/**
 * Tests for CLI dispatch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/config/loader.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/config/loader.js')>();
  return { ...actual, loadConfig: vi.fn(() => actual.EXTERNAL_DEFAULTS) };
});

import { VERSION, applyGlobalOptions, commands, main } from '../../src/cli/index.js';
import { EXTERNAL_DEFAULTS, loadConfig } from '../../src/config/loader.js';
import { formatEntry, setJsonMode, setLogLevel } from '../../src/utils/logger.js';

const mockLoadConfig = vi.mocked(loadConfig);

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

afterEach(() => {
  setLogLevel('info');
  setJsonMode(false);
});

describe('cli', () => {
  describe('command registry', () => {
    it('includes every command once', () => {
      const names = commands.map((c) => c.name);

      expect(names).toEqual(['run', 'compare', 'random', 'config', 'serve']);
    });

    it('gives every command a usage line', () => {
      for (const command of commands) {
        expect(command.usage).toContain(`disksched ${command.name}`);
      }
    });
  });

  describe('main', () => {
    it('prints the version', async () => {
      await main(['--version']);

      expect(console.log).toHaveBeenCalledWith(`disksched ${VERSION}`);
    });

    it('shows help without a command', async () => {
      await main([]);

      expect(console.log).toHaveBeenCalledWith('Usage: disksched <command> [options]');
      expect(console.log).toHaveBeenCalledWith(
        '  run              Schedule requests under one policy',
      );
    });

    it('exits with code 2 on an unknown command', async () => {
      await main(['schedule']);

      expect(console.error).toHaveBeenCalledWith('Unknown command: schedule');
      expect(process.exit).toHaveBeenCalledWith(2);
    });

    it('dispatches to the named command', async () => {
      await main(['run', '--policy', 'FCFS', '--requests', '60']);

      expect(console.log).toHaveBeenCalledWith(
        [
          'Algorithm: FCFS',
          'Sequence: 50 → 60',
          'Total Seek Time: 10',
          'Average Seek Time: 10.00',
          'Throughput: 0.1000 requests/unit',
        ].join('\n'),
      );
    });
  });

  describe('global options', () => {
    const entry = { timestamp: '2024-01-01T00:00:00.000Z', level: 'warn' as const, message: 'x' };

    it('strips logging flags before the command', () => {
      expect(applyGlobalOptions(['--log-level', 'debug', '--log-json', 'run', '--json'])).toEqual({
        argv: ['run', '--json'],
      });
    });

    it('switches log lines to JSON', () => {
      applyGlobalOptions(['--log-json']);

      expect(formatEntry(entry)).toBe(JSON.stringify(entry));
    });

    it('leaves flags after the command alone', () => {
      expect(applyGlobalOptions(['run', '--log-json'])).toEqual({ argv: ['run', '--log-json'] });
      expect(formatEntry(entry)).toBe('[00:00:00] WARN  x');
    });

    it('exits with code 2 on an unknown log level', async () => {
      await main(['--log-level', 'loud', 'run']);

      expect(console.error).toHaveBeenCalledWith('Error: Unknown log level: loud');
      expect(process.exit).toHaveBeenCalledWith(2);
    });
  });

  describe('configuration errors', () => {
    it('exits with code 3 when serve finds an invalid config', async () => {
      mockLoadConfig.mockReturnValueOnce({ ...EXTERNAL_DEFAULTS, server: { port: 70000 } });

      await main(['serve']);

      expect(console.error).toHaveBeenCalledWith(
        'Error: Invalid configuration: server.port must be between 0 and 65535',
      );
      expect(process.exit).toHaveBeenCalledWith(3);
    });
  });
});
