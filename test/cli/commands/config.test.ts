/**
 * Tests for the config CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/config/loader.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/config/loader.js')>();
  return { ...actual, loadConfig: vi.fn(() => actual.EXTERNAL_DEFAULTS) };
});

import { configCommand } from '../../../src/cli/commands/config.js';
import { EXTERNAL_DEFAULTS, loadConfig } from '../../../src/config/loader.js';

const mockLoadConfig = vi.mocked(loadConfig);

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

describe('configCommand', () => {
  it('has correct name and usage', () => {
    expect(configCommand.name).toBe('config');
    expect(configCommand.usage).toBe('disksched config <show|validate>');
  });

  describe('show subcommand', () => {
    it('prints the loaded config as JSON', async () => {
      await configCommand.handler(['show']);

      expect(mockLoadConfig).toHaveBeenCalledOnce();
      expect(console.log).toHaveBeenCalledWith(JSON.stringify(EXTERNAL_DEFAULTS, null, 2));
    });
  });

  describe('validate subcommand', () => {
    it('prints success when config is valid', async () => {
      await configCommand.handler(['validate']);

      expect(console.log).toHaveBeenCalledWith('Configuration is valid.');
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('lists errors and exits with code 3', async () => {
      mockLoadConfig.mockReturnValueOnce({ ...EXTERNAL_DEFAULTS, disk: { size: 0, head: 50 } });

      await configCommand.handler(['validate']);

      expect(console.error).toHaveBeenCalledWith('Configuration errors:');
      expect(console.error).toHaveBeenCalledWith('  - disk.size must be a positive integer');
      expect(console.error).toHaveBeenCalledWith('  - random.count cannot exceed disk.size');
      expect(process.exit).toHaveBeenCalledWith(3);
    });
  });

  it('exits with code 2 on an unknown subcommand', async () => {
    await configCommand.handler(['edit']);

    expect(console.error).toHaveBeenCalledWith('Error: Unknown subcommand');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
