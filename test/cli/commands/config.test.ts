/**
 * Tests for the config CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/config/loader.js', () => ({
  loadConfig: vi.fn(),
  validateExternalConfig: vi.fn(),
}));

import { configCommand } from '../../../src/cli/commands/config.js';
import { loadConfig, validateExternalConfig } from '../../../src/config/loader.js';
import type { ResolvedConfig } from '../../../src/config/loader.js';

const mockLoadConfig = vi.mocked(loadConfig);
const mockValidateExternalConfig = vi.mocked(validateExternalConfig);

const FAKE_CONFIG: ResolvedConfig = {
  registration: { schema: 'extensions', types: ['vector'] },
  logging: { level: 'warn', json: false },
};

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

describe('configCommand', () => {
  it('has correct name and usage', () => {
    expect(configCommand.name).toBe('config');
    expect(configCommand.usage).toContain('show');
    expect(configCommand.usage).toContain('validate');
  });

  describe('show subcommand', () => {
    it('prints the loaded config as JSON', async () => {
      mockLoadConfig.mockReturnValue(FAKE_CONFIG);

      await configCommand.handler(['show']);

      expect(mockLoadConfig).toHaveBeenCalledOnce();
      expect(console.log).toHaveBeenCalledWith(JSON.stringify(FAKE_CONFIG, null, 2));
    });
  });

  describe('validate subcommand', () => {
    it('prints success when config is valid', async () => {
      mockLoadConfig.mockReturnValue(FAKE_CONFIG);
      mockValidateExternalConfig.mockReturnValue([]);

      await configCommand.handler(['validate']);

      expect(mockValidateExternalConfig).toHaveBeenCalledWith(FAKE_CONFIG);
      expect(console.log).toHaveBeenCalledWith('Configuration is valid.');
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('prints errors and exits with code 3 when config is invalid', async () => {
      mockLoadConfig.mockReturnValue(FAKE_CONFIG);
      mockValidateExternalConfig.mockReturnValue([
        'registration.schema must be a non-empty schema name',
        'registration.types must not repeat a type',
      ]);

      await configCommand.handler(['validate']);

      expect(console.error).toHaveBeenCalledWith('Configuration errors:');
      expect(console.error).toHaveBeenCalledWith(
        '  - registration.schema must be a non-empty schema name',
      );
      expect(console.error).toHaveBeenCalledWith('  - registration.types must not repeat a type');
      expect(process.exit).toHaveBeenCalledWith(3);
    });
  });

  describe('unknown subcommand', () => {
    it('prints usage and exits with code 2', async () => {
      await configCommand.handler(['frobnicate']);

      expect(console.error).toHaveBeenCalledWith('Error: Unknown subcommand');
      expect(process.exit).toHaveBeenCalledWith(2);
    });
  });
});
