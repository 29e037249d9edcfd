/**
 * Tests for src/cli/output.ts
 */

jest.mock('cli-progress', () => ({
  SingleBar: jest.fn().mockImplementation(() => ({
    start: jest.fn(),
    update: jest.fn(),
    stop: jest.fn(),
  })),
  Presets: { rect: {} },
}));

import { CLIError, handleCommandError, logError, logSuccess } from '../../cli/output';
import { ConfigError } from '../../utils/config/types';

describe('output helpers', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('prints an icon followed by the message', () => {
    logSuccess('done');
    logError('broken');

    expect(consoleLogSpy.mock.calls[0][1]).toBe('done');
    expect(consoleLogSpy.mock.calls[1][1]).toBe('broken');
  });

  describe('handleCommandError', () => {
    it('exits with 2 for configuration errors', () => {
      handleCommandError(new ConfigError('azureDevOps.pat is required', '/tmp/wiki-sync.config.yaml'));

      expect(process.exitCode).toBe(2);
      expect(consoleLogSpy.mock.calls[0][1]).toBe('ERROR: azureDevOps.pat is required');
      expect(consoleLogSpy.mock.calls[1][1]).toBe('Config file: /tmp/wiki-sync.config.yaml');
    });

    it('exits with 1 for CLI errors and prints the code', () => {
      handleCommandError(new CLIError('cannot continue', 'E_STATE'));

      expect(process.exitCode).toBe(1);
      expect(consoleLogSpy.mock.calls[0][1]).toBe('cannot continue');
      expect(consoleLogSpy.mock.calls[1][1]).toBe('Error code: E_STATE');
    });

    it('exits with 1 for anything else', () => {
      const error = new Error('unexpected');

      handleCommandError(error);

      expect(process.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith(error);
    });
  });
});
