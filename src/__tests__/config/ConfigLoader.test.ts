/**
 * ConfigLoader tests - explicit environment snapshots, config files in a temp directory
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadConfigFile, loadEnvConfig, loadSyncConfig, mergeConfigs } from '../../utils/config/ConfigLoader';
import { ConfigError, ConfigSource, createDefaultConfig } from '../../utils/config/types';
import { LogLevel } from '../../utils/logger';

const REMOTE_ENV = {
  AZDO_ORG_URL: 'https://dev.azure.com/contoso/',
  AZDO_PROJECT: 'Ops',
  AZDO_PAT: 'test-secret'
};

describe('ConfigLoader', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'wiki-sync-config-'));
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  describe('loadSyncConfig()', () => {
    it('returns defaults when nothing is configured', async () => {
      const loaded = await loadSyncConfig({ env: {}, cwd, requireRemote: false });

      expect(loaded.config).toEqual(createDefaultConfig(cwd));
      expect(loaded.sources).toEqual([ConfigSource.DEFAULT]);
      expect(loaded.filePath).toBeUndefined();
      expect(loaded.config.azureDevOps.apiVersion).toBe('7.2-preview');
      expect(loaded.config.upload.folders).toEqual(['Networking', 'Security', 'DevOps']);
    });

    it('requires the connection settings for remote commands', async () => {
      await expect(loadSyncConfig({ env: {}, cwd, requireRemote: true })).rejects.toThrow(
        'Missing or invalid configuration: azureDevOps.orgUrl is required (AZDO_ORG_URL); ' +
          'azureDevOps.project is required (AZDO_PROJECT); azureDevOps.pat is required (AZDO_PAT)'
      );
    });

    it('reads the environment and strips the trailing slash of the org URL', async () => {
      const loaded = await loadSyncConfig({
        env: { ...REMOTE_ENV, WIKI_SYNC_FOLDERS: 'Networking, DevOps', OUTPUT_DIR: 'export' },
        cwd,
        requireRemote: true
      });

      expect(loaded.config.azureDevOps).toEqual({
        orgUrl: 'https://dev.azure.com/contoso',
        project: 'Ops',
        pat: 'test-secret',
        apiVersion: '7.2-preview',
        timeout: 30000,
        listTimeout: 60000
      });
      expect(loaded.config.upload.folders).toEqual(['Networking', 'DevOps']);
      expect(loaded.config.download.outputDir).toBe(path.join(cwd, 'export'));
      expect(loaded.config.aggregate.inputDir).toBe(path.join(cwd, 'export'));
      expect(loaded.sources).toEqual([ConfigSource.DEFAULT, ConfigSource.ENVIRONMENT]);
    });

    it('layers file, environment and overrides in that order', async () => {
      await fs.writeFile(
        path.join(cwd, 'wiki-sync.config.yaml'),
        [
          'azureDevOps:',
          '  orgUrl: https://dev.azure.com/fromfile',
          '  project: FromFile',
          '  wiki: FileWiki',
          'upload:',
          '  root: ./kb',
          '  folders: [Security]'
        ].join('\n')
      );

      const loaded = await loadSyncConfig({
        env: { AZDO_PROJECT: 'FromEnv', AZDO_PAT: 'test-secret' },
        cwd,
        overrides: { azureDevOps: { wiki: 'CliWiki' } },
        requireRemote: true
      });

      expect(loaded.filePath).toBe(path.join(cwd, 'wiki-sync.config.yaml'));
      expect(loaded.config.azureDevOps.orgUrl).toBe('https://dev.azure.com/fromfile');
      expect(loaded.config.azureDevOps.project).toBe('FromEnv');
      expect(loaded.config.azureDevOps.wiki).toBe('CliWiki');
      expect(loaded.config.upload.root).toBe(path.join(cwd, 'kb'));
      expect(loaded.config.upload.folders).toEqual(['Security']);
      expect(loaded.sources).toEqual([
        ConfigSource.DEFAULT,
        ConfigSource.FILE,
        ConfigSource.ENVIRONMENT,
        ConfigSource.OVERRIDES
      ]);
    });

    it('ignores undefined override values', async () => {
      const loaded = await loadSyncConfig({
        env: { AZDO_WIKI: 'EnvWiki' },
        cwd,
        overrides: { azureDevOps: { wiki: undefined }, logging: { level: undefined } },
        requireRemote: false
      });

      expect(loaded.config.azureDevOps.wiki).toBe('EnvWiki');
      expect(loaded.config.logging.level).toBe(LogLevel.INFO);
    });

    it('rejects a non-URL organization', async () => {
      await expect(
        loadSyncConfig({ env: { ...REMOTE_ENV, AZDO_ORG_URL: 'dev.azure.com/contoso' }, cwd, requireRemote: true })
      ).rejects.toThrow('Missing or invalid configuration: azureDevOps.orgUrl must be an http(s) URL');
    });

    it('warns about very short timeouts', async () => {
      const loaded = await loadSyncConfig({ env: { AZDO_TIMEOUT_MS: '500' }, cwd, requireRemote: false });

      expect(loaded.warnings).toEqual(['azureDevOps.timeout is less than 1 second']);
    });
  });

  describe('loadEnvConfig()', () => {
    it('rejects a malformed timeout', () => {
      expect(() => loadEnvConfig({ AZDO_TIMEOUT_MS: 'abc' }, cwd)).toThrow(
        'AZDO_TIMEOUT_MS must be a positive integer, got "abc"'
      );
    });

    it('rejects an unknown log level', () => {
      expect(() => loadEnvConfig({ LOG_LEVEL: 'verbose' }, cwd)).toThrow(ConfigError);
    });

    it('treats blank variables as unset', () => {
      expect(loadEnvConfig({ AZDO_PROJECT: '   ', LOG_TO_FILE: 'TRUE' }, cwd)).toEqual({
        azureDevOps: {},
        upload: {},
        download: {},
        aggregate: {},
        logging: { enableFile: true }
      });
    });
  });

  describe('loadConfigFile()', () => {
    it('resolves paths against the file location', async () => {
      const configDir = path.join(cwd, 'conf');
      await fs.mkdir(configDir);
      const file = path.join(configDir, 'sync.json');
      await fs.writeFile(file, JSON.stringify({ download: { outputDir: '../mirror' }, logging: { level: 'debug' } }));

      const { config, warnings } = await loadConfigFile(file);

      expect(config.download).toEqual({ outputDir: path.join(cwd, 'mirror') });
      expect(config.logging).toEqual({ level: LogLevel.DEBUG });
      expect(warnings).toEqual([]);
    });

    it('reports type errors with the file path', async () => {
      const file = path.join(cwd, 'bad.json');
      await fs.writeFile(file, JSON.stringify({ azureDevOps: { timeout: 'fast' }, extras: {} }));

      const error = await loadConfigFile(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({
        message: 'Configuration validation failed: azureDevOps.timeout must be a number',
        configPath: file
      });
    });

    it('rejects unsupported formats', async () => {
      const file = path.join(cwd, 'sync.ini');
      await fs.writeFile(file, 'a=1');

      await expect(loadConfigFile(file)).rejects.toThrow('Unsupported config file format: .ini');
    });
  });

  describe('mergeConfigs()', () => {
    it('merges section by section', () => {
      const base = createDefaultConfig(cwd);
      const merged = mergeConfigs(base, { azureDevOps: { project: 'P' } });

      expect(merged.azureDevOps.project).toBe('P');
      expect(merged.azureDevOps.apiVersion).toBe('7.2-preview');
      expect(merged.upload).toEqual(base.upload);
    });
  });
});
