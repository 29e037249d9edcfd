/**
 * ConfigLoader - File and environment-based config loading with section merge
 */

import fs from 'fs/promises';
import path from 'path';
import * as yaml from 'js-yaml';
import { PartialSyncConfig, SyncConfig } from '../../models/Config';
import { parseLogLevel } from '../logger';
import {
  ConfigError,
  ConfigSource,
  DEFAULT_CONFIG_FILES,
  ENV_VARS,
  createDefaultConfig
} from './types';
import { validateConfigFile, validateSyncConfig } from './ConfigValidator';

export type Environment = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Environment snapshot taken at process entry */
  env: Environment;
  /** Directory relative paths are resolved against */
  cwd: string;
  /** Explicit config file; otherwise DEFAULT_CONFIG_FILES are tried */
  configFile?: string;
  /** Values from command line flags, applied last */
  overrides?: PartialSyncConfig;
  /** Whether the Azure DevOps connection settings must be present */
  requireRemote: boolean;
}

export interface LoadedConfig {
  config: SyncConfig;
  sources: ConfigSource[];
  filePath?: string;
  warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function str(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

function num(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  return typeof value === 'number' ? value : undefined;
}

function resolveFrom(baseDir: string, value: string | undefined): string | undefined {
  return value === undefined ? undefined : path.resolve(baseDir, value);
}

function splitList(value: string): string[] {
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

/**
 * Drop keys whose value is undefined so they never shadow a lower layer
 */
function compact<T extends object>(obj: T): Partial<T> {
  const result: Partial<T> = { ...obj };
  for (const key in result) {
    if (result[key] === undefined) {
      delete result[key];
    }
  }
  return result;
}

/**
 * Load a configuration file (JSON or YAML) and return the sections it sets.
 * Paths inside the file are resolved against the file's directory.
 */
export async function loadConfigFile(filePath: string): Promise<{ config: PartialSyncConfig; warnings: string[] }> {
  const absolutePath = path.resolve(filePath);
  let fileContent: string;
  try {
    fileContent = await fs.readFile(absolutePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigError(
      `Failed to load config from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const extension = path.extname(absolutePath).toLowerCase();
  let parsed: unknown;

  try {
    if (extension === '.json') {
      parsed = JSON.parse(fileContent);
    } else if (extension === '.yaml' || extension === '.yml') {
      parsed = yaml.load(fileContent);
    } else {
      throw new ConfigError(`Unsupported config file format: ${extension}`, filePath);
    }
  } catch (error: unknown) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(
      `Failed to parse config from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const validation = validateConfigFile(parsed);
  if (!validation.valid) {
    throw new ConfigError(`Configuration validation failed: ${validation.errors.join(', ')}`, filePath);
  }

  const baseDir = path.dirname(absolutePath);
  const azdo = section(get(parsed, 'azureDevOps'));
  const upload = section(get(parsed, 'upload'));
  const download = section(get(parsed, 'download'));
  const aggregate = section(get(parsed, 'aggregate'));
  const logging = section(get(parsed, 'logging'));
  const folders = upload['folders'];
  const enableFile = logging['enableFile'];

  return {
    config: {
      azureDevOps: compact({
        orgUrl: str(azdo, 'orgUrl'),
        project: str(azdo, 'project'),
        wiki: str(azdo, 'wiki'),
        pat: str(azdo, 'pat'),
        apiVersion: str(azdo, 'apiVersion'),
        timeout: num(azdo, 'timeout'),
        listTimeout: num(azdo, 'listTimeout')
      }),
      upload: compact({
        root: resolveFrom(baseDir, str(upload, 'root')),
        folders: Array.isArray(folders) ? folders.filter((f): f is string => typeof f === 'string') : undefined,
        defaultWikiName: str(upload, 'defaultWikiName')
      }),
      download: compact({
        outputDir: resolveFrom(baseDir, str(download, 'outputDir'))
      }),
      aggregate: compact({
        inputDir: resolveFrom(baseDir, str(aggregate, 'inputDir')),
        outputFile: resolveFrom(baseDir, str(aggregate, 'outputFile'))
      }),
      logging: compact({
        level: parseLogLevel(str(logging, 'level')),
        logDir: resolveFrom(baseDir, str(logging, 'logDir')),
        enableFile: typeof enableFile === 'boolean' ? enableFile : undefined
      })
    },
    warnings: validation.warnings
  };
}

function get(obj: unknown, key: string): unknown {
  return isRecord(obj) ? obj[key] : undefined;
}

/**
 * Build a partial config from environment variables.
 * Throws ConfigError when a variable is set to an unusable value.
 */
export function loadEnvConfig(env: Environment, cwd: string): PartialSyncConfig {
  const value = (name: string): string | undefined => {
    const raw = env[name];
    return raw !== undefined && raw.trim() !== '' ? raw.trim() : undefined;
  };

  let timeout: number | undefined;
  const rawTimeout = value(ENV_VARS.TIMEOUT);
  if (rawTimeout !== undefined) {
    timeout = parseInt(rawTimeout, 10);
    if (!/^\d+$/.test(rawTimeout) || timeout <= 0) {
      throw new ConfigError(`${ENV_VARS.TIMEOUT} must be a positive integer, got "${rawTimeout}"`);
    }
  }

  const rawLevel = value(ENV_VARS.LOG_LEVEL);
  const level = parseLogLevel(rawLevel);
  if (rawLevel !== undefined && level === undefined) {
    throw new ConfigError(`${ENV_VARS.LOG_LEVEL} must be one of: error, warn, info, http, debug`);
  }

  const rawFolders = value(ENV_VARS.FOLDERS);
  const rawLogToFile = value(ENV_VARS.LOG_TO_FILE);

  return {
    azureDevOps: compact({
      orgUrl: value(ENV_VARS.ORG_URL),
      project: value(ENV_VARS.PROJECT),
      wiki: value(ENV_VARS.WIKI),
      pat: value(ENV_VARS.PAT),
      apiVersion: value(ENV_VARS.API_VERSION),
      timeout
    }),
    upload: compact({
      root: resolveFrom(cwd, value(ENV_VARS.KNOWLEDGE_ROOT)),
      folders: rawFolders !== undefined ? splitList(rawFolders) : undefined
    }),
    download: compact({
      outputDir: resolveFrom(cwd, value(ENV_VARS.OUTPUT_DIR))
    }),
    aggregate: compact({
      inputDir: resolveFrom(cwd, value(ENV_VARS.OUTPUT_DIR)),
      outputFile: resolveFrom(cwd, value(ENV_VARS.KNOWLEDGE_JSON))
    }),
    logging: compact({
      level,
      logDir: resolveFrom(cwd, value(ENV_VARS.LOG_DIR)),
      enableFile: rawLogToFile !== undefined ? rawLogToFile.toLowerCase() === 'true' : undefined
    })
  };
}

/**
 * Merge a partial config over a complete one, section by section.
 */
export function mergeConfigs(target: SyncConfig, source: PartialSyncConfig): SyncConfig {
  return {
    azureDevOps: { ...target.azureDevOps, ...compact(source.azureDevOps ?? {}) },
    upload: { ...target.upload, ...compact(source.upload ?? {}) },
    download: { ...target.download, ...compact(source.download ?? {}) },
    aggregate: { ...target.aggregate, ...compact(source.aggregate ?? {}) },
    logging: { ...target.logging, ...compact(source.logging ?? {}) }
  };
}

async function findDefaultConfigFile(cwd: string): Promise<string | undefined> {
  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.join(cwd, name);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // Not present, try the next name
    }
  }
  return undefined;
}

function hasValues(partial: PartialSyncConfig): boolean {
  return Object.values(partial).some(s => s !== undefined && Object.keys(s).length > 0);
}

/**
 * Build the SyncConfig for one run: defaults, then the config file, then
 * the environment, then command line overrides.
 */
export async function loadSyncConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const sources: ConfigSource[] = [ConfigSource.DEFAULT];
  const warnings: string[] = [];
  let config = createDefaultConfig(options.cwd);

  const filePath = options.configFile
    ? path.resolve(options.cwd, options.configFile)
    : await findDefaultConfigFile(options.cwd);

  if (filePath) {
    const fromFile = await loadConfigFile(filePath);
    config = mergeConfigs(config, fromFile.config);
    warnings.push(...fromFile.warnings);
    sources.push(ConfigSource.FILE);
  }

  const fromEnv = loadEnvConfig(options.env, options.cwd);
  if (hasValues(fromEnv)) {
    config = mergeConfigs(config, fromEnv);
    sources.push(ConfigSource.ENVIRONMENT);
  }

  if (options.overrides && hasValues(options.overrides)) {
    config = mergeConfigs(config, options.overrides);
    sources.push(ConfigSource.OVERRIDES);
  }

  config.azureDevOps.orgUrl = config.azureDevOps.orgUrl.replace(/\/+$/, '');

  const validation = validateSyncConfig(config, options.requireRemote);
  if (!validation.valid) {
    throw new ConfigError(`Missing or invalid configuration: ${validation.errors.join('; ')}`, filePath);
  }
  warnings.push(...validation.warnings);

  return { config, sources, filePath, warnings };
}
