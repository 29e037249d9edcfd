/**
 * ConfigValidator - Validation logic for configuration objects
 */

import { SyncConfig } from '../../models/Config';
import { isLogLevel } from '../logger';
import { ValidationResult } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Helper to safely access a nested property from a config object. */
function get(obj: unknown, ...keys: string[]): unknown {
  let cur: unknown = obj;
  for (const key of keys) {
    if (!isRecord(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

const STRING_FIELDS: Array<[string, string]> = [
  ['azureDevOps', 'orgUrl'],
  ['azureDevOps', 'project'],
  ['azureDevOps', 'wiki'],
  ['azureDevOps', 'pat'],
  ['azureDevOps', 'apiVersion'],
  ['upload', 'root'],
  ['upload', 'defaultWikiName'],
  ['download', 'outputDir'],
  ['aggregate', 'inputDir'],
  ['aggregate', 'outputFile'],
  ['logging', 'logDir']
];

const NUMBER_FIELDS: Array<[string, string]> = [
  ['azureDevOps', 'timeout'],
  ['azureDevOps', 'listTimeout']
];

/**
 * Validate the shape of a parsed config file before it is merged.
 */
export function validateConfigFile(config: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config === null || typeof config !== 'object' || Array.isArray(config)) {
    return { valid: false, errors: ['Configuration must be an object'], warnings };
  }

  const known = new Set(['azureDevOps', 'upload', 'download', 'aggregate', 'logging']);
  for (const key of Object.keys(config)) {
    if (!known.has(key)) {
      warnings.push(`Unknown configuration section: ${key}`);
    }
  }

  for (const [section, key] of STRING_FIELDS) {
    const value = get(config, section, key);
    if (value !== undefined && typeof value !== 'string') {
      errors.push(`${section}.${key} must be a string`);
    }
  }

  for (const [section, key] of NUMBER_FIELDS) {
    const value = get(config, section, key);
    if (value !== undefined && typeof value !== 'number') {
      errors.push(`${section}.${key} must be a number`);
    }
  }

  const folders = get(config, 'upload', 'folders');
  if (folders !== undefined) {
    if (!Array.isArray(folders) || folders.some(f => typeof f !== 'string')) {
      errors.push('upload.folders must be an array of strings');
    }
  }

  const level = get(config, 'logging', 'level');
  if (level !== undefined && (typeof level !== 'string' || !isLogLevel(level))) {
    errors.push('logging.level must be one of: error, warn, info, http, debug');
  }

  const enableFile = get(config, 'logging', 'enableFile');
  if (enableFile !== undefined && typeof enableFile !== 'boolean') {
    errors.push('logging.enableFile must be a boolean');
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Validate a fully merged configuration.
 *
 * Remote settings are only required by commands that talk to the wiki.
 */
export function validateSyncConfig(config: SyncConfig, requireRemote: boolean): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const azdo = config.azureDevOps;

  if (requireRemote) {
    if (!azdo.orgUrl) {
      errors.push('azureDevOps.orgUrl is required (AZDO_ORG_URL)');
    } else if (!/^https?:\/\//i.test(azdo.orgUrl)) {
      errors.push('azureDevOps.orgUrl must be an http(s) URL');
    }
    if (!azdo.project) {
      errors.push('azureDevOps.project is required (AZDO_PROJECT)');
    }
    if (!azdo.pat) {
      errors.push('azureDevOps.pat is required (AZDO_PAT)');
    }
  }

  if (!azdo.apiVersion) {
    errors.push('azureDevOps.apiVersion must not be empty');
  }

  for (const [name, value] of [['timeout', azdo.timeout], ['listTimeout', azdo.listTimeout]] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`azureDevOps.${name} must be a positive number`);
    } else if (value < 1000) {
      warnings.push(`azureDevOps.${name} is less than 1 second`);
    }
  }

  if (config.upload.folders.length === 0) {
    errors.push('upload.folders must name at least one folder');
  }

  return { valid: errors.length === 0, errors, warnings };
}
