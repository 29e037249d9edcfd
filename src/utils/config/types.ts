/**
 * Shared types for configuration utilities
 */

import path from 'path';
import { SyncConfig } from '../../models/Config';
import { LogLevel } from '../logger';

/**
 * Configuration loading error
 */
export class ConfigError extends Error {
  constructor(message: string, public configPath?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Configuration source types
 */
export enum ConfigSource {
  ENVIRONMENT = 'environment',
  FILE = 'file',
  OVERRIDES = 'overrides',
  DEFAULT = 'default'
}

/**
 * Configuration validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Environment variables read at process entry
 */
export const ENV_VARS = {
  ORG_URL: 'AZDO_ORG_URL',
  PROJECT: 'AZDO_PROJECT',
  WIKI: 'AZDO_WIKI',
  PAT: 'AZDO_PAT',
  API_VERSION: 'AZDO_API_VERSION',
  TIMEOUT: 'AZDO_TIMEOUT_MS',
  KNOWLEDGE_ROOT: 'IT_KNOWLEDGE_ROOT',
  FOLDERS: 'WIKI_SYNC_FOLDERS',
  OUTPUT_DIR: 'OUTPUT_DIR',
  KNOWLEDGE_JSON: 'KNOWLEDGE_JSON',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_DIR: 'LOG_DIR',
  LOG_TO_FILE: 'LOG_TO_FILE'
} as const;

/**
 * Config files looked up in the working directory when none is given
 */
export const DEFAULT_CONFIG_FILES = [
  'wiki-sync.config.yaml',
  'wiki-sync.config.yml',
  'wiki-sync.config.json'
];

export const DEFAULT_FOLDERS = ['Networking', 'Security', 'DevOps'];

/** Folder allow-list entry that admits every folder */
export const ALL_FOLDERS = '*';

export const DEFAULT_API_VERSION = '7.2-preview';

export function createDefaultConfig(cwd: string): SyncConfig {
  return {
    azureDevOps: {
      orgUrl: '',
      project: '',
      pat: '',
      apiVersion: DEFAULT_API_VERSION,
      timeout: 30000,
      listTimeout: 60000
    },
    upload: {
      root: path.join(cwd, 'IT-knowledge'),
      folders: [...DEFAULT_FOLDERS],
      defaultWikiName: 'ProjectWiki'
    },
    download: {
      outputDir: path.join(cwd, 'wiki-export')
    },
    aggregate: {
      inputDir: path.join(cwd, 'wiki-export'),
      outputFile: path.join(cwd, 'it_knowledge.json')
    },
    logging: {
      level: LogLevel.INFO,
      logDir: path.join(cwd, 'logs'),
      enableFile: false
    }
  };
}
