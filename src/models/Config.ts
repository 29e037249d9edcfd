/**
 * Configuration models for wiki-sync
 */

import { LogLevel } from '../utils/logger';

/**
 * Connection settings for the Azure DevOps wiki REST API
 */
export interface AzureDevOpsConfig {
  /** Organization URL, e.g. https://dev.azure.com/contoso */
  orgUrl: string;
  /** Project name or id */
  project: string;
  /** Wiki name; when empty the download picks the project wiki */
  wiki?: string;
  /** Personal Access Token */
  pat: string;
  /** REST api-version query parameter */
  apiVersion: string;
  /** Per-request timeout in milliseconds */
  timeout: number;
  /** Timeout for full-recursion page listings in milliseconds */
  listTimeout: number;
}

/**
 * Settings for pushing a local knowledge folder to the wiki
 */
export interface UploadConfig {
  /** Local root holding one sub-folder per category */
  root: string;
  /** Sub-folder names to upload; '*' uploads every folder */
  folders: string[];
  /** Wiki name used when the configured one does not exist yet */
  defaultWikiName: string;
}

/**
 * Settings for exporting the wiki to disk
 */
export interface DownloadConfig {
  /** Local export directory */
  outputDir: string;
}

/**
 * Settings for building the knowledge catalogue from an export
 */
export interface AggregateConfig {
  /** Exported tree to scan */
  inputDir: string;
  /** JSON file to write */
  outputFile: string;
}

export interface LoggingConfig {
  level: LogLevel;
  logDir: string;
  enableFile: boolean;
}

/**
 * Complete configuration, built once at process entry
 */
export interface SyncConfig {
  azureDevOps: AzureDevOpsConfig;
  upload: UploadConfig;
  download: DownloadConfig;
  aggregate: AggregateConfig;
  logging: LoggingConfig;
}

/**
 * Recursive partial used for config files, environment and CLI overrides
 */
export type PartialSyncConfig = {
  [K in keyof SyncConfig]?: Partial<SyncConfig[K]>;
};
