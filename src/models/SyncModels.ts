/**
 * Result models shared by the download, upload and aggregate operations
 */

/**
 * Outcome classes a caller maps onto process exit codes
 */
export enum OutcomeStatus {
  SUCCESS = 'success',
  CONFIG_ERROR = 'config_error',
  RUNTIME_ERROR = 'runtime_error'
}

export type SyncOutcome<T> =
  | { status: OutcomeStatus.SUCCESS; summary: T }
  | { status: OutcomeStatus.CONFIG_ERROR; message: string }
  | { status: OutcomeStatus.RUNTIME_ERROR; message: string; summary?: T };

export function success<T>(summary: T): SyncOutcome<T> {
  return { status: OutcomeStatus.SUCCESS, summary };
}

export function configError<T>(message: string): SyncOutcome<T> {
  return { status: OutcomeStatus.CONFIG_ERROR, message };
}

export function runtimeError<T>(message: string, summary?: T): SyncOutcome<T> {
  return { status: OutcomeStatus.RUNTIME_ERROR, message, summary };
}

/**
 * 0 success, 2 configuration or precondition error, 1 runtime error
 */
export function exitCodeFor(outcome: SyncOutcome<unknown>): 0 | 1 | 2 {
  switch (outcome.status) {
    case OutcomeStatus.SUCCESS:
      return 0;
    case OutcomeStatus.CONFIG_ERROR:
      return 2;
    case OutcomeStatus.RUNTIME_ERROR:
      return 1;
  }
}

export interface ExportSummary {
  wikiId: string;
  outputDir: string;
  /** Files written (leaf pages and container index pages) */
  exported: number;
  /** Directories created for container pages */
  createdDirs: number;
  /** Leaf pages that had no content */
  skipped: number;
}

export interface PageFailure {
  pagePath: string;
  reason: string;
}

export interface ImportSummary {
  wikiId: string;
  folders: string[];
  created: string[];
  updated: string[];
  failed: PageFailure[];
}

export interface AggregateSummary {
  outputFile: string;
  itemCount: number;
  byCategory: Record<string, number>;
}
