/**
 * CLI-only process handlers.
 *
 * Installs global handlers, so it is imported from src/cli.ts only and never
 * from the library entry point.
 */

import { logError } from './output';

type Listener = (...args: never[]) => void;

/**
 * The part of `process` the handlers are installed on
 */
export interface ProcessHandle {
  on(event: string, listener: Listener): unknown;
  exit(code?: number): void;
}

/**
 * Log and exit 1 on an unhandled rejection or uncaught exception; exit
 * 130 on SIGINT.
 *
 * @param proc - Defaults to the global `process`; tests pass their own.
 */
export function installProcessHandlers(proc: ProcessHandle = process): void {
  proc.on('SIGINT', () => {
    logError('Interrupted');
    proc.exit(130);
  });

  proc.on('unhandledRejection', (reason: unknown) => {
    logError(`Unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
    proc.exit(1);
  });

  proc.on('uncaughtException', (error: Error) => {
    logError(`Uncaught exception: ${error.message}`);
    proc.exit(1);
  });
}
