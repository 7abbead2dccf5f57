/**
 * Update Session
 *
 * Wires a TransactionCoordinator for one CLI invocation: the manifest
 * daemon named by --backend, the persisted refresh timestamp and the
 * loaded configuration.
 */

import { join, resolve } from 'path';
import type { ExecutionContext } from '../types/execution-context.js';
import { ManifestDaemon } from '../core/daemon/manifest-daemon.js';
import { StaticSystemState } from '../core/ports/system-state.js';
import { FileTimestampStore } from '../core/timestamp-store.js';
import { TransactionCoordinator } from '../core/updates/transaction-coordinator.js';
import type { UpdatesNotification } from '../core/updates/notifications.js';
import { INDETERMINATE } from '../core/updates/progress-tracker.js';
import type { UpdateError } from '../core/updates/update-errors.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { exists } from '../utils/fs.js';
import { DaemonError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_BACKEND_FILE = 'backend.json';

export interface UpdateSession {
  coordinator: TransactionCoordinator;
  daemon: ManifestDaemon;
  close(): void;
}

export interface OperationResult {
  success: boolean;
  errors: UpdateError[];
}

/**
 * Resolve the backend manifest: --backend, else backend.json in the
 * pkupdates directory.
 */
export async function resolveBackendPath(ctx: ExecutionContext, backend?: string): Promise<string> {
  const path = backend ? resolve(process.cwd(), backend) : join(ctx.directories.config, DEFAULT_BACKEND_FILE);
  if (!(await exists(path))) {
    throw new DaemonError(
      `No package daemon backend found at ${path}\n` +
      `Hint: pass --backend <file> with a backend manifest`,
      { path }
    );
  }
  return path;
}

export async function openSession(ctx: ExecutionContext, backend?: string): Promise<UpdateSession> {
  const daemon = await ManifestDaemon.fromFile(await resolveBackendPath(ctx, backend));
  const timestampStore = await FileTimestampStore.open(ctx.directories.state);
  const coordinator = new TransactionCoordinator({
    daemon,
    systemState: new StaticSystemState(),
    timestampStore,
    config: ctx.config
  });
  logger.debug('Update session opened');

  return {
    coordinator,
    daemon,
    close: () => coordinator.dispose()
  };
}

/**
 * Start an operation and resolve once its `done` notification arrives,
 * with every error notification it raised on the way.
 */
export function runOperation(
  coordinator: TransactionCoordinator,
  operation: 'check' | 'install',
  start: () => void
): Promise<OperationResult> {
  return new Promise(resolvePromise => {
    const errors: UpdateError[] = [];
    const unsubscribe = coordinator.subscribe((notification: UpdatesNotification) => {
      if (notification.type === 'error' && notification.error.operation === operation) {
        errors.push(notification.error);
      } else if (notification.type === 'done' && notification.operation === operation) {
        unsubscribe();
        resolvePromise({ success: notification.success, errors });
      }
    });
    start();
  });
}

/**
 * Mirror the coordinator's status line into a spinner until unsubscribed.
 */
export function followProgress(
  ctx: ExecutionContext,
  coordinator: TransactionCoordinator,
  initial: string
): (finalMessage: string) => void {
  const spinner = resolveOutput(ctx).spinner();
  spinner.start(initial);

  const unsubscribe = coordinator.on('property-changed', ({ field, snapshot }) => {
    if (field !== 'statusMessage' && field !== 'percentage') {
      return;
    }
    const percent = snapshot.percentage === INDETERMINATE || !snapshot.isActive ? '' : ` ${snapshot.percentage}%`;
    spinner.message(`${snapshot.statusMessage}${percent}`);
  });

  return (finalMessage: string) => {
    unsubscribe();
    spinner.stop(finalMessage);
  };
}

export function failureMessage(result: OperationResult, fallback: string): string {
  return result.errors.length > 0
    ? result.errors.map(error => error.message).join('\n')
    : fallback;
}
