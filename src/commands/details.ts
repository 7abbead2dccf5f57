import { Command } from 'commander';
import pico from 'picocolors';

import type { UpdatesNotification } from '../core/updates/notifications.js';
import type { TransactionCoordinator } from '../core/updates/transaction-coordinator.js';
import { createCliExecutionContext } from '../cli/context.js';
import { getGlobalOptions } from '../cli/global-options.js';
import { openSession } from '../cli/session.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatPackageLabel } from '../utils/package-id.js';
import { DaemonError, withErrorHandling } from '../utils/errors.js';

export type UpdateDetail = Extract<UpdatesNotification, { type: 'update-detail' }>;

const RESTART_NOTES: Partial<Record<UpdateDetail['restart'], string>> = {
  'application': 'Applications using this package need a restart',
  'session': 'You will need to log out and back in',
  'security-session': 'You will need to log out and back in for a security fix',
  'system': 'A system restart is required',
  'security-system': 'A system restart is required for a security fix'
};

/**
 * Request the detail of one update and resolve with the coordinator's answer.
 */
export function fetchUpdateDetail(coordinator: TransactionCoordinator, packageId: string): Promise<UpdateDetail> {
  return new Promise((resolve, reject) => {
    const unsubscribe = coordinator.subscribe(notification => {
      if (notification.type === 'update-detail' && notification.packageId === packageId) {
        unsubscribe();
        resolve(notification);
      } else if (
        notification.type === 'error' &&
        notification.error.operation === 'detail' &&
        notification.packageId === packageId
      ) {
        unsubscribe();
        reject(new DaemonError(notification.error.message, { packageId, kind: notification.error.kind }));
      }
    });
    coordinator.getUpdateDetails(packageId);
  });
}

export function renderDetail(detail: UpdateDetail): string[] {
  const lines = [detail.updateText || pico.dim('No description provided')];
  const restartNote = RESTART_NOTES[detail.restart];
  if (restartNote) {
    lines.push('', pico.yellow(restartNote));
  }
  if (detail.urls.length > 0) {
    lines.push('', 'More information:', ...detail.urls.map(url => `  ${url}`));
  }
  if (detail.changelog) {
    lines.push('', 'Changes:', detail.changelog);
  }
  return lines;
}

export function setupDetailsCommand(program: Command): void {
  program
    .command('details')
    .argument('<package-id>', 'update id as reported by `pkupdates list`')
    .description('Show the description of an update')
    .action(
      withErrorHandling(async (packageId: string, _options: object, command: Command) => {
        const globals = getGlobalOptions(command);
        const ctx = await createCliExecutionContext({ home: globals.home });
        const session = await openSession(ctx, globals.backend);
        try {
          const detail = await fetchUpdateDetail(session.coordinator, packageId);
          resolveOutput(ctx).note(renderDetail(detail).join('\n'), formatPackageLabel(detail.packageId));
        } finally {
          session.close();
        }
      })
    );
}
