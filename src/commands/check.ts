import { Command } from 'commander';
import pico from 'picocolors';

import type { CheckOptions, CommandResult } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import type { UpdatesSnapshot } from '../core/updates/snapshot.js';
import { createCliExecutionContext } from '../cli/context.js';
import { getGlobalOptions } from '../cli/global-options.js';
import { failureMessage, followProgress, openSession, runOperation, type UpdateSession } from '../cli/session.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { DaemonError, withErrorHandling } from '../utils/errors.js';

/**
 * Run one check on an open session. `force` refreshes the daemon cache
 * even when it is recent.
 */
export async function runCheck(
  ctx: ExecutionContext,
  session: UpdateSession,
  options: CheckOptions = {}
): Promise<CommandResult<UpdatesSnapshot>> {
  const { coordinator } = session;
  const stop = followProgress(ctx, coordinator, 'Checking for updates');
  const result = await runOperation(coordinator, 'check', () =>
    coordinator.checkUpdates(options.force ?? true, true)
  );

  if (!result.success) {
    stop('Update check failed');
    return { success: false, error: failureMessage(result, coordinator.statusMessage) };
  }
  stop(coordinator.timestamp);
  return { success: true, data: coordinator.snapshot };
}

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Refresh the package cache and look for updates')
    .option('--no-force', 'reuse a recently refreshed cache')
    .action(
      withErrorHandling(async (options: CheckOptions, command: Command) => {
        const globals = getGlobalOptions(command);
        const ctx = await createCliExecutionContext({ home: globals.home });
        const session = await openSession(ctx, globals.backend);
        try {
          const result = await runCheck(ctx, session, options);
          if (!result.success || !result.data) {
            throw new DaemonError(result.error ?? 'Update check failed');
          }
          const out = resolveOutput(ctx);
          const snapshot = result.data;
          if (snapshot.isSystemUpToDate) {
            out.success(snapshot.message);
          } else {
            out.info(snapshot.securityCount > 0 ? pico.red(snapshot.message) : snapshot.message);
            out.message(pico.dim('Run `pkupdates list` to see them'));
          }
        } finally {
          session.close();
        }
      })
    );
}
