import { Command } from 'commander';
import pico from 'picocolors';

import type { CommandResult, InstallCommandOptions } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import type { EulaRequest } from '../core/updates/eula-negotiator.js';
import type { CatalogSnapshot } from '../core/updates/update-catalog.js';
import { createCliExecutionContext } from '../cli/context.js';
import { getGlobalOptions } from '../cli/global-options.js';
import { failureMessage, followProgress, openSession, runOperation, type UpdateSession } from '../cli/session.js';
import { resolveOutput, resolvePrompt } from '../core/ports/resolve.js';
import { formatPackageLabel, packageName } from '../utils/package-id.js';
import { plural } from '../utils/formatters.js';
import { DaemonError, PackageNotFoundError, ValidationError, withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runCheck } from './check.js';

export interface InstallOutcome {
  installed: string[];
  /** Strongest restart any installed package asked for */
  restart?: 'session' | 'system';
}

/**
 * Map requested ids or package names onto catalog ids. A bare name must
 * match exactly one available update.
 */
export function resolveSelection(catalog: CatalogSnapshot, requested: readonly string[]): string[] {
  const selected = new Set<string>();
  for (const wanted of requested) {
    if (wanted in catalog.packages) {
      selected.add(wanted);
      continue;
    }
    const byName = catalog.entries.filter(entry => packageName(entry.id) === wanted);
    if (byName.length === 0) {
      throw new PackageNotFoundError(wanted);
    }
    if (byName.length > 1) {
      throw new ValidationError(
        `'${wanted}' matches several updates; use one of: ${byName.map(entry => entry.id).join(', ')}`
      );
    }
    selected.add(byName[0].id);
  }
  return [...selected];
}

async function chooseUpdates(
  ctx: ExecutionContext,
  catalog: CatalogSnapshot,
  requested: readonly string[],
  options: InstallCommandOptions
): Promise<string[]> {
  if (options.all) {
    return catalog.entries.map(entry => entry.id);
  }
  if (requested.length > 0) {
    return resolveSelection(catalog, requested);
  }
  if (!ctx.interactive) {
    throw new ValidationError('No updates selected. Pass package ids or --all');
  }
  const allIds = catalog.entries.map(entry => entry.id);
  return resolvePrompt(ctx).multiselect(
    'Select updates to install',
    catalog.entries.map(entry => ({
      title: formatPackageLabel(entry.id),
      value: entry.id,
      description: entry.summary || undefined
    })),
    { initialValues: allIds, min: 1 }
  );
}

async function decideEula(
  ctx: ExecutionContext,
  request: Readonly<EulaRequest>,
  acceptAll: boolean
): Promise<boolean> {
  const out = resolveOutput(ctx);
  const label = formatPackageLabel(request.packageId);
  if (acceptAll) {
    out.info(`Accepting the ${request.vendor} license agreement for ${label}`);
    return true;
  }
  if (!ctx.interactive) {
    out.warn(`${label} requires accepting the ${request.vendor} license agreement; rerun with --accept-eulas`);
    return false;
  }
  out.note(request.licenseText, `${request.vendor} license agreement`);
  return resolvePrompt(ctx).confirm(`Accept the license agreement for ${label}?`, false);
}

/**
 * Install the given updates and answer license agreements as they are
 * surfaced, one at a time.
 */
export async function runInstall(
  ctx: ExecutionContext,
  session: UpdateSession,
  packageIds: readonly string[],
  options: InstallCommandOptions = {}
): Promise<CommandResult<InstallOutcome>> {
  const { coordinator } = session;
  const outcome: InstallOutcome = { installed: [] };
  const prompting: { failure?: unknown } = {};
  let decisions: Promise<void> = Promise.resolve();

  const answer = async (request: Readonly<EulaRequest>): Promise<void> => {
    let agreed = false;
    try {
      agreed = prompting.failure === undefined && await decideEula(ctx, request, options.acceptEulas ?? false);
    } catch (error) {
      logger.debug('License prompt failed', { error });
      prompting.failure = error;
    }
    coordinator.eulaAgreementResult(request.eulaId, agreed);
  };

  const subscriptions = [
    coordinator.on('eula-required', ({ request }) => {
      decisions = decisions.then(() => answer(request));
    }),
    coordinator.on('restart-required', ({ restart }) => {
      if (outcome.restart !== 'system') {
        outcome.restart = restart;
      }
    }),
    coordinator.on('updates-installed', ({ packageIds: installed }) => {
      outcome.installed = installed;
    })
  ];

  const stop = followProgress(ctx, coordinator, 'Installing updates');
  try {
    const result = await runOperation(coordinator, 'install', () =>
      coordinator.installUpdates(packageIds, options.simulate ?? true, options.allowUntrusted ?? false)
    );
    await decisions;
    if (prompting.failure !== undefined) {
      stop('Installation cancelled');
      throw prompting.failure;
    }
    if (!result.success) {
      stop('Installation failed');
      return { success: false, error: failureMessage(result, coordinator.statusMessage) };
    }
    stop(plural(outcome.installed.length, 'Installed 1 update', 'Installed %1 updates'));
    return { success: true, data: outcome };
  } finally {
    for (const unsubscribe of subscriptions) {
      unsubscribe();
    }
  }
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .argument('[package-ids...]', 'update ids or package names; prompts when omitted')
    .description('Install available updates')
    .option('--all', 'install every available update')
    .option('--no-simulate', 'skip the dependency simulation before installing')
    .option('--allow-untrusted', 'allow packages from untrusted repositories')
    .option('--accept-eulas', 'accept every license agreement without prompting')
    .action(
      withErrorHandling(async (requested: string[], options: InstallCommandOptions, command: Command) => {
        const globals = getGlobalOptions(command);
        const ctx = await createCliExecutionContext({ home: globals.home });
        const session = await openSession(ctx, globals.backend);
        const out = resolveOutput(ctx);
        try {
          const check = await runCheck(ctx, session, { force: false });
          if (!check.success) {
            throw new DaemonError(check.error ?? 'Update check failed');
          }
          const catalog = session.coordinator.catalogSnapshot;
          if (catalog.isUpToDate) {
            out.success('Your system is up to date');
            return;
          }

          const packageIds = await chooseUpdates(ctx, catalog, requested, options);
          if (packageIds.length === 0) {
            out.info('Nothing selected');
            return;
          }

          const result = await runInstall(ctx, session, packageIds, options);
          if (!result.success || !result.data) {
            throw new DaemonError(result.error ?? 'Installing updates failed', { packageIds });
          }
          for (const id of result.data.installed) {
            out.message(`  ${pico.green('✓')} ${formatPackageLabel(id)}`);
          }
          if (result.data.restart === 'system') {
            out.warn('Restart your computer to complete the update');
          } else if (result.data.restart === 'session') {
            out.warn('Log out and back in to complete the update');
          }
        } finally {
          session.close();
        }
      })
    );
}
