import { Command } from 'commander';
import pico from 'picocolors';

import type { CatalogSnapshot, PackageEntry, UpdateCategory } from '../core/updates/update-catalog.js';
import { createCliExecutionContext } from '../cli/context.js';
import { getGlobalOptions } from '../cli/global-options.js';
import { openSession } from '../cli/session.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatPackageLabel, packageArch, packageData } from '../utils/package-id.js';
import { DaemonError, withErrorHandling } from '../utils/errors.js';
import { runCheck } from './check.js';

interface ListOptions {
  refresh?: boolean;
}

const CATEGORY_TITLES: Record<UpdateCategory, string> = {
  security: 'Security updates',
  important: 'Important updates',
  bugfix: 'Bug fixes',
  other: 'Other updates'
};

function colorFor(category: UpdateCategory): (text: string) => string {
  switch (category) {
    case 'security':
      return pico.red;
    case 'important':
      return pico.yellow;
    default:
      return (text: string) => text;
  }
}

function formatEntry(entry: PackageEntry): string {
  const origin = [packageArch(entry.id), packageData(entry.id)].filter(Boolean).join(', ');
  const suffix = origin ? pico.dim(` (${origin})`) : '';
  const summary = entry.summary ? ` ${pico.dim('-')} ${entry.summary}` : '';
  return `${colorFor(entry.category)(formatPackageLabel(entry.id))}${suffix}${summary}`;
}

/**
 * Render the committed catalog grouped by category, in display order.
 */
export function renderCatalog(catalog: CatalogSnapshot): string[] {
  const lines: string[] = [];
  let current: UpdateCategory | undefined;
  for (const entry of catalog.entries) {
    if (entry.category !== current) {
      current = entry.category;
      if (lines.length > 0) {
        lines.push('');
      }
      lines.push(pico.bold(CATEGORY_TITLES[current]));
    }
    lines.push(`  ${formatEntry(entry)}`);
  }
  return lines;
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .description('List available updates')
    .option('--refresh', 'force a cache refresh before listing')
    .action(
      withErrorHandling(async (options: ListOptions, command: Command) => {
        const globals = getGlobalOptions(command);
        const ctx = await createCliExecutionContext({ home: globals.home });
        const session = await openSession(ctx, globals.backend);
        try {
          const result = await runCheck(ctx, session, { force: options.refresh ?? false });
          if (!result.success || !result.data) {
            throw new DaemonError(result.error ?? 'Update check failed');
          }
          const out = resolveOutput(ctx);
          const catalog = session.coordinator.catalogSnapshot;
          if (catalog.isUpToDate) {
            out.success(result.data.message);
            return;
          }
          out.note(renderCatalog(catalog).join('\n'), result.data.message);
        } finally {
          session.close();
        }
      })
    );
}
