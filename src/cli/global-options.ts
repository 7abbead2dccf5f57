import type { Command } from 'commander';

export interface GlobalOptions {
  backend?: string;
  home?: string;
}

/**
 * Read the root program's options from a subcommand.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const programOpts = command.parent?.opts() ?? {};
  const backend: unknown = programOpts.backend;
  const home: unknown = programOpts.home;
  return {
    backend: typeof backend === 'string' ? backend : undefined,
    home: typeof home === 'string' ? home : undefined
  };
}
