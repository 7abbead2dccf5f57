/**
 * Execution Context Types
 *
 * Everything a command needs besides its own arguments: resolved
 * directories, loaded configuration and the output/prompt ports.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import type { PkUpdatesConfig, PkUpdatesDirectories } from './index.js';

export interface ExecutionContext {
  directories: PkUpdatesDirectories;

  config: PkUpdatesConfig;

  /**
   * Whether prompts may be shown. When false, commands must take their
   * answers from flags.
   */
  interactive: boolean;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * Prompt port for license agreements and package selection.
   * When not provided, defaults to nonInteractivePrompt (throws on prompt).
   */
  prompt?: PromptPort;
}

export interface ExecutionOptions {
  /** Overrides PKUPDATES_HOME / ~/.pkupdates */
  home?: string;

  interactive?: boolean;
}
