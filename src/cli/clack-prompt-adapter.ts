/**
 * Clack Prompt Adapter
 *
 * CLI PromptPort implementation routed to @clack/prompts.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, PromptChoice } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

function cancelled(): never {
  clack.cancel('Operation cancelled.');
  throw new UserCancellationError('Operation cancelled by user');
}

export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false,
      });
      if (clack.isCancel(result)) {
        return cancelled();
      }
      return result;
    },

    async multiselect(
      message: string,
      choices: PromptChoice[],
      options?: { initialValues?: string[]; min?: number }
    ): Promise<string[]> {
      const result = await clack.multiselect<string>({
        message,
        options: choices.map(c => ({
          label: c.title,
          value: c.value,
          ...(c.description ? { hint: c.description } : {}),
        })),
        initialValues: options?.initialValues,
        required: options?.min ? options.min > 0 : false,
      });
      if (clack.isCancel(result)) {
        return cancelled();
      }
      return result;
    },
  };
}
