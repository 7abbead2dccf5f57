/**
 * Non-Interactive Prompt Adapter (Default/CI)
 *
 * PromptPort that throws on any prompt attempt.
 */

import type { PromptPort, PromptChoice } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(promptType: string) {
    super(
      `Cannot prompt for ${promptType} in non-interactive mode. ` +
      `Use specific flags or options to provide the required input.`
    );
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async confirm(_message: string, _initial?: boolean): Promise<boolean> {
    throw new NonInteractivePromptError('confirmation');
  },

  async multiselect(_message: string, _choices: PromptChoice[]): Promise<string[]> {
    throw new NonInteractivePromptError('multi-selection');
  },
};
