/**
 * Prompt Port Interface
 *
 * Contract for interactive prompts (license agreements, package selection).
 *
 * Implementations:
 *   - ClackPrompt (CLI, TTY): @clack/prompts
 *   - nonInteractivePrompt (CI/default): throws on any prompt
 */

export interface PromptChoice {
  title: string;
  value: string;
  description?: string;
}

export interface PromptPort {
  confirm(message: string, initial?: boolean): Promise<boolean>;

  /** Resolves with the selected values */
  multiselect(
    message: string,
    choices: PromptChoice[],
    options?: { initialValues?: string[]; min?: number }
  ): Promise<string[]>;
}
