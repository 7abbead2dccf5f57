/**
 * Output Port Interface
 *
 * Contract for all user-facing output. Commands write through this
 * interface instead of console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - ClackOutput (CLI, TTY): @clack/prompts log lines and spinner
 *   - consoleOutput (piped/CI, and the default when a context carries none)
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;
  step(message: string): void;
  message(message: string): void;
  success(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  /** A block of text with an optional title */
  note(content: string, title?: string): void;
  spinner(): UnifiedSpinner;
}
