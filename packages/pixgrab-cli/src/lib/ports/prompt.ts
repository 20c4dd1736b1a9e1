/**
 * Abstraction for user prompts.
 * Allows testing the interactive menu without actual user input.
 * Every method resolves to undefined when the user cancels (Ctrl-C / Esc).
 */
export interface PromptChoice<T extends string> {
  title: string;
  value: T;
  description?: string;
}

export interface PromptService {
  /** Pick one entry from a menu */
  select<T extends string>(message: string, choices: PromptChoice<T>[]): Promise<T | undefined>;
  /** Ask for a line of free text */
  text(message: string): Promise<string | undefined>;
}
