import { confirm, select } from '@inquirer/prompts';

export async function confirmPrompt(message: string, defaultValue = true): Promise<boolean> {
  return confirm({ message, default: defaultValue });
}

export async function selectPrompt<T>(
  message: string,
  choices: { name: string; value: T; description?: string }[],
  defaultValue?: T,
): Promise<T> {
  return select({ message, choices, default: defaultValue });
}

/** Prompts only make sense when a person is at the terminal. */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}
