import ora from 'ora';
import type { Ora } from 'ora';

export function createSpinner(text: string, enabled = true): Ora {
  return ora({ text, spinner: 'dots', isEnabled: enabled && Boolean(process.stderr.isTTY) });
}

/** Runs `fn` behind a spinner; `enabled: false` keeps the terminal quiet (e.g. for --json). */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  options: { enabled?: boolean } = {},
): Promise<T> {
  const spinner = createSpinner(text, options.enabled ?? true);
  spinner.start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
