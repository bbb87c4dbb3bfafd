import { listRemoteBranches } from '../core/materializer.js';
import { withSpinner } from '../ui/spinner.js';
import { commandContext, handleCommandError } from './shared.js';

export async function branchesCommand(repo: string, options: { json?: boolean }): Promise<void> {
  try {
    const { config } = await commandContext(options);
    const branches = await withSpinner(
      `Listing branches of ${repo}`,
      () => listRemoteBranches(repo, { timeoutMs: config.cloneTimeoutMs }),
      { enabled: !options.json },
    );
    console.log(options.json ? JSON.stringify(branches) : branches.join('\n'));
  } catch (error) {
    handleCommandError(error);
  }
}
