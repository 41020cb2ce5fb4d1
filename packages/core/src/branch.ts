/**
 * Branch detection for runs outside CI
 */

import { simpleGit } from 'simple-git';
import { PipelineError, errorMessage } from './errors.js';
import { normalizeBranch } from './version-resolver.js';

/**
 * Explicit ref wins; otherwise ask git for the checked-out branch
 */
export async function resolveBranch(cwd: string, ref?: string): Promise<string> {
  if (ref && ref.trim().length > 0) {
    return normalizeBranch(ref);
  }

  try {
    const git = simpleGit(cwd);
    const branch = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    if (!branch || branch === 'HEAD') {
      throw new Error('HEAD is detached');
    }
    return branch;
  } catch (error) {
    throw new PipelineError('INVALID_CONFIG', `Cannot determine the current branch: ${errorMessage(error)}`, {
      hint: 'Set GITHUB_REF or pass --branch',
    });
  }
}
