/**
 * Version-control operations used by the revision store.
 *
 * Kept behind an interface so the store can be exercised without a real
 * repository; GitVcs is the only production implementation.
 */

import execa from 'execa';
import { logger } from './logger';

export interface Vcs {
  /** Resolves a revision name to a full commit id in the main repository */
  resolveCommit(repository: string, revision: string): Promise<string>;
  /** Commit checked out in a working tree */
  headCommit(workTree: string): Promise<string>;
  /** Creates a linked working tree for `revision` at `target` without touching the main tree */
  addWorktree(repository: string, target: string, revision: string): Promise<void>;
  /** Drops bookkeeping for linked working trees whose directory is gone */
  pruneWorktrees(repository: string): Promise<void>;
}

export class GitVcs implements Vcs {
  async resolveCommit(repository: string, revision: string): Promise<string> {
    const { stdout } = await execa('git', ['rev-parse', '--verify', '--quiet', `${revision}^{commit}`], {
      cwd: repository,
    });
    return stdout.trim();
  }

  async headCommit(workTree: string): Promise<string> {
    const { stdout } = await execa('git', ['rev-parse', 'HEAD'], { cwd: workTree });
    return stdout.trim();
  }

  async addWorktree(repository: string, target: string, revision: string): Promise<void> {
    logger.debug(`git worktree add --force --detach ${target} ${revision}`);
    await execa('git', ['worktree', 'add', '--force', '--detach', target, revision], { cwd: repository });
  }

  async pruneWorktrees(repository: string): Promise<void> {
    await execa('git', ['worktree', 'prune'], { cwd: repository });
  }
}

/**
 * Best description of a failed subprocess: its stderr when there is one
 */
export function processErrorOutput(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string' && stderr.trim() !== '') {
      return stderr.trim();
    }
  }
  return error instanceof Error ? error.message : String(error);
}
