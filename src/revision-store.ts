/**
 * Revision store
 *
 * Maps a revision to a materialized working tree under the temporary root and
 * records, with one symlink per (benchmark, label), which benchmarks still
 * use it. A materialized tree is deleted only when the last link to it is
 * released.
 *
 * ```
 * <tmpRoot>/abc123/                      git worktree for abc123
 * <root>/build/matrix-multiply/baseline  -> <tmpRoot>/abc123
 * <root>/build/sort/old                  -> <tmpRoot>/abc123
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import { describeError, LinkConflict, RevbenchError, RevisionUnavailable } from './errors';
import { LockOptions, withLock } from './file-lock';
import { logger } from './logger';
import { WorkspaceLayout } from './paths';
import { Configuration, CURRENT_CHECKOUT } from './types';
import { GitVcs, processErrorOutput, Vcs } from './vcs';

export interface ReleaseResult {
  /** False when there was no link to remove */
  removedLink: boolean;
  /** Materialized directory deleted because nothing references it anymore */
  deletedDirectory?: string;
}

function lstatOrNull(filePath: string): fs.Stats | null {
  try {
    return fs.lstatSync(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function readLinkTarget(linkPath: string): string {
  return path.resolve(path.dirname(linkPath), fs.readlinkSync(linkPath));
}

export class RevisionStore {
  private readonly config: Configuration;
  private readonly layout: WorkspaceLayout;
  private readonly vcs: Vcs;
  private readonly lockOptions: LockOptions;

  constructor(config: Configuration, layout: WorkspaceLayout, vcs: Vcs = new GitVcs(), lockOptions: LockOptions = {}) {
    this.config = config;
    this.layout = layout;
    this.vcs = vcs;
    this.lockOptions = lockOptions;
  }

  /**
   * Directory the revision is (or will be) materialized in
   */
  pathFor(revision: string): string {
    return revision === CURRENT_CHECKOUT ? this.config.repository : this.layout.revisionDir(revision);
  }

  /**
   * Directory builds and benchmark invocations run in
   */
  buildRoot(materializedPath: string): string {
    return path.join(materializedPath, this.config.buildSubdir);
  }

  /**
   * Returns a buildable directory for the revision, checking it out first if
   * needed. Safe to call concurrently from several processes.
   */
  async ensureMaterialized(revision: string): Promise<string> {
    if (revision === CURRENT_CHECKOUT) {
      return this.config.repository;
    }

    const target = this.layout.revisionDir(revision);
    // Unlocked check is only a shortcut; a checkout in progress elsewhere looks broken here
    const ready = await this.isMaterialized(revision, target).catch((error: unknown) => {
      logger.debug(`Waiting for the lock of ${revision}: ${describeError(error)}`);
      return false;
    });
    if (ready) {
      logger.debug(`Revision ${revision} already materialized at ${target}`);
      return target;
    }

    fs.mkdirSync(this.layout.tmpRoot, { recursive: true });

    return withLock(
      this.layout.revisionLockFile(revision),
      async () => {
        // Another process may have finished while we waited for the lock
        if (await this.isMaterialized(revision, target)) {
          return target;
        }

        logger.info(`Materializing revision ${revision} at ${target}`);
        try {
          await this.vcs.addWorktree(this.config.repository, target, revision);
        } catch (error) {
          throw new RevisionUnavailable(
            revision,
            `Failed to check out ${revision}: ${processErrorOutput(error)}`,
            processErrorOutput(error)
          );
        }
        return target;
      },
      this.lockOptions
    );
  }

  private async isMaterialized(revision: string, target: string): Promise<boolean> {
    if (!fs.existsSync(target)) {
      return false;
    }

    const gitPointer = lstatOrNull(path.join(target, '.git'));
    if (!gitPointer || !gitPointer.isFile()) {
      if (fs.readdirSync(target).length === 0) {
        // Leftover of an interrupted checkout; git accepts an empty target
        return false;
      }
      throw new RevisionUnavailable(revision, `${target} exists but is not a linked worktree`);
    }

    let expected: string;
    let actual: string;
    try {
      [expected, actual] = await Promise.all([
        this.vcs.resolveCommit(this.config.repository, revision),
        this.vcs.headCommit(target),
      ]);
    } catch (error) {
      throw new RevisionUnavailable(
        revision,
        `Cannot verify checkout of ${revision} at ${target}: ${processErrorOutput(error)}`,
        processErrorOutput(error)
      );
    }

    if (expected !== actual) {
      throw new RevisionUnavailable(
        revision,
        `${target} has ${actual} checked out, expected ${expected}; release it with "clean" first`
      );
    }
    return true;
  }

  /**
   * Records that (benchmark, label) uses the revision's materialized
   * directory. An existing link to another directory is never re-pointed.
   */
  retainReference(benchmark: string, label: string, revision: string): string {
    const link = this.layout.labelLink(benchmark, label);
    const target = this.pathFor(revision);
    fs.mkdirSync(path.dirname(link), { recursive: true });

    const existing = lstatOrNull(link);
    if (existing) {
      if (!existing.isSymbolicLink()) {
        throw new LinkConflict(link, 'a file that is not a symbolic link', target, { benchmark, label });
      }
      const current = readLinkTarget(link);
      if (current !== target) {
        throw new LinkConflict(link, current, target, { benchmark, label });
      }
      return link;
    }

    fs.symlinkSync(target, link, 'dir');
    logger.debug(`Linked ${link} -> ${target}`);
    return link;
  }

  /**
   * Materialized directory a label was linked to by a previous build, or null
   */
  resolveReference(benchmark: string, label: string): string | null {
    const link = this.layout.labelLink(benchmark, label);
    const stat = lstatOrNull(link);
    if (!stat || !stat.isSymbolicLink()) {
      return null;
    }
    return readLinkTarget(link);
  }

  /**
   * Rebuilds the reference counts from the links on disk:
   * materialized directory → links that point at it
   */
  referenceIndex(): Map<string, string[]> {
    const index = new Map<string, string[]>();
    if (!fs.existsSync(this.layout.buildDir)) {
      return index;
    }

    for (const benchDir of fs.readdirSync(this.layout.buildDir, { withFileTypes: true })) {
      if (!benchDir.isDirectory()) {
        continue;
      }
      const benchPath = path.join(this.layout.buildDir, benchDir.name);
      for (const entry of fs.readdirSync(benchPath, { withFileTypes: true })) {
        if (!entry.isSymbolicLink()) {
          continue;
        }
        const link = path.join(benchPath, entry.name);
        const target = readLinkTarget(link);
        const links = index.get(target) ?? [];
        links.push(link);
        index.set(target, links);
      }
    }
    return index;
  }

  private isOwnedDirectory(directory: string): boolean {
    const relative = path.relative(this.layout.tmpRoot, directory);
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative) && !relative.includes(path.sep);
  }

  /**
   * Removes the (benchmark, label) link and deletes the materialized
   * directory once no link references it. Releasing twice is harmless.
   */
  async release(benchmark: string, label: string): Promise<ReleaseResult> {
    const link = this.layout.labelLink(benchmark, label);
    const stat = lstatOrNull(link);
    if (!stat) {
      logger.debug(`No link for ${benchmark}/${label}, nothing to release`);
      return { removedLink: false };
    }
    if (!stat.isSymbolicLink()) {
      throw new RevbenchError('link', `${link} is not a symbolic link; remove it by hand`, { benchmark, label });
    }

    const target = readLinkTarget(link);
    fs.unlinkSync(link);
    logger.debug(`Removed link ${link}`);

    // The live checkout and anything outside the temporary root are never deleted
    if (!this.isOwnedDirectory(target)) {
      return { removedLink: true };
    }

    const revision = path.basename(target);
    const deleted = await withLock(
      this.layout.revisionLockFile(revision),
      async () => {
        const remaining = this.referenceIndex().get(target) ?? [];
        if (remaining.length > 0) {
          logger.debug(`${target} is still referenced by ${remaining.join(', ')}`);
          return false;
        }
        if (!fs.existsSync(target)) {
          return false;
        }
        fs.rmSync(target, { recursive: true, force: true });
        return true;
      },
      this.lockOptions
    );

    if (!deleted) {
      return { removedLink: true };
    }

    logger.info(`Deleted materialized revision ${target}`);
    try {
      await this.vcs.pruneWorktrees(this.config.repository);
    } catch (error) {
      // The directory is gone either way; git recovers on the next prune
      logger.warn(`git worktree prune failed: ${processErrorOutput(error)}`);
    }
    return { removedLink: true, deletedDirectory: target };
  }

  /**
   * Releases every label of a benchmark and removes its link directory
   */
  async releaseAll(benchmark: string): Promise<ReleaseResult[]> {
    const linkDir = this.layout.benchLinkDir(benchmark);
    if (!fs.existsSync(linkDir)) {
      return [];
    }

    const results: ReleaseResult[] = [];
    for (const label of fs.readdirSync(linkDir).sort()) {
      results.push(await this.release(benchmark, label));
    }

    if (fs.readdirSync(linkDir).length === 0) {
      fs.rmdirSync(linkDir);
    }
    return results;
  }
}
