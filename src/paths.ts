import * as os from 'os';
import * as path from 'path';

export const DEFAULT_TMP_DIRNAME = 'revbench-repos';

/**
 * On-disk layout of one revbench workspace
 *
 * ```
 * <tmpRoot>/<revision>/          materialized worktrees, shared between benchmarks
 * <root>/build/<bench>/<label>   symlinks into tmpRoot, one per referencing label
 * <root>/data/<bench>/<label>.csv
 * <root>/plots/<bench>.json
 * ```
 */
export class WorkspaceLayout {
  readonly root: string;
  readonly tmpRoot: string;

  constructor(root: string, tmpRoot: string = path.join(os.tmpdir(), DEFAULT_TMP_DIRNAME)) {
    this.root = path.resolve(root);
    this.tmpRoot = path.resolve(tmpRoot);
  }

  get buildDir(): string {
    return path.join(this.root, 'build');
  }

  get dataDir(): string {
    return path.join(this.root, 'data');
  }

  get plotDir(): string {
    return path.join(this.root, 'plots');
  }

  revisionDir(revision: string): string {
    return path.join(this.tmpRoot, revision);
  }

  revisionLockFile(revision: string): string {
    return path.join(this.tmpRoot, `${revision}.lock`);
  }

  benchLinkDir(benchmark: string): string {
    return path.join(this.buildDir, benchmark);
  }

  labelLink(benchmark: string, label: string): string {
    return path.join(this.benchLinkDir(benchmark), label);
  }

  benchDataDir(benchmark: string): string {
    return path.join(this.dataDir, benchmark);
  }

  tableFile(benchmark: string, label: string): string {
    return path.join(this.benchDataDir(benchmark), `${label}.csv`);
  }

  reportFile(benchmark: string): string {
    return path.join(this.plotDir, `${benchmark}.json`);
  }
}

/**
 * Rejects names that would escape the directory they are joined onto
 */
export function isSafePathSegment(name: string): boolean {
  return name.length > 0 && name !== '.' && name !== '..' && !/[\\/\0]/.test(name);
}
