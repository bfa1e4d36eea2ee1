/**
 * Shared helpers for the revbench subcommands
 */

import * as path from 'path';
import { getBenchmark, loadConfiguration } from '../config';
import { isLogLevel, logger } from '../logger';
import { WorkspaceLayout } from '../paths';
import { BenchmarkDescriptor, Configuration } from '../types';

/**
 * Options defined on the root program, available to every subcommand
 */
export type GlobalOptions = {
  /** Path to the configuration file */
  config: string;
  /** Workspace root holding build/, data/ and plots/ */
  root: string;
  /** Where revisions are materialized (default: <os tmpdir>/revbench-repos) */
  tmpRoot?: string;
  logLevel: string;
};

export interface CommandContext {
  config: Configuration;
  benchmark: BenchmarkDescriptor;
  layout: WorkspaceLayout;
}

/**
 * Applies the log level and loads the configuration and the named benchmark
 */
export function createCommandContext(benchmarkName: string, globals: GlobalOptions): CommandContext {
  if (isLogLevel(globals.logLevel)) {
    logger.setLevel(globals.logLevel);
  } else {
    logger.warn(`Unknown log level "${globals.logLevel}", using ${logger.getLevel()}`);
  }

  const root = path.resolve(globals.root);
  const config = loadConfiguration(path.resolve(root, globals.config));
  const benchmark = getBenchmark(config, benchmarkName);
  const layout = new WorkspaceLayout(root, globals.tmpRoot);
  logger.debug(`Workspace root ${layout.root}, revisions under ${layout.tmpRoot}`);

  return { config, benchmark, layout };
}

/**
 * Reports a fatal error (naming its stage, benchmark and label) and exits 1
 */
export function exitWithError(error: unknown): never {
  logger.failure(error);
  process.exit(1);
}
