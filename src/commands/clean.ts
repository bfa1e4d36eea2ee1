/**
 * Command handlers for `revbench clean` and `revbench cleancsv`
 */

import { logger } from '../logger';
import { MeasurementStore } from '../measurement-store';
import { ReleaseResult, RevisionStore } from '../revision-store';
import { Vcs } from '../vcs';
import { createCommandContext, exitWithError, GlobalOptions } from './command-helpers';

/**
 * Releases every label of the benchmark; materialized revisions no other
 * benchmark links to are deleted
 */
export async function cleanCommand(benchmarkName: string, globals: GlobalOptions, vcs?: Vcs): Promise<ReleaseResult[]> {
  try {
    const { config, layout } = createCommandContext(benchmarkName, globals);
    const revisions = new RevisionStore(config, layout, vcs);
    const results = await revisions.releaseAll(benchmarkName);

    if (results.length === 0) {
      logger.info('No bench revisions found');
      return results;
    }

    const deleted = results.filter(result => result.deletedDirectory !== undefined).length;
    logger.success(`Released ${results.length} label(s), deleted ${deleted} revision folder(s)`);
    return results;
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * Deletes the benchmark's measurement tables
 */
export function cleanCsvCommand(benchmarkName: string, globals: GlobalOptions): number {
  try {
    const { layout } = createCommandContext(benchmarkName, globals);
    const removed = new MeasurementStore(layout).removeTables(benchmarkName);

    if (removed === 0) {
      logger.info('No bench csv files found');
    } else {
      logger.success(`Removed ${removed} csv file(s)`);
    }
    return removed;
  } catch (error) {
    exitWithError(error);
  }
}
