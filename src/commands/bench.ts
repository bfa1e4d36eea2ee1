/**
 * Command handler for `revbench bench <benchmark> <min> <max>`
 */

import { logger } from '../logger';
import { SampleSummary } from '../orchestrator';
import { createOrchestrator } from './build';
import { createCommandContext, exitWithError, GlobalOptions } from './command-helpers';

export interface BenchCommandOptions {
  /** Stop after this many samples instead of running until interrupted */
  iterations?: number;
  /** Build the revisions first instead of reusing an earlier `build` */
  build: boolean;
}

/**
 * Samples the benchmark until interrupted (SIGINT/SIGTERM) or until the
 * requested number of samples has been appended. An interrupt lets the
 * running benchmark finish and keeps every row written so far.
 */
export async function benchCommand(
  benchmarkName: string,
  min: number,
  max: number,
  options: BenchCommandOptions,
  globals: GlobalOptions
): Promise<SampleSummary> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping after the current sample (repeat to force)...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const context = createCommandContext(benchmarkName, globals);
    const orchestrator = createOrchestrator(context);
    const summary = await orchestrator.run({
      min,
      max,
      iterations: options.iterations,
      build: options.build,
      signal: controller.signal,
    });

    const perLabel = Object.entries(summary.perLabel)
      .map(([label, count]) => `${label}=${count}`)
      .join(', ');
    logger.success(`Appended ${summary.samples} samples (${perLabel})`);
    if (summary.skippedFailures > 0) {
      logger.warn(`${summary.skippedFailures} failed benchmark invocations were skipped`);
    }
    return summary;
  } catch (error) {
    exitWithError(error);
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}
