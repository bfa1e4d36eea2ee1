/**
 * Command handler for `revbench build <benchmark>`
 */

import { BenchmarkRunner } from '../benchmark-runner';
import { Builder } from '../builder';
import { MeasurementStore } from '../measurement-store';
import { Orchestrator } from '../orchestrator';
import { RevisionStore } from '../revision-store';
import { Vcs } from '../vcs';
import { logger } from '../logger';
import { CommandContext, createCommandContext, exitWithError, GlobalOptions } from './command-helpers';

/**
 * Wires the production components for one benchmark
 */
export function createOrchestrator(context: CommandContext, vcs?: Vcs): Orchestrator {
  const { config, benchmark, layout } = context;
  return new Orchestrator(config, benchmark, {
    revisions: new RevisionStore(config, layout, vcs),
    builder: new Builder({ command: config.buildCommand }),
    runner: new BenchmarkRunner({ command: config.benchCommand, timeoutMs: config.timeoutMs }),
    store: new MeasurementStore(layout),
  });
}

/**
 * Materializes and builds every revision the benchmark compares
 */
export async function buildCommand(benchmarkName: string, globals: GlobalOptions): Promise<void> {
  try {
    const context = createCommandContext(benchmarkName, globals);
    await createOrchestrator(context).prepare();
    logger.success(`Bench ${benchmarkName} built successfully`);
  } catch (error) {
    exitWithError(error);
  }
}
