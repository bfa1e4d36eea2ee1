/**
 * Orchestrator for one benchmark run
 *
 * ```
 * idle -> building -> sampling -> stopped
 *            \            \
 *             `-> failed   `-> failed
 * ```
 *
 * Building is fail-fast: a revision that cannot be materialized or built
 * fails the whole run before any sample is taken, since comparing against a
 * silently missing revision would be misleading. Sampling is sequential (one
 * benchmark process at a time) and stops at the first iteration boundary
 * after the abort signal fires. Rows already appended stay valid.
 */

import * as path from 'path';
import { BenchmarkRunner } from './benchmark-runner';
import { Builder } from './builder';
import { BenchFailed, describeError, RevbenchError, Stage } from './errors';
import { logger as defaultLogger } from './logger';
import { MeasurementStore, MeasurementTable } from './measurement-store';
import { RevisionStore } from './revision-store';
import { RandomSource, Sampler } from './sampler';
import { BenchEntry, BenchmarkDescriptor, BuildStatus, Configuration, TableSchema } from './types';

export type RunState = 'idle' | 'building' | 'sampling' | 'stopped' | 'failed';

export interface OrchestratorDependencies {
  revisions: Pick<RevisionStore, 'ensureMaterialized' | 'retainReference' | 'resolveReference' | 'buildRoot'>;
  builder: Pick<Builder, 'build'>;
  runner: Pick<BenchmarkRunner, 'run'>;
  store: Pick<MeasurementStore, 'openOrInit' | 'append'>;
  /** Drives label selection and parameter sampling, Math.random by default */
  random?: RandomSource;
}

export interface OrchestratorLogger {
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
  success: (message: string, ...args: unknown[]) => void;
}

export interface SampleOptions {
  /** Inclusive lower bound of the sampled parameter */
  min: number;
  /** Exclusive upper bound of the sampled parameter */
  max: number;
  /** Stop after this many appended samples; runs until aborted when omitted */
  iterations?: number;
  signal?: AbortSignal;
}

export interface RunOptions extends SampleOptions {
  /** Materialize and build first; otherwise reuse the links left by an earlier build */
  build: boolean;
}

export interface SampleSummary {
  /** Samples appended in this run */
  samples: number;
  /** Samples appended per label */
  perLabel: Record<string, number>;
  /** Benchmark invocations that failed and were skipped */
  skippedFailures: number;
  /** True when the loop ended because the signal fired */
  aborted: boolean;
}

interface LabelState {
  label: string;
  entry: BenchEntry;
  status: BuildStatus;
  buildRoot?: string;
  table?: MeasurementTable;
}

export class Orchestrator {
  private readonly config: Configuration;
  private readonly benchmark: BenchmarkDescriptor;
  private readonly deps: OrchestratorDependencies;
  private readonly logger: OrchestratorLogger;
  private readonly random: RandomSource;
  private readonly labels: LabelState[];
  private currentState: RunState = 'idle';

  constructor(
    config: Configuration,
    benchmark: BenchmarkDescriptor,
    deps: OrchestratorDependencies,
    logger: OrchestratorLogger = defaultLogger
  ) {
    this.config = config;
    this.benchmark = benchmark;
    this.deps = deps;
    this.logger = logger;
    this.random = deps.random ?? Math.random;
    this.labels = Object.entries(benchmark.benches).map(([label, entry]): LabelState => ({
      label,
      entry,
      status: 'unbuilt',
    }));
  }

  get state(): RunState {
    return this.currentState;
  }

  get schema(): TableSchema {
    return [this.benchmark.parameter, this.benchmark.output];
  }

  buildStatus(label: string): BuildStatus | undefined {
    return this.labels.find(state => state.label === label)?.status;
  }

  private expectState(expected: RunState, action: string): void {
    if (this.currentState !== expected) {
      throw new Error(`Cannot ${action} while ${this.currentState} (expected ${expected})`);
    }
  }

  /**
   * Moves to `failed` and returns the error to throw, tagged with this run's
   * benchmark and the label at fault
   */
  private fail(error: unknown, stage: Stage, label?: string): RevbenchError {
    this.currentState = 'failed';
    const context = { benchmark: this.benchmark.name, label };
    if (error instanceof RevbenchError) {
      return error.withContext(context);
    }
    return new RevbenchError(stage, describeError(error), context);
  }

  /**
   * Materializes, links and builds every label's revision. A revision shared
   * by several labels is built once.
   */
  async prepare(): Promise<void> {
    this.expectState('idle', 'prepare');
    this.currentState = 'building';

    const builds = new Map<string, Promise<void>>();

    for (const state of this.labels) {
      const { label, entry } = state;
      state.status = 'building';
      let stage: Stage = 'materialize';
      try {
        const materialized = await this.deps.revisions.ensureMaterialized(entry.commit);

        // Link before building so "clean" can reclaim the tree even if the build fails
        stage = 'link';
        this.deps.revisions.retainReference(this.benchmark.name, label, entry.commit);

        stage = 'build';
        const buildRoot = this.deps.revisions.buildRoot(materialized);
        const targets = entry.elf ? [buildRoot, path.join(materialized, entry.elf)] : [buildRoot];
        for (const target of targets) {
          let pending = builds.get(target);
          if (!pending) {
            pending = this.deps.builder.build(target);
            builds.set(target, pending);
          }
          await pending;
        }

        state.buildRoot = buildRoot;
        state.status = 'built';
        this.logger.success(`Built ${this.benchmark.name}/${label} (${entry.commit})`);
      } catch (error) {
        state.status = 'failed';
        throw this.fail(error, stage, label);
      }
    }
  }

  /**
   * Reuses builds from an earlier `prepare` (possibly another process),
   * found through the benchmark's reference links
   */
  attach(): void {
    this.expectState('idle', 'attach');
    this.currentState = 'building';

    for (const state of this.labels) {
      const materialized = this.deps.revisions.resolveReference(this.benchmark.name, state.label);
      if (materialized === null) {
        state.status = 'unbuilt';
        throw this.fail(
          new RevbenchError('materialize', `Revision ${state.entry.commit} has not been built; run "build ${this.benchmark.name}" first`),
          'materialize',
          state.label
        );
      }
      state.buildRoot = this.deps.revisions.buildRoot(materialized);
      state.status = 'built';
    }
  }

  /**
   * Opens every label's table against the benchmark's columns, so a schema
   * conflict surfaces before any time is spent sampling
   */
  openTables(): void {
    this.expectState('building', 'open tables');

    for (const state of this.labels) {
      try {
        state.table = this.deps.store.openOrInit({ benchmark: this.benchmark.name, label: state.label }, this.schema);
      } catch (error) {
        throw this.fail(error, 'schema', state.label);
      }
    }
  }

  private createSamplers(min: number, max: number): Map<string, Sampler> {
    const samplers = new Map<string, Sampler>();
    for (const state of this.labels) {
      try {
        samplers.set(state.label, new Sampler({ min, max, config: this.benchmark.sampler, random: this.random }));
      } catch (error) {
        throw this.fail(error, 'sample', state.label);
      }
    }
    return samplers;
  }

  private pickLabel(): LabelState {
    const index = Math.min(Math.floor(this.random() * this.labels.length), this.labels.length - 1);
    return this.labels[index];
  }

  /**
   * Sampling loop: random label, one parameter, one benchmark run, one row
   */
  async sample(options: SampleOptions): Promise<SampleSummary> {
    this.expectState('building', 'sample');
    const samplers = this.createSamplers(options.min, options.max);
    this.currentState = 'sampling';

    const { iterations, signal } = options;
    const perLabel: Record<string, number> = Object.fromEntries(this.labels.map(state => [state.label, 0]));
    let samples = 0;
    let skippedFailures = 0;
    let consecutiveFailures = 0;

    while (!signal?.aborted && (iterations === undefined || samples < iterations)) {
      const state = this.pickLabel();
      const { table, buildRoot } = state;
      const sampler = samplers.get(state.label);
      if (!table || !buildRoot || !sampler) {
        throw this.fail(new Error(`${state.label} is not ready for sampling`), 'sample', state.label);
      }

      const parameter = sampler.next();
      let metric: number;
      try {
        metric = await this.deps.runner.run(state.entry.benchFunction, parameter, buildRoot);
      } catch (error) {
        // An interrupt also reaches the child through the process group
        if (signal?.aborted) {
          this.logger.debug(`Discarding interrupted sample for ${state.label}: ${describeError(error)}`);
          break;
        }
        if (!(error instanceof BenchFailed) || this.config.failurePolicy === 'abort') {
          throw this.fail(error, 'sample', state.label);
        }
        skippedFailures++;
        consecutiveFailures++;
        this.logger.warn(`Skipping failed sample for ${state.label}: ${error.message}`);
        if (consecutiveFailures >= this.config.maxConsecutiveFailures) {
          throw this.fail(
            new RevbenchError(
              'sample',
              `${consecutiveFailures} benchmark invocations failed in a row, last: ${error.message}`
            ),
            'sample',
            state.label
          );
        }
        continue;
      }
      consecutiveFailures = 0;

      try {
        this.deps.store.append(table, parameter, metric);
      } catch (error) {
        throw this.fail(error, 'append', state.label);
      }

      samples++;
      perLabel[state.label]++;
      this.logger.info(`Sampled ${samples} times (${state.label}: ${this.benchmark.parameter}=${parameter}, ${this.benchmark.output}=${metric})`);
    }

    this.currentState = 'stopped';
    const aborted = Boolean(signal?.aborted);
    if (aborted) {
      this.logger.info(`Stopped after ${samples} samples; all rows so far are saved`);
    }
    return { samples, perLabel, skippedFailures, aborted };
  }

  /**
   * Whole run: build (or attach to an earlier build), open tables, sample
   */
  async run(options: RunOptions): Promise<SampleSummary> {
    if (options.build) {
      await this.prepare();
    } else {
      this.attach();
    }
    this.openTables();
    return this.sample(options);
  }
}
