/**
 * Configuration and data model types for revbench
 */

/**
 * Revision identifier meaning "benchmark the live working tree, do not materialize"
 */
export const CURRENT_CHECKOUT = 'current';

export type BuildStatus = 'unbuilt' | 'building' | 'built' | 'failed';

/**
 * One compared series of a benchmark: which revision to build and which
 * entry point of the built binary to invoke
 */
export interface BenchEntry {
  /** Revision to materialize (commit, branch, tag or CURRENT_CHECKOUT) */
  commit: string;
  /** Benchmark entry point name passed to the target binary */
  benchFunction: string;
  /** Optional sub-path (relative to the materialized revision) that is built as well */
  elf?: string;
}

export type SamplerConfig =
  | { kind: 'uniform'; integer?: boolean }
  | { kind: 'skewed'; mean: number; sigma?: number; maxRetries?: number; integer?: boolean };

export interface BenchmarkDescriptor {
  name: string;
  /** Column name of the sampled input parameter */
  parameter: string;
  /** Column name of the measured metric */
  output: string;
  description: string;
  /** Label → entry */
  benches: Record<string, BenchEntry>;
  sampler?: SamplerConfig;
}

/**
 * What the sampling loop does when a single benchmark invocation fails
 */
export type FailurePolicy = 'abort' | 'skip';

export interface Configuration {
  /** Absolute path of the main repository the revisions come from */
  repository: string;
  /** Sub-directory of a materialized revision that holds the benchmarked program */
  buildSubdir: string;
  /** Build command, run in the build root */
  buildCommand: string[];
  /** Benchmark command prefix; entry point and parameter are appended */
  benchCommand: string[];
  /** Ceiling for one benchmark invocation in milliseconds */
  timeoutMs: number;
  failurePolicy: FailurePolicy;
  /** Consecutive failures tolerated under the 'skip' policy */
  maxConsecutiveFailures: number;
  benches: Record<string, BenchmarkDescriptor>;
}

/**
 * Ordered pair of column names of a measurement table
 */
export type TableSchema = readonly [parameter: string, output: string];

export interface Measurement {
  parameter: number;
  metric: number;
}
