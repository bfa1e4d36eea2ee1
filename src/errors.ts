/**
 * Error taxonomy. Every fatal error knows the stage it came from and, where it
 * applies, the benchmark and label it concerns, so the CLI can name them.
 */

export type Stage = 'config' | 'materialize' | 'link' | 'build' | 'sample' | 'append' | 'schema' | 'report';

export interface ErrorContext {
  benchmark?: string;
  label?: string;
}

export class RevbenchError extends Error {
  readonly stage: Stage;
  benchmark?: string;
  label?: string;

  constructor(stage: Stage, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.stage = stage;
    this.benchmark = context.benchmark;
    this.label = context.label;
  }

  /**
   * Fills in benchmark/label if the thrower did not know them
   */
  withContext(context: ErrorContext): this {
    if (this.benchmark === undefined) {
      this.benchmark = context.benchmark;
    }
    if (this.label === undefined) {
      this.label = context.label;
    }
    return this;
  }
}

export class ConfigurationError extends RevbenchError {
  constructor(message: string) {
    super('config', message);
  }
}

export class RevisionUnavailable extends RevbenchError {
  readonly revision: string;
  readonly output: string;

  constructor(revision: string, message: string, output = '') {
    super('materialize', message);
    this.revision = revision;
    this.output = output;
  }
}

export class LinkConflict extends RevbenchError {
  readonly linkPath: string;
  readonly existingTarget: string;
  readonly requestedTarget: string;

  constructor(linkPath: string, existingTarget: string, requestedTarget: string, context: ErrorContext = {}) {
    super(
      'link',
      `${linkPath} already points to ${existingTarget}, not ${requestedTarget}; remove it with "clean" or fix it by hand`,
      context
    );
    this.linkPath = linkPath;
    this.existingTarget = existingTarget;
    this.requestedTarget = requestedTarget;
  }
}

export class BuildFailed extends RevbenchError {
  readonly directory: string;
  readonly exitCode: number | undefined;
  readonly output: string;

  constructor(directory: string, exitCode: number | undefined, output: string) {
    super('build', `Build failed in ${directory}${exitCode !== undefined ? ` (exit code ${exitCode})` : ''}`);
    this.directory = directory;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export interface BenchFailureDetails {
  entryPoint: string;
  parameter: number;
  exitCode?: number;
  timedOut?: boolean;
  stdout?: string;
  stderr?: string;
}

export class BenchFailed extends RevbenchError {
  readonly details: BenchFailureDetails;

  constructor(message: string, details: BenchFailureDetails) {
    super('sample', message);
    this.details = details;
  }
}

/**
 * The benchmark exited cleanly but printed nothing that looks like a result
 */
export class OutputParseError extends BenchFailed {}

export class SchemaMismatch extends RevbenchError {
  readonly tablePath: string;
  readonly expected: readonly string[];
  readonly found: readonly string[];

  constructor(tablePath: string, expected: readonly string[], found: readonly string[]) {
    super(
      'schema',
      `Header of ${tablePath} is [${found.join(', ')}], expected columns [${expected.join(', ')}]; ` +
        'move the file away or run "cleancsv" to start over'
    );
    this.tablePath = tablePath;
    this.expected = expected;
    this.found = found;
  }
}

/**
 * Not thrown: reported when a skewed sampler gives up rejection sampling
 */
export class SamplerConfigurationWarning extends Error {
  readonly rejections: number;

  constructor(message: string, rejections: number) {
    super(message);
    this.name = 'SamplerConfigurationWarning';
    this.rejections = rejections;
  }
}

/**
 * One-line operator message: `[stage] benchmark/label: message`
 */
export function describeError(error: unknown): string {
  if (error instanceof RevbenchError) {
    const target = [error.benchmark, error.label].filter((part): part is string => Boolean(part)).join('/');
    return `[${error.stage}] ${target ? `${target}: ` : ''}${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
