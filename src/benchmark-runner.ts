/**
 * Benchmark runner
 *
 * Invokes the built program's benchmark entry point for one parameter and
 * turns its stdout into a single number. This is the only place where the
 * benchmark's text protocol is known: the program must exit 0 and print a
 * decimal number (e.g. "took 1.234s") somewhere on stdout. stderr is not part
 * of the protocol and is only kept for error reports.
 */

import execa from 'execa';
import { BenchFailed, OutputParseError } from './errors';
import { logger } from './logger';

/**
 * First decimal number on stdout is the measurement
 */
export const RESULT_PATTERN = /\d+\.\d+/;

export interface BenchmarkRunnerOptions {
  /** Command prefix; entry point and parameter are appended */
  command: string[];
  /** Ceiling for one invocation in milliseconds */
  timeoutMs: number;
}

/**
 * Extracts the measurement from benchmark output
 *
 * @returns The first decimal number in the text, or null when there is none
 */
export function parseMeasurement(stdout: string): number | null {
  const match = RESULT_PATTERN.exec(stdout);
  return match ? parseFloat(match[0]) : null;
}

export class BenchmarkRunner {
  private readonly command: string;
  private readonly args: string[];
  private readonly timeoutMs: number;

  constructor(options: BenchmarkRunnerOptions) {
    const [command, ...args] = options.command;
    if (!command) {
      throw new Error('Benchmark command must not be empty');
    }
    this.command = command;
    this.args = args;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Runs one benchmark invocation
   *
   * @param entryPoint - Benchmark function name understood by the program
   * @param parameter - Sampled input parameter
   * @param workingDirectory - Build root of the materialized revision
   * @throws BenchFailed on non-zero exit, spawn failure, kill or timeout
   * @throws OutputParseError when stdout contains no decimal number
   */
  async run(entryPoint: string, parameter: number, workingDirectory: string): Promise<number> {
    const args = [...this.args, entryPoint, String(parameter)];
    logger.trace(`Running ${this.command} ${args.join(' ')} in ${workingDirectory}`);

    const result = await execa(this.command, args, {
      cwd: workingDirectory,
      timeout: this.timeoutMs,
      stdin: 'ignore',
      reject: false,
    });

    const details = {
      entryPoint,
      parameter,
      stdout: result.stdout,
      stderr: result.stderr,
    };

    if (result.timedOut) {
      throw new BenchFailed(`Benchmark ${entryPoint}(${parameter}) timed out after ${this.timeoutMs}ms`, {
        ...details,
        timedOut: true,
      });
    }

    if (result.failed || result.exitCode !== 0) {
      const exitCode = typeof result.exitCode === 'number' ? result.exitCode : undefined;
      let reason = 'could not be started';
      if (exitCode !== undefined) {
        reason = `exited with code ${exitCode}`;
      } else if (result.signal) {
        reason = `was killed by ${result.signal}`;
      }
      const stderr = result.stderr ? `: ${result.stderr.trim()}` : '';
      throw new BenchFailed(`Benchmark ${entryPoint}(${parameter}) ${reason}${stderr}`, { ...details, exitCode });
    }

    const value = parseMeasurement(result.stdout);
    if (value === null) {
      throw new OutputParseError(
        `Benchmark ${entryPoint}(${parameter}) printed no decimal number on stdout`,
        { ...details, exitCode: 0 }
      );
    }

    logger.trace(`${entryPoint}(${parameter}) = ${value}`);
    return value;
  }
}
