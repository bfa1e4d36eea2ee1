import execa from 'execa';
import { BuildFailed } from './errors';
import { logger } from './logger';

export interface BuilderOptions {
  /** Command and arguments, e.g. ['cargo', 'build', '--release'] */
  command: string[];
}

/**
 * Runs the build toolchain in a materialized revision. Does no caching of
 * its own; an unchanged tree rebuilds as fast as the toolchain allows.
 */
export class Builder {
  private readonly command: string;
  private readonly args: string[];

  constructor(options: BuilderOptions) {
    const [command, ...args] = options.command;
    if (!command) {
      throw new Error('Build command must not be empty');
    }
    this.command = command;
    this.args = args;
  }

  async build(directory: string): Promise<void> {
    logger.info(`Building in ${directory}: ${[this.command, ...this.args].join(' ')}`);

    const result = await execa(this.command, this.args, {
      cwd: directory,
      all: true,
      reject: false,
    });

    if (result.exitCode !== 0 || result.failed) {
      const output = result.all ?? [result.stdout, result.stderr].filter(Boolean).join('\n');
      // Spawn errors (missing toolchain, missing directory) carry no exit code
      const exitCode = typeof result.exitCode === 'number' ? result.exitCode : undefined;
      throw new BuildFailed(directory, exitCode, output || `${result.command} failed`);
    }

    logger.debug(`Build finished in ${directory}`);
  }
}
