#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_CONFIG_FILE } from './config';
import { REPORT_FORMATS, ReportFormat } from './report-assembler';
import { benchCommand } from './commands/bench';
import { buildCommand } from './commands/build';
import { cleanCommand, cleanCsvCommand } from './commands/clean';
import { GlobalOptions } from './commands/command-helpers';
import { plotCommand } from './commands/plot';

/**
 * Parses a finite number argument (benchmark parameter bounds)
 */
export function parseNumber(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return parsed;
}

/**
 * Parses a positive integer argument (sample counts)
 */
export function parsePositiveInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`"${value}" is not a positive integer.`);
  }
  return parsed;
}

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

const program = new Command();

program
  .name('revbench')
  .description('Compare the performance of one benchmark across several revisions of a repository')
  .version('0.1.0')
  .option('-c, --config <path>', 'Configuration file, relative to --root', DEFAULT_CONFIG_FILE)
  .option('-r, --root <dir>', 'Workspace root holding build/, data/ and plots/', process.cwd())
  .option('--tmp-root <dir>', 'Directory where revisions are checked out (default: <tmpdir>/revbench-repos)')
  .option('--log-level <level>', 'Log level: trace, debug, info, warn, error', 'info');

program
  .command('build')
  .description('Check out and build every revision of a benchmark')
  .argument('<benchmark>', 'Benchmark name from the configuration')
  .action(async (benchmark: string, _options: unknown, command: Command) => {
    await buildCommand(benchmark, command.optsWithGlobals<GlobalOptions>());
  });

program
  .command('bench')
  .description('Sample a benchmark with random parameters in [min, max) until interrupted')
  .argument('<benchmark>', 'Benchmark name from the configuration')
  .argument('<min>', 'Lower parameter bound (inclusive)', parseNumber)
  .argument('<max>', 'Upper parameter bound (exclusive)', parseNumber)
  .option('-n, --iterations <count>', 'Stop after this many samples', parsePositiveInteger)
  .option('--build', 'Build the revisions before sampling', false)
  .action(
    async (
      benchmark: string,
      min: number,
      max: number,
      options: { iterations?: number; build: boolean },
      command: Command
    ) => {
      await benchCommand(benchmark, min, max, options, command.optsWithGlobals<GlobalOptions>());
    }
  );

program
  .command('clean')
  .description('Remove the benchmark links and delete revisions nothing else uses')
  .argument('<benchmark>', 'Benchmark name from the configuration')
  .action(async (benchmark: string, _options: unknown, command: Command) => {
    await cleanCommand(benchmark, command.optsWithGlobals<GlobalOptions>());
  });

program
  .command('cleancsv')
  .description('Delete the measurement tables of a benchmark')
  .argument('<benchmark>', 'Benchmark name from the configuration')
  .action((benchmark: string, _options: unknown, command: Command) => {
    cleanCsvCommand(benchmark, command.optsWithGlobals<GlobalOptions>());
  });

program
  .command('plot')
  .description('Assemble the per-revision series and regression lines of a benchmark')
  .argument('<benchmark>', 'Benchmark name from the configuration')
  .addOption(
    new Option('-f, --format <format>', 'Output format')
      .choices(REPORT_FORMATS)
      .default('pretty')
  )
  .action((benchmark: string, options: { format: string }, command: Command) => {
    const format: ReportFormat = isReportFormat(options.format) ? options.format : 'pretty';
    plotCommand(benchmark, { format }, command.optsWithGlobals<GlobalOptions>());
  });

export { program };

// Only parse arguments if this file is run directly (not imported as a module)
if (require.main === module) {
  program.parseAsync().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
