/**
 * Command handler for `revbench plot <benchmark>`
 */

import { logger } from '../logger';
import { MeasurementStore } from '../measurement-store';
import { formatReport, ReportAssembler, ReportFormat, writeReport } from '../report-assembler';
import { createCommandContext, exitWithError, GlobalOptions } from './command-helpers';

export interface PlotCommandOptions {
  format: ReportFormat;
}

/**
 * Assembles the series of every label, writes plots/<benchmark>.json and
 * prints the report in the requested format
 */
export function plotCommand(benchmarkName: string, options: PlotCommandOptions, globals: GlobalOptions): void {
  try {
    const { benchmark, layout } = createCommandContext(benchmarkName, globals);
    const report = new ReportAssembler(new MeasurementStore(layout)).assemble(benchmark);

    for (const series of report.series) {
      if (!series.plotted) {
        logger.warn(`No samples for ${benchmarkName}/${series.label} yet`);
      }
    }

    const written = writeReport(report, layout.reportFile(benchmarkName));
    if (options.format !== 'json') {
      logger.info(`Plot data written to ${written}`);
    }

    const colorize = Boolean(process.stdout.isTTY && options.format === 'pretty');
    console.log(formatReport(report, options.format, colorize));
  } catch (error) {
    exitWithError(error);
  }
}
