/**
 * Report assembly for the `plot` command
 *
 * Reads every label's measurement table and returns plot-ready series with a
 * least-squares line per series. Drawing is left to whatever consumes the
 * JSON document; Markdown and terminal renderings are provided for humans.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { MeasurementStore } from './measurement-store';
import { BenchmarkDescriptor, TableSchema } from './types';

export interface LinearFit {
  slope: number;
  intercept: number;
}

export interface SeriesStats {
  min: number;
  max: number;
  mean: number;
  median: number;
  stdDev: number;
  samples: number;
}

export interface Series {
  label: string;
  revision: string;
  benchFunction: string;
  parameters: number[];
  metrics: number[];
  /** Fit evaluated at each parameter; empty when there is no fit */
  fitted: number[];
  /** Null with fewer than two distinct parameters */
  fit: LinearFit | null;
  /** False for a table with no rows: listed in the report but nothing to draw */
  plotted: boolean;
  stats: SeriesStats;
}

export interface Report {
  benchmark: string;
  description: string;
  parameter: string;
  output: string;
  series: Series[];
  totalSamples: number;
  generatedAt: string;
}

export const REPORT_FORMATS = ['json', 'markdown', 'pretty'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

/**
 * Ordinary least-squares fit of y = intercept + slope * x
 */
export function linearRegression(xs: readonly number[], ys: readonly number[]): LinearFit | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    return null;
  }

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += xs[i];
    sumY += ys[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    sxx += dx * dx;
    sxy += dx * (ys[i] - meanY);
  }

  // All parameters equal: the slope is undefined
  if (sxx === 0) {
    return null;
  }

  const slope = sxy / sxx;
  return { slope, intercept: meanY - slope * meanX };
}

/**
 * Statistical summary of a series' metric values
 */
export function calculateStats(values: readonly number[]): SeriesStats {
  if (values.length === 0) {
    return { min: 0, max: 0, mean: 0, median: 0, stdDev: 0, samples: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mean = sorted.reduce((a, b) => a + b, 0) / sorted.length;

  const mid = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];

  const variance = sorted.reduce((acc, v) => acc + Math.pow(v - mean, 2), 0) / sorted.length;

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean,
    median,
    stdDev: Math.sqrt(variance),
    samples: sorted.length,
  };
}

export class ReportAssembler {
  private readonly store: Pick<MeasurementStore, 'read'>;

  constructor(store: Pick<MeasurementStore, 'read'>) {
    this.store = store;
  }

  assemble(benchmark: BenchmarkDescriptor, now: Date = new Date()): Report {
    const schema: TableSchema = [benchmark.parameter, benchmark.output];

    const series = Object.entries(benchmark.benches).map(([label, entry]): Series => {
      const rows = this.store.read({ benchmark: benchmark.name, label }, schema);
      const parameters = rows.map(row => row.parameter);
      const metrics = rows.map(row => row.metric);
      const fit = linearRegression(parameters, metrics);

      return {
        label,
        revision: entry.commit,
        benchFunction: entry.benchFunction,
        parameters,
        metrics,
        fitted: fit ? parameters.map(x => fit.intercept + fit.slope * x) : [],
        fit,
        plotted: rows.length > 0,
        stats: calculateStats(metrics),
      };
    });

    return {
      benchmark: benchmark.name,
      description: benchmark.description,
      parameter: benchmark.parameter,
      output: benchmark.output,
      series,
      totalSamples: series.reduce((total, s) => total + s.parameters.length, 0),
      generatedAt: now.toISOString(),
    };
  }
}

export function formatReportJson(report: Report): string {
  return JSON.stringify(report, null, 2);
}

function formatFit(fit: LinearFit | null): string {
  return fit ? `${fit.intercept.toPrecision(4)} + ${fit.slope.toPrecision(4)}·x` : '-';
}

/**
 * Markdown summary (one row per series), suitable for a CI step summary
 */
export function formatReportMarkdown(report: Report): string {
  let md = `## ${report.benchmark}\n\n`;
  if (report.description) {
    md += `${report.description}\n\n`;
  }
  md += `**Samples:** ${report.totalSamples}\n\n`;

  md += `| Label | Revision | Samples | Mean ${report.output} | Median | Std Dev | Fit (x = ${report.parameter}) |\n`;
  md += '|-------|----------|---------|------|--------|---------|-----|\n';

  for (const series of report.series) {
    if (!series.plotted) {
      md += `| ${series.label} | \`${series.revision}\` | 0 | - | - | - | - |\n`;
      continue;
    }
    md += `| ${series.label} | \`${series.revision}\` | ${series.stats.samples} | `;
    md += `${series.stats.mean.toFixed(4)} | ${series.stats.median.toFixed(4)} | `;
    md += `${series.stats.stdDev.toFixed(4)} | ${formatFit(series.fit)} |\n`;
  }

  return md;
}

/**
 * Terminal summary, coloured when `colorize` is set
 */
export function formatReportPretty(report: Report, colorize: boolean): string {
  const bold = (text: string) => (colorize ? chalk.bold(text) : text);
  const dim = (text: string) => (colorize ? chalk.gray(text) : text);

  const lines: string[] = [];
  lines.push(bold(`${report.benchmark}: ${report.output} vs ${report.parameter}`));
  if (report.description) {
    lines.push(dim(report.description));
  }
  lines.push(`num_samples=${report.totalSamples}`);
  lines.push('');

  for (const series of report.series) {
    const heading = `${series.label} (${series.revision}, ${series.benchFunction})`;
    if (!series.plotted) {
      lines.push(`  ${heading}: ${dim('no samples yet')}`);
      continue;
    }
    lines.push(`  ${bold(heading)}`);
    lines.push(
      `    samples=${series.stats.samples} mean=${series.stats.mean.toFixed(4)} ` +
        `min=${series.stats.min.toFixed(4)} max=${series.stats.max.toFixed(4)}`
    );
    lines.push(`    fit: ${formatFit(series.fit)}`);
  }

  return lines.join('\n');
}

export function formatReport(report: Report, format: ReportFormat, colorize = false): string {
  switch (format) {
    case 'json':
      return formatReportJson(report);
    case 'markdown':
      return formatReportMarkdown(report);
    case 'pretty':
      return formatReportPretty(report, colorize);
  }
}

/**
 * Writes the JSON document where plotting tools pick it up
 *
 * @returns Path written
 */
export function writeReport(report: Report, filePath: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${formatReportJson(report)}\n`);
  return filePath;
}
