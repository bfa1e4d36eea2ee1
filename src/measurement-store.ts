/**
 * Append-only measurement tables
 *
 * One CSV file per (benchmark, label). The first line holds the two column
 * names; every following line is one `parameter,metric` row. Rows are only
 * ever appended, each with a single write followed by fsync, so a process
 * killed between samples leaves a file that parses.
 */

import * as fs from 'fs';
import * as path from 'path';
import { RevbenchError, SchemaMismatch } from './errors';
import { logger } from './logger';
import { WorkspaceLayout } from './paths';
import { Measurement, TableSchema } from './types';

export interface TableId {
  benchmark: string;
  label: string;
}

export interface MeasurementTable {
  readonly id: TableId;
  readonly path: string;
  readonly schema: TableSchema;
  /** Column order as found in the file's header */
  readonly columns: readonly [string, string];
}

const HEADER_CHUNK_SIZE = 4096;

/**
 * Reads the first line of a file without loading the rest
 */
export function readFirstLine(filePath: string): string {
  const fd = fs.openSync(filePath, 'r');
  try {
    const buffer = Buffer.alloc(HEADER_CHUNK_SIZE);
    const chunks: Buffer[] = [];
    let position = 0;
    for (;;) {
      const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, position);
      if (bytesRead === 0) {
        break;
      }
      const chunk = buffer.subarray(0, bytesRead);
      const newline = chunk.indexOf(0x0a);
      if (newline !== -1) {
        chunks.push(Buffer.from(chunk.subarray(0, newline)));
        break;
      }
      chunks.push(Buffer.from(chunk));
      position += bytesRead;
    }
    return Buffer.concat(chunks).toString('utf-8');
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Splits a header line into column names, tolerating a BOM, CRLF and quoting
 */
export function parseHeader(line: string): string[] {
  return line
    .replace(/^\uFEFF/, '')
    .replace(/\r$/, '')
    .split(',')
    .map(column => column.trim().replace(/^"(.*)"$/, '$1'));
}

function sameColumnSet(expected: readonly string[], found: readonly string[]): boolean {
  if (found.length !== expected.length || new Set(found).size !== found.length) {
    return false;
  }
  return expected.every(column => found.includes(column));
}

function formatValue(value: number): string {
  return String(value);
}

export class MeasurementStore {
  private readonly layout: WorkspaceLayout;
  private readonly tables = new Map<string, MeasurementTable>();

  constructor(layout: WorkspaceLayout) {
    this.layout = layout;
  }

  tablePath(id: TableId): string {
    return this.layout.tableFile(id.benchmark, id.label);
  }

  /**
   * Opens a table, creating it with a header when missing. An existing
   * header must name the same two columns (in any order), otherwise
   * SchemaMismatch is thrown and nothing is written. The header is checked
   * once per store instance.
   */
  openOrInit(id: TableId, schema: TableSchema): MeasurementTable {
    const tablePath = this.tablePath(id);
    const cached = this.tables.get(tablePath);
    if (cached) {
      if (!sameColumnSet(schema, cached.columns)) {
        throw new SchemaMismatch(tablePath, schema, cached.columns).withContext(id);
      }
      return cached;
    }

    fs.mkdirSync(path.dirname(tablePath), { recursive: true });

    let columns: readonly [string, string];
    const exists = fs.existsSync(tablePath);
    if (!exists || fs.statSync(tablePath).size === 0) {
      // Exclusive create so a concurrent opener cannot write a second header
      try {
        fs.writeFileSync(tablePath, `${schema[0]},${schema[1]}\n`, { flag: exists ? 'w' : 'wx' });
        logger.debug(`Created measurement table ${tablePath}`);
        columns = [schema[0], schema[1]];
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
          throw error;
        }
        columns = this.checkHeader(tablePath, schema, id);
      }
    } else {
      columns = this.checkHeader(tablePath, schema, id);
      this.repairTornRow(tablePath);
    }

    const table: MeasurementTable = { id, path: tablePath, schema, columns };
    this.tables.set(tablePath, table);
    return table;
  }

  private checkHeader(tablePath: string, schema: TableSchema, id: TableId): readonly [string, string] {
    const found = parseHeader(readFirstLine(tablePath));
    if (!sameColumnSet(schema, found)) {
      throw new SchemaMismatch(tablePath, schema, found).withContext(id);
    }
    return [found[0], found[1]];
  }

  /**
   * Drops an unterminated last line (a write torn by another writer or a
   * crash outside this store) so the next row starts on its own line
   */
  private repairTornRow(tablePath: string): void {
    const { size } = fs.statSync(tablePath);
    const fd = fs.openSync(tablePath, 'r+');
    try {
      const last = Buffer.alloc(1);
      fs.readSync(fd, last, 0, 1, size - 1);
      if (last[0] === 0x0a) {
        return;
      }

      // Walk back to the previous newline; the header always ends in one
      const buffer = Buffer.alloc(HEADER_CHUNK_SIZE);
      let end = size;
      while (end > 0) {
        const start = Math.max(0, end - buffer.length);
        const length = end - start;
        fs.readSync(fd, buffer, 0, length, start);
        const newline = buffer.subarray(0, length).lastIndexOf(0x0a);
        if (newline !== -1) {
          const keep = start + newline + 1;
          logger.warn(`Dropping incomplete last row of ${tablePath} (${size - keep} bytes)`);
          fs.ftruncateSync(fd, keep);
          fs.fsyncSync(fd);
          return;
        }
        end = start;
      }

      // Header without newline and no rows
      fs.writeSync(fd, '\n', size);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }

  /**
   * Appends one row. The row is written with one write call and flushed to
   * disk before this returns; existing content is never read or rewritten.
   */
  append(table: MeasurementTable, parameter: number, metric: number): void {
    if (!Number.isFinite(parameter) || !Number.isFinite(metric)) {
      throw new RevbenchError('append', `Refusing to append non-finite row (${parameter}, ${metric}) to ${table.path}`, table.id);
    }

    const values = table.columns[0] === table.schema[0] ? [parameter, metric] : [metric, parameter];
    const row = `${formatValue(values[0])},${formatValue(values[1])}\n`;

    let fd: number;
    try {
      fd = fs.openSync(table.path, 'a');
    } catch (error) {
      throw new RevbenchError(
        'append',
        `Cannot open ${table.path} for appending: ${error instanceof Error ? error.message : error}`,
        table.id
      );
    }
    try {
      fs.writeSync(fd, row);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }

  /**
   * Reads every complete row of a table. Columns are matched by name, so
   * the header's order does not matter. A missing table reads as empty.
   */
  read(id: TableId, schema: TableSchema): Measurement[] {
    const tablePath = this.tablePath(id);
    if (!fs.existsSync(tablePath)) {
      return [];
    }

    const content = fs.readFileSync(tablePath, 'utf-8');
    if (content === '') {
      return [];
    }

    const lines = content.split('\n');
    const header = parseHeader(lines[0]);
    if (!sameColumnSet(schema, header)) {
      throw new SchemaMismatch(tablePath, schema, header).withContext(id);
    }
    const parameterIndex = header.indexOf(schema[0]);
    const outputIndex = header.indexOf(schema[1]);

    // Whatever follows the last newline was never completed
    const tail = lines.pop();
    if (lines.length === 0) {
      return [];
    }
    if (tail !== undefined && tail.trim() !== '') {
      logger.warn(`Ignoring incomplete last row of ${tablePath}`);
    }

    const measurements: Measurement[] = [];
    for (let i = 1; i < lines.length; i++) {
      const line = lines[i].replace(/\r$/, '');
      if (line.trim() === '') {
        continue;
      }
      const fields = line.split(',');
      const parameter = Number(fields[parameterIndex]);
      const metric = Number(fields[outputIndex]);
      if (fields.length !== 2 || !Number.isFinite(parameter) || !Number.isFinite(metric)) {
        throw new RevbenchError('report', `Malformed row ${i + 1} in ${tablePath}: "${line}"`, id);
      }
      measurements.push({ parameter, metric });
    }
    return measurements;
  }

  /**
   * Deletes every table of a benchmark
   *
   * @returns Number of table files removed
   */
  removeTables(benchmark: string): number {
    const dir = this.layout.benchDataDir(benchmark);
    if (!fs.existsSync(dir)) {
      return 0;
    }

    const files = fs.readdirSync(dir).filter(name => name.endsWith('.csv'));
    for (const name of files) {
      const filePath = path.join(dir, name);
      fs.unlinkSync(filePath);
      this.tables.delete(filePath);
    }
    if (fs.readdirSync(dir).length === 0) {
      fs.rmdirSync(dir);
    }
    return files.length;
  }
}
