import * as fs from 'fs';
import * as path from 'path';
import { load } from 'js-yaml';
import { ConfigurationError } from './errors';
import { isSafePathSegment } from './paths';
import {
  BenchEntry,
  BenchmarkDescriptor,
  Configuration,
  FailurePolicy,
  SamplerConfig,
} from './types';

export const DEFAULT_CONFIG_FILE = 'revbench.config.json';
export const DEFAULT_BUILD_COMMAND = ['cargo', 'build', '--release'];
export const DEFAULT_BENCH_COMMAND = ['cargo', 'run', '--release', 'bench'];
export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, where: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${where} must be a non-empty string`);
  }
  return value.trim();
}

function optionalString(value: unknown, where: string): string | undefined {
  return value === undefined ? undefined : requireString(value, where);
}

function optionalNumber(value: unknown, where: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${where} must be a finite number`);
  }
  return value;
}

function optionalBoolean(value: unknown, where: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw new ConfigurationError(`${where} must be a boolean`);
}

function commandList(value: unknown, where: string, fallback: string[]): string[] {
  if (value === undefined) {
    return [...fallback];
  }
  if (!Array.isArray(value) || value.length === 0 || !value.every(part => typeof part === 'string' && part !== '')) {
    throw new ConfigurationError(`${where} must be a non-empty array of strings`);
  }
  return value.map(String);
}

function validateSampler(value: unknown, where: string): SamplerConfig | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }

  const integer = optionalBoolean(value.integer, `${where}.integer`);

  if (value.kind === 'uniform') {
    return { kind: 'uniform', integer };
  }

  if (value.kind === 'skewed') {
    const mean = optionalNumber(value.mean, `${where}.mean`);
    if (mean === undefined || mean <= 0) {
      throw new ConfigurationError(`${where}.mean must be a positive number for a skewed sampler`);
    }
    const sigma = optionalNumber(value.sigma, `${where}.sigma`);
    if (sigma !== undefined && sigma <= 0) {
      throw new ConfigurationError(`${where}.sigma must be positive`);
    }
    const maxRetries = optionalNumber(value.maxRetries, `${where}.maxRetries`);
    if (maxRetries !== undefined && (!Number.isInteger(maxRetries) || maxRetries < 1)) {
      throw new ConfigurationError(`${where}.maxRetries must be a positive integer`);
    }
    return { kind: 'skewed', mean, sigma, maxRetries, integer };
  }

  throw new ConfigurationError(`${where}.kind must be "uniform" or "skewed"`);
}

function parseFailurePolicy(value: unknown): FailurePolicy {
  if (value === undefined || value === 'abort') {
    return 'abort';
  }
  if (value === 'skip') {
    return 'skip';
  }
  throw new ConfigurationError('failurePolicy must be "abort" or "skip"');
}

function validateEntry(value: unknown, where: string): BenchEntry {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }

  const commit = requireString(value.commit, `${where}.commit`);
  if (!isSafePathSegment(commit)) {
    throw new ConfigurationError(`${where}.commit "${commit}" cannot be used as a directory name`);
  }

  // snake_case and camelCase keys are both accepted
  const benchFunction = requireString(value.bench_function ?? value.benchFunction, `${where}.bench_function`);
  const elf = optionalString(value.elf, `${where}.elf`);

  return elf === undefined ? { commit, benchFunction } : { commit, benchFunction, elf };
}

function validateDescriptor(name: string, value: unknown): BenchmarkDescriptor {
  const where = `benches.${name}`;
  if (!isSafePathSegment(name)) {
    throw new ConfigurationError(`Benchmark name "${name}" cannot be used as a directory name`);
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }

  const parameter = requireString(value.parameter, `${where}.parameter`);
  const output = requireString(value.output, `${where}.output`);
  if (parameter === output) {
    throw new ConfigurationError(`${where}: parameter and output must be different column names`);
  }
  if (/[",\r\n]/.test(parameter) || /[",\r\n]/.test(output)) {
    throw new ConfigurationError(`${where}: column names must not contain commas, quotes or newlines`);
  }

  const description = typeof value.description === 'string' ? value.description : '';

  if (!isRecord(value.benches) || Object.keys(value.benches).length === 0) {
    throw new ConfigurationError(`${where}.benches must map at least one label to a revision`);
  }

  const benches: Record<string, BenchEntry> = {};
  for (const [label, entry] of Object.entries(value.benches)) {
    if (!isSafePathSegment(label)) {
      throw new ConfigurationError(`Label "${label}" in ${where} cannot be used as a file name`);
    }
    benches[label] = validateEntry(entry, `${where}.benches.${label}`);
  }

  const sampler = validateSampler(value.sampler, `${where}.sampler`);

  return { name, parameter, output, description, benches, ...(sampler ? { sampler } : {}) };
}

/**
 * Validates a parsed configuration document
 *
 * @param document - Parsed JSON/YAML value
 * @param baseDir - Directory relative paths in the document are resolved against
 */
export function validateConfiguration(document: unknown, baseDir: string): Configuration {
  if (!isRecord(document)) {
    throw new ConfigurationError('Configuration must be an object');
  }
  if (!isRecord(document.benches)) {
    throw new ConfigurationError('Configuration must contain a "benches" object');
  }

  const benches: Record<string, BenchmarkDescriptor> = {};
  for (const [name, descriptor] of Object.entries(document.benches)) {
    benches[name] = validateDescriptor(name, descriptor);
  }

  const failurePolicy = parseFailurePolicy(document.failurePolicy);

  const timeoutMs = optionalNumber(document.timeoutMs, 'timeoutMs') ?? DEFAULT_TIMEOUT_MS;
  if (timeoutMs <= 0) {
    throw new ConfigurationError('timeoutMs must be positive');
  }

  const maxConsecutiveFailures =
    optionalNumber(document.maxConsecutiveFailures, 'maxConsecutiveFailures') ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
  if (!Number.isInteger(maxConsecutiveFailures) || maxConsecutiveFailures < 1) {
    throw new ConfigurationError('maxConsecutiveFailures must be a positive integer');
  }

  const repository = path.resolve(baseDir, optionalString(document.repository, 'repository') ?? '.');
  const buildSubdir = optionalString(document.buildSubdir, 'buildSubdir') ?? 'cli';

  return {
    repository,
    buildSubdir,
    buildCommand: commandList(document.buildCommand, 'buildCommand', DEFAULT_BUILD_COMMAND),
    benchCommand: commandList(document.benchCommand, 'benchCommand', DEFAULT_BENCH_COMMAND),
    timeoutMs,
    failurePolicy,
    maxConsecutiveFailures,
    benches,
  };
}

/**
 * Loads the configuration file. JSON and YAML documents are both accepted.
 */
export function loadConfiguration(filePath: string): Configuration {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Configuration file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${filePath}: ${error instanceof Error ? error.message : error}`
    );
  }

  return validateConfiguration(parsed, path.dirname(path.resolve(filePath)));
}

/**
 * Looks up one benchmark, failing with the list of known names
 */
export function getBenchmark(config: Configuration, name: string): BenchmarkDescriptor {
  const descriptor = Object.prototype.hasOwnProperty.call(config.benches, name) ? config.benches[name] : undefined;
  if (!descriptor) {
    const known = Object.keys(config.benches);
    throw new ConfigurationError(
      `Unknown benchmark "${name}"${known.length > 0 ? ` (known: ${known.join(', ')})` : ''}`
    );
  }
  return descriptor;
}
