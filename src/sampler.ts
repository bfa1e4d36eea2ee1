import { SamplerConfigurationWarning } from './errors';
import { logger } from './logger';
import { SamplerConfig } from './types';

/** Uniform source in [0, 1), Math.random by default */
export type RandomSource = () => number;

export const DEFAULT_SKEW_SIGMA = 0.5;
export const DEFAULT_MAX_RETRIES = 1000;

export interface SamplerOptions {
  min: number;
  max: number;
  config?: SamplerConfig;
  random?: RandomSource;
  /** Called (once per sampler) when rejection sampling gives up and falls back to uniform */
  onWarning?: (warning: SamplerConfigurationWarning) => void;
}

/**
 * Infinite sequence of benchmark parameters in [min, max)
 *
 * The skewed policy draws from a log-normal distribution whose median is
 * `mean`, rejecting draws outside (min, max). After `maxRetries` rejections
 * in a row it falls back to a uniform draw.
 */
export class Sampler {
  readonly min: number;
  readonly max: number;
  readonly config: SamplerConfig;
  private readonly integer: boolean;
  private readonly random: RandomSource;
  private readonly onWarning?: (warning: SamplerConfigurationWarning) => void;
  private warned = false;

  constructor(options: SamplerOptions) {
    const { min, max } = options;
    this.config = options.config ?? { kind: 'uniform' };
    this.integer = this.config.integer ?? true;

    if (!Number.isFinite(min) || !Number.isFinite(max) || min >= max) {
      throw new RangeError(`Invalid sampling range [${min}, ${max}): min must be less than max`);
    }
    if (this.integer && Math.ceil(min) >= max) {
      throw new RangeError(`Sampling range [${min}, ${max}) contains no integer`);
    }

    this.min = min;
    this.max = max;
    this.random = options.random ?? Math.random;
    this.onWarning = options.onWarning;
  }

  next(): number {
    const value = this.config.kind === 'skewed' ? this.drawSkewed(this.config) : this.drawUniform();
    return this.integer ? this.toInteger(value) : value;
  }

  /**
   * Lazy, infinite view of the sampler; every call starts a fresh sequence
   */
  *samples(): Generator<number, never, void> {
    for (;;) {
      yield this.next();
    }
  }

  private drawUniform(): number {
    if (this.integer) {
      const low = Math.ceil(this.min);
      const high = Math.ceil(this.max);
      return low + Math.floor(this.random() * (high - low));
    }
    const value = this.min + this.random() * (this.max - this.min);
    // Rounding can land exactly on max for draws just below 1
    return value < this.max ? value : this.min;
  }

  private drawSkewed(config: Extract<SamplerConfig, { kind: 'skewed' }>): number {
    const mu = Math.log(config.mean);
    const sigma = config.sigma ?? DEFAULT_SKEW_SIGMA;
    const maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const value = Math.exp(mu + sigma * this.standardNormal());
      if (value > this.min && value < this.max) {
        return value;
      }
    }

    this.warn(
      new SamplerConfigurationWarning(
        `Skewed sampler (mean ${config.mean}, sigma ${sigma}) produced no value in (${this.min}, ${this.max}) ` +
          `after ${maxRetries} draws; falling back to uniform sampling`,
        maxRetries
      )
    );
    return this.drawUniform();
  }

  // Box-Muller; 1 - u keeps the logarithm's argument in (0, 1]
  private standardNormal(): number {
    const u1 = 1 - this.random();
    const u2 = this.random();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  private toInteger(value: number): number {
    return Math.max(Math.ceil(this.min), Math.floor(value));
  }

  private warn(warning: SamplerConfigurationWarning): void {
    if (this.warned) {
      return;
    }
    this.warned = true;
    logger.warn(warning.message);
    this.onWarning?.(warning);
  }
}
