import debug, { Debugger } from 'debug';
import chalk from 'chalk';
import { describeError } from './errors';

/**
 * Levels from most to least verbose
 */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

interface Channel {
  /** Lowest logger level at which the channel is written */
  level: LogLevel;
  tag: string;
  paint: (text: string) => string;
  write: Debugger;
}

function channel(name: string, level: LogLevel, paint: (text: string) => string): Channel {
  return { level, tag: `[${name.toUpperCase()}]`, paint, write: debug(`revbench:${name}`) };
}

const channels = {
  trace: channel('trace', 'trace', text => chalk.dim(text)),
  debug: channel('debug', 'debug', text => chalk.gray(text)),
  info: channel('info', 'info', text => chalk.blue(text)),
  success: channel('success', 'info', text => chalk.green(text)),
  warn: channel('warn', 'warn', text => chalk.yellow(text)),
  error: channel('error', 'error', text => chalk.red(text)),
};

type ChannelName = keyof typeof channels;

// stdout carries command output (reports), every log line goes to stderr
debug.log = (...args: unknown[]) => console.error(...args);

class Logger {
  private level: LogLevel = 'info';

  constructor(level: LogLevel = 'info') {
    this.setLevel(level);
  }

  /**
   * Changes the level and re-enables the matching `revbench:*` namespaces
   */
  setLevel(level: LogLevel): void {
    this.level = level;
    const enabled = Object.values(channels)
      .filter(entry => this.isEnabled(entry.level))
      .map(entry => entry.write.namespace);
    debug.enable(enabled.join(','));
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private emit(name: ChannelName, message: string, args: unknown[]): void {
    const entry = channels[name];
    if (this.isEnabled(entry.level)) {
      entry.write(entry.paint(`${entry.tag} ${message}`), ...args);
    }
  }

  trace(message: string, ...args: unknown[]): void {
    this.emit('trace', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args);
  }

  success(message: string, ...args: unknown[]): void {
    this.emit('success', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args);
  }

  /**
   * Logs a fatal error as `[stage] benchmark/label: message`, with the stack
   * at debug level
   */
  failure(error: unknown): void {
    this.error(describeError(error));
    if (error instanceof Error && error.stack) {
      this.debug(error.stack);
    }
  }
}

export type { Logger };

export const logger = new Logger();
