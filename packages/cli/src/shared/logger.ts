import chalk from 'chalk';
import type { PipelineLogger } from '@pubwatch/contracts';
import { maskMeta, maskSecrets } from '@pubwatch/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  colors?: boolean;
  json?: boolean;
  /** Log sink; stdout is reserved for command results */
  write?: (line: string) => void;
  now?: () => Date;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger implements PipelineLogger {
  level: LogLevel;
  readonly colors: boolean;
  readonly json: boolean;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;
  private readonly secrets: string[] = [];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.colors = options.colors ?? true;
    this.json = options.json ?? false;
    this.write = options.write ?? ((line) => process.stderr.write(line + '\n'));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Register a value that must never appear in log output
   */
  addSecret(secret: string | undefined): void {
    if (secret) {
      this.secrets.push(secret);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVELS[level] < LEVELS[this.level]) {
      return;
    }
    this.write(this.format(level, maskSecrets(message, this.secrets), meta && maskMeta(meta, this.secrets)));
  }

  private format(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
    if (this.json) {
      return JSON.stringify({ level, message, ...(meta ? { meta } : {}), timestamp: this.now().toISOString() });
    }

    const suffix = meta && Object.keys(meta).length > 0 ? ' ' + this.paint(chalk.gray, formatMeta(meta)) : '';
    return `${this.levelTag(level)} ${message}${suffix}`;
  }

  private levelTag(level: LogLevel): string {
    const tag = `[${level.toUpperCase()}]`;
    switch (level) {
      case 'debug':
        return this.paint(chalk.gray, tag);
      case 'info':
        return this.paint(chalk.blue, tag);
      case 'warn':
        return this.paint(chalk.yellow, tag);
      case 'error':
        return this.paint(chalk.red, tag);
    }
  }

  private paint(color: (text: string) => string, text: string): string {
    return this.colors ? color(text) : text;
  }
}

function formatMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ');
}
