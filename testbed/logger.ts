/**
 * Console logging for the benchmark runner and dashboard.
 *
 * Lines go to the console (coloured on a TTY) and, without colour, to any
 * attached sinks: the run log file, or the output buffer of a dashboard job.
 */
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export interface LogSink {
  write(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel | { current: LogLevel };
  context?: string;
  silent?: boolean;
  colors?: boolean;
  sinks?: LogSink[];
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  success: 1,
};

const labels: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
  success: chalk.green,
};

export class Logger {
  // shared with children, like the sinks
  private level: { current: LogLevel };
  private context: string;
  private silent: boolean;
  private useColors: boolean;
  private sinks: LogSink[];

  constructor(options: LoggerOptions = {}) {
    const level = options.level ?? (process.env.DEBUG ? 'debug' : 'info');
    this.level = typeof level === 'string' ? { current: level } : level;
    this.context = options.context ?? '';
    this.silent = options.silent ?? false;
    this.useColors = options.colors ?? (process.stdout.isTTY ?? false);
    this.sinks = options.sinks ?? [];
  }

  private format(level: LogLevel, message: string, colored: boolean): string {
    const tag = level === 'success' ? '[ok]' : `[${level}]`;
    if (!colored) {
      return this.context ? `${tag} (${this.context}) ${message}` : `${tag} ${message}`;
    }
    const ctx = this.context ? ` ${chalk.dim(`(${this.context})`)}` : '';
    return `${labels[level](tag)}${ctx} ${message}`;
  }

  private emit(level: LogLevel, message: string): void {
    if (levelPriority[level] < levelPriority[this.level.current]) return;

    if (this.sinks.length > 0) {
      const line = `${new Date().toISOString()} ${this.format(level, message, false)}`;
      for (const sink of this.sinks) sink.write(line);
    }
    if (this.silent) return;

    const output = this.format(level, message, this.useColors);
    if (level === 'error') console.error(output);
    else if (level === 'warn') console.warn(output);
    else console.log(output);
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  success(message: string): void {
    this.emit('success', message);
  }

  /**
   * Raw tool output, kept out of the console unless debugging.
   */
  output(line: string): void {
    for (const sink of this.sinks) sink.write(line);
    if (!this.silent && this.level.current === 'debug') console.log(chalk.dim(line));
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  removeSink(sink: LogSink): void {
    const index = this.sinks.indexOf(sink);
    if (index >= 0) this.sinks.splice(index, 1);
  }

  setLevel(level: LogLevel): void {
    this.level.current = level;
  }

  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
      sinks: this.sinks,
    });
  }
}

export class FileSink implements LogSink {
  constructor(private readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  write(line: string): void {
    fs.appendFileSync(this.filePath, `${line}\n`);
  }
}

export class MemorySink implements LogSink {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }
}

export function createLogger(context?: string, options: Omit<LoggerOptions, 'context'> = {}): Logger {
  return new Logger({ ...options, context });
}

export const logger = createLogger();
