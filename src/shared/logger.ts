// ---------------------------------------------------------------------------
// Strata — Structured Logger
// ---------------------------------------------------------------------------
// JSON or human-readable lines, written to the console or to a file with
// size-based rotation. Each domain and module logs through a child whose
// prefix names it, e.g. `Strata:storage:settings`.
// ---------------------------------------------------------------------------

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ILogger } from '../core/types/module';
import { LogLevel } from '../core/types/config';

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level: LogLevel;
  format: 'json' | 'text';
  prefix?: string;
  /** Default: 'console'. */
  output?: 'console' | 'file';
  /** File path when output is 'file'. */
  filePath?: string;
  /** Max file size in bytes before rotation. Default: 10 MB. */
  maxFileSize?: number;
  /** Max number of rotated files to keep. Default: 5. */
  maxFiles?: number;
}

/** Scope ids may be bigints, which JSON.stringify rejects. */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Open log file shared by a logger and all of its children, so that
 * rotation seen by one is seen by all.
 */
export class LogFile {
  private fd: number | undefined;
  private size = 0;
  private failed = false;

  constructor(
    readonly filePath: string,
    private readonly maxFileSize: number,
    private readonly maxFiles: number,
  ) {}

  /** Returns false once the file cannot be written; callers fall back to the console. */
  write(line: string): boolean {
    if (this.failed) return false;
    const fd = this.fd ?? this.open();
    if (fd === undefined) return false;

    const data = line + '\n';
    const bytes = Buffer.byteLength(data, 'utf-8');
    let target = fd;
    if (this.size > 0 && this.size + bytes > this.maxFileSize) {
      const rotated = this.rotate();
      if (rotated === undefined) return false;
      target = rotated;
    }

    try {
      fs.writeSync(target, data);
      this.size += bytes;
      return true;
    } catch (err) {
      this.fail('write to', err);
      return false;
    }
  }

  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    fs.closeSync(fd);
  }

  private open(): number | undefined {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const fd = fs.openSync(this.filePath, 'a');
      this.size = fs.fstatSync(fd).size;
      this.fd = fd;
      return fd;
    } catch (err) {
      this.fail('open', err);
      return undefined;
    }
  }

  /** app.log → app.log.1 → ... → app.log.N; the oldest is deleted. */
  private rotate(): number | undefined {
    this.close();
    try {
      fs.rmSync(`${this.filePath}.${this.maxFiles}`, { force: true });
      for (let i = this.maxFiles - 1; i >= 1; i--) {
        const from = `${this.filePath}.${i}`;
        if (fs.existsSync(from)) fs.renameSync(from, `${this.filePath}.${i + 1}`);
      }
      if (fs.existsSync(this.filePath)) fs.renameSync(this.filePath, `${this.filePath}.1`);
    } catch (err) {
      this.fail('rotate', err);
      return undefined;
    }
    this.size = 0;
    return this.open();
  }

  private fail(action: string, err: unknown): void {
    this.failed = true;
    console.error(
      `[Logger] Failed to ${action} log file "${this.filePath}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly format: 'json' | 'text';
  private readonly prefix: string;
  private readonly file: LogFile | undefined;

  constructor(options: LoggerOptions, file?: LogFile) {
    this.level = options.level;
    this.format = options.format;
    this.prefix = options.prefix ?? '';
    this.file =
      file ??
      (options.output === 'file' && options.filePath
        ? new LogFile(options.filePath, options.maxFileSize ?? 10 * 1024 * 1024, options.maxFiles ?? 5)
        : undefined);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('error', message, error, context);
  }

  child(prefix: string): ILogger {
    return new Logger(
      {
        level: this.level,
        format: this.format,
        prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      },
      this.file,
    );
  }

  /** Close the log file. Call during shutdown. */
  close(): void {
    this.file?.close();
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private emit(
    level: LogLevel,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    if (LOG_PRIORITY[level] < LOG_PRIORITY[this.level]) return;

    const timestamp = new Date().toISOString();
    const hasContext = context !== undefined && Object.keys(context).length > 0;
    let line: string;

    if (this.format === 'json') {
      const entry: Record<string, unknown> = { timestamp, level };
      if (this.prefix) entry.module = this.prefix;
      entry.message = message;
      if (hasContext) entry.context = context;
      if (error) {
        entry.error = { name: error.name, message: error.message, stack: error.stack };
      }
      line = JSON.stringify(entry, jsonReplacer);
    } else {
      const tag = level.toUpperCase().padEnd(5);
      const modulePart = this.prefix ? `[${this.prefix}] ` : '';
      line = `${timestamp} ${tag} ${modulePart}${message}`;
      if (hasContext) {
        line += ` ${JSON.stringify(context, jsonReplacer)}`;
      }
      if (error) {
        line += `\n  Error: ${error.message}`;
        if (error.stack) line += `\n  ${error.stack}`;
      }
    }

    if (this.file?.write(line)) return;
    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}
