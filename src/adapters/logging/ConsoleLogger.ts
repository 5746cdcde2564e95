import fs from 'fs';
import path from 'path';
import { Logger, LogLevel } from '../../core/services/Logger';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface FileSinkOptions {
  maxSizeBytes?: number;
  maxFiles?: number;
}

// Append-only log file; app.log rolls over to app.log.1 .. app.log.N by size.
class RotatingFileSink {
  private fd: number | null = null;
  private size = 0;
  private readonly maxSizeBytes: number;
  private readonly maxFiles: number;

  constructor(private filePath: string, options: FileSinkOptions = {}) {
    this.maxSizeBytes = options.maxSizeBytes ?? 5 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 3;
    this.open();
  }

  write(line: string): void {
    const bytes = Buffer.byteLength(line, 'utf8');
    if (this.size > 0 && this.size + bytes > this.maxSizeBytes) this.rotate();
    if (this.fd === null) return;
    fs.writeSync(this.fd, line);
    this.size += bytes;
  }

  close(): void {
    if (this.fd === null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }

  private open(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    this.fd = fs.openSync(this.filePath, 'a');
    this.size = fs.fstatSync(this.fd).size;
  }

  private rotate(): void {
    this.close();
    const oldest = `${this.filePath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const src = `${this.filePath}.${i}`;
      if (fs.existsSync(src)) fs.renameSync(src, `${this.filePath}.${i + 1}`);
    }
    if (fs.existsSync(this.filePath)) fs.renameSync(this.filePath, `${this.filePath}.1`);
    this.open();
  }
}

export class ConsoleLogger implements Logger {
  private timers = new Map<string, number>();
  private sink: RotatingFileSink | null;

  constructor(
    private level: LogLevel = 'info',
    filePath?: string,
    fileOptions: FileSinkOptions = {}
  ) {
    this.sink = filePath ? new RotatingFileSink(filePath, fileOptions) : null;
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  time(label: string): void {
    this.timers.set(label, Date.now());
    this.debug(`Timer '${label}' started`);
  }

  timeEnd(label: string): number {
    const startedAt = this.timers.get(label);
    if (startedAt === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return 0;
    }
    this.timers.delete(label);
    const duration = Date.now() - startedAt;
    this.debug(`Timer '${label}': ${duration}ms`);
    return duration;
  }

  timeLog(label: string, message?: string, ...args: unknown[]): void {
    const startedAt = this.timers.get(label);
    if (startedAt === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return;
    }
    const duration = Date.now() - startedAt;
    this.info(message ? `${message} (${duration}ms)` : `Timer '${label}': ${duration}ms`, ...args);
  }

  close(): void {
    this.sink?.close();
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
    console[level](line, ...args);
    if (this.sink) {
      const extras = args.length > 0 ? ' ' + args.map(stringify).join(' ') : '';
      this.sink.write(`${line}${extras}\n`);
    }
  }
}

function stringify(value: unknown): string {
  if (value instanceof Error) {
    return `${value.name}: ${value.message}${value.stack ? `\n${value.stack}` : ''}`;
  }
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
