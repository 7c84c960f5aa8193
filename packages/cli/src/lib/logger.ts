/**
 * Console logger for chirp-build
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Numbered stage progress, success and failure marks
 * - JSON-lines output for --json
 * - Redaction of secret-looking values in debug data (tool environments)
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  json?: boolean;
}

/**
 * Keys whose values never reach the console
 */
const SENSITIVE_PATTERNS = [/api[_-]?key/i, /secret/i, /password/i, /token/i, /credential/i];

export class Logger {
  private verbose = false;
  private silent = false;
  private json = false;

  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.json = options.json ?? false;
  }

  get isJson(): boolean {
    return this.json;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose || this.silent) return;
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /**
   * Numbered pipeline stage
   */
  step(step: number, total: number, message: string): void {
    if (this.silent || this.json) return;
    console.log(pc.dim(`[${step}/${total}]`), message);
  }

  success(message: string): void {
    if (this.silent || this.json) return;
    console.log(pc.green('✓'), message);
  }

  fail(message: string): void {
    if (this.json) return;
    console.error(pc.red('✗'), message);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const redactedData = data ? redact(data) : undefined;

    if (this.json) {
      console.log(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...(redactedData && { data: redactedData }),
        })
      );
      return;
    }

    const formattedMessage = `${getPrefix(level)} ${message}`;
    if (level === 'error') {
      console.error(formattedMessage);
    } else {
      console.log(formattedMessage);
    }

    if (this.verbose && redactedData) {
      console.log(pc.dim(JSON.stringify(redactedData, null, 2)));
    }
  }
}

function getPrefix(level: LogLevel): string {
  switch (level) {
    case 'debug':
      return pc.dim('[DEBUG]');
    case 'info':
      return pc.blue('[INFO]');
    case 'warn':
      return pc.yellow('[WARN]');
    case 'error':
      return pc.red('[ERROR]');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redact(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
      redacted[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      redacted[key] = redact(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

// Singleton logger instance
export const logger = new Logger();
