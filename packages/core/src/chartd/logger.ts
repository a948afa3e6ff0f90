/**
 * chartd Logger
 *
 * Everything goes to stderr: in stdio mode stdout carries MCP traffic.
 */

export interface LoggerOptions {
  verbose?: boolean;
  scope?: string;
  silent?: boolean;
}

export class Logger {
  private verbose: boolean;
  private silent: boolean;
  private prefix: string;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.prefix = options.scope ? `[chartd:${options.scope}]` : '[chartd]';
  }

  /** Logger for a sub-component, sharing this logger's settings */
  child(scope: string): Logger {
    return new Logger({ verbose: this.verbose, silent: this.silent, scope });
  }

  info(message: string): void {
    this.write(`${this.prefix} ${message}`);
  }

  warn(message: string): void {
    this.write(`${this.prefix} ⚠️  ${message}`);
  }

  error(message: string, error?: unknown): void {
    this.write(`${this.prefix} ❌ ${message}`);
    if (error instanceof Error && error.stack && this.verbose) {
      this.write(error.stack);
    }
  }

  success(message: string): void {
    this.write(`${this.prefix} ✓ ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.write(`${this.prefix.replace(']', ':debug]')} ${message}`);
    }
  }

  private write(line: string): void {
    if (!this.silent) console.error(line);
  }
}

/** A logger that drops everything; used where no output is wanted */
export const silentLogger = new Logger({ silent: true });
