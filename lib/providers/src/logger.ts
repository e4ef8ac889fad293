import chalk from 'chalk';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

const LOG_PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue('ℹ'),
  success: chalk.green('✓'),
  warn: chalk.yellow('⚠'),
  error: chalk.red('✗'),
  debug: chalk.gray('⋯'),
};

const LOG_STYLES: Record<LogLevel, (text: string) => string> = {
  info: (text) => text,
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  debug: chalk.gray,
};

/**
 * Logging contract for provider and engine modules. Callers inject one;
 * modules default to `silentLogger`.
 */
export interface ProviderLogger {
  info(message: string, ...args: unknown[]): void;
  success(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Prefixed console output. Errors go to stderr, debug only when verbose.
 * Applications subclass it to add their own output helpers.
 */
export class ConsoleLogger implements ProviderLogger {
  protected verbose = false;

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  protected write(level: LogLevel, message: string, args: unknown[]): void {
    const line = `${LOG_PREFIXES[level]} ${LOG_STYLES[level](message)}`;
    if (level === 'error') {
      console.error(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  success(message: string, ...args: unknown[]): void {
    this.write('success', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) this.write('debug', message, args);
  }
}

export const silentLogger: ProviderLogger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
