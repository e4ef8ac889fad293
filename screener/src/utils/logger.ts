import chalk from 'chalk';
import { ConsoleLogger } from '@niftywatch/providers';
import type { Signal } from '../types/index.ts';

export function colorSignal(signal: Signal): string {
  switch (signal) {
    case 'Buy':
      return chalk.green(signal);
    case 'Sell':
      return chalk.red(signal);
    default:
      return chalk.gray(signal);
  }
}

/**
 * CLI logger: the shared console logger plus screen output helpers
 */
class ScreenLogger extends ConsoleLogger {
  ticker(symbol: string, rsi: number, signal: Signal): void {
    console.log(
      `  ${chalk.bold(symbol.padEnd(14))} ` +
        `RSI ${rsi.toFixed(1).padStart(5)}  ${colorSignal(signal)}`
    );
  }

  divider(): void {
    console.log(chalk.gray('─'.repeat(60)));
  }

  header(title: string): void {
    console.log();
    console.log(chalk.bold.cyan(title));
    this.divider();
  }
}

export const logger = new ScreenLogger();
