import chalk from 'chalk';
import ora, { type Ora } from 'ora';

let verboseEnabled = false;

/**
 * Enable or disable verbose (debug) output.
 */
export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  success(message: string, ...args: unknown[]): void;
  /** Printed only in verbose mode. */
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Console logger with color-coded level prefixes.  A `scope` names the
 * pipeline stage (`toc`, `render`, `merge`, …) in brackets after the
 * level, so interleaved stage output stays attributable.
 */
export function createLogger(scope?: string): Logger {
  const tag = scope ? chalk.dim(`[${scope}]`) : undefined;
  const prefix = (level: string): string[] => (tag ? [level, tag] : [level]);

  return {
    info(message, ...args) {
      console.log(...prefix(chalk.blue('info')), message, ...args);
    },
    warn(message, ...args) {
      console.warn(...prefix(chalk.yellow('warn')), message, ...args);
    },
    error(message, ...args) {
      console.error(...prefix(chalk.red('error')), message, ...args);
    },
    success(message, ...args) {
      console.log(...prefix(chalk.green('success')), message, ...args);
    },
    debug(message, ...args) {
      if (verboseEnabled) {
        console.log(...prefix(chalk.gray('debug')), message, ...args);
      }
    },
  };
}

export const logger = createLogger();

/**
 * Create a stopped ora spinner.  In verbose mode the spinner is disabled
 * so that debug lines are not overwritten.
 */
export function createSpinner(text: string): Ora {
  return ora({ text, isEnabled: verboseEnabled ? false : undefined });
}

/**
 * Render a caught value as one line, following `cause` chains:
 * `outer: inner`.  A cause whose message the outer one already ends
 * with is not repeated.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);

  let message = error.message;
  let cause: unknown = error.cause;
  const seen = new Set<unknown>([error]);
  while (cause !== undefined && !seen.has(cause)) {
    seen.add(cause);
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    if (!message.endsWith(causeMessage)) {
      message += `: ${causeMessage}`;
    }
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return message;
}
