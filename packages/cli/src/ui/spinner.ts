/**
 * Spinner - Progress spinners
 *
 * Provides animated spinners for loads and fetches, plus one-line status
 * indicators for everything else.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import { errorMessage } from 'glyphdeck-core';

type SpinnerColor = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

/**
 * Spinner configuration options
 */
export interface SpinnerOptions {
  /** Spinner text */
  text?: string;
  /** Spinner color */
  color?: SpinnerColor;
  /** Whether to animate (false in CI mode and when stderr is not a terminal) */
  enabled?: boolean;
}

/**
 * Spinner wrapper for consistent CLI feedback
 */
export class Spinner {
  private spinner: Ora;
  private enabled: boolean;

  constructor(options: SpinnerOptions = {}) {
    this.enabled = options.enabled ?? (!process.env['CI'] && Boolean(process.stderr.isTTY));

    const baseOptions = {
      color: options.color ?? 'cyan',
      isEnabled: this.enabled,
    } as const;

    this.spinner = options.text
      ? ora({ ...baseOptions, text: options.text })
      : ora(baseOptions);
  }

  start(text?: string): this {
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    this.spinner.succeed(text);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

/**
 * Create a new spinner instance
 */
export function createSpinner(textOrOptions?: string | SpinnerOptions): Spinner {
  if (typeof textOrOptions === 'string') {
    return new Spinner({ text: textOrOptions });
  }
  return new Spinner(textOrOptions);
}

/**
 * Run an async operation with a spinner. The spinner fails with the
 * error's message unless failText says otherwise; the error is rethrown.
 */
export async function withSpinner<T>(
  text: string,
  operation: () => Promise<T>,
  options?: {
    color?: SpinnerColor;
    successText?: string | ((result: T) => string);
    failText?: string | ((error: unknown) => string);
  }
): Promise<T> {
  const spinner = createSpinner({ text, color: options?.color ?? 'cyan' });
  spinner.start();

  try {
    const result = await operation();
    const successText =
      typeof options?.successText === 'function'
        ? options.successText(result)
        : options?.successText;
    spinner.succeed(successText);
    return result;
  } catch (error) {
    const failText =
      typeof options?.failText === 'function'
        ? options.failText(error)
        : options?.failText ?? errorMessage(error);
    spinner.fail(failText);
    throw error;
  }
}

/**
 * Status indicators for non-spinner output
 */
export const status = {
  success(message: string): void {
    console.log(chalk.green('✔'), message);
  },

  error(message: string): void {
    console.log(chalk.red('✖'), message);
  },

  warning(message: string): void {
    console.log(chalk.yellow('⚠'), message);
  },

  info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  },
};
