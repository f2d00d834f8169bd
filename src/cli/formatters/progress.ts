/**
 * Progress Formatters
 *
 * Spinner for long-running operations and duration formatting.
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Force the spinner off (e.g. under --quiet or --json) */
  enabled?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Cleaning addresses...');
 * spinner.start();
 *
 * try {
 *   await engine.run(records, { addressField });
 *   spinner.succeed('Batch complete');
 * } catch (err) {
 *   spinner.fail('Batch failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: ora.Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    const isTTY = process.stdout.isTTY === true;

    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: isTTY && options.enabled !== false,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * ```typescript
 * formatDuration(450);    // '450ms'
 * formatDuration(2500);   // '2.5s'
 * formatDuration(125000); // '2m 5s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Spinner text for batch progress: "Cleaning addresses 40/120 (33%)".
 */
export function formatProgress(label: string, completed: number, total: number): string {
  const percentage = total === 0 ? 100 : Math.round((completed / total) * 100);
  return `${label} ${completed}/${total} (${percentage}%)`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
