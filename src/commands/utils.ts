/**
 * CLI Utilities
 *
 * Shared helpers for the pubtrace commands.
 *
 * @module commands/utils
 */

import { setTimeout as delay } from 'node:timers/promises';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { getErrorCode, isPubtraceError } from '../errors.js';

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Report a failed command on stderr and exit with status 1
 */
export function handleError(error: unknown): never {
  if (isPubtraceError(error)) {
    console.error(chalk.red(`Error: ${error.toDisplayString()}`));
    if (error.suggestion) {
      console.error(chalk.yellow(`Hint: ${error.suggestion}`));
    }
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Error: ${message}`));
    const code = getErrorCode(error);
    if (code) {
      console.error(`Code: ${code}`);
    }
  }

  process.exit(1);
}

// =============================================================================
// Terminal
// =============================================================================

/**
 * Checks if colors should be used in output
 *
 * Respects NO_COLOR, TERM=dumb and non-TTY stdout.
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.TERM === 'dumb') {
    return false;
  }
  return process.stdout.isTTY === true;
}

// =============================================================================
// Options
// =============================================================================

/**
 * Commander parser for non-negative integer options
 */
export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer number of milliseconds.');
  }
  return parsed;
}

// =============================================================================
// Loop control
// =============================================================================

/**
 * Simulated processing time
 */
export async function sleep(ms: number): Promise<void> {
  await delay(ms);
}

/**
 * Call `onQuit` once when `q` is typed on `input` or SIGINT arrives.
 * Returns a function that stops watching.
 */
export function watchForQuit(
  onQuit: () => void,
  input: NodeJS.ReadableStream = process.stdin
): () => void {
  let fired = false;
  const fire = (): void => {
    if (!fired) {
      fired = true;
      onQuit();
    }
  };
  const onData = (chunk: Buffer | string): void => {
    if (chunk.toString().includes('q')) {
      fire();
    }
  };

  input.on('data', onData);
  process.once('SIGINT', fire);

  return () => {
    input.off('data', onData);
    input.pause();
    process.off('SIGINT', fire);
  };
}
