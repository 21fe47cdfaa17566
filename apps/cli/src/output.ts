/**
 * chalk-based console output for the jot CLI.
 */

import chalk from 'chalk';
import type { Outcome, SessionEvent } from '@jot/core';

// --- Session output ---

/** Print a rendered outcome: errors in red, confirmations in green */
export function printOutcome(outcome: Outcome, lines: readonly string[]): void {
  const [head, ...rest] = lines;
  if (head === undefined) return;

  switch (outcome.type) {
    case 'failed':
      for (const line of lines) error(line);
      return;
    case 'added':
    case 'deleted':
    case 'marked':
      success(head);
      break;
    default:
      info(head);
  }
  for (const line of rest) info(line);
}

export function printSessionEvent(event: SessionEvent): void {
  switch (event.type) {
    case 'outcome': printOutcome(event.outcome, event.lines); break;
    case 'saved': info(chalk.dim(`Saved ${event.count} task(s) to ${event.path}`)); break;
    case 'save-failed': error(event.error.message); break;
  }
}

export function printWarnings(warnings: readonly string[]): void {
  for (const w of warnings) warning(w);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
