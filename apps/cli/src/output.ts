/**
 * chalk-based terminal output. The only place the CLI writes to the console.
 */

import chalk from 'chalk';
import { renderTask } from '@dolist/core';
import type { ListedTask, MutationResult } from '@dolist/core';

// --- Formatting ---

/** `3. [ ] Pay rent (Priority: Low)`; completed tasks dimmed */
export function formatListedTask({ position, task }: ListedTask): string {
  const line = renderTask(task);
  return `${position}. ${task.completed ? chalk.dim(line) : line}`;
}

export function heading(title: string): void {
  console.log(chalk.bold(title));
}

export function rule(width: number): void {
  console.log(chalk.dim('-'.repeat(width)));
}

// --- Result output ---

export function printResult(result: MutationResult): void {
  switch (result.type) {
    case 'success':
      success(result.message);
      break;
    case 'unsaved':
      success(result.message);
      warning(`Warning: ${result.error.message}. The tasks file may be out of date.`);
      break;
    case 'invalid':
      error(`Error: ${result.error.message}`);
      break;
    case 'out-of-range':
      error('Error: Invalid task number. Please try again.');
      break;
  }
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
