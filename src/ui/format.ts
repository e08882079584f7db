import chalk from 'chalk';
import type { TaskStatus } from '../core/tasks.js';

export function warn(msg: string): string {
  return chalk.yellow(`⚠ ${msg}`);
}

export function error(msg: string): string {
  return chalk.red(`✗ ${msg}`);
}

export function info(msg: string): string {
  return chalk.dim(`  ${msg}`);
}

// Summary box

export const boxText = chalk.bgBlue.white;

const STATUS_TEXT: Record<TaskStatus, string> = {
  pending: ' PENDING ',
  running: ' RUNNING ',
  completed: 'COMPLETED',
  skipped: ' SKIPPED ',
  failed: '  FAILED ',
};

const STATUS_STYLE: Record<TaskStatus, (text: string) => string> = {
  pending: chalk.bgBlack.white,
  running: chalk.bgYellow.black,
  completed: chalk.bgGreen.white,
  skipped: boxText,
  failed: chalk.bgRed.white,
};

/**
 * Fixed-width status cell. Every status is nine characters so the box
 * border lines up whatever state a task is in.
 */
export function statusCell(status: TaskStatus): string {
  return STATUS_STYLE[status](STATUS_TEXT[status]);
}
