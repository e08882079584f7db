import type { Task, TaskStatus } from './tasks.js';

export class UnknownTaskError extends Error {
  constructor(readonly key: string) {
    super(`Unknown task: "${key}"`);
    this.name = 'UnknownTaskError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(readonly key: string, readonly from: TaskStatus, readonly to: TaskStatus) {
    super(`Task "${key}" cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * A task's command exited nonzero. Terminal for the whole run.
 */
export class TaskFailure extends Error {
  constructor(readonly task: Task, readonly index: number, readonly exitCode: number) {
    super(`${task.label} failed with exit code ${exitCode}`);
    this.name = 'TaskFailure';
  }
}

export class ConfigError extends Error {
  constructor(readonly path: string, detail: string) {
    super(`Invalid config at ${path}: ${detail}`);
    this.name = 'ConfigError';
  }
}
