import { UnknownTaskError } from './errors.js';
import type { Task, TaskStatus } from './tasks.js';

export interface BoardEntry {
  task: Task;
  status: TaskStatus;
}

export class StatusBoard {
  private readonly statuses = new Map<string, TaskStatus>();

  constructor(private readonly tasks: readonly Task[]) {
    for (const task of tasks) {
      this.statuses.set(task.key, 'pending');
    }
  }

  get(key: string): TaskStatus {
    const status = this.statuses.get(key);
    if (status === undefined) throw new UnknownTaskError(key);
    return status;
  }

  set(key: string, status: TaskStatus): void {
    if (!this.statuses.has(key)) throw new UnknownTaskError(key);
    this.statuses.set(key, status);
  }

  /**
   * Current status of every task, in sequence order.
   */
  snapshot(): BoardEntry[] {
    return this.tasks.map((task) => ({ task, status: this.get(task.key) }));
  }
}
