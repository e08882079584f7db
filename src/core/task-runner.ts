import type { CommandExecutor } from '../system/executor.js';
import type { Precheck } from '../system/unneeded-packages.js';
import { InvalidTransitionError, TaskFailure, UnknownTaskError } from './errors.js';
import type { RunContext } from './run-context.js';
import { canTransition, type Task, type TaskStatus } from './tasks.js';

export type RunOutcome = { ok: true } | { ok: false; failure: TaskFailure };

export interface TaskRunnerDeps {
  execute: CommandExecutor;
  precheck: Precheck;
  /** Called after every status change so the display can catch up at once. */
  onChange: () => void;
}

/**
 * Runs the fixed task sequence one command at a time. The first nonzero exit
 * fails that task, skips every later one and ends the run.
 */
export class TaskRunner {
  constructor(
    private readonly ctx: Pick<RunContext, 'tasks' | 'board' | 'log'>,
    private readonly deps: TaskRunnerDeps,
  ) {}

  async run(): Promise<RunOutcome> {
    const { tasks } = this.ctx;
    for (let index = 0; index < tasks.length; index++) {
      const task = tasks[index];

      if (task.precheck && !(await this.deps.precheck(task.precheck))) {
        // nothing to do counts as done
        this.advance(task, 'completed');
        this.deps.onChange();
        continue;
      }

      const failure = await this.runTask(index);
      if (failure) {
        return { ok: false, failure };
      }
    }
    return { ok: true };
  }

  /**
   * Execute one task's command. Resolves with the failure when the command
   * exits nonzero, after the rest of the sequence has been skipped.
   */
  async runTask(index: number): Promise<TaskFailure | null> {
    const task = this.taskAt(index);

    this.advance(task, 'running');
    this.deps.onChange();

    const exitCode = await this.deps.execute(task.command, this.ctx.log);

    if (exitCode === 0) {
      this.advance(task, 'completed');
      this.deps.onChange();
      return null;
    }

    this.advance(task, 'failed');
    this.skipAfter(index);
    this.deps.onChange();
    return new TaskFailure(task, index, exitCode);
  }

  private skipAfter(index: number): void {
    const { tasks } = this.ctx;
    for (let next = index + 1; next < tasks.length; next++) {
      this.advance(tasks[next], 'skipped');
    }
  }

  private advance(task: Task, status: TaskStatus): void {
    const current = this.ctx.board.get(task.key);
    if (!canTransition(current, status)) {
      throw new InvalidTransitionError(task.key, current, status);
    }
    this.ctx.board.set(task.key, status);
  }

  private taskAt(index: number): Task {
    const task = this.ctx.tasks[index];
    if (!task) throw new UnknownTaskError(`#${index}`);
    return task;
  }
}
