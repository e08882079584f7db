import { join } from 'path';
import type { UpdateConfig } from './config.js';
import { LogSink } from './log-sink.js';
import { StatusBoard } from './status-board.js';
import type { Task } from './tasks.js';
import type { TerminalMetrics } from './terminal.js';

/**
 * Everything one invocation shares between the task flow and the display.
 */
export interface RunContext {
  id: string;
  startedAt: Date;
  tasks: readonly Task[];
  board: StatusBoard;
  log: LogSink;
  terminal: TerminalMetrics;
  config: UpdateConfig;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Local timestamp like 2024-05-01_13-45-09-123, used to name the run's log.
 */
export function formatRunId(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}-${pad(date.getMilliseconds(), 3)}`;
}

export function getLogPath(logDir: string, runId: string): string {
  return join(logDir, `${runId}_os-update.log`);
}

export function createRunContext(options: {
  tasks: readonly Task[];
  terminal: TerminalMetrics;
  config: UpdateConfig;
  now?: Date;
}): RunContext {
  const startedAt = options.now ?? new Date();
  const id = formatRunId(startedAt);
  return {
    id,
    startedAt,
    tasks: options.tasks,
    board: new StatusBoard(options.tasks),
    log: new LogSink(getLogPath(options.config.logDir, id)),
    terminal: options.terminal,
    config: options.config,
  };
}
