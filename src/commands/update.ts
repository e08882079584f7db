import ora from 'ora';
import { loadConfig, type UpdateConfig } from '../core/config.js';
import { createRunContext } from '../core/run-context.js';
import { TaskRunner, type RunOutcome } from '../core/task-runner.js';
import { TASKS, type Task } from '../core/tasks.js';
import { processTerminal, type TerminalMetrics } from '../core/terminal.js';
import { postUpdateDiagnostics, type Diagnostics } from '../system/diagnostics.js';
import { shellExecutor, type CommandExecutor } from '../system/executor.js';
import { unneededPackagesPrecheck, type Precheck } from '../system/unneeded-packages.js';
import { error } from '../ui/format.js';
import { RefreshLoop } from '../ui/refresh-loop.js';
import { SummaryRenderer, type OutputStream } from '../ui/summary-renderer.js';

export interface UpdateOptions {
  config?: UpdateConfig;
  tasks?: readonly Task[];
  terminal?: TerminalMetrics;
  output?: OutputStream;
  print?: (line: string) => void;
  reportError?: (message: string) => void;
  execute?: CommandExecutor;
  precheck?: Precheck;
  diagnostics?: Diagnostics;
  now?: Date;
}

// three blank lines between report sections
function printGap(print: (line: string) => void): void {
  print('');
  print('');
  print('');
}

async function printDiagnostics(diagnostics: Diagnostics, print: (line: string) => void): Promise<void> {
  const spinner = ora('Checking for restarts and rpm config changes...').start();
  const report = await diagnostics();
  spinner.stop();
  printGap(print);
  print(report);
}

/**
 * Update command — run the whole maintenance sequence under a live summary,
 * then report what the operator should look at. Resolves with the exit code.
 */
export async function updateCommand(options: UpdateOptions = {}): Promise<number> {
  const print = options.print ?? ((line: string) => console.log(line));
  const config = options.config ?? loadConfig();

  const ctx = createRunContext({
    tasks: options.tasks ?? TASKS,
    terminal: options.terminal ?? processTerminal(),
    config,
    now: options.now,
  });

  const renderer = new SummaryRenderer(ctx, options.output);
  const loop = new RefreshLoop(renderer, config.refreshIntervalMs, options.reportError);
  const runner = new TaskRunner(ctx, {
    execute: options.execute ?? shellExecutor,
    precheck: options.precheck ?? unneededPackagesPrecheck,
    onChange: () => loop.renderNow(),
  });

  let outcome: RunOutcome;
  loop.start();
  try {
    outcome = await runner.run();
  } finally {
    loop.stop();
  }
  loop.renderNow();

  // a failed refresh installed nothing
  if (outcome.ok || outcome.failure.index > 0) {
    await printDiagnostics(options.diagnostics ?? postUpdateDiagnostics, print);
  }

  printGap(print);
  if (!outcome.ok) {
    print(error(outcome.failure.message));
    print('If you want to view the log or keep it, please move it from /tmp');
    print(`Log: ${ctx.log.path}`);
    return 1;
  }

  print('Note: If you want to view the log');
  print(`Log: ${ctx.log.path}`);
  print('If you want to keep it, make sure you move it from /tmp before a reboot.');
  return 0;
}
