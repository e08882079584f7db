import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultConfig, type UpdateConfig } from '../core/config.js';
import type { CommandExecutor } from '../system/executor.js';
import { updateCommand, type UpdateOptions } from './update.js';

const NOW = new Date(2024, 2, 14, 6, 30, 0, 5);

function executorFailingOn(failing: string[] = []): CommandExecutor {
  return async (command, sink) => {
    sink.append(`ran ${command}\n`);
    return failing.includes(command) ? 1 : 0;
  };
}

describe('updateCommand', () => {
  let dir: string;
  let config: UpdateConfig;
  let printed: string[];
  let frames: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'full-update-cmd-'));
    config = { ...defaultConfig(), logDir: dir };
    printed = [];
    frames = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function run(overrides: UpdateOptions = {}) {
    return updateCommand({
      config,
      now: NOW,
      terminal: { rows: () => 40, columns: () => 100 },
      output: { write: (chunk: string) => frames.push(chunk) },
      print: (line) => printed.push(line),
      precheck: async () => true,
      diagnostics: async () => 'No rpm configs that need updates.',
      ...overrides,
    });
  }

  it('exits 0 and points at the log after a clean run', async () => {
    const diagnostics = vi.fn(async () => 'No programs using deleted files so reboot is probably not necessary.');
    const code = await run({ execute: executorFailingOn(), diagnostics });

    const logPath = join(dir, '2024-03-14_06-30-00-005_os-update.log');
    expect(code).toBe(0);
    expect(diagnostics).toHaveBeenCalledOnce();
    expect(printed).toEqual([
      '',
      '',
      '',
      'No programs using deleted files so reboot is probably not necessary.',
      '',
      '',
      '',
      'Note: If you want to view the log',
      `Log: ${logPath}`,
      'If you want to keep it, make sure you move it from /tmp before a reboot.',
    ]);
    expect(readFileSync(logPath, 'utf-8').split('\n')).toHaveLength(7);
    expect(frames.at(-1)).toContain('= Removing old flatpaks......[ COMPLETED ] =');
  });

  it('exits 1 with the failed task, skipped tail and log path', async () => {
    const code = await run({ execute: executorFailingOn(['zypper -n dist-upgrade']) });

    const lastFrame = frames.at(-1) ?? '';
    expect(code).toBe(1);
    expect(lastFrame).toContain('= Updating Packages..........[ COMPLETED ] =');
    expect(lastFrame).toContain('= Updating Distro............[   FAILED  ] =');
    expect(lastFrame).toContain('= Removing old dependencies..[  SKIPPED  ] =');
    expect(lastFrame).toContain('= Removing old flatpaks......[  SKIPPED  ] =');
    expect(printed.slice(-7)).toEqual([
      'No rpm configs that need updates.',
      '',
      '',
      '',
      '✗ Updating Distro failed with exit code 1',
      'If you want to view the log or keep it, please move it from /tmp',
      `Log: ${join(dir, '2024-03-14_06-30-00-005_os-update.log')}`,
    ]);
  });

  it('finishes the run and points at the log when the screen cannot be drawn', async () => {
    const reported: string[] = [];
    const write = vi.fn(() => {
      throw new Error('EPIPE: broken pipe, write');
    });
    const code = await run({
      execute: executorFailingOn(['zypper -n update']),
      output: { write },
      reportError: (message) => reported.push(message),
    });

    expect(code).toBe(1);
    expect(write).toHaveBeenCalledOnce();
    expect(reported).toEqual(['⚠ Live summary stopped: EPIPE: broken pipe, write']);
    expect(printed.slice(-3)).toEqual([
      '✗ Updating Packages failed with exit code 1',
      'If you want to view the log or keep it, please move it from /tmp',
      `Log: ${join(dir, '2024-03-14_06-30-00-005_os-update.log')}`,
    ]);
  });

  it('skips diagnostics when the very first task fails', async () => {
    const diagnostics = vi.fn(async () => 'unused');
    const code = await run({ execute: executorFailingOn(['zypper -n refresh']), diagnostics });

    expect(code).toBe(1);
    expect(diagnostics).not.toHaveBeenCalled();
  });

  it('stops the periodic redraw once the run ends', async () => {
    vi.useFakeTimers();
    try {
      await run({ execute: executorFailingOn() });
      const count = frames.length;
      vi.advanceTimersByTime(10_000);
      expect(frames).toHaveLength(count);
    } finally {
      vi.useRealTimers();
    }
  });
});
