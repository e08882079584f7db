import { execa } from 'execa';

export interface OutputSink {
  append(chunk: Buffer | string): void;
  flush(): void;
}

export type CommandExecutor = (command: string, sink: OutputSink) => Promise<number>;

/**
 * Run a command line through the shell, streaming stdout and stderr
 * (interleaved as produced) into the sink. Resolves with the exit code;
 * never rejects on a nonzero exit.
 */
export const shellExecutor: CommandExecutor = async (command, sink) => {
  const subprocess = execa(command, {
    shell: true,
    all: true,
    buffer: false,
    reject: false,
    stdin: 'ignore',
  });

  subprocess.all?.on('data', (chunk: Buffer | string) => sink.append(chunk));

  const result = await subprocess;
  sink.flush();

  // killed by a signal or never started
  return result.exitCode ?? 1;
};
