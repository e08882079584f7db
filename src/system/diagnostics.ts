import { execa, ExecaError } from 'execa';

const NO_DELETED_FILES_MARKER = 'No processes using deleted files';
const RPMCONFIGCHECK_IDLE_OUTPUT = 'Searching for unresolved configuration files';

function banner(title: string): string {
  const rule = '#'.repeat(title.length + 4);
  return `${rule}\n# ${title} #\n${rule}`;
}

/**
 * Turn `zypper ps -s` output into advice on what to restart.
 */
export function describeDeletedFileUsers(output: string): string {
  if (output.includes(NO_DELETED_FILES_MARKER)) {
    return 'No programs using deleted files so reboot is probably not necessary.';
  }
  return `${banner('Programs that should be restarted')}\n${output}`;
}

/**
 * Turn `rpmconfigcheck` output into a list of config files needing a merge.
 */
export function describeRpmConfigCheck(output: string): string {
  const trimmed = output.trim();
  if (trimmed === '' || trimmed === RPMCONFIGCHECK_IDLE_OUTPUT) {
    return 'No rpm configs that need updates.';
  }
  return `${banner('rpm config check')}\n${output}`;
}

type Capture = { ok: true; output: string } | { ok: false; reason: string };

interface ToolCommand {
  file: string;
  args: string[];
}

export interface DiagnosticCommands {
  deletedFileUsers: ToolCommand;
  rpmConfigCheck: ToolCommand;
}

const DEFAULT_COMMANDS: DiagnosticCommands = {
  deletedFileUsers: { file: 'zypper', args: ['ps', '-s'] },
  rpmConfigCheck: { file: 'rpmconfigcheck', args: [] },
};

// Section separator, three blank lines.
const SECTION_GAP = '\n\n\n\n';

async function capture({ file, args }: ToolCommand): Promise<Capture> {
  const result = await execa(file, args, { reject: false });
  // no exit code: the tool never started, or was killed
  if (result instanceof ExecaError && result.exitCode === undefined) {
    return { ok: false, reason: result.shortMessage };
  }
  return { ok: true, output: result.stdout };
}

export type Diagnostics = () => Promise<string>;

/**
 * Post-update report: processes still holding deleted files, and rpm
 * config files left unmerged by the upgrade.
 */
export function createDiagnostics(commands: DiagnosticCommands = DEFAULT_COMMANDS): Diagnostics {
  return async () => {
    const processes = await capture(commands.deletedFileUsers);
    const configs = await capture(commands.rpmConfigCheck);
    const processReport = processes.ok
      ? describeDeletedFileUsers(processes.output)
      : `Could not check for programs using deleted files: ${processes.reason}`;
    const configReport = configs.ok
      ? describeRpmConfigCheck(configs.output)
      : `Could not check for unmerged rpm configs: ${configs.reason}`;
    return `${processReport}${SECTION_GAP}${configReport}`;
  };
}

export const postUpdateDiagnostics: Diagnostics = createDiagnostics();
