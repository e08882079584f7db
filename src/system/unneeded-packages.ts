import { execa } from 'execa';

// two lines of loading chatter, then the table header and its rule
const PREAMBLE_LINES = 4;
const NAME_COLUMN = 2;

/**
 * Extract package names from `zypper packages --unneeded` table output.
 *
 * S | Repository | Name    | Version | Arch
 * --+------------+---------+---------+-------
 * i | repo-oss   | libfoo1 | 1.2-1.1 | x86_64
 */
export function parseUnneededPackages(output: string): string[] {
  return output
    .split('\n')
    .slice(PREAMBLE_LINES)
    .map((line) => (line.split('|')[NAME_COLUMN] ?? '').trim())
    .filter((name) => name !== '' && !name.includes('Name'));
}

export type Precheck = (command: string) => Promise<boolean>;

/**
 * Run a non-destructive package query and report whether it lists anything
 * to remove.
 */
export const unneededPackagesPrecheck: Precheck = async (command) => {
  const result = await execa(command, { shell: true, reject: false });
  return parseUnneededPackages(result.stdout).length > 0;
};
