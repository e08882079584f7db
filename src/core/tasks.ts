export const TASK_KEYS = [
  'refresh',
  'update',
  'dist_upgrade',
  'remove_deps',
  'update_flatpaks',
  'remove_flatpaks',
] as const;

export type TaskKey = (typeof TASK_KEYS)[number];

export type TaskStatus = 'pending' | 'running' | 'completed' | 'skipped' | 'failed';

export interface Task {
  key: TaskKey;
  label: string;
  command: string;
  /** Query run before the task; the task only executes when it reports work to do. */
  precheck?: string;
}

const UNNEEDED_QUERY = 'zypper packages --unneeded';

/**
 * The maintenance sequence, in execution order. Each step relies on the
 * system state the previous one leaves behind.
 */
export const TASKS: readonly Task[] = [
  { key: 'refresh', label: 'Refreshing Repos', command: 'zypper -n refresh' },
  { key: 'update', label: 'Updating Packages', command: 'zypper -n update' },
  { key: 'dist_upgrade', label: 'Updating Distro', command: 'zypper -n dist-upgrade' },
  {
    key: 'remove_deps',
    label: 'Removing old dependencies',
    command: `${UNNEEDED_QUERY} | awk -F'|' 'NR<=4 {next} {print $3}' | grep -v Name | xargs zypper -n remove --clean-deps`,
    precheck: UNNEEDED_QUERY,
  },
  { key: 'update_flatpaks', label: 'Updating flatpaks', command: 'flatpak update --system -y' },
  { key: 'remove_flatpaks', label: 'Removing old flatpaks', command: 'flatpak uninstall --unused --system -y' },
];

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  // pending -> completed covers a precheck that found nothing to do
  pending: ['running', 'skipped', 'completed'],
  running: ['completed', 'failed'],
  completed: [],
  skipped: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}
