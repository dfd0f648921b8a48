import chalk from 'chalk';
import { ChangeKind, PathStatus } from '../types/status.types';

export const MARKERS: Readonly<Record<ChangeKind, string>> = {
  [ChangeKind.Unmodified]: '-',
  [ChangeKind.New]: 'N',
  [ChangeKind.Modified]: 'M',
  [ChangeKind.Deleted]: 'D',
  [ChangeKind.Renamed]: 'R',
  [ChangeKind.TypeChanged]: 'T',
};

/**
 * One colored character for a change kind
 */
export function formatChangeKind(kind: ChangeKind): string {
  const marker = MARKERS[kind];
  switch (kind) {
    case ChangeKind.New:
      return chalk.green(marker);
    case ChangeKind.Modified:
      return chalk.blue(marker);
    case ChangeKind.Deleted:
      return chalk.red(marker);
    case ChangeKind.Renamed:
      return chalk.yellow(marker);
    case ChangeKind.TypeChanged:
      return chalk.magenta(marker);
    case ChangeKind.Unmodified:
      return chalk.gray(marker);
  }
}

/**
 * Staged marker followed by unstaged marker, e.g. `NM`
 */
export function formatPathStatus(status: PathStatus): string {
  return formatChangeKind(status.staged) + formatChangeKind(status.unstaged);
}
