import * as path from 'path';
import { RawStatusEntry, StatusFlag, StatusFlags, StatusSnapshotEntry } from '../types/status.types';

/**
 * True when `candidate` is `dir` itself or lies beneath it, compared by whole
 * path components: `/a/bb` is not under `/a/b`. Both paths must be normalized.
 */
export function isSameOrDescendant(candidate: string, dir: string): boolean {
  if (candidate === dir) {
    return true;
  }
  const prefix = dir.endsWith(path.sep) ? dir : dir + path.sep;
  return candidate.startsWith(prefix);
}

/**
 * Point-in-time status of every non-clean path in a repository.
 *
 * Built once when the repository is opened and never updated; a fresh scan is
 * needed to see later changes. Safe to read from any number of callers.
 */
export class StatusSnapshot {
  private readonly records: ReadonlyArray<StatusSnapshotEntry>;

  private constructor(records: StatusSnapshotEntry[]) {
    this.records = Object.freeze(records.map(record => Object.freeze({ ...record })));
  }

  /**
   * Resolve provider entries against the working directory.
   * Trailing separators (collapsed untracked directories) are dropped by normalization.
   */
  public static fromEntries(workingDirectory: string, entries: RawStatusEntry[]): StatusSnapshot {
    return new StatusSnapshot(
      entries.map(entry => ({
        path: path.resolve(workingDirectory, entry.path),
        flags: entry.flags,
      })),
    );
  }

  public get size(): number {
    return this.records.length;
  }

  public entries(): ReadonlyArray<StatusSnapshotEntry> {
    return this.records;
  }

  /**
   * Raw flags of the entry recorded for exactly this absolute path
   */
  public find(absolutePath: string): StatusFlags | undefined {
    return this.records.find(record => record.path === absolutePath)?.flags;
  }

  /**
   * Union of the flags of `dir` and everything beneath it
   */
  public combinedFlags(dir: string): StatusFlags {
    return this.records
      .filter(record => isSameOrDescendant(record.path, dir))
      .reduce<StatusFlags>((combined, record) => combined | record.flags, StatusFlag.Current);
  }
}
