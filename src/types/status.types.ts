/**
 * The single change reported for one side (staged or unstaged) of a path
 */
export enum ChangeKind {
  Unmodified = 'unmodified',
  New = 'new',
  Modified = 'modified',
  Deleted = 'deleted',
  Renamed = 'renamed',
  TypeChanged = 'typechanged',
}

/**
 * Staged and unstaged change of one file, or the aggregate of a directory
 */
export interface PathStatus {
  /** Change recorded in the index */
  staged: ChangeKind;
  /** Change in the working tree not yet staged */
  unstaged: ChangeKind;
}

/**
 * Raw status conditions as reported by the repository provider.
 * A path may carry several of them at once; combine with bitwise OR.
 */
export enum StatusFlag {
  Current = 0,
  IndexNew = 1 << 0,
  IndexModified = 1 << 1,
  IndexDeleted = 1 << 2,
  IndexRenamed = 1 << 3,
  IndexTypeChange = 1 << 4,
  WorkTreeNew = 1 << 7,
  WorkTreeModified = 1 << 8,
  WorkTreeDeleted = 1 << 9,
  WorkTreeTypeChange = 1 << 10,
  WorkTreeRenamed = 1 << 11,
  Ignored = 1 << 14,
  Conflicted = 1 << 15,
}

/**
 * Union of StatusFlag bits
 */
export type StatusFlags = number;

/**
 * One status record as enumerated by the provider, path relative to the working directory
 */
export interface RawStatusEntry {
  path: string;
  flags: StatusFlags;
}

/**
 * One snapshot record, path absolute
 */
export interface StatusSnapshotEntry {
  readonly path: string;
  readonly flags: StatusFlags;
}

export const UNMODIFIED_STATUS: Readonly<PathStatus> = Object.freeze({
  staged: ChangeKind.Unmodified,
  unstaged: ChangeKind.Unmodified,
});
