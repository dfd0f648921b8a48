import { ChangeKind, PathStatus, StatusFlag, StatusFlags } from '../types/status.types';

/**
 * Priority tables reducing a raw flag set to one change kind per side.
 *
 * Evaluated top to bottom, first match wins: a file that is new in the index and
 * modified afterwards still reads as New. The order between Renamed and
 * TypeChanged carries no meaning of its own but is part of the output contract,
 * so keep it.
 */
export const INDEX_PRIORITY: ReadonlyArray<readonly [StatusFlag, ChangeKind]> = [
  [StatusFlag.IndexNew, ChangeKind.New],
  [StatusFlag.IndexModified, ChangeKind.Modified],
  [StatusFlag.IndexDeleted, ChangeKind.Deleted],
  [StatusFlag.IndexRenamed, ChangeKind.Renamed],
  [StatusFlag.IndexTypeChange, ChangeKind.TypeChanged],
];

export const WORK_TREE_PRIORITY: ReadonlyArray<readonly [StatusFlag, ChangeKind]> = [
  [StatusFlag.WorkTreeNew, ChangeKind.New],
  [StatusFlag.WorkTreeModified, ChangeKind.Modified],
  [StatusFlag.WorkTreeDeleted, ChangeKind.Deleted],
  [StatusFlag.WorkTreeRenamed, ChangeKind.Renamed],
  [StatusFlag.WorkTreeTypeChange, ChangeKind.TypeChanged],
];

function reduce(
  flags: StatusFlags,
  table: ReadonlyArray<readonly [StatusFlag, ChangeKind]>,
): ChangeKind {
  for (const [flag, kind] of table) {
    if ((flags & flag) !== 0) {
      return kind;
    }
  }
  return ChangeKind.Unmodified;
}

export function indexStatus(flags: StatusFlags): ChangeKind {
  return reduce(flags, INDEX_PRIORITY);
}

export function workTreeStatus(flags: StatusFlags): ChangeKind {
  return reduce(flags, WORK_TREE_PRIORITY);
}

export function toPathStatus(flags: StatusFlags): PathStatus {
  return { staged: indexStatus(flags), unstaged: workTreeStatus(flags) };
}

const INDEX_CODES: Readonly<Record<string, StatusFlag>> = {
  A: StatusFlag.IndexNew,
  C: StatusFlag.IndexNew,
  M: StatusFlag.IndexModified,
  D: StatusFlag.IndexDeleted,
  R: StatusFlag.IndexRenamed,
  T: StatusFlag.IndexTypeChange,
};

const WORK_TREE_CODES: Readonly<Record<string, StatusFlag>> = {
  '?': StatusFlag.WorkTreeNew,
  M: StatusFlag.WorkTreeModified,
  D: StatusFlag.WorkTreeDeleted,
  R: StatusFlag.WorkTreeRenamed,
  T: StatusFlag.WorkTreeTypeChange,
};

function isUnmerged(index: string, workingDir: string): boolean {
  return (
    index === 'U' ||
    workingDir === 'U' ||
    (index === 'A' && workingDir === 'A') ||
    (index === 'D' && workingDir === 'D')
  );
}

/**
 * Convert the two status letters of `git status --porcelain` into raw flags
 */
export function flagsFromPorcelain(index: string, workingDir: string): StatusFlags {
  const x = index.trim();
  const y = workingDir.trim();

  if (x === '!' && y === '!') {
    return StatusFlag.Ignored;
  }
  if (isUnmerged(x, y)) {
    return StatusFlag.Conflicted;
  }

  let flags: StatusFlags = StatusFlag.Current;
  flags |= INDEX_CODES[x] ?? StatusFlag.Current;
  flags |= WORK_TREE_CODES[y] ?? StatusFlag.Current;
  return flags;
}
