import * as path from 'path';
import { PathStatus, UNMODIFIED_STATUS } from '../types/status.types';
import { RepositoryHandle } from './repository.handle';
import { StatusSnapshot, isSameOrDescendant } from './status.snapshot';
import { toPathStatus } from './status.flags';
import { IgnoreQueryError } from '../errors/git.error';
import { causeOf } from '../errors/base.error';
import { logger } from '../utils/logger.service';

/**
 * A second spelling of a directory inside the repository, e.g. `/tmp/repo`
 * for a working directory git reports as `/private/tmp/repo`
 */
export interface PathAlias {
  from: string;
  to: string;
}

/**
 * Status and ignore queries for one repository, used by the listing for every entry
 */
export class GitStatusResolver {
  private readonly handle: RepositoryHandle;
  private readonly snapshot: StatusSnapshot;
  private readonly aliases: ReadonlyArray<PathAlias>;

  constructor(handle: RepositoryHandle, snapshot: StatusSnapshot, aliases: PathAlias[] = []) {
    this.handle = handle;
    this.snapshot = snapshot;
    this.aliases = aliases
      .map(alias => ({ from: path.resolve(alias.from), to: path.resolve(alias.to) }))
      .filter(alias => alias.from !== alias.to);
  }

  public get workingDirectory(): string {
    return this.handle.workingDirectory;
  }

  /**
   * Status of a single file. Paths with no recorded change are unmodified.
   */
  public status(filePath: string): PathStatus {
    const flags = this.snapshot.find(this.normalize(filePath));
    return flags === undefined ? { ...UNMODIFIED_STATUS } : toPathStatus(flags);
  }

  /**
   * Combined status of everything under a directory: if any descendant is
   * New on a side, the directory is New on that side, and so on down the
   * priority order.
   */
  public dirStatus(dir: string): PathStatus {
    return toPathStatus(this.snapshot.combinedFlags(this.normalize(dir)));
  }

  /**
   * Whether the repository's ignore rules match the path. Relative paths are
   * taken from the working directory. Never rejects; failures read as false.
   */
  public async shouldIgnore(targetPath: string): Promise<boolean> {
    const absolutePath = this.normalize(path.resolve(this.workingDirectory, targetPath));
    try {
      return await this.handle.isIgnored(absolutePath);
    } catch (error) {
      const failure = new IgnoreQueryError('Could not evaluate ignore rules', absolutePath, causeOf(error));
      logger.debug(`${failure.code} for ${failure.path}:`, failure.describe());
      return false;
    }
  }

  /**
   * Absolute, normalized form used by the snapshot, with alias roots rewritten
   */
  public normalize(queryPath: string): string {
    const resolved = path.resolve(queryPath);
    for (const alias of this.aliases) {
      if (isSameOrDescendant(resolved, alias.from)) {
        return path.join(alias.to, path.relative(alias.from, resolved));
      }
    }
    return resolved;
  }
}
