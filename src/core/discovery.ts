import * as fs from 'fs-extra';
import { RepositoryProvider } from './repository.provider';
import { RepositoryHandle } from './repository.handle';
import { SimpleGitProvider, SimpleGitProviderSettings } from './simple-git.provider';
import { StatusSnapshot } from './status.snapshot';
import { GitStatusResolver, PathAlias } from './status.resolver';
import {
  RepositoryNotFoundError,
  StatusEnumerationError,
  WorkingDirectoryError,
} from '../errors/git.error';
import { BaseError, causeOf } from '../errors/base.error';
import { nearestDirectory, pathAlias } from '../utils/path.utils';
import { logger } from '../utils/logger.service';

export interface ScanOptions {
  /** Defaults to a SimpleGitProvider built from `settings` */
  provider?: RepositoryProvider;
  settings?: Partial<SimpleGitProviderSettings>;
}

/**
 * Find the repository enclosing `startingPath` and snapshot its status.
 *
 * Git awareness is optional for a listing, so this never rejects: no
 * repository, a bare repository, or any failure while reading statuses all
 * give null.
 */
export async function scan(
  startingPath: string,
  options: ScanOptions = {},
): Promise<GitStatusResolver | null> {
  const provider = options.provider ?? new SimpleGitProvider(options.settings);

  try {
    return await open(provider, startingPath);
  } catch (error) {
    if (error instanceof BaseError) {
      logger.debug(`Git status unavailable (${error.code}):`, error.describe());
    } else {
      logger.debug('Git status unavailable:', causeOf(error));
    }
    return null;
  }
}

async function open(provider: RepositoryProvider, startingPath: string): Promise<GitStatusResolver> {
  const session = await provider.discover(startingPath);
  if (!session) {
    throw new RepositoryNotFoundError(`No repository encloses ${startingPath}`);
  }

  const workingDirectory = await session.workingDirectory();
  if (!workingDirectory) {
    throw new WorkingDirectoryError(`Repository for ${startingPath} has no working directory`);
  }
  logger.debug(`Got working directory ${workingDirectory}`);

  let snapshot: StatusSnapshot;
  try {
    snapshot = StatusSnapshot.fromEntries(workingDirectory, await session.enumerateStatuses());
  } catch (error) {
    throw new StatusEnumerationError('Failed to read repository status', causeOf(error));
  }
  logger.debug(`Recorded ${snapshot.size} path(s) with changes`);

  const aliases = await findAliases(startingPath, workingDirectory);
  return new GitStatusResolver(new RepositoryHandle(session, workingDirectory), snapshot, aliases);
}

async function findAliases(startingPath: string, workingDirectory: string): Promise<PathAlias[]> {
  const spelledDir = await nearestDirectory(startingPath);
  if (!spelledDir) {
    return [];
  }

  const alias = pathAlias(spelledDir, await fs.realpath(spelledDir), workingDirectory);
  return alias ? [alias] : [];
}
