import * as path from 'path';
import { simpleGit, SimpleGit, SimpleGitOptions, StatusResult } from 'simple-git';
import { DEFAULT_SETTINGS, GitmarksSettings } from '../types/config.types';
import { RawStatusEntry } from '../types/status.types';
import { RepositoryProvider, RepositorySession } from './repository.provider';
import { flagsFromPorcelain } from './status.flags';
import { causeOf } from '../errors/base.error';
import { logger } from '../utils/logger.service';
import { nearestDirectory } from '../utils/path.utils';

/**
 * Settings the provider reads
 */
export type SimpleGitProviderSettings = Pick<
  GitmarksSettings,
  'untrackedFiles' | 'gitBinary' | 'timeoutMs'
>;

/**
 * The part of simple-git the provider drives
 */
export type GitClient = Pick<SimpleGit, 'checkIsRepo' | 'revparse' | 'status' | 'raw'>;

export type GitClientFactory = (options: Partial<SimpleGitOptions>) => GitClient;

/**
 * Session over one simple-git instance rooted inside a repository
 */
export class SimpleGitSession implements RepositorySession {
  private readonly git: GitClient;
  private readonly settings: SimpleGitProviderSettings;

  constructor(git: GitClient, settings: SimpleGitProviderSettings) {
    this.git = git;
    this.settings = settings;
  }

  public async workingDirectory(): Promise<string | null> {
    try {
      const toplevel = (await this.git.revparse(['--show-toplevel'])).trim();
      return toplevel ? path.resolve(toplevel) : null;
    } catch (error) {
      // bare repositories and the inside of .git have no toplevel
      logger.debug('No working directory:', causeOf(error));
      return null;
    }
  }

  public async enumerateStatuses(): Promise<RawStatusEntry[]> {
    const status: StatusResult = await this.git.status([
      `--untracked-files=${this.settings.untrackedFiles}`,
    ]);

    return status.files.map(file => ({
      path: file.path,
      flags: flagsFromPorcelain(file.index, file.working_dir),
    }));
  }

  public async isIgnored(targetPath: string): Promise<boolean> {
    // --no-index: match the rules even for paths that are already tracked
    const output = await this.git.raw(['check-ignore', '--no-index', '--', targetPath]);
    return output.trim().length > 0;
  }
}

/**
 * Repository provider backed by the git command line through simple-git
 */
export class SimpleGitProvider implements RepositoryProvider {
  private readonly settings: SimpleGitProviderSettings;
  private readonly createClient: GitClientFactory;

  constructor(
    settings: Partial<SimpleGitProviderSettings> = {},
    createClient: GitClientFactory = simpleGit,
  ) {
    this.createClient = createClient;
    this.settings = {
      untrackedFiles: settings.untrackedFiles ?? DEFAULT_SETTINGS.untrackedFiles,
      gitBinary: settings.gitBinary ?? DEFAULT_SETTINGS.gitBinary,
      timeoutMs: settings.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs,
    };
  }

  public async discover(startingPath: string): Promise<RepositorySession | null> {
    const baseDir = await nearestDirectory(startingPath);
    if (!baseDir) {
      return null;
    }

    const git = this.createClient({
      baseDir,
      binary: this.settings.gitBinary,
      maxConcurrentProcesses: 1,
      timeout: { block: this.settings.timeoutMs },
    });

    if (!(await git.checkIsRepo())) {
      logger.debug(`No git repository at or above ${baseDir}`);
      return null;
    }

    return new SimpleGitSession(git, this.settings);
  }
}
