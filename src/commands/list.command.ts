import * as path from 'path';
import * as fs from 'fs-extra';
import { CommandOptions, CommandResult } from '../types/config.types';
import { PathStatus } from '../types/status.types';
import { ConfigManager } from '../core/config.manager';
import { RepositoryProvider } from '../core/repository.provider';
import { GitStatusResolver } from '../core/status.resolver';
import { scan } from '../core/discovery';
import { DirectoryReadError } from '../errors/listing.error';
import { causeOf } from '../errors/base.error';
import { formatPathStatus } from '../utils/status.markers';
import { logger, LogLevel } from '../utils/logger.service';

/**
 * One listed directory entry
 */
export interface ListedEntry {
  name: string;
  isDirectory: boolean;
  /** Null when the directory is not inside a repository */
  status: PathStatus | null;
}

export interface ListResult extends CommandResult {
  data: ListedEntry[];
}

/**
 * Lists a directory with staged and unstaged markers in front of each entry
 */
export class ListCommand {
  private readonly directory: string;
  private readonly provider?: RepositoryProvider | undefined;

  constructor(directory?: string, provider?: RepositoryProvider) {
    this.directory = path.resolve(directory || process.cwd());
    this.provider = provider;
  }

  public async execute(options: CommandOptions = {}): Promise<ListResult> {
    if (options.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }

    const settings = await new ConfigManager(this.directory).load();
    const dirents = await this.readDirectory();

    const resolver =
      options.git === false ? null : await scan(this.directory, { provider: this.provider, settings });
    if (!resolver) {
      logger.debug(`Listing ${this.directory} without git status`);
    }

    const hideIgnored = options.gitIgnore ?? settings.hideIgnored;
    const entries: ListedEntry[] = [];

    for (const dirent of dirents) {
      const fullPath = path.join(this.directory, dirent.name);
      const isDirectory = dirent.isDirectory();

      if (resolver && hideIgnored && (await resolver.shouldIgnore(fullPath))) {
        logger.debug(`Hiding ignored ${fullPath}`);
        continue;
      }

      entries.push({
        name: dirent.name,
        isDirectory,
        status: resolver ? this.statusOf(resolver, fullPath, isDirectory) : null,
      });
    }

    return {
      success: true,
      message: entries.map(entry => this.formatEntry(entry)).join('\n'),
      data: entries,
      exitCode: 0,
    };
  }

  private async readDirectory(): Promise<fs.Dirent[]> {
    try {
      const dirents = await fs.readdir(this.directory, { withFileTypes: true });
      return dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    } catch (error) {
      throw new DirectoryReadError(`Cannot read directory ${this.directory}`, causeOf(error));
    }
  }

  private statusOf(resolver: GitStatusResolver, fullPath: string, isDirectory: boolean): PathStatus {
    return isDirectory ? resolver.dirStatus(fullPath) : resolver.status(fullPath);
  }

  private formatEntry(entry: ListedEntry): string {
    const name = entry.isDirectory ? `${entry.name}/` : entry.name;
    return entry.status ? `${formatPathStatus(entry.status)} ${name}` : name;
  }
}
