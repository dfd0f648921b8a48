import { RepositoryProvider, RepositorySession } from '../../core/repository.provider';
import { RawStatusEntry } from '../../types/status.types';

export interface MemoryRepository {
  /** Paths at or below this root discover the repository */
  root: string;
  /** Null models a bare repository */
  workingDirectory?: string | null;
  statuses?: RawStatusEntry[];
  /** Absolute paths the ignore rules match */
  ignored?: string[];
  statusError?: Error;
  ignoreError?: Error;
}

/**
 * In-process stand-in for a git repository
 */
export class MemorySession implements RepositorySession {
  public readonly ignoreCalls: string[] = [];

  constructor(private readonly repo: MemoryRepository) {}

  public async workingDirectory(): Promise<string | null> {
    return this.repo.workingDirectory === undefined ? this.repo.root : this.repo.workingDirectory;
  }

  public async enumerateStatuses(): Promise<RawStatusEntry[]> {
    if (this.repo.statusError) {
      throw this.repo.statusError;
    }
    return this.repo.statuses ?? [];
  }

  public async isIgnored(targetPath: string): Promise<boolean> {
    this.ignoreCalls.push(targetPath);
    if (this.repo.ignoreError) {
      throw this.repo.ignoreError;
    }
    return (this.repo.ignored ?? []).includes(targetPath);
  }
}

export class MemoryProvider implements RepositoryProvider {
  public session: MemorySession | null = null;

  constructor(private readonly repo: MemoryRepository | null) {}

  public async discover(startingPath: string): Promise<RepositorySession | null> {
    if (!this.repo) {
      return null;
    }
    const root = this.repo.root;
    if (startingPath !== root && !startingPath.startsWith(root.endsWith('/') ? root : `${root}/`)) {
      return null;
    }
    this.session = new MemorySession(this.repo);
    return this.session;
  }
}
