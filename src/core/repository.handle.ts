import { RepositorySession } from './repository.provider';

/**
 * An open repository session plus its working directory.
 *
 * The session is not safe to share, so every call into it goes through a
 * promise-chain mutex: one call in flight, later callers wait their turn in
 * arrival order. The raw session is never handed out.
 */
export class RepositoryHandle {
  private readonly session: RepositorySession;
  private readonly workdir: string;
  private tail: Promise<void> = Promise.resolve();

  constructor(session: RepositorySession, workingDirectory: string) {
    this.session = session;
    this.workdir = workingDirectory;
  }

  /**
   * Absolute working directory root, cached when the repository was opened
   */
  public get workingDirectory(): string {
    return this.workdir;
  }

  /**
   * Whether ignore rules match the path. Rejects if the provider fails.
   */
  public async isIgnored(targetPath: string): Promise<boolean> {
    return this.exclusive(session => session.isIgnored(targetPath));
  }

  private async exclusive<T>(operation: (session: RepositorySession) => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const done = new Promise<void>(resolve => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => done);

    // previous only ever resolves: each link waits on a release, never on a rejection
    await previous;
    try {
      return await operation(this.session);
    } finally {
      release();
    }
  }
}
