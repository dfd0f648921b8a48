import { RepositoryHandle } from '../../core/repository.handle';
import { RepositorySession } from '../../core/repository.provider';
import { RawStatusEntry } from '../../types/status.types';

/**
 * Session whose isIgnored calls stay pending until released, recording overlap
 */
class GatedSession implements RepositorySession {
  public active = 0;
  public maxActive = 0;
  public readonly started: string[] = [];
  private readonly gates: Array<() => void> = [];

  public async workingDirectory(): Promise<string | null> {
    return '/repo';
  }

  public async enumerateStatuses(): Promise<RawStatusEntry[]> {
    return [];
  }

  public async isIgnored(targetPath: string): Promise<boolean> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    this.started.push(targetPath);
    await new Promise<void>(resolve => this.gates.push(resolve));
    this.active--;
    if (targetPath.endsWith('broken')) {
      throw new Error('provider failure');
    }
    return targetPath.endsWith('.log');
  }

  public releaseNext(): void {
    const gate = this.gates.shift();
    if (gate) {
      gate();
    }
  }
}

async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

describe('RepositoryHandle', () => {
  it('should expose the cached working directory', () => {
    const handle = new RepositoryHandle(new GatedSession(), '/repo');
    expect(handle.workingDirectory).toBe('/repo');
  });

  it('should run one provider call at a time in arrival order', async () => {
    const session = new GatedSession();
    const handle = new RepositoryHandle(session, '/repo');

    const first = handle.isIgnored('/repo/a.log');
    const second = handle.isIgnored('/repo/b.txt');
    const third = handle.isIgnored('/repo/c.log');

    await flush();
    expect(session.started).toEqual(['/repo/a.log']);

    session.releaseNext();
    await expect(first).resolves.toBe(true);
    await flush();
    expect(session.started).toEqual(['/repo/a.log', '/repo/b.txt']);

    session.releaseNext();
    await expect(second).resolves.toBe(false);
    await flush();

    session.releaseNext();
    await expect(third).resolves.toBe(true);

    expect(session.started).toEqual(['/repo/a.log', '/repo/b.txt', '/repo/c.log']);
    expect(session.maxActive).toBe(1);
  });

  it('should release the lock when a call rejects', async () => {
    const session = new GatedSession();
    const handle = new RepositoryHandle(session, '/repo');

    const failing = handle.isIgnored('/repo/broken');
    const next = handle.isIgnored('/repo/after.log');

    await flush();
    session.releaseNext();
    await expect(failing).rejects.toThrow('provider failure');

    await flush();
    session.releaseNext();
    await expect(next).resolves.toBe(true);
    expect(session.maxActive).toBe(1);
  });
});
