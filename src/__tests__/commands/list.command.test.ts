import * as path from 'path';
import * as fs from 'fs-extra';
import * as os from 'os';
import { ListCommand } from '../../commands/list.command';
import { DirectoryReadError } from '../../errors/listing.error';
import { ConfigValidationError } from '../../core/config.manager';
import { CONFIG_FILE_NAME } from '../../types/config.types';
import { ChangeKind, StatusFlag } from '../../types/status.types';
import { MemoryProvider } from '../helpers/memory.provider';

describe('ListCommand', () => {
  let tempDir: string;

  beforeEach(async () => {
    // realpath so the provider sees the same spelling as the listing
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'gitmarks-list-')));
    await fs.ensureDir(path.join(tempDir, 'src'));
    await fs.ensureDir(path.join(tempDir, 'dist'));
    await fs.writeFile(path.join(tempDir, 'src', 'index.ts'), 'export {};');
    await fs.writeFile(path.join(tempDir, 'README.md'), '# readme');
    await fs.writeFile(path.join(tempDir, 'notes.txt'), 'notes');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  function provider(ignored: string[] = []): MemoryProvider {
    return new MemoryProvider({
      root: tempDir,
      statuses: [
        { path: 'README.md', flags: StatusFlag.WorkTreeModified },
        { path: 'src/index.ts', flags: StatusFlag.IndexNew | StatusFlag.WorkTreeModified },
      ],
      ignored: ignored.map(name => path.join(tempDir, name)),
    });
  }

  it('should prefix each entry with its staged and unstaged markers', async () => {
    const result = await new ListCommand(tempDir, provider()).execute();

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.message).toBe(['-M README.md', '-- dist/', '-- notes.txt', 'NM src/'].join('\n'));
  });

  it('should return the listed entries as data', async () => {
    const result = await new ListCommand(tempDir, provider()).execute();
    expect(result.data.find(entry => entry.name === 'src')).toEqual({
      name: 'src',
      isDirectory: true,
      status: { staged: ChangeKind.New, unstaged: ChangeKind.Modified },
    });
  });

  it('should hide ignored entries when asked', async () => {
    const result = await new ListCommand(tempDir, provider(['dist', 'notes.txt'])).execute({
      gitIgnore: true,
    });

    expect(result.message).toBe(['-M README.md', 'NM src/'].join('\n'));
  });

  it('should keep ignored entries by default', async () => {
    const result = await new ListCommand(tempDir, provider(['dist'])).execute();

    expect(result.message).toContain('-- dist/');
  });

  it('should hide ignored entries when the config file says so', async () => {
    await fs.writeJson(path.join(tempDir, CONFIG_FILE_NAME), { hideIgnored: true });

    const result = await new ListCommand(tempDir, provider(['dist', CONFIG_FILE_NAME])).execute();

    expect(result.message).toBe(['-M README.md', '-- notes.txt', 'NM src/'].join('\n'));
  });

  it('should list without markers outside a repository', async () => {
    const result = await new ListCommand(tempDir, new MemoryProvider(null)).execute();

    expect(result.success).toBe(true);
    expect(result.message).toBe(['README.md', 'dist/', 'notes.txt', 'src/'].join('\n'));
  });

  it('should skip discovery when git is turned off', async () => {
    const repoProvider = provider();
    const discoverSpy = jest.spyOn(repoProvider, 'discover');

    const result = await new ListCommand(tempDir, repoProvider).execute({ git: false });

    expect(discoverSpy).not.toHaveBeenCalled();
    expect(result.message).toBe(['README.md', 'dist/', 'notes.txt', 'src/'].join('\n'));
  });

  it('should still list when the repository status cannot be read', async () => {
    const broken = new MemoryProvider({ root: tempDir, statusError: new Error('corrupt index') });

    const result = await new ListCommand(tempDir, broken).execute();

    expect(result.message).toBe(['README.md', 'dist/', 'notes.txt', 'src/'].join('\n'));
  });

  it('should fail on a directory that cannot be read', async () => {
    const missing = path.join(tempDir, 'missing');

    await expect(new ListCommand(missing, provider()).execute()).rejects.toBeInstanceOf(
      DirectoryReadError,
    );
  });

  it('should fail on an invalid config file', async () => {
    await fs.writeJson(path.join(tempDir, CONFIG_FILE_NAME), { untrackedFiles: 42 });

    await expect(new ListCommand(tempDir, provider()).execute()).rejects.toBeInstanceOf(
      ConfigValidationError,
    );
  });
});
