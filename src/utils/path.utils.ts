import * as path from 'path';
import * as fs from 'fs-extra';

/**
 * The path itself when it is a directory, else its closest existing ancestor directory
 */
export async function nearestDirectory(startingPath: string): Promise<string | null> {
  let current = path.resolve(startingPath);

  for (;;) {
    if (await fs.pathExists(current)) {
      const stats = await fs.stat(current);
      if (stats.isDirectory()) {
        return current;
      }
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Given a directory as the caller spelled it and as it really is on disk, find
 * the spelling to rewrite and what it stands for.
 *
 * `/tmp/repo/src` really being `/private/tmp/repo/src` under the working
 * directory `/private/tmp/repo` maps `/tmp/repo` to the working directory. When
 * the trailing components differ, as with a symlink `/repo/a/link` to
 * `/repo/b`, only the directory itself is mapped. Returns null when the
 * spellings agree.
 */
export function pathAlias(
  spelledDir: string,
  realDir: string,
  workingDirectory: string,
): { from: string; to: string } | null {
  const spelled = path.resolve(spelledDir);
  const real = path.resolve(realDir);
  if (spelled === real) {
    return null;
  }

  const relative = path.relative(workingDirectory, real);
  const inside =
    relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);

  if (inside) {
    const depth = relative === '' ? 0 : relative.split(path.sep).length;
    let root = spelled;
    for (let i = 0; i < depth; i++) {
      root = path.dirname(root);
    }
    if (path.join(root, relative) === spelled) {
      return { from: root, to: path.resolve(workingDirectory) };
    }
  }

  return { from: spelled, to: real };
}
