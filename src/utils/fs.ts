import { stat, writeFile, rename, rm } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { WriteError, toError } from '../errors/index.js';

export type PathKind = 'file' | 'directory' | 'other' | 'missing';

/**
 * Classify what lives at a path. Any stat failure (missing path, a parent
 * that is a file, a symlink loop, an over-long name, no permission) reports
 * `missing`.
 */
export async function getPathKind(path: string): Promise<PathKind> {
  try {
    const pathStat = await stat(path);
    if (pathStat.isFile()) return 'file';
    if (pathStat.isDirectory()) return 'directory';
    return 'other';
  } catch {
    return 'missing';
  }
}

/**
 * Write UTF-8 text so the destination is either fully replaced or untouched.
 * The content goes to a temporary file in the destination's directory which is
 * then renamed over the target.
 *
 * @throws WriteError when any step fails; the temporary file is removed first.
 * A failed removal is kept on `WriteError.cleanupError`.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = join(
    dirname(filePath),
    `.${basename(filePath)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`
  );

  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    const cleanupError = await rm(tempPath, { force: true }).then(() => undefined, toError);
    throw new WriteError(filePath, toError(error), cleanupError);
  }
}
