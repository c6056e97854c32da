/**
 * ContentSnapshot - content-addressed map of a directory tree
 *
 * Maps every regular file under a root (root-relative, forward slashes) to the
 * SHA-256 of its bytes, skipping whatever the supplied NoiseFilter excludes.
 *
 * Key behaviors:
 * - Missing root → empty snapshot (first run, no working tree yet)
 * - Transient lock on read → one retry, then IOFailureError naming the path
 * - Symlinks and other non-regular entries are ignored
 */

import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import { log } from '../../utils/logger.js';
import { sha256FileHasher, type FileHasher } from '../../utils/hashUtils.js';
import { NoiseFilter } from '../../utils/noiseFilter.js';
import { IOFailureError, errnoCode, errorMessage } from '../../errors/releaseErrors.js';

/**
 * Relative path → content digest. Immutable once built.
 */
export type ContentSnapshot = ReadonlyMap<string, string>;

/**
 * Error codes treated as a transient lock held by another process
 */
export const TRANSIENT_LOCK_CODES: readonly string[] = ['EBUSY', 'EAGAIN', 'EPERM', 'EACCES'];

export const DEFAULT_RETRY_DELAY_MS = 200;

export interface SnapshotOptions {
  hasher?: FileHasher;
  /** Delay before the single retry of a locked file */
  retryDelayMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw new IOFailureError('stat', dirPath, errorMessage(error));
  }
}

/**
 * Recursively collect root-relative file paths that pass the filter
 */
async function walkFiles(
  rootAbs: string,
  relDir: string,
  filter: NoiseFilter,
  out: string[]
): Promise<void> {
  const dirAbs = relDir ? path.join(rootAbs, relDir) : rootAbs;
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirAbs, { withFileTypes: true });
  } catch (error) {
    throw new IOFailureError('read directory', dirAbs, errorMessage(error));
  }

  for (const entry of entries) {
    const rel = relDir ? `${relDir}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      if (filter.shouldPruneDirectory(rel)) {
        log.debug(`[SNAPSHOT] Skipping directory: ${rel}`);
        continue;
      }
      await walkFiles(rootAbs, rel, filter, out);
    } else if (entry.isFile()) {
      const result = filter.filter(rel);
      if (result.skip) {
        log.debug(`[SNAPSHOT] Excluding file: ${rel} (${result.reason})`);
        continue;
      }
      out.push(rel);
    }
  }
}

/**
 * Hash a file, retrying exactly once when the failure looks like a transient lock
 */
async function hashWithRetry(
  hasher: FileHasher,
  absPath: string,
  relPath: string,
  retryDelayMs: number
): Promise<string> {
  try {
    return await hasher.hashFile(absPath);
  } catch (firstError) {
    const code = errnoCode(firstError);
    if (!code || !TRANSIENT_LOCK_CODES.includes(code)) {
      throw new IOFailureError('read', relPath, errorMessage(firstError));
    }

    log.warn(`[SNAPSHOT] ${relPath} is locked (${code}), retrying once in ${retryDelayMs}ms`);
    await sleep(retryDelayMs);

    try {
      return await hasher.hashFile(absPath);
    } catch (secondError) {
      throw new IOFailureError('read', relPath, `still locked after retry: ${errorMessage(secondError)}`);
    }
  }
}

/**
 * Build a ContentSnapshot of a directory tree
 *
 * @param rootDir - Tree to snapshot (may not exist)
 * @param filter - Path filter; must be the same instance for both sides of a diff
 * @throws IOFailureError when a file cannot be read
 */
export async function buildSnapshot(
  rootDir: string,
  filter: NoiseFilter,
  options: SnapshotOptions = {}
): Promise<ContentSnapshot> {
  const hasher = options.hasher ?? sha256FileHasher;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const rootAbs = path.resolve(rootDir);

  if (!(await directoryExists(rootAbs))) {
    log.info(`[SNAPSHOT] ${rootAbs} does not exist, using empty snapshot`);
    return new Map();
  }

  const relPaths: string[] = [];
  await walkFiles(rootAbs, '', filter, relPaths);
  relPaths.sort();

  const snapshot = new Map<string, string>();
  for (const rel of relPaths) {
    const abs = path.join(rootAbs, ...rel.split('/'));
    snapshot.set(rel, await hashWithRetry(hasher, abs, rel, retryDelayMs));
  }

  log.debug(`[SNAPSHOT] ${rootAbs}: ${snapshot.size} file(s)`);
  return snapshot;
}

/**
 * Whether two snapshots hold exactly the same paths and digests
 */
export function snapshotsEqual(a: ContentSnapshot, b: ContentSnapshot): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [relPath, digest] of a) {
    if (b.get(relPath) !== digest) {
      return false;
    }
  }
  return true;
}
