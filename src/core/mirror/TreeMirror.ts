/**
 * TreeMirror - one-directional sync of a source tree into a destination tree
 *
 * Makes the destination's file set and contents identical to the source:
 * - Files missing or differing in the destination are copied
 * - Files absent from the source are deleted, and directories they leave
 *   empty are removed
 * - Files already identical are not touched (no metadata churn)
 * - .git and any extra protected paths are never touched
 *
 * NOT ATOMIC: each file operation stands alone. A failing path is recorded in
 * the report and the mirror moves on; nothing already applied is rolled back.
 * Callers decide what a partial mirror means for them.
 *
 * Idempotent: running again with unchanged inputs performs zero operations.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../../utils/logger.js';
import type { FileHasher } from '../../utils/hashUtils.js';
import { NoiseFilter } from '../../utils/noiseFilter.js';
import { buildSnapshot } from '../snapshot/ContentSnapshot.js';
import { diffSnapshots } from '../snapshot/SnapshotDiff.js';
import { IOFailureError, errnoCode, errorMessage } from '../../errors/releaseErrors.js';

export type MirrorOperation = 'copy' | 'delete' | 'remove-directory';

export interface MirrorFailure {
  path: string;
  operation: MirrorOperation;
  message: string;
}

export interface MirrorReport {
  /** Relative paths written into the destination */
  copied: string[];
  /** Relative paths removed from the destination */
  deleted: string[];
  /** Relative directories removed after becoming empty */
  removedDirectories: string[];
  failed: MirrorFailure[];

  /** File system operations attempted, successful or not */
  operations: number;
  /** False when any path failed; the destination is then partially mirrored */
  complete: boolean;
}

export interface MirrorOptions {
  hasher?: FileHasher;
  retryDelayMs?: number;
  /** Root-relative paths left alone on both sides, besides .git */
  protectedPaths?: readonly string[];
}

function toAbsolute(root: string, relPath: string): string {
  return path.join(root, ...relPath.split('/'));
}

/**
 * Mirror sourceDir into destDir
 *
 * @throws IOFailureError when the source is missing or either tree cannot be
 *   scanned; per-file failures during apply are reported, not thrown
 */
export async function mirrorTree(
  sourceDir: string,
  destDir: string,
  options: MirrorOptions = {}
): Promise<MirrorReport> {
  const sourceAbs = path.resolve(sourceDir);
  const destAbs = path.resolve(destDir);

  const sourceStat = await fs.stat(sourceAbs).catch(() => null);
  if (!sourceStat || !sourceStat.isDirectory()) {
    throw new IOFailureError('mirror from', sourceAbs, 'source directory does not exist');
  }

  const filter = NoiseFilter.forMirror(options.protectedPaths);
  const snapshotOptions = { hasher: options.hasher, retryDelayMs: options.retryDelayMs };
  const sourceSnapshot = await buildSnapshot(sourceAbs, filter, snapshotOptions);
  const destSnapshot = await buildSnapshot(destAbs, filter, snapshotOptions);

  // Old = destination, new = source
  const plan = diffSnapshots(destSnapshot, sourceSnapshot);

  const report: MirrorReport = {
    copied: [],
    deleted: [],
    removedDirectories: [],
    failed: [],
    operations: 0,
    complete: true
  };

  if (plan.isEmpty) {
    log.info(`[MIRROR] ${destAbs} already matches ${sourceAbs}`);
    return report;
  }

  log.info(`[MIRROR] Applying: +${plan.added.length} ~${plan.changed.length} -${plan.removed.length}`);

  // Deletes first so a file can replace a directory of the same name
  for (const relPath of plan.removed) {
    report.operations++;
    try {
      await fs.unlink(toAbsolute(destAbs, relPath));
      report.deleted.push(relPath);
      log.debug(`[MIRROR] Deleted: ${relPath}`);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        report.deleted.push(relPath);
        continue;
      }
      report.failed.push({ path: relPath, operation: 'delete', message: errorMessage(error) });
    }
  }

  await removeEmptyParents(destAbs, report.deleted, report);

  for (const relPath of [...plan.added, ...plan.changed].sort()) {
    report.operations++;
    const target = toAbsolute(destAbs, relPath);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(toAbsolute(sourceAbs, relPath), target);
      report.copied.push(relPath);
      log.debug(`[MIRROR] Copied: ${relPath}`);
    } catch (error) {
      report.failed.push({ path: relPath, operation: 'copy', message: errorMessage(error) });
    }
  }

  report.complete = report.failed.length === 0;

  if (!report.complete) {
    log.warn(
      `[MIRROR] ${report.failed.length} path(s) failed; ${report.copied.length + report.deleted.length} ` +
      `change(s) already applied are kept (mirror is not atomic)`
    );
    for (const failure of report.failed) {
      log.warn(`[MIRROR]   ${failure.operation} ${failure.path}: ${failure.message}`);
    }
  }

  log.info(
    `[MIRROR] Done: ${report.copied.length} copied, ${report.deleted.length} deleted, ` +
    `${report.removedDirectories.length} dir(s) removed, ${report.failed.length} failed`
  );

  return report;
}

/**
 * Remove directories emptied by deletions, deepest first, stopping at the
 * destination root or the first non-empty directory
 */
async function removeEmptyParents(destAbs: string, deleted: string[], report: MirrorReport): Promise<void> {
  const candidates = new Set<string>();
  for (const relPath of deleted) {
    let dir = path.posix.dirname(relPath);
    while (dir !== '.' && dir !== '') {
      candidates.add(dir);
      dir = path.posix.dirname(dir);
    }
  }

  const ordered = [...candidates].sort((a, b) => b.split('/').length - a.split('/').length || a.localeCompare(b));

  for (const relDir of ordered) {
    const dirAbs = toAbsolute(destAbs, relDir);
    let entries: string[];
    try {
      entries = await fs.readdir(dirAbs);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        report.operations++;
        report.failed.push({ path: relDir, operation: 'remove-directory', message: errorMessage(error) });
      }
      continue;
    }
    if (entries.length > 0) {
      continue;
    }

    report.operations++;
    try {
      await fs.rmdir(dirAbs);
      report.removedDirectories.push(relDir);
      log.debug(`[MIRROR] Removed empty directory: ${relDir}`);
    } catch (error) {
      report.failed.push({ path: relDir, operation: 'remove-directory', message: errorMessage(error) });
    }
  }
}
