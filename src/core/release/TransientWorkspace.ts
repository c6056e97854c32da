/**
 * Transient workspace for one release run: holds the exported archive and
 * the directory it is unpacked into. Acquired and released as a scope; the
 * release runs on every exit path and its own failures are only logged.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { log } from '../../utils/logger.js';
import { errorMessage } from '../../errors/releaseErrors.js';

export interface TransientWorkspace {
  /** Temporary root owning everything below */
  root: string;
  /** Where the export collaborator writes the archive */
  archivePath: string;
  /** Where the archive is unpacked; created by the unpack step */
  unpackDir: string;
}

const WORKSPACE_PREFIX = 'solution-snapshot-';

/**
 * Run `body` with a fresh transient workspace, removing it afterwards
 * whether `body` resolves or throws
 *
 * @param tempRoot - Parent directory for the workspace (defaults to os.tmpdir())
 * @param onCleanup - Invoked after cleanup has been attempted
 */
export async function withTransientWorkspace<T>(
  solutionName: string,
  tempRoot: string | undefined,
  body: (workspace: TransientWorkspace) => Promise<T>,
  onCleanup?: () => void
): Promise<T> {
  const parent = tempRoot ?? os.tmpdir();
  await fs.mkdir(parent, { recursive: true });
  const root = await fs.mkdtemp(path.join(parent, WORKSPACE_PREFIX));

  const safeName = solutionName.replace(/[^A-Za-z0-9_.-]/g, '_');
  const workspace: TransientWorkspace = {
    root,
    archivePath: path.join(root, `${safeName}.zip`),
    unpackDir: path.join(root, 'unpacked')
  };

  log.debug(`[WORKSPACE] Acquired ${root}`);

  try {
    return await body(workspace);
  } finally {
    await releaseWorkspace(workspace);
    onCleanup?.();
  }
}

/**
 * Remove the workspace. Failures are logged and never thrown.
 */
async function releaseWorkspace(workspace: TransientWorkspace): Promise<void> {
  try {
    await fs.rm(workspace.root, { recursive: true, force: true });
    log.debug(`[WORKSPACE] Released ${workspace.root}`);
  } catch (error) {
    log.warn(`[WORKSPACE] Failed to remove ${workspace.root}: ${errorMessage(error)}`);
  }
}
