/**
 * SolutionExporter - port for the export/unpack collaborator
 *
 * The release engine treats both calls as opaque, blocking and
 * exit-code-reporting. There is no internal timeout; a caller needing
 * cancellation wraps the process runner.
 */

import { promises as fs } from 'fs';
import { log } from '../../utils/logger.js';
import { execCommand, runChecked, type CommandRunner } from '../../utils/processRunner.js';
import { CollaboratorFailureError } from '../../errors/releaseErrors.js';

export interface ExportRequest {
  solutionName: string;
  managed: boolean;
  /** Archive file to create */
  archivePath: string;
}

export interface UnpackRequest {
  archivePath: string;
  /** Directory to unpack into */
  targetDir: string;
  managed: boolean;
}

export interface SolutionExporter {
  exportSolution(request: ExportRequest): Promise<void>;
  unpackSolution(request: UnpackRequest): Promise<void>;
}

export const DEFAULT_EXPORT_COMMAND = 'pac';

/**
 * Power Platform CLI implementation
 *
 * pac solution export --name <n> --path <zip> --managed <bool> --overwrite
 * pac solution unpack --zipfile <zip> --folder <dir> --packagetype <Managed|Unmanaged>
 */
export class PacSolutionExporter implements SolutionExporter {
  constructor(
    private readonly command: string = DEFAULT_EXPORT_COMMAND,
    private readonly runner: CommandRunner = execCommand
  ) {}

  async exportSolution(request: ExportRequest): Promise<void> {
    const { solutionName, managed, archivePath } = request;
    log.info(`[EXPORT] Exporting ${solutionName} (${managed ? 'managed' : 'unmanaged'})`);

    await runChecked(this.runner, this.command, [
      'solution', 'export',
      '--name', solutionName,
      '--path', archivePath,
      '--managed', String(managed),
      '--overwrite'
    ]);

    // Exit code 0 without an archive still means the export did not happen
    const stat = await fs.stat(archivePath).catch(() => null);
    if (!stat || !stat.isFile()) {
      throw new CollaboratorFailureError(
        `${this.command} solution export`,
        0,
        `no archive written to ${archivePath}`
      );
    }
    log.debug(`[EXPORT] Archive written: ${archivePath} (${stat.size} bytes)`);
  }

  async unpackSolution(request: UnpackRequest): Promise<void> {
    const { archivePath, targetDir, managed } = request;
    log.info(`[EXPORT] Unpacking into ${targetDir}`);

    await runChecked(this.runner, this.command, [
      'solution', 'unpack',
      '--zipfile', archivePath,
      '--folder', targetDir,
      '--packagetype', managed ? 'Managed' : 'Unmanaged',
      '--allowDelete', 'true',
      '--allowWrite', 'true'
    ]);
  }
}
