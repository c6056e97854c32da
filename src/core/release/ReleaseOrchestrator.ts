/**
 * ReleaseOrchestrator - sequences one release run
 *
 * exporting → unpacking → snapshotting-old → snapshotting-new → diffing →
 * deciding → [noop: cleanup → done]
 *          | [bumping → mirroring → cleanup → signal-commit → done]
 *
 * The transient workspace (archive + unpacked tree) is scoped to the run and
 * removed on every exit path. The version is parsed from the freshly exported
 * manifest and bumped in the unpacked tree, so the mirror carries the new
 * version into the working tree together with the content changes.
 */

import path from 'path';
import { log } from '../../utils/logger.js';
import type { FileHasher } from '../../utils/hashUtils.js';
import { NoiseFilter, createNoiseRules } from '../../utils/noiseFilter.js';
import type { RunConfig } from '../../config/releaseConfig.js';
import { renderCommitMessage } from '../../config/releaseConfig.js';
import { buildSnapshot } from '../snapshot/ContentSnapshot.js';
import { diffSnapshots, formatDiffSummary, type DiffResult } from '../snapshot/SnapshotDiff.js';
import { parseVersion, bumpVersion, formatVersion, versionTag, type BumpKind } from '../version/Version.js';
import { VersionManifest } from '../version/VersionManifest.js';
import { mirrorTree, type MirrorReport } from '../mirror/TreeMirror.js';
import type { SolutionExporter } from '../export/SolutionExporter.js';
import type { ReleaseCommitter, CommitOutcome } from '../vcs/ReleaseCommitter.js';
import { decideRelease, type ReleaseDecisionKind } from './ReleaseDecision.js';
import { withTransientWorkspace, type TransientWorkspace } from './TransientWorkspace.js';
import { ManifestNotFoundError } from '../../errors/releaseErrors.js';

export type ReleaseState =
  | 'exporting'
  | 'unpacking'
  | 'snapshotting-old'
  | 'snapshotting-new'
  | 'diffing'
  | 'deciding'
  | 'bumping'
  | 'mirroring'
  | 'cleanup'
  | 'signal-commit'
  | 'done';

export interface ReleaseResult {
  decision: ReleaseDecisionKind;
  effectiveBump: BumpKind;
  diff: DiffResult;
  /** Version found in the export before bumping; null when not read */
  previousVersion: string | null;
  /** Resolved version after this run; null only on a noop without a manifest */
  version: string | null;
  tag: string | null;
  /** Null when the mirror did not run (noop or dry-run) */
  mirror: MirrorReport | null;
  /** Null when nothing was handed to version control */
  commit: CommitOutcome | null;
  dryRun: boolean;
  states: ReleaseState[];
}

export interface ReleaseDependencies {
  exporter: SolutionExporter;
  committer: ReleaseCommitter;
  hasher?: FileHasher;
}

/**
 * Tree-relative path of the ignore file when it lives inside the working
 * tree; the diff and the mirror leave that path alone
 */
export function ignoreFileInTree(workingDir: string, ignoreFile: string | null): string[] {
  if (!ignoreFile) {
    return [];
  }
  const relative = path.relative(workingDir, ignoreFile);
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return [];
  }
  return [relative.split(path.sep).join('/')];
}

export class ReleaseOrchestrator {
  constructor(private readonly deps: ReleaseDependencies) {}

  /**
   * Run one release against config.workingDir
   *
   * @throws ReleaseError subclasses for fatal failures; the workspace is
   *   removed before the error leaves this method
   */
  async run(config: RunConfig): Promise<ReleaseResult> {
    const states: ReleaseState[] = [];
    const enter = (state: ReleaseState): void => {
      states.push(state);
      log.info(`[RELEASE] → ${state}`);
    };

    const inner = await withTransientWorkspace(
      config.solutionName,
      config.tempRoot,
      workspace => this.runInWorkspace(config, workspace, enter),
      () => enter('cleanup')
    );

    let commit: CommitOutcome | null = null;
    if (inner.decision !== 'noop' && !config.dryRun && config.commit) {
      enter('signal-commit');
      const message = renderCommitMessage(config.commitMessage, {
        solution: config.solutionName,
        version: inner.version ?? '',
        previousVersion: inner.previousVersion ?? '',
        summary: formatDiffSummary(inner.diff)
      });
      commit = await this.deps.committer.commit({
        workingDir: config.workingDir,
        message,
        tag: config.tag && inner.tag ? inner.tag : undefined,
        push: config.push
      });
    }

    enter('done');
    return { ...inner, commit, dryRun: config.dryRun, states };
  }

  private async runInWorkspace(
    config: RunConfig,
    workspace: TransientWorkspace,
    enter: (state: ReleaseState) => void
  ): Promise<Omit<ReleaseResult, 'commit' | 'dryRun' | 'states'>> {
    const { exporter, hasher } = this.deps;
    const snapshotOptions = { hasher, retryDelayMs: config.retryDelayMs };

    enter('exporting');
    await exporter.exportSolution({
      solutionName: config.solutionName,
      managed: config.managed,
      archivePath: workspace.archivePath
    });

    enter('unpacking');
    await exporter.unpackSolution({
      archivePath: workspace.archivePath,
      targetDir: workspace.unpackDir,
      managed: config.managed
    });

    const protectedPaths = ignoreFileInTree(config.workingDir, config.noise.ignoreFile);

    // Same filter instance for both snapshots
    const filter = NoiseFilter.forDiff(createNoiseRules(config.noise), protectedPaths);
    if (config.noise.ignoreFile) {
      await filter.loadIgnoreFile(config.noise.ignoreFile);
    }

    enter('snapshotting-old');
    const oldSnapshot = await buildSnapshot(config.workingDir, filter, snapshotOptions);

    enter('snapshotting-new');
    const newSnapshot = await buildSnapshot(workspace.unpackDir, filter, snapshotOptions);

    enter('diffing');
    const diff = diffSnapshots(oldSnapshot, newSnapshot);
    log.info(`[RELEASE] ${formatDiffSummary(diff)}`);

    enter('deciding');
    const { decision, effectiveBump } = decideRelease(diff, config.bump);
    log.info(`[RELEASE] Decision: ${decision} (bump: ${effectiveBump})`);

    if (decision === 'noop') {
      const current = await this.readCurrentVersion(config, workspace.unpackDir);
      return {
        decision,
        effectiveBump,
        diff,
        previousVersion: current,
        version: current,
        tag: null,
        mirror: null
      };
    }

    enter('bumping');
    const manifest = await VersionManifest.locate(
      workspace.unpackDir,
      config.manifestFileName,
      config.versionElement
    );
    const previousText = await manifest.readVersion();
    // Parsed before anything touches the working tree
    const previous = parseVersion(previousText);
    const next = bumpVersion(previous, effectiveBump, config.prerelease);
    const version = formatVersion(next);
    log.info(`[RELEASE] Version ${formatVersion(previous)} → ${version}`);

    if (config.dryRun) {
      log.info('[RELEASE] Dry run: working tree left untouched');
      return {
        decision,
        effectiveBump,
        diff,
        previousVersion: formatVersion(previous),
        version,
        tag: versionTag(next),
        mirror: null
      };
    }

    await manifest.writeVersion(version);

    enter('mirroring');
    const mirror = await mirrorTree(workspace.unpackDir, config.workingDir, { ...snapshotOptions, protectedPaths });

    return {
      decision,
      effectiveBump,
      diff,
      previousVersion: formatVersion(previous),
      version,
      tag: versionTag(next),
      mirror
    };
  }

  /**
   * Version text of the export on a noop run, as written. Nothing is bumped,
   * so a missing manifest only means the version is unknown.
   */
  private async readCurrentVersion(config: RunConfig, unpackDir: string): Promise<string | null> {
    try {
      const manifest = await VersionManifest.locate(unpackDir, config.manifestFileName, config.versionElement);
      return await manifest.readVersion();
    } catch (error) {
      if (error instanceof ManifestNotFoundError) {
        log.debug(`[RELEASE] ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
