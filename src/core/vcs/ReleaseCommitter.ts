/**
 * ReleaseCommitter - port for the version-control hand-off
 *
 * Receives the working tree after the mirror step. `git status` is used only
 * to list what is being handed over, never to decide whether a release
 * happened; that decision is made from content hashes before this point.
 *
 * Never invokes history rewriting (reset, rebase, amend) or conflict resolution.
 */

import path from 'path';
import { log } from '../../utils/logger.js';
import { execCommand, runChecked, type CommandRunner } from '../../utils/processRunner.js';

export interface CommitRequest {
  /** Working tree to stage (may be a subdirectory of the repository) */
  workingDir: string;
  message: string;
  /** Tag to create, e.g. v1.2.3; omitted when tagging is disabled */
  tag?: string;
  push: boolean;
}

export interface CommitOutcome {
  /** Working-tree paths differing from the last commit, repository-relative */
  changedPaths: string[];
  committed: boolean;
  commitSha?: string;
  tag?: string;
  pushed: boolean;
}

export interface ReleaseCommitter {
  commit(request: CommitRequest): Promise<CommitOutcome>;
}

/**
 * Parse `git status --porcelain` output into paths.
 * Renames ("R  old -> new") report the new path; quoted paths are unquoted.
 */
export function parsePorcelainStatus(output: string): string[] {
  const paths: string[] = [];
  for (const line of output.split('\n')) {
    if (line.length < 4) continue;
    let entry = line.slice(3);
    const arrow = entry.indexOf(' -> ');
    if (arrow !== -1) {
      entry = entry.slice(arrow + 4);
    }
    if (entry.startsWith('"') && entry.endsWith('"')) {
      entry = entry.slice(1, -1);
    }
    paths.push(entry);
  }
  return paths;
}

export class GitReleaseCommitter implements ReleaseCommitter {
  constructor(private readonly runner: CommandRunner = execCommand) {}

  private git(args: string[], cwd: string): Promise<string> {
    return runChecked(this.runner, 'git', args, cwd);
  }

  async commit(request: CommitRequest): Promise<CommitOutcome> {
    const { message, tag, push } = request;
    const workingDir = path.resolve(request.workingDir);

    // Porcelain paths are repository-relative whatever the cwd; '.' scopes
    // every command to the working tree
    const status = await this.git(['status', '--porcelain', '--untracked-files=all', '--', '.'], workingDir);
    const changedPaths = parsePorcelainStatus(status);

    if (changedPaths.length === 0) {
      log.info(`[GIT] Nothing to commit under ${workingDir}`);
      return { changedPaths, committed: false, pushed: false };
    }

    log.info(`[GIT] Committing ${changedPaths.length} path(s) under ${workingDir}`);
    await this.git(['add', '-A', '--', '.'], workingDir);
    await this.git(['commit', '-m', message, '--', '.'], workingDir);
    const commitSha = (await this.git(['rev-parse', 'HEAD'], workingDir)).trim();

    if (tag) {
      await this.git(['tag', tag], workingDir);
      log.info(`[GIT] Tagged ${tag}`);
    }

    if (push) {
      await this.git(['push'], workingDir);
      if (tag) {
        await this.git(['push', 'origin', tag], workingDir);
      }
      log.info(`[GIT] Pushed${tag ? ` with ${tag}` : ''}`);
    }

    log.info(`[GIT] Committed ${commitSha.slice(0, 7)} - ${message}`);
    return { changedPaths, committed: true, commitSha, tag, pushed: push };
  }
}
