#!/usr/bin/env node

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { ReleaseConfigManager, type ConfigLayer } from './config/releaseConfig.js';
import { ReleaseOrchestrator, type ReleaseResult } from './core/release/ReleaseOrchestrator.js';
import { PacSolutionExporter } from './core/export/SolutionExporter.js';
import { GitReleaseCommitter } from './core/vcs/ReleaseCommitter.js';
import { formatDiffSummary } from './core/snapshot/SnapshotDiff.js';
import { parseBumpKind } from './core/version/Version.js';
import { ConfigError, ReleaseError, errorMessage } from './errors/releaseErrors.js';
import { log } from './utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL_MIRROR = 2;

export interface CliArgs {
  overrides: ConfigLayer;
  configPath?: string;
  help: boolean;
}

export const HELP_TEXT = `Usage: solution-snapshot --solution <name> [options]

Export a solution, compare it with the working tree by content, and when it
changed bump the manifest version and mirror the export into the tree.

Options:
  -s, --solution <name>     Solution to export (required)
  -w, --working-dir <dir>   Working tree to compare and update (default: ./<solution>)
      --managed             Export as managed
  -b, --bump <kind>         none | patch | minor | major (default: none)
      --prerelease <label>  Prerelease label for the new version
      --manifest <file>     Manifest file name (default: Solution.xml)
  -c, --config <file>       JSON config file (default: ./solution-snapshot.json if present)
      --no-commit           Do not hand the result to git
      --no-tag              Do not tag the release commit
      --push                Push the commit and tag
  -m, --message <template>  Commit message; {solution} {version} {previousVersion} {summary}
      --dry-run             Report what would happen without touching the working tree
  -h, --help                Show this help

Exit codes: 0 success or nothing to do, 1 failure, 2 mirror applied partially.
`;

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  '--solution', '-s',
  '--working-dir', '-w',
  '--managed',
  '--bump', '-b',
  '--prerelease',
  '--manifest',
  '--config', '-c',
  '--no-commit',
  '--no-tag',
  '--push',
  '--message', '-m',
  '--dry-run',
  '--help', '-h'
]);

/**
 * Parse command line arguments (without node and script path)
 *
 * @throws ConfigError for unknown flags or missing values
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { overrides: {}, help: false };
  const overrides = result.overrides;

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    // A value may start with '-', but not be another option
    if (value === undefined || KNOWN_FLAGS.has(value)) {
      throw new ConfigError(flag, value ?? '', 'a value');
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--solution':
      case '-s':
        overrides.solutionName = valueOf(arg, i++);
        break;
      case '--working-dir':
      case '-w':
        overrides.workingDir = valueOf(arg, i++);
        break;
      case '--managed':
        overrides.managed = true;
        break;
      case '--bump':
      case '-b':
        overrides.bump = parseBumpKind(valueOf(arg, i++));
        break;
      case '--prerelease':
        overrides.prerelease = valueOf(arg, i++);
        break;
      case '--manifest':
        overrides.manifestFileName = valueOf(arg, i++);
        break;
      case '--config':
      case '-c':
        result.configPath = valueOf(arg, i++);
        break;
      case '--no-commit':
        overrides.commit = false;
        break;
      case '--no-tag':
        overrides.tag = false;
        break;
      case '--push':
        overrides.push = true;
        break;
      case '--message':
      case '-m':
        overrides.commitMessage = valueOf(arg, i++);
        break;
      case '--dry-run':
        overrides.dryRun = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new ConfigError('argument', arg, 'a known option (see --help)');
    }
  }

  return result;
}

/**
 * Human-readable run summary for stdout
 */
export function formatResult(result: ReleaseResult): string {
  const lines = [
    `Decision: ${result.decision}${result.dryRun ? ' (dry run)' : ''}`,
    `Changes:  ${formatDiffSummary(result.diff)}`
  ];

  if (result.version !== null) {
    lines.push(
      result.previousVersion !== null && result.previousVersion !== result.version
        ? `Version:  ${result.previousVersion} → ${result.version}`
        : `Version:  ${result.version}`
    );
  }

  if (result.mirror) {
    const { copied, deleted, removedDirectories, failed } = result.mirror;
    lines.push(
      `Mirror:   ${copied.length} copied, ${deleted.length} deleted, ` +
      `${removedDirectories.length} dir(s) removed, ${failed.length} failed`
    );
    for (const failure of failed) {
      lines.push(`  ! ${failure.operation} ${failure.path}: ${failure.message}`);
    }
  }

  if (result.commit) {
    lines.push(
      result.commit.committed
        ? `Commit:   ${result.commit.commitSha ?? ''}${result.commit.tag ? ` (${result.commit.tag})` : ''}`
        : 'Commit:   nothing to commit'
    );
  }

  return lines.join('\n');
}

export function exitCodeFor(result: ReleaseResult): number {
  return result.mirror && !result.mirror.complete ? EXIT_PARTIAL_MIRROR : EXIT_OK;
}

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(HELP_TEXT);
      return EXIT_OK;
    }

    const config = await ReleaseConfigManager.load({
      cli: args.overrides,
      configPath: args.configPath,
      env: process.env,
      cwd: process.cwd()
    });

    log.info(`[CLI] ${config.solutionName} → ${config.workingDir}`);

    const orchestrator = new ReleaseOrchestrator({
      exporter: new PacSolutionExporter(config.exportCommand),
      committer: new GitReleaseCommitter()
    });

    const result = await orchestrator.run(config);
    console.log(formatResult(result));
    return exitCodeFor(result);
  } catch (error) {
    if (error instanceof ReleaseError) {
      log.error(`[${error.code}] ${error.message}`);
    } else {
      log.error(`Unexpected failure: ${errorMessage(error)}`);
    }
    return EXIT_FAILURE;
  }
}

/**
 * Whether the script node was started with is this module, following the
 * symlink npm installs for `bin`
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === fileURLToPath(moduleUrl);
  } catch (error) {
    log.debug(`[CLI] Cannot resolve ${scriptPath}: ${errorMessage(error)}`);
    return false;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  main().then(code => {
    process.exitCode = code;
  }).catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(EXIT_FAILURE);
  });
}
