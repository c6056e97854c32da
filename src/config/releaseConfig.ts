import { promises as fs } from 'fs';
import path from 'path';
import { ConfigError, errnoCode, errorMessage } from '../errors/releaseErrors.js';
import { parseBumpKind, type BumpKind } from '../core/version/Version.js';
import { DEFAULT_MANIFEST_FILE, DEFAULT_VERSION_ELEMENT } from '../core/version/VersionManifest.js';
import { DEFAULT_EXPORT_COMMAND } from '../core/export/SolutionExporter.js';
import { DEFAULT_RETRY_DELAY_MS } from '../core/snapshot/ContentSnapshot.js';
import { DEFAULT_NOISE_SUFFIXES, DEFAULT_NOISE_IGNORE_FILE } from '../utils/noiseFilter.patterns.js';
import { log } from '../utils/logger.js';

/**
 * Noise configuration as written in the config file
 */
export interface NoiseConfig {
  suffixes: readonly string[];
  regexes: readonly string[];
  globs: readonly string[];
  /** gitignore-style file with extra noise patterns; null disables it */
  ignoreFile: string | null;
}

/**
 * Immutable per-run configuration. Built once from defaults, config file,
 * environment and CLI flags, then frozen and passed to every component.
 */
export interface RunConfig {
  readonly solutionName: string;
  readonly managed: boolean;
  /** Absolute path of the working tree the export is mirrored into */
  readonly workingDir: string;
  readonly bump: BumpKind;
  /** Empty when no prerelease override was requested */
  readonly prerelease: string;
  readonly manifestFileName: string;
  readonly versionElement: string;
  readonly noise: Readonly<NoiseConfig>;
  readonly exportCommand: string;
  /** Parent of the transient workspace; undefined means os.tmpdir() */
  readonly tempRoot?: string;
  readonly retryDelayMs: number;
  readonly commit: boolean;
  readonly tag: boolean;
  readonly push: boolean;
  /** Template with {solution} {version} {previousVersion} {summary} */
  readonly commitMessage: string;
  readonly dryRun: boolean;
}

/**
 * Values any layer may supply; later layers win
 */
export type ConfigLayer = {
  -readonly [K in Exclude<keyof RunConfig, 'noise'>]?: RunConfig[K];
} & {
  noise?: Partial<NoiseConfig>;
};

export const DEFAULT_CONFIG_FILE = 'solution-snapshot.json';

export const DEFAULT_COMMIT_MESSAGE = 'Release {solution} {version}';

/**
 * Default configuration template
 */
const DEFAULT_CONFIG: Omit<RunConfig, 'solutionName' | 'workingDir'> = {
  managed: false,
  bump: 'none',
  prerelease: '',
  manifestFileName: DEFAULT_MANIFEST_FILE,
  versionElement: DEFAULT_VERSION_ELEMENT,
  noise: {
    suffixes: DEFAULT_NOISE_SUFFIXES,
    regexes: [],
    globs: [],
    ignoreFile: DEFAULT_NOISE_IGNORE_FILE
  },
  exportCommand: DEFAULT_EXPORT_COMMAND,
  retryDelayMs: DEFAULT_RETRY_DELAY_MS,
  commit: true,
  tag: true,
  push: false,
  commitMessage: DEFAULT_COMMIT_MESSAGE,
  dryRun: false
};

// ============================================================================
// Field validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(field: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new ConfigError(field, value, 'a string');
  }
  return value;
}

function expectNonEmptyString(field: string, value: unknown): string {
  const text = expectString(field, value).trim();
  if (text.length === 0) {
    throw new ConfigError(field, value, 'a non-empty string');
  }
  return text;
}

function expectBoolean(field: string, value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigError(field, value, 'true or false');
  }
  return value;
}

function expectStringArray(field: string, value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(field, value, 'an array of strings');
  }
  return [...value];
}

function expectDelay(field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(field, value, 'a non-negative integer (milliseconds)');
  }
  return value;
}

/**
 * Validate a parsed config file object into a layer
 */
export function parseConfigObject(raw: unknown): ConfigLayer {
  if (!isRecord(raw)) {
    throw new ConfigError('config file', raw, 'a JSON object');
  }

  const layer: ConfigLayer = {};

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'solutionName':
        layer.solutionName = expectNonEmptyString(key, value);
        break;
      case 'managed':
        layer.managed = expectBoolean(key, value);
        break;
      case 'workingDir':
        layer.workingDir = expectNonEmptyString(key, value);
        break;
      case 'bump':
        layer.bump = parseBumpKind(expectString(key, value));
        break;
      case 'prerelease':
        layer.prerelease = expectString(key, value).trim();
        break;
      case 'manifestFileName':
        layer.manifestFileName = expectNonEmptyString(key, value);
        break;
      case 'versionElement':
        layer.versionElement = expectNonEmptyString(key, value);
        break;
      case 'exportCommand':
        layer.exportCommand = expectNonEmptyString(key, value);
        break;
      case 'tempRoot':
        layer.tempRoot = expectNonEmptyString(key, value);
        break;
      case 'retryDelayMs':
        layer.retryDelayMs = expectDelay(key, value);
        break;
      case 'commit':
        layer.commit = expectBoolean(key, value);
        break;
      case 'tag':
        layer.tag = expectBoolean(key, value);
        break;
      case 'push':
        layer.push = expectBoolean(key, value);
        break;
      case 'commitMessage':
        layer.commitMessage = expectNonEmptyString(key, value);
        break;
      case 'dryRun':
        layer.dryRun = expectBoolean(key, value);
        break;
      case 'noise':
        layer.noise = parseNoiseObject(value);
        break;
      default:
        log.warn(`[CONFIG] Ignoring unknown key "${key}"`);
    }
  }

  return layer;
}

function parseNoiseObject(raw: unknown): Partial<NoiseConfig> {
  if (!isRecord(raw)) {
    throw new ConfigError('noise', raw, 'an object');
  }

  const noise: Partial<NoiseConfig> = {};
  if (raw.suffixes !== undefined) noise.suffixes = expectStringArray('noise.suffixes', raw.suffixes);
  if (raw.regexes !== undefined) noise.regexes = expectStringArray('noise.regexes', raw.regexes);
  if (raw.globs !== undefined) noise.globs = expectStringArray('noise.globs', raw.globs);
  if (raw.ignoreFile !== undefined) {
    noise.ignoreFile = raw.ignoreFile === null ? null : expectNonEmptyString('noise.ignoreFile', raw.ignoreFile);
  }
  return noise;
}

/**
 * Environment overrides:
 * - SNAPSHOT_EXPORT_COMMAND: export/unpack CLI (default pac)
 * - SNAPSHOT_TEMP_ROOT: parent of the transient workspace
 * - SNAPSHOT_RETRY_DELAY_MS: delay before retrying a locked file
 */
export function readEnvironment(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};

  if (env.SNAPSHOT_EXPORT_COMMAND) {
    layer.exportCommand = env.SNAPSHOT_EXPORT_COMMAND;
  }
  if (env.SNAPSHOT_TEMP_ROOT) {
    layer.tempRoot = env.SNAPSHOT_TEMP_ROOT;
  }
  if (env.SNAPSHOT_RETRY_DELAY_MS) {
    const parsed = Number(env.SNAPSHOT_RETRY_DELAY_MS);
    layer.retryDelayMs = expectDelay('SNAPSHOT_RETRY_DELAY_MS', Number.isNaN(parsed) ? env.SNAPSHOT_RETRY_DELAY_MS : parsed);
  }

  return layer;
}

/**
 * Replace {solution}, {version}, {previousVersion} and {summary} in a template.
 * Unknown placeholders are left as written.
 */
export function renderCommitMessage(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

/**
 * Configuration loader
 */
export class ReleaseConfigManager {
  /**
   * Read a JSON config file into a layer
   *
   * @param required - When false a missing file yields an empty layer
   */
  static async loadFile(filePath: string, required: boolean): Promise<ConfigLayer> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (!required && errnoCode(error) === 'ENOENT') {
        return {};
      }
      throw new ConfigError('config file', filePath, `a readable file (${errorMessage(error)})`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError('config file', filePath, `valid JSON (${errorMessage(error)})`);
    }

    log.debug(`[CONFIG] Loaded ${filePath}`);
    return parseConfigObject(parsed);
  }

  /**
   * Merge layers over the defaults and freeze the result.
   * Relative paths resolve against `cwd`, except the ignore file, which
   * resolves against the working tree.
   *
   * @throws ConfigError when no solution name is given
   */
  static resolve(layers: ConfigLayer[], cwd: string): RunConfig {
    const pick = <T>(select: (layer: ConfigLayer) => T | undefined): T | undefined => {
      let value: T | undefined;
      for (const layer of layers) {
        const candidate = select(layer);
        if (candidate !== undefined) value = candidate;
      }
      return value;
    };

    const solutionName = pick((l) => l.solutionName);
    if (!solutionName) {
      throw new ConfigError('solutionName', solutionName ?? '', 'a solution name (--solution)');
    }

    const tempRoot = pick((l) => l.tempRoot);
    // null disables the ignore file, so it cannot fall through to the default
    const ignoreSetting = pick((l) => l.noise?.ignoreFile);
    const ignoreFile = ignoreSetting === undefined ? DEFAULT_CONFIG.noise.ignoreFile : ignoreSetting;

    const workingDir = path.resolve(cwd, pick((l) => l.workingDir) ?? solutionName);

    const config: RunConfig = {
      solutionName,
      managed: pick((l) => l.managed) ?? DEFAULT_CONFIG.managed,
      workingDir,
      bump: pick((l) => l.bump) ?? DEFAULT_CONFIG.bump,
      prerelease: pick((l) => l.prerelease) ?? DEFAULT_CONFIG.prerelease,
      manifestFileName: pick((l) => l.manifestFileName) ?? DEFAULT_CONFIG.manifestFileName,
      versionElement: pick((l) => l.versionElement) ?? DEFAULT_CONFIG.versionElement,
      noise: Object.freeze({
        suffixes: Object.freeze([...(pick((l) => l.noise?.suffixes) ?? DEFAULT_CONFIG.noise.suffixes)]),
        regexes: Object.freeze([...(pick((l) => l.noise?.regexes) ?? DEFAULT_CONFIG.noise.regexes)]),
        globs: Object.freeze([...(pick((l) => l.noise?.globs) ?? DEFAULT_CONFIG.noise.globs)]),
        ignoreFile: ignoreFile === null ? null : path.resolve(workingDir, ignoreFile)
      }),
      exportCommand: pick((l) => l.exportCommand) ?? DEFAULT_CONFIG.exportCommand,
      tempRoot: tempRoot ? path.resolve(cwd, tempRoot) : undefined,
      retryDelayMs: pick((l) => l.retryDelayMs) ?? DEFAULT_CONFIG.retryDelayMs,
      commit: pick((l) => l.commit) ?? DEFAULT_CONFIG.commit,
      tag: pick((l) => l.tag) ?? DEFAULT_CONFIG.tag,
      push: pick((l) => l.push) ?? DEFAULT_CONFIG.push,
      commitMessage: pick((l) => l.commitMessage) ?? DEFAULT_CONFIG.commitMessage,
      dryRun: pick((l) => l.dryRun) ?? DEFAULT_CONFIG.dryRun
    };

    return Object.freeze(config);
  }

  /**
   * Build the run configuration: defaults < config file < environment < CLI
   */
  static async load(options: {
    cli: ConfigLayer;
    configPath?: string;
    env: NodeJS.ProcessEnv;
    cwd: string;
  }): Promise<RunConfig> {
    const { cli, configPath, env, cwd } = options;
    const fileLayer = configPath
      ? await ReleaseConfigManager.loadFile(path.resolve(cwd, configPath), true)
      : await ReleaseConfigManager.loadFile(path.join(cwd, DEFAULT_CONFIG_FILE), false);

    return ReleaseConfigManager.resolve([fileLayer, readEnvironment(env), cli], cwd);
  }
}
