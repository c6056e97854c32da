/**
 * Centralized NoiseFilter utility
 *
 * Single source of truth for which relative paths take part in a snapshot.
 * The same instance must be used for both sides of a comparison, otherwise a
 * noise file present on one side shows up as a false add or remove.
 *
 * Two exclusion families:
 * - Protected paths: version-control metadata (.git at any depth) plus any
 *   extra root-relative paths the caller names, such as the ignore file
 *   itself. Never snapshotted, never copied over or deleted by the mirror.
 * - Noise rules: files that change on every export without a real change
 *   (suffix, regex or gitignore-style glob). Excluded from the release diff
 *   only; the mirror still copies them.
 *
 * All paths are root-relative with forward slashes.
 */

import { promises as fs } from 'fs';
import ignore, { type Ignore } from 'ignore';
import {
  DEFAULT_NOISE_SUFFIXES,
  DEFAULT_NOISE_REGEXES,
  PROTECTED_DIRS,
  FILTER_PRESETS,
  type FilterPresetName,
} from './noiseFilter.patterns.js';
import { ConfigError, errnoCode } from '../errors/releaseErrors.js';
import { log } from './logger.js';

/**
 * A single noise pattern tested against a relative path
 */
export type NoiseRule =
  | { kind: 'suffix'; suffix: string }
  | { kind: 'regex'; pattern: RegExp }
  | { kind: 'glob'; pattern: string };

/**
 * Result of filtering a single path
 */
export interface FilterResult {
  /** Whether the path is excluded from the snapshot */
  skip: boolean;
  reason?: 'protected' | 'noise';
  /** The noise rule that matched (if reason=noise) */
  rule?: NoiseRule;
}

/**
 * Options for NoiseFilter configuration
 */
export interface NoiseFilterOptions {
  /** Exclude .git and other protected directories */
  excludeProtected?: boolean;
  /** Apply the noise rules */
  excludeNoise?: boolean;
  /** Noise rules (defaults to DEFAULT_NOISE_SUFFIXES) */
  rules?: NoiseRule[];
  /** Extra root-relative paths treated like .git */
  protectedPaths?: readonly string[];
}

/**
 * Build noise rules from plain configuration values
 *
 * @throws ConfigError for a regex that does not compile
 */
export function createNoiseRules(config: {
  suffixes?: readonly string[];
  regexes?: readonly string[];
  globs?: readonly string[];
}): NoiseRule[] {
  const rules: NoiseRule[] = [];

  for (const suffix of config.suffixes ?? []) {
    rules.push({ kind: 'suffix', suffix });
  }

  for (const source of config.regexes ?? []) {
    let pattern: RegExp;
    try {
      pattern = new RegExp(source);
    } catch {
      throw new ConfigError('noise.regexes', source, 'a valid regular expression');
    }
    rules.push({ kind: 'regex', pattern });
  }

  for (const pattern of config.globs ?? []) {
    rules.push({ kind: 'glob', pattern });
  }

  return rules;
}

export function defaultNoiseRules(): NoiseRule[] {
  return createNoiseRules({
    suffixes: DEFAULT_NOISE_SUFFIXES,
    regexes: DEFAULT_NOISE_REGEXES,
  });
}

/**
 * NoiseFilter class for centralized path exclusion logic
 *
 * Usage:
 * ```typescript
 * const filter = NoiseFilter.forDiff(rules);
 * await filter.loadIgnoreFile('.snapshotignore');
 *
 * if (filter.shouldSkip('CanvasApps/app_DocumentUri.msapp')) {
 *   continue;
 * }
 * ```
 */
export class NoiseFilter {
  private readonly excludeProtected: boolean;
  private readonly excludeNoise: boolean;
  private readonly rules: NoiseRule[];
  private readonly globMatcher: Ignore;
  private readonly protectedPaths: ReadonlySet<string>;

  constructor(options: NoiseFilterOptions = {}) {
    this.excludeProtected = options.excludeProtected ?? true;
    this.excludeNoise = options.excludeNoise ?? true;
    this.rules = [...(options.rules ?? defaultNoiseRules())];
    this.globMatcher = ignore();
    this.protectedPaths = new Set(options.protectedPaths ?? []);

    const globs = this.rules.flatMap(rule => (rule.kind === 'glob' ? [rule.pattern] : []));
    if (globs.length > 0) {
      this.globMatcher.add(globs);
    }
  }

  // ============================================================================
  // Factory Methods
  // ============================================================================

  private static fromPreset(
    name: FilterPresetName,
    rules: NoiseRule[] | undefined,
    protectedPaths: readonly string[]
  ): NoiseFilter {
    return new NoiseFilter({ ...FILTER_PRESETS[name], rules, protectedPaths });
  }

  /**
   * Filter for the release diff: protected paths and noise excluded
   */
  static forDiff(rules?: NoiseRule[], protectedPaths: readonly string[] = []): NoiseFilter {
    return NoiseFilter.fromPreset('diff', rules, protectedPaths);
  }

  /**
   * Filter for the tree mirror: protected paths excluded, noise kept
   */
  static forMirror(protectedPaths: readonly string[] = []): NoiseFilter {
    return NoiseFilter.fromPreset('mirror', [], protectedPaths);
  }

  // ============================================================================
  // Main Filter Methods
  // ============================================================================

  shouldSkip(relativePath: string): boolean {
    return this.filter(relativePath).skip;
  }

  /**
   * Get detailed filter result for a path
   */
  filter(relativePath: string): FilterResult {
    if (this.excludeProtected && this.isProtected(relativePath)) {
      return { skip: true, reason: 'protected' };
    }

    if (this.excludeNoise) {
      const rule = this.matchingRule(relativePath);
      if (rule) {
        return { skip: true, reason: 'noise', rule };
      }
    }

    return { skip: false };
  }

  /**
   * Whether a directory walk should not descend into this directory.
   * Only protected directories are pruned; noise rules are per file.
   */
  shouldPruneDirectory(relativeDir: string): boolean {
    return this.excludeProtected && this.isProtected(relativeDir);
  }

  private isProtected(relativePath: string): boolean {
    return NoiseFilter.isProtectedPath(relativePath) || this.protectedPaths.has(relativePath);
  }

  // ============================================================================
  // Ignore File Loading
  // ============================================================================

  /**
   * Load gitignore-style noise patterns from a file. A missing file is not
   * an error.
   *
   * @returns number of patterns added
   */
  async loadIgnoreFile(ignoreFilePath: string): Promise<number> {
    let content: string;
    try {
      content = await fs.readFile(ignoreFilePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        log.debug(`[NOISE] No ignore file at ${ignoreFilePath}`);
        return 0;
      }
      throw error;
    }

    const patterns = content
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0 && !line.startsWith('#'));

    this.addGlobPatterns(patterns);
    log.debug(`[NOISE] Loaded ${patterns.length} pattern(s) from ${ignoreFilePath}`);
    return patterns.length;
  }

  /**
   * Add gitignore-style patterns directly
   */
  addGlobPatterns(patterns: string[]): void {
    if (patterns.length === 0) {
      return;
    }
    this.globMatcher.add(patterns);
    for (const pattern of patterns) {
      this.rules.push({ kind: 'glob', pattern });
    }
  }

  // ============================================================================
  // Pattern Matching Helpers
  // ============================================================================

  private matchingRule(relativePath: string): NoiseRule | undefined {
    for (const rule of this.rules) {
      switch (rule.kind) {
        case 'suffix':
          if (relativePath.endsWith(rule.suffix)) return rule;
          break;
        case 'regex':
          if (rule.pattern.test(relativePath)) return rule;
          break;
        case 'glob':
          // Globs are matched together below so negations apply
          break;
      }
    }

    if (this.globMatcher.ignores(relativePath)) {
      return this.rules.find(rule => rule.kind === 'glob');
    }

    return undefined;
  }

  // ============================================================================
  // Static Utilities
  // ============================================================================

  /**
   * Check if a path is, or lies inside, a protected directory:
   * - .git (root)
   * - .git/config (root)
   * - nested/.git/HEAD (nested repo)
   */
  static isProtectedPath(relativePath: string): boolean {
    const parts = relativePath.split('/');
    return parts.some(part => PROTECTED_DIRS.some(dir => dir === part));
  }
}

export { DEFAULT_NOISE_SUFFIXES, DEFAULT_NOISE_IGNORE_FILE, PROTECTED_DIRS } from './noiseFilter.patterns.js';
