/**
 * Default noise and protection patterns
 *
 * Single source of truth for path exclusion across:
 * - ContentSnapshot.ts (diff snapshots)
 * - TreeMirror.ts (protected paths only)
 * - VersionManifest.ts (manifest search)
 */

/**
 * Suffixes of files that change on every export without a real change.
 * Canvas app packages are re-zipped with fresh timestamps each export.
 */
export const DEFAULT_NOISE_SUFFIXES = ['.msapp'] as const;

/**
 * Regex sources for volatile paths (none by default)
 */
export const DEFAULT_NOISE_REGEXES: readonly string[] = [];

/**
 * Default gitignore-style file read from the working tree for extra noise rules
 */
export const DEFAULT_NOISE_IGNORE_FILE = '.snapshotignore';

/**
 * Directory names never snapshotted, copied over, or deleted by the mirror
 */
export const PROTECTED_DIRS = ['.git'] as const;

/**
 * Filter presets for the two ways trees are compared
 */
export const FILTER_PRESETS = {
  /**
   * Release diff
   * - Exclude protected paths
   * - Exclude noise rules
   */
  diff: {
    excludeProtected: true,
    excludeNoise: true,
  },

  /**
   * Tree mirror
   * - Exclude protected paths only; noise files are part of the release
   */
  mirror: {
    excludeProtected: true,
    excludeNoise: false,
  },
} as const;

export type FilterPresetName = keyof typeof FILTER_PRESETS;
