/**
 * Version model
 *
 * FORMAT: major.minor.patch or major.minor.build.revision, optionally
 * followed by "-label". The label is opaque: never parsed, never ordered.
 * All operations are pure; bumpVersion returns a new value.
 */

import { ConfigError, InvalidVersionError } from '../../errors/releaseErrors.js';

export const SEGMENT_SEPARATOR = '.';
export const PRERELEASE_SEPARATOR = '-';

export const BUMP_KINDS = ['none', 'patch', 'minor', 'major'] as const;

export type BumpKind = (typeof BUMP_KINDS)[number];

export interface Version {
  /** 3 or 4 non-negative integers */
  readonly segments: readonly number[];
  /** Empty string when absent */
  readonly prerelease: string;
}

const NUMERIC_SEGMENT = /^\d+$/;

/**
 * Parse version text
 *
 * @throws InvalidVersionError for non-numeric segments or fewer than 3 / more than 4 segments
 */
export function parseVersion(text: string): Version {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new InvalidVersionError(text, 'empty version');
  }

  const separatorIndex = trimmed.indexOf(PRERELEASE_SEPARATOR);
  const numericPart = separatorIndex === -1 ? trimmed : trimmed.slice(0, separatorIndex);
  const prerelease = separatorIndex === -1 ? '' : trimmed.slice(separatorIndex + 1);

  const parts = numericPart.split(SEGMENT_SEPARATOR);
  if (parts.length < 3) {
    throw new InvalidVersionError(text, `expected at least 3 numeric segments, got ${parts.length}`);
  }
  if (parts.length > 4) {
    throw new InvalidVersionError(text, `expected at most 4 numeric segments, got ${parts.length}`);
  }

  const segments = parts.map((part, index) => {
    if (!NUMERIC_SEGMENT.test(part)) {
      throw new InvalidVersionError(text, `segment ${index + 1} ("${part}") is not a non-negative integer`);
    }
    const value = Number(part);
    if (!Number.isSafeInteger(value)) {
      throw new InvalidVersionError(text, `segment ${index + 1} is too large`);
    }
    return value;
  });

  return { segments, prerelease };
}

/**
 * Serialize a version; the label is appended only when non-empty
 */
export function formatVersion(version: Version): string {
  const numeric = version.segments.join(SEGMENT_SEPARATOR);
  return version.prerelease ? `${numeric}${PRERELEASE_SEPARATOR}${version.prerelease}` : numeric;
}

/**
 * Advance a version under a bump policy
 *
 * - major: segment[0] + 1, lower segments reset
 * - minor: segment[1] + 1, lower segments reset
 * - patch: last segment + 1, nothing else changes
 * - none: numeric segments unchanged
 *
 * A non-empty prereleaseOverride always replaces the label. Without one the
 * label is cleared by a numeric bump and kept by `none`.
 */
export function bumpVersion(version: Version, kind: BumpKind, prereleaseOverride = ''): Version {
  const segments = [...version.segments];

  switch (kind) {
    case 'major':
      segments[0] += 1;
      segments.fill(0, 1);
      break;
    case 'minor':
      segments[1] += 1;
      segments.fill(0, 2);
      break;
    case 'patch':
      segments[segments.length - 1] += 1;
      break;
    case 'none':
      break;
  }

  let prerelease: string;
  if (prereleaseOverride) {
    prerelease = prereleaseOverride;
  } else if (kind === 'none') {
    prerelease = version.prerelease;
  } else {
    prerelease = '';
  }

  return { segments, prerelease };
}

/**
 * Compare numeric segments; a missing fourth segment reads as 0.
 * Labels do not take part in ordering.
 *
 * @returns negative, zero or positive like Array.prototype.sort comparators
 */
export function compareVersions(a: Version, b: Version): number {
  const length = Math.max(a.segments.length, b.segments.length);
  for (let i = 0; i < length; i++) {
    const diff = (a.segments[i] ?? 0) - (b.segments[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

export function isBumpKind(value: string): value is BumpKind {
  return BUMP_KINDS.some(kind => kind === value);
}

/**
 * Parse a bump request from CLI or config text (case-insensitive)
 *
 * @throws ConfigError for unknown values
 */
export function parseBumpKind(text: string): BumpKind {
  const normalized = text.trim().toLowerCase();
  if (!isBumpKind(normalized)) {
    throw new ConfigError('bump', text, BUMP_KINDS.join(' | '));
  }
  return normalized;
}

/**
 * Tag name for a released version
 */
export function versionTag(version: Version): string {
  return `v${formatVersion(version)}`;
}
