/**
 * SnapshotDiff - classifies paths between two ContentSnapshots
 *
 * Pure function over two maps; O(n) with map lookups. The three result sets
 * are disjoint and sorted.
 */

import { log } from '../../utils/logger.js';
import type { ContentSnapshot } from './ContentSnapshot.js';

export interface DiffResult {
  /** In new, not in old */
  added: string[];
  /** In old, not in new */
  removed: string[];
  /** In both, digests differ */
  changed: string[];

  totalChanges: number;
  isEmpty: boolean;
}

/**
 * Compute the difference between an old and a new snapshot
 */
export function diffSnapshots(oldSnapshot: ContentSnapshot, newSnapshot: ContentSnapshot): DiffResult {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];

  for (const [relPath, digest] of newSnapshot) {
    const previous = oldSnapshot.get(relPath);
    if (previous === undefined) {
      added.push(relPath);
      log.debug(`[DIFF] ADD: ${relPath}`);
    } else if (previous !== digest) {
      changed.push(relPath);
      log.debug(`[DIFF] CHANGE: ${relPath} (${previous.slice(0, 8)} -> ${digest.slice(0, 8)})`);
    }
  }

  for (const relPath of oldSnapshot.keys()) {
    if (!newSnapshot.has(relPath)) {
      removed.push(relPath);
      log.debug(`[DIFF] REMOVE: ${relPath}`);
    }
  }

  added.sort();
  removed.sort();
  changed.sort();

  const totalChanges = added.length + removed.length + changed.length;
  return {
    added,
    removed,
    changed,
    totalChanges,
    isEmpty: totalChanges === 0
  };
}

/**
 * Create a summary string for display
 */
export function formatDiffSummary(diff: DiffResult): string {
  if (diff.isEmpty) {
    return 'No changes detected';
  }

  const parts: string[] = [];
  if (diff.added.length > 0) {
    parts.push(`+${diff.added.length} added`);
  }
  if (diff.changed.length > 0) {
    parts.push(`~${diff.changed.length} changed`);
  }
  if (diff.removed.length > 0) {
    parts.push(`-${diff.removed.length} removed`);
  }

  return parts.join(', ') + ` (${diff.totalChanges} total)`;
}
