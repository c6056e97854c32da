/**
 * Release policy: the single place that decides whether a run acts.
 *
 * | diff      | requested          | decision      | effective bump |
 * |-----------|--------------------|---------------|----------------|
 * | empty     | none               | noop          | none           |
 * | empty     | patch/minor/major  | bump-only     | requested      |
 * | non-empty | none               | bump-and-sync | patch          |
 * | non-empty | patch/minor/major  | bump-and-sync | requested      |
 */

import type { DiffResult } from '../snapshot/SnapshotDiff.js';
import type { BumpKind } from '../version/Version.js';

export type ReleaseDecisionKind = 'noop' | 'bump-only' | 'bump-and-sync';

export interface ReleaseDecision {
  decision: ReleaseDecisionKind;
  effectiveBump: BumpKind;
}

export function decideRelease(diff: Pick<DiffResult, 'isEmpty'>, requested: BumpKind): ReleaseDecision {
  if (diff.isEmpty) {
    return requested === 'none'
      ? { decision: 'noop', effectiveBump: 'none' }
      : { decision: 'bump-only', effectiveBump: requested };
  }

  return {
    decision: 'bump-and-sync',
    effectiveBump: requested === 'none' ? 'patch' : requested
  };
}
