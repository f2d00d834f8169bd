/**
 * Address Grouping for Deduplication
 *
 * Groups canonicalized rows that share a fingerprint. Groups keep the order
 * in which their first member was seen; members keep input order.
 *
 * Representative selection, in priority order:
 * 1. Highest confidence ('exact' > 'resolved' > 'partial')
 * 2. Fewest absent address fields
 * 3. First seen
 *
 * @module dedupe/groups
 */

import { CONFIDENCE_RANK, countAbsentFields } from '../schemas/address.js';
import type { CanonicalAddress } from '../schemas/address.js';
import type { DedupGroup, DedupItem } from '../schemas/batch.js';
import type { RawRecord } from '../schemas/record.js';
import { fingerprint } from '../address/fingerprint.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Input to {@link deduplicate}. The fingerprint is computed when omitted.
 */
export interface DedupInput {
  record: RawRecord;
  address: CanonicalAddress;
  fingerprint?: string;
}

/**
 * Statistics about a grouping.
 */
export interface GroupSummary {
  inputCount: number;
  groupCount: number;
  duplicatesAbsorbed: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * True when `candidate` should replace `current` as representative.
 * Ties keep the current (earlier) member.
 */
function outranks(candidate: DedupItem, current: DedupItem): boolean {
  const rankDiff =
    CONFIDENCE_RANK[candidate.address.confidence] - CONFIDENCE_RANK[current.address.confidence];
  if (rankDiff !== 0) {
    return rankDiff > 0;
  }
  return countAbsentFields(candidate.address) < countAbsentFields(current.address);
}

/**
 * Pick the representative of a non-empty member list.
 */
export function selectRepresentative(members: readonly DedupItem[]): DedupItem {
  if (members.length === 0) {
    throw new Error('Cannot select a representative from an empty group');
  }
  return members.reduce((best, current) => (outranks(current, best) ? current : best));
}

function createGroup(key: string, members: DedupItem[]): DedupGroup {
  const representative = selectRepresentative(members);
  const rowIndices = members.map((member) => member.record.rowIndex);

  return {
    fingerprint: key,
    members,
    representative,
    size: members.length,
    rowIndices,
    absorbedRowIndices: members
      .filter((member) => member !== representative)
      .map((member) => member.record.rowIndex),
  };
}

// ============================================================================
// Main Functions
// ============================================================================

/**
 * Group items by fingerprint.
 *
 * @example
 * ```typescript
 * const groups = deduplicate(items);
 * for (const group of groups) {
 *   console.log(group.representative.record.rowIndex, group.absorbedRowIndices);
 * }
 * ```
 */
export function deduplicate(items: readonly DedupInput[]): DedupGroup[] {
  const buckets = new Map<string, DedupItem[]>();

  for (const item of items) {
    const key = item.fingerprint ?? fingerprint(item.address);
    const bucket = buckets.get(key) ?? [];
    bucket.push({ record: item.record, address: item.address, fingerprint: key });
    buckets.set(key, bucket);
  }

  return Array.from(buckets, ([key, members]) => createGroup(key, members));
}

/**
 * Summarize a grouping.
 */
export function summarizeGroups(groups: readonly DedupGroup[]): GroupSummary {
  const inputCount = groups.reduce((sum, group) => sum + group.size, 0);
  return {
    inputCount,
    groupCount: groups.length,
    duplicatesAbsorbed: inputCount - groups.length,
  };
}
