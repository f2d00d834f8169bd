/**
 * Deduplication Module
 *
 * Groups canonical addresses by fingerprint and picks one representative
 * per group.
 *
 * @module dedupe
 */

export {
  deduplicate,
  summarizeGroups,
  selectRepresentative,
  type DedupInput,
  type GroupSummary,
} from './groups.js';
