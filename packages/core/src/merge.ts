import { MergeConflictError, type MergeConflict } from './errors.js';
import type { Entry, Resource } from './model.js';
import { cloneEntry, entryId, formatTranslation } from './model.js';

export const MERGE_STRATEGIES = ['first', 'last', 'error'] as const;
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export const isMergeStrategy = (value: unknown): value is MergeStrategy =>
  typeof value === 'string' && (MERGE_STRATEGIES as readonly string[]).includes(value);

interface ConflictGroup {
  members: Array<{ input: number; entry: Entry }>;
}

/**
 * Combine resources into one whose entries are the union of every input's
 * (key, language) pairs.
 *
 * Output order is the first-seen order of each pair across the concatenated
 * inputs; the entry kept for a pair is chosen by `strategy`. With `error`,
 * any pair supplied by more than one input fails the whole merge and no
 * resource is produced.
 */
export function mergeResources(resources: Resource[], strategy: MergeStrategy = 'last'): Resource {
  const groups = new Map<string, ConflictGroup>();

  resources.forEach((resource, input) => {
    for (const entry of resource.entries) {
      const id = entryId(entry.key, entry.language);
      const group = groups.get(id);
      if (group) {
        group.members.push({ input, entry });
      } else {
        groups.set(id, { members: [{ input, entry }] });
      }
    }
  });

  if (strategy === 'error') {
    const conflicts: MergeConflict[] = [];
    for (const group of groups.values()) {
      if (group.members.length > 1) {
        const [first] = group.members;
        conflicts.push({
          key: first.entry.key,
          language: first.entry.language,
          members: group.members.map(({ input, entry }) => ({
            input,
            value: formatTranslation(entry.value),
            status: entry.status,
          })),
        });
      }
    }
    if (conflicts.length) {
      throw new MergeConflictError(conflicts);
    }
  }

  const entries: Entry[] = [];
  for (const group of groups.values()) {
    const kept = strategy === 'last' ? group.members[group.members.length - 1] : group.members[0];
    entries.push(cloneEntry(kept.entry));
  }

  return { metadata: mergeMetadata(resources, strategy), entries };
}

/**
 * Union of metadata keys in first-seen order. `last` lets later inputs
 * overwrite values; the other strategies keep the earliest.
 */
export function mergeMetadata(resources: Resource[], strategy: MergeStrategy): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const resource of resources) {
    for (const [key, value] of Object.entries(resource.metadata)) {
      if (!(key in metadata) || strategy === 'last') {
        metadata[key] = value;
      }
    }
  }
  return metadata;
}
