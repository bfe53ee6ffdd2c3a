import type { Entry, EntryStatus, Resource, Translation } from './model.js';
import { cloneEntry, createEntry, defaultStatusFor, entriesEqual, entryId } from './model.js';

export type EditAction = 'added' | 'updated' | 'removed' | 'unchanged';

export interface EntryEdit {
  key: string;
  language: string;
  /** Omitted or empty removes the entry */
  value?: Translation | string;
  comment?: string;
  status?: EntryStatus;
}

export interface EditResult {
  resource: Resource;
  action: EditAction;
}

function toTranslation(value: Translation | string | undefined): Translation | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value.length ? { kind: 'singular', value } : undefined;
  }
  return value;
}

/**
 * Add, update or remove one entry, returning a new resource. An existing
 * entry is replaced at its position; a new entry is appended. Filling an
 * entry that was `new` marks it translated unless a status is given.
 */
export function setEntry(resource: Resource, edit: EntryEdit): EditResult {
  const id = entryId(edit.key, edit.language);
  const index = resource.entries.findIndex((entry) => entryId(entry.key, entry.language) === id);
  const value = toTranslation(edit.value);
  const entries = resource.entries.map(cloneEntry);
  const metadata = { ...resource.metadata };

  if (!value) {
    if (index === -1) {
      return { resource: { metadata, entries }, action: 'unchanged' };
    }
    entries.splice(index, 1);
    return { resource: { metadata, entries }, action: 'removed' };
  }

  if (index === -1) {
    entries.push(
      createEntry({ key: edit.key, language: edit.language, value, status: edit.status, comment: edit.comment })
    );
    return { resource: { metadata, entries }, action: 'added' };
  }

  const previous = entries[index];
  const next: Entry = createEntry({
    key: previous.key,
    language: previous.language,
    value,
    status: edit.status ?? (previous.status === 'new' ? defaultStatusFor(value) : previous.status),
    comment: edit.comment ?? previous.comment,
    custom: previous.custom,
  });
  if (entriesEqual(previous, next)) {
    return { resource: { metadata, entries }, action: 'unchanged' };
  }
  entries[index] = next;
  return { resource: { metadata, entries }, action: 'updated' };
}

export function removeEntry(resource: Resource, key: string, language: string): EditResult {
  return setEntry(resource, { key, language });
}
