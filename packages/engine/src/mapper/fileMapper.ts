import type { Label, ListItem, Note, NoteInput } from '@notesync/shared';
import { ParseError, findLabelByName, normalizeLabelNames, normalizeTitle } from '@notesync/shared';

import type { NoteFormat } from '../config';
import { assignSortIndexes, sortItemsBySortIndex } from '../store/sortIndex';
import {
  looksLikeFrontmatter,
  parseFrontmatterText,
  readFrontmatterHeader,
  renderFrontmatterText,
  writeFrontmatterHeader,
} from './frontmatterFormat';
import { parseKeepText, readKeepHeader, renderKeepText, writeKeepHeader } from './keepFormat';
import type { ArtifactHeader, PartialNote, ParseOptions } from './types';

export type { ArtifactHeader, ParsedContent, PartialNote, ParseOptions } from './types';

export interface ApplyResult {
  note: NoteInput;
  /** Label names from the artifact with no matching label. They are not created. */
  unknownLabels: string[];
  changed: boolean;
}

export function detectFormat(text: string): NoteFormat {
  return looksLikeFrontmatter(text) ? 'frontmatter' : 'keep';
}

export function toText(note: NoteInput, labelNames: string[], format: NoteFormat = 'keep'): string {
  return format === 'frontmatter'
    ? renderFrontmatterText(note, labelNames)
    : renderKeepText(note, labelNames);
}

export function fromText(
  text: string,
  options: ParseOptions & { format?: NoteFormat } = {},
): PartialNote {
  const format = options.format ?? detectFormat(text);
  return format === 'frontmatter'
    ? parseFrontmatterText(text, options)
    : parseKeepText(text, options);
}

/**
 * Reads whatever id and title the artifact declares. Never throws on malformed text.
 */
export function readArtifactHeader(text: string): ArtifactHeader {
  return looksLikeFrontmatter(text) ? readFrontmatterHeader(text) : readKeepHeader(text);
}

export function writeArtifactHeader(
  text: string,
  id: string,
  title: string,
  format: NoteFormat,
): string {
  return format === 'frontmatter'
    ? writeFrontmatterHeader(text, id, title)
    : writeKeepHeader(text, id, title);
}

function sameItems(a: ListItem[], b: ListItem[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((item, index) => {
    const other = b[index];
    return (
      other !== undefined &&
      other.text === item.text &&
      other.checked === item.checked &&
      other.sortIndex === item.sortIndex
    );
  });
}

function sameStrings(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((value, index) => b[index] === value);
}

/**
 * Merges what an artifact says into `note`. Fields the artifact cannot express (color,
 * status flags, revision) are kept. `updatedAt` only moves when something changed.
 */
export function applyParsed(
  note: Note,
  partial: PartialNote,
  labels: Iterable<Label>,
  now: () => Date = () => new Date(),
): ApplyResult {
  if (partial.id !== note.id) {
    throw new ParseError(`Artifact id ${partial.id} does not match note ${note.id}`);
  }

  const vocabulary = [...labels];
  const unknownLabels: string[] = [];
  const labelIds: string[] = [];
  for (const name of normalizeLabelNames(partial.labelNames)) {
    const label = findLabelByName(vocabulary, name);
    if (label) {
      labelIds.push(label.id);
    } else {
      unknownLabels.push(name);
    }
  }

  const title = partial.title === undefined ? note.title : normalizeTitle(partial.title);
  const header = {
    id: note.id,
    title,
    color: note.color,
    labels: labelIds,
    pinned: note.pinned,
    archived: note.archived,
    trashed: note.trashed,
    serverRevision: note.serverRevision,
    createdAt: note.createdAt,
    updatedAt: note.updatedAt,
    hasConflict: note.hasConflict,
    stale: note.stale,
  };

  let merged: NoteInput;
  let contentChanged: boolean;
  if (partial.content.kind === 'list') {
    const existing = note.kind === 'list' ? sortItemsBySortIndex(note.items) : [];
    const items = assignSortIndexes(partial.content.items, existing);
    contentChanged = note.kind !== 'list' || !sameItems(existing, items);
    merged = { ...header, kind: 'list', items };
  } else {
    contentChanged = note.kind !== 'text' || note.body !== partial.content.body;
    merged = { ...header, kind: 'text', body: partial.content.body };
  }

  const changed =
    contentChanged || title !== note.title || !sameStrings(labelIds, note.labels);
  if (changed) {
    merged.updatedAt = now().toISOString();
  } else {
    merged.contentFingerprint = note.contentFingerprint;
  }

  return { note: merged, unknownLabels, changed };
}
