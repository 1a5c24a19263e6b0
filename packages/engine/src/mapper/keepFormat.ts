import type { NoteInput, NoteKind } from '@notesync/shared';
import { ParseError } from '@notesync/shared';

import { normalizeNewlines } from '../store/fingerprint';
import type { ParsedListItem } from '../store/sortIndex';
import { sortItemsBySortIndex } from '../store/sortIndex';
import type { ArtifactHeader, ParsedContent, PartialNote, ParseOptions } from './types';

const LIST_ITEM_PATTERN = /^(\s*)\[([ xX-])\]\s?(.*)$/;
const BLANK_PATTERN = /^\s*$/;
const LABEL_PATTERN = /"((?:[^"\\]|\\.)+)"|([^,"]+)/g;
const ID_PATTERN = /^\S+$/;

/** Number of body lines inspected when guessing whether a new artifact is a list. */
const LIST_DETECTION_LINES = 8;

/** Names holding a comma or a quote are quoted; `"` and `\` inside quotes take a backslash. */
export function formatLabelLine(names: string[]): string {
  return names
    .map((name) => (/[,"]/.test(name) ? `"${name.replace(/["\\]/g, '\\$&')}"` : name))
    .join(', ');
}

export function parseLabelLine(line: string): string[] {
  const names: string[] = [];
  for (const match of line.matchAll(LABEL_PATTERN)) {
    const quoted = match[1];
    const raw = quoted !== undefined ? quoted.replace(/\\(.)/g, '$1') : (match[2] ?? '');
    const name = raw.trim();
    if (name) {
      names.push(name);
    }
  }
  return names;
}

export function renderBodyLines(note: NoteInput): string[] {
  if (note.kind === 'text') {
    return note.body.split('\n');
  }
  return sortItemsBySortIndex(note.items).map(
    (item) => `${item.checked ? '[x]' : '[ ]'} ${item.text}`,
  );
}

export function renderKeepText(note: NoteInput, labelNames: string[]): string {
  const lines = [`# ${note.title}`, `id: ${note.id}`];
  if (labelNames.length > 0) {
    lines.push(`labels: ${formatLabelLine(labelNames)}`);
  }
  lines.push('');
  lines.push(...renderBodyLines(note));
  return `${lines.join('\n')}\n`;
}

/**
 * Splits normalised text into lines, dropping the single trailing newline every
 * rendered artifact ends with.
 */
export function splitArtifactLines(text: string): string[] {
  const normalized = normalizeNewlines(text);
  const trimmed = normalized.endsWith('\n') ? normalized.slice(0, -1) : normalized;
  return trimmed.split('\n');
}

interface KeepHeader {
  id: string | undefined;
  idLine: number | undefined;
  title: string | undefined;
  labelNames: string[];
  bodyStart: number;
}

function readHeader(lines: string[]): KeepHeader {
  let i = 0;
  let title: string | undefined;
  let id: string | undefined;
  let idLine: number | undefined;
  let labelNames: string[] = [];

  const first = lines[i];
  if (first !== undefined && first.startsWith('#')) {
    title = first.slice(1).trim();
    i += 1;
  }
  const idCandidate = lines[i];
  if (idCandidate !== undefined && idCandidate.startsWith('id:')) {
    id = idCandidate.slice('id:'.length).trim();
    idLine = i;
    i += 1;
  }
  const labelCandidate = lines[i];
  if (labelCandidate !== undefined && labelCandidate.startsWith('labels:')) {
    labelNames = parseLabelLine(labelCandidate.slice('labels:'.length));
    i += 1;
  }
  const separator = lines[i];
  if (separator !== undefined && separator.trim() === '') {
    i += 1;
  }

  return { id, idLine, title, labelNames, bodyStart: i };
}

export function detectKind(bodyLines: string[]): NoteKind {
  for (const line of bodyLines.slice(0, LIST_DETECTION_LINES)) {
    if (LIST_ITEM_PATTERN.test(line)) {
      return 'list';
    }
  }
  return 'text';
}

export function parseListLines(lines: string[]): ParsedListItem[] {
  const items: ParsedListItem[] = [];
  for (const line of lines) {
    const match = LIST_ITEM_PATTERN.exec(line);
    if (match) {
      items.push({ text: match[3] ?? '', checked: (match[2] ?? ' ').toLowerCase() === 'x' });
      continue;
    }
    if (BLANK_PATTERN.test(line)) {
      continue;
    }
    items.push({ text: line.trim(), checked: false });
  }
  return items;
}

export function parseBody(bodyLines: string[], kind: NoteKind | undefined): ParsedContent {
  const resolvedKind = kind ?? detectKind(bodyLines);
  if (resolvedKind === 'list') {
    return { kind: 'list', items: parseListLines(bodyLines) };
  }
  return { kind: 'text', body: bodyLines.join('\n') };
}

export function assertValidId(
  id: string | undefined,
  line: number,
  artifact: string | undefined,
): string {
  const where = artifact ? { artifact, line } : { line };
  if (id === undefined) {
    throw new ParseError('Missing id line', where);
  }
  if (!ID_PATTERN.test(id)) {
    throw new ParseError(`Malformed id line: "${id}"`, where);
  }
  return id;
}

export function parseKeepText(text: string, options: ParseOptions = {}): PartialNote {
  const lines = splitArtifactLines(text);
  const header = readHeader(lines);
  const id = assertValidId(
    header.id,
    (header.idLine ?? (header.title !== undefined ? 1 : 0)) + 1,
    options.artifact,
  );

  return {
    id,
    title: header.title,
    labelNames: header.labelNames,
    content: parseBody(lines.slice(header.bodyStart), options.kind),
    format: 'keep',
  };
}

export function readKeepHeader(text: string): ArtifactHeader {
  const header = readHeader(splitArtifactLines(text));
  const id = header.id !== undefined && ID_PATTERN.test(header.id) ? header.id : undefined;
  return { id, title: header.title, format: 'keep' };
}

/**
 * Inserts or replaces the title and id lines, leaving the rest of the artifact as the
 * user wrote it.
 */
export function writeKeepHeader(text: string, id: string, title: string): string {
  const lines = splitArtifactLines(text);
  const hasTitle = (lines[0] ?? '').startsWith('#');
  if (hasTitle) {
    lines[0] = `# ${title}`;
  } else {
    lines.unshift(`# ${title}`);
  }
  if ((lines[1] ?? '').startsWith('id:')) {
    lines[1] = `id: ${id}`;
  } else {
    lines.splice(1, 0, `id: ${id}`);
    const next = lines[2];
    if (next !== undefined && next.trim() !== '' && !next.startsWith('labels:')) {
      lines.splice(2, 0, '');
    }
  }
  return `${lines.join('\n')}\n`;
}
