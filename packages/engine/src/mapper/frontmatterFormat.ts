import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import type { NoteInput } from '@notesync/shared';
import { ParseError, describeError } from '@notesync/shared';

import { normalizeNewlines } from '../store/fingerprint';
import { assertValidId, parseBody, renderBodyLines } from './keepFormat';
import type { ArtifactHeader, PartialNote, ParseOptions } from './types';

const FRONTMATTER_PATTERN = /^---\n([\s\S]*?)\n---\n?([\s\S]*)$/;

interface FrontmatterBlock {
  fields: Record<string, unknown>;
  body: string;
}

export function looksLikeFrontmatter(text: string): boolean {
  return normalizeNewlines(text).startsWith('---\n');
}

function splitFrontmatter(text: string, artifact: string | undefined): FrontmatterBlock {
  const where = artifact ? { artifact, line: 1 } : { line: 1 };
  const match = FRONTMATTER_PATTERN.exec(normalizeNewlines(text));
  if (!match) {
    throw new ParseError('Unterminated front matter block', where);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(match[1] ?? '') ?? {};
  } catch (err) {
    throw new ParseError(`Invalid front matter: ${describeError(err)}`, where);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ParseError('Front matter must be a mapping', where);
  }

  let body = (match[2] ?? '').replace(/^\n/, '');
  if (body.endsWith('\n')) {
    body = body.slice(0, -1);
  }
  return { fields: Object.fromEntries(Object.entries(parsed)), body };
}

function readId(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function readCategories(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter(
        (entry): entry is string | number =>
          typeof entry === 'string' || typeof entry === 'number',
      )
      .map((entry) => String(entry).trim())
      .filter((entry) => entry.length > 0);
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }
  return [];
}

export function renderFrontmatterText(note: NoteInput, labelNames: string[]): string {
  const fields: Record<string, unknown> = {
    title: note.title,
    id: note.id,
    ...(labelNames.length > 0 ? { categories: labelNames } : {}),
  };
  const yamlText = stringifyYaml(fields).trimEnd();
  return `---\n${yamlText}\n---\n\n${renderBodyLines(note).join('\n')}\n`;
}

export function parseFrontmatterText(text: string, options: ParseOptions = {}): PartialNote {
  const { fields, body } = splitFrontmatter(text, options.artifact);
  const id = assertValidId(readId(fields['id']), 1, options.artifact);
  const title = fields['title'];

  return {
    id,
    title: typeof title === 'string' ? title : undefined,
    labelNames: readCategories(fields['categories']),
    content: parseBody(body.split('\n'), options.kind),
    format: 'frontmatter',
  };
}

export function readFrontmatterHeader(text: string): ArtifactHeader {
  try {
    const { fields } = splitFrontmatter(text, undefined);
    const id = readId(fields['id']);
    const title = fields['title'];
    return {
      id: id && /^\S+$/.test(id) ? id : undefined,
      title: typeof title === 'string' ? title : undefined,
      format: 'frontmatter',
    };
  } catch (err) {
    if (err instanceof ParseError) {
      return { id: undefined, title: undefined, format: 'frontmatter' };
    }
    throw err;
  }
}

/**
 * Sets `id` and `title` in the front matter, adding a block when the text has none.
 */
export function writeFrontmatterHeader(text: string, id: string, title: string): string {
  if (!looksLikeFrontmatter(text)) {
    const yamlText = stringifyYaml({ title, id }).trimEnd();
    const body = normalizeNewlines(text);
    return `---\n${yamlText}\n---\n\n${body.endsWith('\n') || body === '' ? body : `${body}\n`}`;
  }
  const { fields, body } = splitFrontmatter(text, undefined);
  const yamlText = stringifyYaml({ ...fields, title, id }).trimEnd();
  return `---\n${yamlText}\n---\n\n${body}\n`;
}
