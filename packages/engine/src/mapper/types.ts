import type { NoteKind } from '@notesync/shared';

import type { NoteFormat } from '../config';
import type { ParsedListItem } from '../store/sortIndex';

export type ParsedContent =
  | { kind: 'text'; body: string }
  | { kind: 'list'; items: ParsedListItem[] };

/**
 * What a textual artifact says about a note. `title` is undefined when the artifact
 * has no title line; an absent labels line means "no labels".
 */
export interface PartialNote {
  id: string;
  title: string | undefined;
  labelNames: string[];
  content: ParsedContent;
  format: NoteFormat;
}

export interface ArtifactHeader {
  id: string | undefined;
  title: string | undefined;
  format: NoteFormat;
}

export interface ParseOptions {
  /** Kind of the note the artifact belongs to; detected from the body when absent. */
  kind?: NoteKind;
  /** Used in error messages. */
  artifact?: string;
}
