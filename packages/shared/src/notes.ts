import { z } from 'zod';

export const DEFAULT_NOTE_COLOR = 'default';

const NonEmptyStringSchema = z.string().min(1);

export const ListItemSchema = z.object({
  text: z.string(),
  checked: z.boolean(),
  sortIndex: z.number().finite(),
});
export type ListItem = z.infer<typeof ListItemSchema>;

export const LabelSchema = z.object({
  id: NonEmptyStringSchema,
  name: NonEmptyStringSchema,
});
export type Label = z.infer<typeof LabelSchema>;

const noteHeaderShape = {
  id: NonEmptyStringSchema,
  title: z.string(),
  color: NonEmptyStringSchema,
  labels: z.array(NonEmptyStringSchema),
  pinned: z.boolean(),
  archived: z.boolean(),
  trashed: z.boolean(),
  serverRevision: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  contentFingerprint: z.string().optional(),
  hasConflict: z.boolean().optional(),
  stale: z.boolean().optional(),
};

const TextNoteObjectSchema = z.object({
  ...noteHeaderShape,
  kind: z.literal('text'),
  body: z.string(),
});

const ListNoteObjectSchema = z.object({
  ...noteHeaderShape,
  kind: z.literal('list'),
  items: z.array(ListItemSchema),
});

/**
 * Rejects fields that belong to the other kind, e.g. `items` on a text note.
 */
export const NoteInputSchema = z.discriminatedUnion('kind', [
  TextNoteObjectSchema.strict(),
  ListNoteObjectSchema.strict(),
]);

/**
 * Lenient form used when reading persisted data: unknown fields are dropped.
 */
export const StoredNoteSchema = z.discriminatedUnion('kind', [
  TextNoteObjectSchema,
  ListNoteObjectSchema,
]);

export type NoteInput = z.infer<typeof NoteInputSchema>;
export type NoteKind = NoteInput['kind'];

export type Note = NoteInput & {
  contentFingerprint: string;
  hasConflict: boolean;
  stale: boolean;
};

export type TextNote = Extract<Note, { kind: 'text' }>;
export type ListNote = Extract<Note, { kind: 'list' }>;

export type NoteStatusFlag = 'pinned' | 'archived' | 'trashed';

export function isTemporaryNoteId(id: string): boolean {
  return id.startsWith('local-');
}

/**
 * Searchable body text: the body of a text note, or item texts joined by newlines.
 */
export function noteBodyText(note: NoteInput): string {
  if (note.kind === 'text') {
    return note.body;
  }
  return note.items.map((item) => item.text).join('\n');
}

export function normalizeTitle(title: string): string {
  return title.replace(/\s+/g, ' ').trim();
}
