import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import type { SerializedNote } from '../types/index.js';
import { htmlToPlainText } from '../utils/html-text.js';

export const UNTITLED = 'Untitled';
export const NO_PREVIEW = 'No additional text';
export const TITLE_MAX_LENGTH = 50;
export const PREVIEW_MAX_LENGTH = 60;
export const NOTE_SCHEMA_VERSION = 1;

const ELLIPSIS = '...';

/**
 * Raised when a stored record cannot be turned back into a note at all.
 */
export class CorruptNoteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CorruptNoteError';
  }
}

// Every field degrades to a default instead of failing the whole record.
const storedNoteSchema = z.object({
  schema_version: z.number().int().positive().optional().catch(undefined),
  id: z.string().min(1).optional().catch(undefined),
  content: z.string().catch(''),
  created_at: z.string().optional().catch(undefined),
  modified_at: z.string().optional().catch(undefined),
  is_favorite: z.boolean().catch(false),
});

function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  return chars.length > maxLength ? chars.slice(0, maxLength).join('') + ELLIPSIS : text;
}

function parseTimestamp(value: string | undefined, fallback: Date): Date {
  if (!value) {
    return fallback;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? fallback : parsed;
}

/**
 * Title shown for a piece of content: its first visible line, capped at
 * {@link TITLE_MAX_LENGTH} characters.
 */
export function deriveTitle(content: string): string {
  const firstLine = htmlToPlainText(content).split('\n')[0];
  return firstLine ? truncate(firstLine, TITLE_MAX_LENGTH) : UNTITLED;
}

/**
 * Second visible line of the content, used as the list-row teaser.
 */
export function derivePreview(content: string): string {
  const lines = htmlToPlainText(content).split('\n');
  return lines.length > 1 ? truncate(lines[1], PREVIEW_MAX_LENGTH) : NO_PREVIEW;
}

interface NoteInit {
  id: string;
  content: string;
  createdAt: Date;
  modifiedAt: Date;
  isFavorite: boolean;
}

export interface DeserializeOptions {
  /** Identifier to use when the record carries none (e.g. the file stem). */
  fallbackId?: string;
}

/**
 * A single note. The title is always derived from the content, so content
 * only changes through {@link Note.updateContent}.
 */
export class Note {
  readonly id: string;
  readonly createdAt: Date;
  isFavorite: boolean;
  private text: string;
  private derivedTitle: string;
  private lastModified: Date;

  private constructor(init: NoteInit) {
    this.id = init.id;
    this.createdAt = init.createdAt;
    this.isFavorite = init.isFavorite;
    this.text = init.content;
    this.derivedTitle = deriveTitle(init.content);
    this.lastModified = init.modifiedAt;
  }

  static create(): Note {
    const now = new Date();
    return new Note({
      id: randomUUID(),
      content: '',
      createdAt: now,
      modifiedAt: now,
      isFavorite: false,
    });
  }

  /**
   * Rebuild a note from its stored form. The stored title is ignored and
   * re-derived from content.
   *
   * @throws CorruptNoteError when `data` is not a note-shaped object or was
   *   written by a newer schema version.
   */
  static deserialize(data: unknown, options: DeserializeOptions = {}): Note {
    const result = storedNoteSchema.safeParse(data);
    if (!result.success) {
      throw new CorruptNoteError('Note record is not an object');
    }

    const record = result.data;
    const version = record.schema_version ?? 1;
    if (version > NOTE_SCHEMA_VERSION) {
      throw new CorruptNoteError(`Unsupported note schema version ${version}`);
    }

    const now = new Date();
    return new Note({
      id: record.id ?? options.fallbackId ?? randomUUID(),
      content: record.content,
      createdAt: parseTimestamp(record.created_at, now),
      modifiedAt: parseTimestamp(record.modified_at, now),
      isFavorite: record.is_favorite,
    });
  }

  get title(): string {
    return this.derivedTitle;
  }

  get content(): string {
    return this.text;
  }

  get modifiedAt(): Date {
    return this.lastModified;
  }

  get preview(): string {
    return derivePreview(this.text);
  }

  updateContent(content: string): void {
    const now = new Date();
    this.text = content;
    if (now.getTime() > this.lastModified.getTime()) {
      this.lastModified = now;
    }
    this.derivedTitle = deriveTitle(content);
  }

  toggleFavorite(): boolean {
    this.isFavorite = !this.isFavorite;
    return this.isFavorite;
  }

  serialize(): SerializedNote {
    return {
      schema_version: NOTE_SCHEMA_VERSION,
      id: this.id,
      title: this.derivedTitle,
      content: this.text,
      created_at: this.createdAt.toISOString(),
      modified_at: this.lastModified.toISOString(),
      is_favorite: this.isFavorite,
    };
  }
}
