import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  CorruptNoteError,
  NO_PREVIEW,
  Note,
  UNTITLED,
  derivePreview,
  deriveTitle,
} from './note.js';

describe('deriveTitle', () => {
  it('uses Untitled for empty content', () => {
    expect(deriveTitle('')).toBe(UNTITLED);
    expect(deriveTitle('   ')).toBe(UNTITLED);
  });

  it('uses Untitled when markup has no visible text', () => {
    expect(deriveTitle('<p><br></p>')).toBe(UNTITLED);
  });

  it('takes the first line of the plain-text rendering', () => {
    expect(deriveTitle('<p>Hello</p><p>world</p>')).toBe('Hello');
    expect(deriveTitle('Hello\nworld')).toBe('Hello');
  });

  it('skips leading blank blocks', () => {
    expect(deriveTitle('<p></p><h1> Groceries </h1><p>milk</p>')).toBe('Groceries');
  });

  it('truncates long first lines to 50 characters plus an ellipsis', () => {
    const line = 'a'.repeat(50) + 'bcdef';
    expect(deriveTitle(`<p>${line}</p>`)).toBe('a'.repeat(50) + '...');
  });

  it('keeps a first line of exactly 50 characters intact', () => {
    const line = 'x'.repeat(50);
    expect(deriveTitle(line)).toBe(line);
  });
});

describe('derivePreview', () => {
  it('uses the line after the title', () => {
    expect(derivePreview('<h1>Title</h1><p>Body text</p><p>More</p>')).toBe('Body text');
  });

  it('reports missing additional text', () => {
    expect(derivePreview('<p>Only a title</p>')).toBe(NO_PREVIEW);
    expect(derivePreview('')).toBe(NO_PREVIEW);
  });

  it('truncates to 60 characters', () => {
    expect(derivePreview(`Title\n${'b'.repeat(61)}`)).toBe('b'.repeat(60) + '...');
  });
});

describe('Note', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates an empty untitled note with matching timestamps', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T10:00:00Z'));

    const note = Note.create();

    expect(note.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(note.title).toBe(UNTITLED);
    expect(note.content).toBe('');
    expect(note.isFavorite).toBe(false);
    expect(note.createdAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    expect(note.modifiedAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });

  it('generates distinct identifiers', () => {
    expect(Note.create().id).not.toBe(Note.create().id);
  });

  it('re-derives title and modification time on content updates', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T10:00:00Z'));
    const note = Note.create();

    vi.setSystemTime(new Date('2024-05-01T10:05:00Z'));
    note.updateContent('<p>Shopping list</p><p>eggs</p>');

    expect(note.title).toBe('Shopping list');
    expect(note.preview).toBe('eggs');
    expect(note.modifiedAt.toISOString()).toBe('2024-05-01T10:05:00.000Z');
    expect(note.createdAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
  });

  it('derives the same title when the same content is applied twice', () => {
    const note = Note.create();
    const content = '<h2>Repeatable</h2><p>body</p>';

    note.updateContent(content);
    const first = note.title;
    note.updateContent(content);

    expect(note.title).toBe(first);
    expect(note.title).toBe('Repeatable');
  });

  it('never moves the modification time backwards', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T10:00:00Z'));
    const note = Note.create();

    vi.setSystemTime(new Date('2024-04-30T09:00:00Z'));
    note.updateContent('clock went back');

    expect(note.modifiedAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    expect(note.title).toBe('clock went back');
  });

  it('toggles the favourite flag without touching content metadata', () => {
    const note = Note.create();
    const modified = note.modifiedAt;

    expect(note.toggleFavorite()).toBe(true);
    expect(note.isFavorite).toBe(true);
    expect(note.toggleFavorite()).toBe(false);
    expect(note.modifiedAt).toBe(modified);
  });

  describe('serialization', () => {
    it('writes every field with ISO timestamps', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-05-01T10:00:00Z'));
      const note = Note.create();
      note.updateContent('<p>Stored</p>');
      note.isFavorite = true;

      expect(note.serialize()).toEqual({
        schema_version: 1,
        id: note.id,
        title: 'Stored',
        content: '<p>Stored</p>',
        created_at: '2024-05-01T10:00:00.000Z',
        modified_at: '2024-05-01T10:00:00.000Z',
        is_favorite: true,
      });
    });

    it('round-trips every field', () => {
      const note = Note.create();
      note.updateContent('<p>Round</p><p>trip</p>');
      note.toggleFavorite();

      const restored = Note.deserialize(note.serialize());

      expect(restored).toEqual(note);
      expect(restored.serialize()).toEqual(note.serialize());
    });

    it('defaults missing fields', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-01T00:00:00Z'));

      const note = Note.deserialize({ id: 'partial' });

      expect(note.id).toBe('partial');
      expect(note.title).toBe(UNTITLED);
      expect(note.content).toBe('');
      expect(note.isFavorite).toBe(false);
      expect(note.createdAt.toISOString()).toBe('2024-06-01T00:00:00.000Z');
      expect(note.modifiedAt.toISOString()).toBe('2024-06-01T00:00:00.000Z');
    });

    it('degrades wrongly typed fields and unparsable dates to defaults', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-01T00:00:00Z'));

      const note = Note.deserialize({
        id: 'odd',
        content: 42,
        created_at: 'yesterday-ish',
        modified_at: '2024-02-02T02:02:02.000Z',
        is_favorite: 'yes',
      });

      expect(note.content).toBe('');
      expect(note.isFavorite).toBe(false);
      expect(note.createdAt.toISOString()).toBe('2024-06-01T00:00:00.000Z');
      expect(note.modifiedAt.toISOString()).toBe('2024-02-02T02:02:02.000Z');
    });

    it('uses the fallback id when the record has none', () => {
      expect(Note.deserialize({ content: 'x' }, { fallbackId: 'from-file' }).id).toBe('from-file');
    });

    it('re-derives the title instead of trusting the stored one', () => {
      const note = Note.deserialize({ id: 'n', title: 'Stale', content: '<p>Fresh</p>' });
      expect(note.title).toBe('Fresh');
    });

    it('reads records written before the schema version existed', () => {
      const note = Note.deserialize({
        id: 'legacy',
        content: 'Legacy note',
        created_at: '2023-01-01T00:00:00',
        modified_at: '2023-01-02T00:00:00',
        is_favorite: true,
      });
      expect(note.title).toBe('Legacy note');
      expect(note.isFavorite).toBe(true);
    });

    it('rejects non-object input', () => {
      expect(() => Note.deserialize('not a note')).toThrow(CorruptNoteError);
      expect(() => Note.deserialize(null)).toThrow(CorruptNoteError);
      expect(() => Note.deserialize([1, 2])).toThrow(CorruptNoteError);
    });

    it('rejects records from a newer schema version', () => {
      expect(() => Note.deserialize({ schema_version: 2, id: 'future' })).toThrow(
        'Unsupported note schema version 2'
      );
    });
  });
});
