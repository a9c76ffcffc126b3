import { beforeEach, describe, expect, it } from 'vitest';

import { Note } from '../core/note.js';
import { MemoryNoteRepository } from './memory-note-repository.js';

function createNote(id: string, content: string, modifiedAt: string): Note {
  return Note.deserialize({
    id,
    content,
    created_at: '2024-01-01T00:00:00.000Z',
    modified_at: modifiedAt,
  });
}

describe('MemoryNoteRepository', () => {
  let repository: MemoryNoteRepository;

  beforeEach(() => {
    repository = new MemoryNoteRepository();
  });

  it('persists notes via save and retrieves them', async () => {
    const note = createNote('a', 'Hello world', '2024-01-02T00:00:00.000Z');

    expect(await repository.save(note)).toBe(true);
    expect(await repository.load('a')).toEqual({ status: 'found', note });
    expect(await repository.count()).toBe(1);
  });

  it('hands out copies that do not alias stored state', async () => {
    const note = createNote('a', 'stored', '2024-01-02T00:00:00.000Z');
    await repository.save(note);
    note.updateContent('unsaved edit');

    const result = await repository.load('a');
    expect(result.status === 'found' && result.note.content).toBe('stored');
  });

  it('returns notes newest first', async () => {
    await repository.save(createNote('old', 'old', '2024-01-01T00:00:00.000Z'));
    await repository.save(createNote('new', 'new', '2024-03-01T00:00:00.000Z'));
    await repository.save(createNote('mid', 'mid', '2024-02-01T00:00:00.000Z'));

    expect((await repository.loadAll()).map((n) => n.id)).toEqual(['new', 'mid', 'old']);
  });

  it('deletes notes and reports unknown ids', async () => {
    await repository.save(createNote('a', 'x', '2024-01-02T00:00:00.000Z'));

    expect(await repository.delete('a')).toBe('deleted');
    expect(await repository.delete('a')).toBe('not-found');
    expect(await repository.load('a')).toEqual({ status: 'not-found' });
    expect(await repository.count()).toBe(0);
  });
});
