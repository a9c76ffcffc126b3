import type { Note } from '../core/note.js';

export type LoadResult =
  | { status: 'found'; note: Note }
  | { status: 'not-found' }
  | { status: 'corrupt'; reason: string }
  | { status: 'failed'; reason: string };

export type DeleteOutcome = 'deleted' | 'not-found' | 'failed';

/**
 * Storage abstraction for notes, keyed by note id.
 * Implementations report expected failures through return values and never
 * throw for them.
 */
export interface NoteRepository {
  /**
   * Persist or overwrite a single note. Resolves to false when the write failed.
   */
  save(note: Note): Promise<boolean>;

  /**
   * Return a single note by id.
   */
  load(id: string): Promise<LoadResult>;

  /**
   * Every readable note, newest modification first. Unreadable records are
   * skipped.
   */
  loadAll(): Promise<Note[]>;

  /**
   * Remove a single note by id if it exists.
   */
  delete(id: string): Promise<DeleteOutcome>;

  /**
   * Number of notes currently stored.
   */
  count(): Promise<number>;
}

export function sortByRecency(notes: Note[]): Note[] {
  return notes.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
}
