import { Note } from '../core/note.js';
import type { SerializedNote } from '../types/index.js';
import { DeleteOutcome, LoadResult, NoteRepository, sortByRecency } from './note-repository.js';

/**
 * In-memory NoteRepository implementation.
 * Keeps serialized snapshots, so a note handed out can be mutated freely
 * without touching what is stored.
 */
export class MemoryNoteRepository implements NoteRepository {
  private notes = new Map<string, SerializedNote>();

  async save(note: Note): Promise<boolean> {
    this.notes.set(note.id, note.serialize());
    return true;
  }

  async load(id: string): Promise<LoadResult> {
    const stored = this.notes.get(id);
    if (!stored) {
      return { status: 'not-found' };
    }
    return { status: 'found', note: Note.deserialize(stored) };
  }

  async loadAll(): Promise<Note[]> {
    return sortByRecency(Array.from(this.notes.values(), (stored) => Note.deserialize(stored)));
  }

  async delete(id: string): Promise<DeleteOutcome> {
    return this.notes.delete(id) ? 'deleted' : 'not-found';
  }

  async count(): Promise<number> {
    return this.notes.size;
  }
}
