import { htmlToPlainText } from '../utils/html-text.js';
import logger from '../utils/logger.js';
import type { Note } from './note.js';

export interface SearchOptions {
  favoritesOnly?: boolean;
}

/**
 * In-memory working set of notes, newest first, with single selection.
 *
 * Order is established by {@link load} and then maintained incrementally:
 * new notes go to the front, edited notes keep their slot.
 */
export class NoteIndex {
  private notes: Note[] = [];
  private selectedId?: string;

  get size(): number {
    return this.notes.length;
  }

  /**
   * Replace the working set. `notes` is expected to be sorted by recency.
   */
  load(notes: Note[]): void {
    this.notes = [...notes];
    if (this.selectedId && !this.get(this.selectedId)) {
      this.selectedId = undefined;
    }
    logger.info({ count: notes.length }, 'Note index loaded');
  }

  list(): readonly Note[] {
    return this.notes;
  }

  get(id: string): Note | undefined {
    return this.notes.find((note) => note.id === id);
  }

  insertNew(note: Note): void {
    this.notes.unshift(note);
    logger.debug({ id: note.id }, 'Note added to index');
  }

  /**
   * Swap in the record with the same id, keeping its position.
   */
  replace(note: Note): boolean {
    const position = this.notes.findIndex((candidate) => candidate.id === note.id);
    if (position === -1) {
      return false;
    }
    this.notes[position] = note;
    logger.debug({ id: note.id }, 'Note updated in index');
    return true;
  }

  remove(id: string): boolean {
    const before = this.notes.length;
    this.notes = this.notes.filter((note) => note.id !== id);
    if (this.selectedId === id) {
      this.selectedId = undefined;
    }
    return this.notes.length !== before;
  }

  /**
   * Make `id` the selection. Unknown ids leave the selection unchanged.
   */
  select(id: string): boolean {
    if (!this.get(id)) {
      return false;
    }
    this.selectedId = id;
    return true;
  }

  getSelected(): Note | undefined {
    return this.selectedId ? this.get(this.selectedId) : undefined;
  }

  /**
   * Case-insensitive substring match on title or plain-text content.
   * Returns a filtered copy; the index itself is untouched.
   */
  search(query: string, options: SearchOptions = {}): Note[] {
    const needle = query.trim().toLowerCase();
    return this.notes.filter((note) => {
      if (options.favoritesOnly && !note.isFavorite) {
        return false;
      }
      if (!needle) {
        return true;
      }
      return (
        note.title.toLowerCase().includes(needle) ||
        htmlToPlainText(note.content).toLowerCase().includes(needle)
      );
    });
  }
}
