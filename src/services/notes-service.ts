import { AutoSaveScheduler, DEFAULT_AUTO_SAVE_DELAY_MS } from '../core/auto-save-scheduler.js';
import { EditorBuffer } from '../core/editor-buffer.js';
import type { NoteEventBus, Unsubscribe } from '../core/event-bus.js';
import { Note } from '../core/note.js';
import { NoteIndex, SearchOptions } from '../core/note-index.js';
import type { DeleteOutcome, NoteRepository } from '../repositories/note-repository.js';
import {
  AutoSaveConfig,
  EventType,
  NoteEventPayloads,
  NoteSummary,
  SaveMode,
} from '../types/index.js';
import logger from '../utils/logger.js';
import { formatRelativeTime } from '../utils/relative-time.js';
import { createWelcomeNote } from './welcome-note.js';

export const SAVE_FAILED_MESSAGE = 'Failed to save note. Please try again.';

export type SaveOutcome = 'saved' | 'unchanged' | 'failed' | 'no-note';

export type FavoriteResult =
  | { status: 'updated'; note: Note }
  | { status: 'not-found' }
  | { status: 'failed' };

export interface NotesServiceOptions {
  autoSave?: Partial<AutoSaveConfig>;
  /** Seed an empty store with a welcome note on initialize. Defaults to true. */
  welcomeNote?: boolean;
}

export interface EditorState {
  noteId: string | null;
  content: string;
}

/**
 * Coordinates the editor buffer, auto-save scheduler, note index and
 * repository: the single owner of the "current note".
 *
 * Every repository write or delete runs through one queue, so a save is never
 * issued while another save or delete of the same note is still in flight.
 */
export class NotesService {
  private readonly repository: NoteRepository;
  private readonly eventBus: NoteEventBus;
  private readonly index: NoteIndex;
  private readonly editor: EditorBuffer;
  private readonly scheduler: AutoSaveScheduler;
  private readonly seedWelcomeNote: boolean;
  private readonly stopListening: Unsubscribe;
  private readonly unsavedIds = new Set<string>();
  private currentNote?: Note;
  private storageTail: Promise<void> = Promise.resolve();

  constructor(repository: NoteRepository, eventBus: NoteEventBus, options: NotesServiceOptions = {}) {
    this.repository = repository;
    this.eventBus = eventBus;
    this.index = new NoteIndex();
    this.editor = new EditorBuffer(eventBus);
    this.seedWelcomeNote = options.welcomeNote ?? true;
    this.scheduler = new AutoSaveScheduler(
      async () => (await this.persistCurrent('auto')) !== 'failed',
      options.autoSave?.delayMs ?? DEFAULT_AUTO_SAVE_DELAY_MS
    );
    if (options.autoSave?.enabled === false) {
      this.scheduler.disable();
    }

    this.stopListening = this.eventBus.on(EventType.ContentChanged, () => {
      this.scheduler.trigger();
    });
  }

  /**
   * Load every stored note, seed a welcome note into an empty store and open
   * the most recent note.
   */
  async initialize(): Promise<void> {
    let notes = await this.repository.loadAll();

    if (notes.length === 0 && this.seedWelcomeNote) {
      const welcome = createWelcomeNote();
      if (await this.repository.save(welcome)) {
        logger.info({ id: welcome.id }, 'Created welcome note');
        notes = [welcome];
      } else {
        logger.error('Failed to create welcome note');
      }
    }

    this.index.load(notes);
    if (notes.length > 0) {
      await this.openNote(notes[0].id);
    }
    logger.info({ count: notes.length }, 'Notes service initialized');
  }

  get current(): Note | undefined {
    return this.currentNote;
  }

  getNote(id: string): Note | undefined {
    return this.index.get(id);
  }

  listNotes(query = '', options: SearchOptions = {}): NoteSummary[] {
    const selectedId = this.index.getSelected()?.id;
    const now = new Date();
    return this.index.search(query, options).map((note) => ({
      id: note.id,
      title: note.title,
      preview: note.preview,
      modifiedAt: note.modifiedAt.toISOString(),
      modifiedRelative: formatRelativeTime(note.modifiedAt, now),
      isFavorite: note.isFavorite,
      selected: note.id === selectedId,
    }));
  }

  getEditorState(): EditorState {
    return {
      noteId: this.currentNote?.id ?? null,
      content: this.editor.getContent(),
    };
  }

  /**
   * Make a note current. The previously open note is flushed first.
   */
  async openNote(id: string): Promise<Note | undefined> {
    const note = this.index.get(id);
    if (!note) {
      return undefined;
    }
    if (this.currentNote?.id === id) {
      this.index.select(id);
      return note;
    }

    await this.flush();
    this.currentNote = note;
    this.index.select(id);
    this.editor.open(id, note.content);
    this.publish(EventType.NoteSelected, { noteId: id });
    logger.info({ id }, 'Opened note');
    return note;
  }

  async createNote(): Promise<Note | undefined> {
    await this.flush();

    const note = Note.create();
    if (!(await this.exclusive(() => this.repository.save(note)))) {
      logger.error('Failed to create new note');
      this.publish(EventType.NoteSaveFailed, {
        noteId: note.id,
        explicit: true,
        message: SAVE_FAILED_MESSAGE,
      });
      return undefined;
    }

    this.index.insertNew(note);
    this.publish(EventType.NoteCreated, { noteId: note.id });
    await this.openNote(note.id);
    logger.info({ id: note.id }, 'Created new note');
    return note;
  }

  /**
   * Editor input for the current note. Returns false when no note is open.
   */
  updateContent(html: string): boolean {
    if (!this.currentNote) {
      return false;
    }
    this.editor.setContent(html);
    return true;
  }

  /**
   * Explicit save of the current note, bypassing the debounce window. A save
   * already in flight finishes first, so the newest content is written last.
   */
  async saveNow(): Promise<SaveOutcome> {
    this.scheduler.cancel();
    return this.persistCurrent('explicit');
  }

  /**
   * Delete a note. Waits for any save already under way, so the file cannot
   * be written back after it is removed.
   */
  async deleteNote(id: string): Promise<DeleteOutcome> {
    const isCurrent = this.currentNote?.id === id;
    if (isCurrent) {
      this.scheduler.cancel();
    }

    const outcome = await this.exclusive(async () => {
      const result = await this.repository.delete(id);
      if (result !== 'failed') {
        this.forget(id);
      }
      return result;
    });

    if (outcome === 'failed') {
      logger.error({ id }, 'Failed to delete note');
      if (isCurrent) {
        this.scheduler.trigger();
      }
    } else if (outcome === 'deleted') {
      this.publish(EventType.NoteDeleted, { noteId: id });
    }
    return outcome;
  }

  async toggleFavorite(id: string): Promise<FavoriteResult> {
    const result = await this.exclusive(async (): Promise<FavoriteResult> => {
      const note = this.index.get(id);
      if (!note) {
        return { status: 'not-found' };
      }

      note.toggleFavorite();
      if (!(await this.repository.save(note))) {
        note.toggleFavorite();
        return { status: 'failed' };
      }

      this.unsavedIds.delete(id);
      this.index.replace(note);
      return { status: 'updated', note };
    });

    if (result.status === 'failed') {
      this.publish(EventType.NoteSaveFailed, {
        noteId: id,
        explicit: true,
        message: SAVE_FAILED_MESSAGE,
      });
    }
    return result;
  }

  getAutoSaveSettings(): AutoSaveConfig {
    return { delayMs: this.scheduler.delayMs, enabled: this.scheduler.isEnabled };
  }

  setAutoSave(settings: Partial<AutoSaveConfig>): AutoSaveConfig {
    if (settings.delayMs !== undefined) {
      this.scheduler.setDelay(settings.delayMs);
    }
    if (settings.enabled === true) {
      this.scheduler.enable();
    } else if (settings.enabled === false) {
      this.scheduler.disable();
    }
    return this.getAutoSaveSettings();
  }

  /**
   * Flush pending edits, retry notes whose last save failed and release the
   * scheduler.
   */
  async shutdown(): Promise<void> {
    await this.flush();

    for (const id of Array.from(this.unsavedIds)) {
      const note = this.index.get(id);
      if (note && (await this.exclusive(() => this.repository.save(note)))) {
        this.unsavedIds.delete(id);
      }
    }
    if (this.unsavedIds.size > 0) {
      logger.error({ ids: Array.from(this.unsavedIds) }, 'Shutting down with unsaved notes');
    }

    this.scheduler.dispose();
    this.stopListening();
    logger.info('Notes service stopped');
  }

  private async flush(): Promise<void> {
    if (this.currentNote) {
      await this.scheduler.saveNow();
    }
  }

  /**
   * Run storage work after everything queued before it has settled.
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.storageTail.then(task);
    // The caller sees the failure through `run`; the queue only needs to move on.
    this.storageTail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private persistCurrent(mode: SaveMode): Promise<SaveOutcome> {
    return this.exclusive(() => this.writeCurrent(mode));
  }

  /**
   * Commit the editor content into the current note and persist it. Content
   * is read here, when the queued save starts.
   */
  private async writeCurrent(mode: SaveMode): Promise<SaveOutcome> {
    const note = this.currentNote;
    if (!note) {
      return 'no-note';
    }

    const content = this.editor.getContent();
    if (content !== note.content) {
      note.updateContent(content);
      this.unsavedIds.add(note.id);
    }
    if (!this.unsavedIds.has(note.id)) {
      return 'unchanged';
    }

    if (!(await this.repository.save(note))) {
      logger.error({ id: note.id, mode }, 'Failed to save note');
      this.publish(EventType.NoteSaveFailed, {
        noteId: note.id,
        explicit: mode === 'explicit',
        ...(mode === 'explicit' ? { message: SAVE_FAILED_MESSAGE } : {}),
      });
      return 'failed';
    }

    this.unsavedIds.delete(note.id);
    this.index.replace(note);
    this.publish(EventType.NoteSaved, { noteId: note.id, title: note.title, mode });
    logger.debug({ id: note.id, mode }, 'Saved note');
    return 'saved';
  }

  private forget(id: string): void {
    this.index.remove(id);
    this.unsavedIds.delete(id);
    if (this.currentNote?.id === id) {
      this.scheduler.cancel();
      this.currentNote = undefined;
      this.editor.clear();
    }
  }

  private publish<K extends EventType>(type: K, payload: NoteEventPayloads[K]): void {
    this.eventBus.emit(type, payload, 'notes-service');
  }
}
