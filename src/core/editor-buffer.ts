import { EventType } from '../types/index.js';
import type { NoteEventBus } from './event-bus.js';

export interface SetContentOptions {
  /** Load content without announcing it as a user edit. */
  silent?: boolean;
}

/**
 * The HTML currently shown by the rendering surface.
 * Every non-silent change is announced as `content.changed` on the bus.
 */
export class EditorBuffer {
  private readonly eventBus: NoteEventBus;
  private html = '';
  private noteId?: string;

  constructor(eventBus: NoteEventBus) {
    this.eventBus = eventBus;
  }

  getContent(): string {
    return this.html;
  }

  get currentNoteId(): string | undefined {
    return this.noteId;
  }

  /**
   * Show a note's content. Does not count as an edit.
   */
  open(noteId: string, html: string): void {
    this.noteId = noteId;
    this.setContent(html, { silent: true });
  }

  setContent(html: string, options: SetContentOptions = {}): void {
    this.html = html;
    if (options.silent) {
      return;
    }
    this.eventBus.emit(EventType.ContentChanged, { noteId: this.noteId, length: html.length }, 'editor');
  }

  clear(): void {
    this.noteId = undefined;
    this.html = '';
  }
}
