/**
 * Core type definitions for quillbox
 */

export type StorageKind = 'disk' | 'memory';

export interface AutoSaveConfig {
  delayMs: number;
  enabled: boolean;
}

export interface AppConfig {
  notesDir: string;
  storage: StorageKind;
  autoSave: AutoSaveConfig;
  server: {
    port: number;
    host: string;
  };
}

/**
 * On-disk shape of a note. Field names are snake_case so the files stay
 * readable by other tools.
 */
export interface SerializedNote {
  schema_version: number;
  id: string;
  title: string;
  content: string;
  created_at: string; // ISO-8601
  modified_at: string; // ISO-8601
  is_favorite: boolean;
}

/**
 * List-row projection of a note handed to the selection UI.
 */
export interface NoteSummary {
  id: string;
  title: string;
  preview: string;
  modifiedAt: string;
  modifiedRelative: string;
  isFavorite: boolean;
  selected: boolean;
}

export enum EventType {
  ContentChanged = 'content.changed',
  NoteCreated = 'note.created',
  NoteSelected = 'note.selected',
  NoteSaved = 'note.saved',
  NoteSaveFailed = 'note.save_failed',
  NoteDeleted = 'note.deleted',
}

export type SaveMode = 'auto' | 'explicit';

/**
 * Payload carried by each event type.
 */
export interface NoteEventPayloads {
  [EventType.ContentChanged]: { noteId?: string; length: number };
  [EventType.NoteCreated]: { noteId: string };
  [EventType.NoteSelected]: { noteId: string };
  [EventType.NoteSaved]: { noteId: string; title: string; mode: SaveMode };
  [EventType.NoteSaveFailed]: { noteId: string; explicit: boolean; message?: string };
  [EventType.NoteDeleted]: { noteId: string };
}

export interface NoteEvent<K extends EventType = EventType> {
  type: K;
  timestamp: Date;
  source: string;
  payload: NoteEventPayloads[K];
}

export type NoteEventListener<K extends EventType = EventType> = (
  event: NoteEvent<K>
) => void | Promise<void>;
