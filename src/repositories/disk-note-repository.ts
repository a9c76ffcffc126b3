import { promises as fs } from 'node:fs';
import { join, resolve } from 'node:path';

import { Note } from '../core/note.js';
import logger from '../utils/logger.js';
import { DeleteOutcome, LoadResult, NoteRepository, sortByRecency } from './note-repository.js';

const NOTE_EXTENSION = '.json';
const SAFE_NOTE_ID = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Raised for identifiers that cannot be used as a file name inside the notes
 * directory.
 */
export class InvalidNoteIdError extends Error {
  constructor(id: string) {
    super(`Invalid note id: ${JSON.stringify(id)}`);
    this.name = 'InvalidNoteIdError';
  }
}

export function isValidNoteId(id: string): boolean {
  return SAFE_NOTE_ID.test(id);
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Disk-backed NoteRepository implementation.
 * Stores one pretty-printed JSON file per note, `<root>/<id>.json`.
 * Writes go to a hidden temp file first and are renamed into place, so a
 * failed write leaves the previous version intact.
 */
export class DiskNoteRepository implements NoteRepository {
  private readonly root: string;
  private ready?: Promise<void>;
  private readonly maxParallel = 8;
  private tempCounter = 0;

  constructor(notesDir: string) {
    this.root = resolve(notesDir);
  }

  async save(note: Note): Promise<boolean> {
    let tempPath: string | undefined;
    try {
      const target = this.resolveNotePath(note.id);
      await this.ensureRoot();
      const json = JSON.stringify(note.serialize(), null, 2);
      this.tempCounter += 1;
      tempPath = join(this.root, `.${note.id}${NOTE_EXTENSION}.${process.pid}-${this.tempCounter}.tmp`);
      await fs.writeFile(tempPath, json, 'utf-8');
      await fs.rename(tempPath, target);
      logger.debug({ id: note.id }, 'Saved note');
      return true;
    } catch (error) {
      logger.error({ err: error, id: note.id }, 'Failed to save note');
      if (tempPath) {
        await this.removeTempFile(tempPath);
      }
      return false;
    }
  }

  async load(id: string): Promise<LoadResult> {
    if (!isValidNoteId(id)) {
      logger.warn({ id }, 'Rejected invalid note id');
      return { status: 'not-found' };
    }

    const result = await this.readRecord(id);
    switch (result.status) {
      case 'not-found':
        logger.warn({ id }, 'Note not found');
        break;
      case 'corrupt':
        logger.error({ id, reason: result.reason }, 'Note file is corrupt');
        break;
      case 'failed':
        logger.error({ id, reason: result.reason }, 'Failed to read note');
        break;
    }
    return result;
  }

  async loadAll(): Promise<Note[]> {
    let ids: string[];
    try {
      ids = await this.listIds();
    } catch (error) {
      logger.error({ err: error, notesDir: this.root }, 'Failed to list notes');
      return [];
    }

    const notes: Note[] = [];
    await this.runWithConcurrency(ids, async (id) => {
      const result = await this.readRecord(id);
      if (result.status === 'found') {
        notes.push(result.note);
      } else if (result.status !== 'not-found') {
        logger.error({ id, reason: result.reason }, 'Skipping unreadable note');
      }
    });

    logger.info({ count: notes.length, skipped: ids.length - notes.length }, 'Loaded notes');
    return sortByRecency(notes);
  }

  async delete(id: string): Promise<DeleteOutcome> {
    if (!isValidNoteId(id)) {
      logger.warn({ id }, 'Rejected invalid note id');
      return 'not-found';
    }

    try {
      await this.ensureRoot();
      await fs.unlink(this.resolveNotePath(id));
      logger.info({ id }, 'Deleted note');
      return 'deleted';
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        logger.warn({ id }, 'Note not found for deletion');
        return 'not-found';
      }
      logger.error({ err: error, id }, 'Failed to delete note');
      return 'failed';
    }
  }

  async count(): Promise<number> {
    try {
      const ids = await this.listIds();
      return ids.length;
    } catch (error) {
      logger.error({ err: error, notesDir: this.root }, 'Failed to count notes');
      return 0;
    }
  }

  private ensureRoot(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.root, { recursive: true }).then(
        () => {
          logger.info({ notesDir: this.root }, 'Notes directory ready');
        },
        (error: unknown) => {
          this.ready = undefined;
          throw error;
        }
      );
    }
    return this.ready;
  }

  private resolveNotePath(id: string): string {
    if (!isValidNoteId(id)) {
      throw new InvalidNoteIdError(id);
    }
    return join(this.root, `${id}${NOTE_EXTENSION}`);
  }

  private async readRecord(id: string): Promise<LoadResult> {
    let raw: string;
    try {
      await this.ensureRoot();
      raw = await fs.readFile(this.resolveNotePath(id), 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return { status: 'not-found' };
      }
      return { status: 'failed', reason: errorMessage(error) };
    }

    try {
      const note = Note.deserialize(JSON.parse(raw), { fallbackId: id });
      if (note.id !== id) {
        return { status: 'corrupt', reason: `Record id ${note.id} does not match file name` };
      }
      return { status: 'found', note };
    } catch (error) {
      return { status: 'corrupt', reason: errorMessage(error) };
    }
  }

  private async listIds(): Promise<string[]> {
    await this.ensureRoot();
    const entries = await fs.readdir(this.root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(NOTE_EXTENSION))
      .map((entry) => entry.name.slice(0, -NOTE_EXTENSION.length))
      .filter(isValidNoteId);
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      logger.warn({ err: error, tempPath }, 'Failed to remove temp file');
    }
  }

  private async runWithConcurrency<T>(
    items: T[],
    worker: (item: T) => Promise<void>
  ): Promise<void> {
    if (items.length === 0) {
      return;
    }
    let index = 0;
    const limit = Math.min(this.maxParallel, items.length);
    const runners = Array.from({ length: limit }, async () => {
      while (index < items.length) {
        const current = index++;
        await worker(items[current]);
      }
    });
    await Promise.all(runners);
  }
}
