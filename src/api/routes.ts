import { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { MAX_AUTO_SAVE_DELAY_MS } from '../core/auto-save-scheduler.js';
import { NotesService, SAVE_FAILED_MESSAGE } from '../services/notes-service.js';
import { AppConfig } from '../types/index.js';

const editorBodySchema = z.object({
  content: z.string(),
});

const listQuerySchema = z.object({
  q: z.string().default(''),
  favorites: z.enum(['true', 'false']).optional(),
});

const autoSaveBodySchema = z
  .object({
    delayMs: z.number().int().nonnegative().max(MAX_AUTO_SAVE_DELAY_MS).optional(),
    enabled: z.boolean().optional(),
  })
  .strict();

function invalidRequest(error: z.ZodError, part: 'body' | 'query' = 'body') {
  return {
    error: `Invalid request ${part}`,
    issues: error.issues.map((issue) => `${issue.path.join('.') || part}: ${issue.message}`),
  };
}

export async function registerRoutes(
  app: FastifyInstance,
  notesService: NotesService,
  config: AppConfig
) {
  // Health check
  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // List notes, optionally filtered
  app.get('/notes', async (request, reply) => {
    const parsed = listQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(parsed.error, 'query');
    }
    const { q, favorites } = parsed.data;
    return notesService.listNotes(q, { favoritesOnly: favorites === 'true' });
  });

  // Get specific note
  app.get<{ Params: { id: string } }>('/notes/:id', async (request, reply) => {
    const note = notesService.getNote(request.params.id);
    if (!note) {
      reply.code(404);
      return { error: 'Note not found' };
    }
    return note.serialize();
  });

  // Create a note and open it
  app.post('/notes', async (_request, reply) => {
    const note = await notesService.createNote();
    if (!note) {
      reply.code(500);
      return { error: 'Failed to create new note. Please try again.' };
    }
    reply.code(201);
    return note.serialize();
  });

  // Open a note in the editor
  app.post<{ Params: { id: string } }>('/notes/:id/select', async (request, reply) => {
    const note = await notesService.openNote(request.params.id);
    if (!note) {
      reply.code(404);
      return { error: 'Note not found' };
    }
    return note.serialize();
  });

  app.post<{ Params: { id: string } }>('/notes/:id/favorite', async (request, reply) => {
    const result = await notesService.toggleFavorite(request.params.id);
    if (result.status === 'not-found') {
      reply.code(404);
      return { error: 'Note not found' };
    }
    if (result.status === 'failed') {
      reply.code(500);
      return { error: SAVE_FAILED_MESSAGE };
    }
    return result.note.serialize();
  });

  app.delete<{ Params: { id: string } }>('/notes/:id', async (request, reply) => {
    const outcome = await notesService.deleteNote(request.params.id);
    if (outcome === 'not-found') {
      reply.code(404);
      return { error: 'Note not found' };
    }
    if (outcome === 'failed') {
      reply.code(500);
      return { error: 'Failed to delete note. Please try again.' };
    }
    return reply.code(204).send();
  });

  // Rendering surface: current content in, edits out
  app.get('/editor', async () => {
    return notesService.getEditorState();
  });

  app.put<{ Body: unknown }>('/editor', async (request, reply) => {
    const parsed = editorBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(parsed.error);
    }
    if (!notesService.updateContent(parsed.data.content)) {
      reply.code(409);
      return { error: 'No note is open' };
    }
    reply.code(202);
    return { message: 'Content accepted' };
  });

  app.post('/editor/save', async (_request, reply) => {
    const outcome = await notesService.saveNow();
    if (outcome === 'failed') {
      reply.code(500);
      return { error: SAVE_FAILED_MESSAGE };
    }
    return { outcome };
  });

  // Get current configuration
  app.get('/config', async () => {
    return {
      notesDir: config.notesDir,
      storage: config.storage,
      autoSave: notesService.getAutoSaveSettings(),
      server: {
        port: config.server.port,
        host: config.server.host,
      },
    };
  });

  // Update auto-save configuration
  app.put<{ Body: unknown }>('/config/autosave', async (request, reply) => {
    const parsed = autoSaveBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400);
      return invalidRequest(parsed.error);
    }

    config.autoSave = notesService.setAutoSave(parsed.data);
    return { message: 'Configuration updated', autoSave: config.autoSave };
  });
}
