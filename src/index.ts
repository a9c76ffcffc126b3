import Fastify from 'fastify';
import cors from '@fastify/cors';
import { loadConfig } from './utils/config.js';
import { registerRoutes } from './api/routes.js';
import { NoteEventBus } from './core/event-bus.js';
import { DiskNoteRepository } from './repositories/disk-note-repository.js';
import { MemoryNoteRepository } from './repositories/memory-note-repository.js';
import type { NoteRepository } from './repositories/note-repository.js';
import { NotesService } from './services/notes-service.js';
import type { AppConfig } from './types/index.js';
import { EventType } from './types/index.js';
import logger from './utils/logger.js';

function createRepository(config: AppConfig): NoteRepository {
  if (config.storage === 'memory') {
    logger.warn('Using in-memory note storage; notes will not survive a restart');
    return new MemoryNoteRepository();
  }
  logger.info({ notesDir: config.notesDir }, 'Using disk note storage');
  return new DiskNoteRepository(config.notesDir);
}

async function main() {
  // Load configuration
  const config = loadConfig();

  const eventBus = new NoteEventBus();
  eventBus.onAny((event) => {
    logger.debug({ eventType: event.type, payload: event.payload, source: event.source }, 'Event emitted');
  });
  eventBus.on(EventType.NoteSaveFailed, (event) => {
    if (event.payload.explicit) {
      logger.warn({ noteId: event.payload.noteId }, event.payload.message ?? 'Explicit save failed');
    }
  });

  const notesService = new NotesService(createRepository(config), eventBus, {
    autoSave: config.autoSave,
  });
  await notesService.initialize();

  // Initialize Fastify server
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  await app.register(cors, {
    origin: true,
  });

  await registerRoutes(app, notesService, config);

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info(
      { port: config.server.port, host: config.server.host },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown: the service flushes the open note before the scheduler goes away
  const shutdown = async () => {
    logger.info('Shutting down...');
    await app.close();
    await notesService.shutdown();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
