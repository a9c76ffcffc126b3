import dotenv from 'dotenv';
import { DEFAULT_AUTO_SAVE_DELAY_MS, MAX_AUTO_SAVE_DELAY_MS } from '../core/auto-save-scheduler.js';
import { AppConfig, StorageKind } from '../types/index.js';

dotenv.config();

function parseDelay(raw: string | undefined): number {
  const parsed = parseInt(raw || String(DEFAULT_AUTO_SAVE_DELAY_MS), 10);
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= MAX_AUTO_SAVE_DELAY_MS
    ? parsed
    : DEFAULT_AUTO_SAVE_DELAY_MS;
}

function parseStorage(raw: string | undefined): StorageKind {
  return raw === 'memory' ? 'memory' : 'disk';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    notesDir: env.NOTES_DIR || './notes',
    storage: parseStorage(env.NOTES_STORAGE),
    autoSave: {
      delayMs: parseDelay(env.AUTO_SAVE_DELAY_MS),
      enabled: env.AUTO_SAVE_ENABLED !== 'false',
    },
    server: {
      port: parseInt(env.PORT || '3000', 10),
      host: env.HOST || '127.0.0.1',
    },
  };
}
