import fs from 'fs';
import path from 'path';
import { logger } from './logger';

const ENV_LOADED = Symbol.for('STD_CRAWL_SERVICE_ENV_LOADED');

export function parseEnvFile(content: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const [key, ...rest] = trimmed.split('=');
    const value = rest.join('=').trim().replace(/^(['"])(.*)\1$/, '$2');
    if (key) {
      entries[key.trim()] = value;
    }
  }
  return entries;
}

export function loadEnv(envFile = path.resolve(process.cwd(), '.env')) {
  if (Reflect.get(globalThis, ENV_LOADED) === true) {
    return;
  }

  if (fs.existsSync(envFile)) {
    const entries = parseEnvFile(fs.readFileSync(envFile, 'utf-8'));
    for (const [key, value] of Object.entries(entries)) {
      if (!(key in process.env)) {
        process.env[key] = value;
      }
    }
    logger.info('Environment variables loaded from .env');
  }

  Reflect.set(globalThis, ENV_LOADED, true);
}
