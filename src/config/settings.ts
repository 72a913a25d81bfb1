import * as dotenv from 'dotenv';
import path from 'path';

export interface Settings {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  defaultModel: string;
  logLevel?: string;
  logDir?: string;
  nodeEnv: string;
}

let loaded = false;

function loadEnv(): void {
  if (loaded) return;
  loaded = true;
  dotenv.config({ path: process.env.DOTENV_PATH || path.resolve(process.cwd(), '.env') });
}

/**
 * Read runtime settings. `.env` is loaded once; explicit process
 * environment always wins over the file.
 */
export function getSettings(): Settings {
  loadEnv();
  return {
    openaiApiKey: process.env.OPENAI_API_KEY || undefined,
    openaiBaseUrl: process.env.OPENAI_BASE_URL || undefined,
    defaultModel: process.env.ARIUM_DEFAULT_MODEL || process.env.OPENAI_MODEL || 'gpt-4o-mini',
    logLevel: process.env.LOG_LEVEL || undefined,
    logDir: process.env.LOG_DIR || undefined,
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}
