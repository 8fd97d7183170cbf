/*
  Runtime settings
  ----------------
  Read from the environment (a .env file is loaded by bootstrap()).

    HISTORY_MAX_DEPTH      # undo/redo stack bound (default 500)
    TEMPLATES_USER_DIR     # per-user template directory (default: platform config dir)
    DEFAULT_TEMPLATE       # base template id (default generic_default)
    VOCAB_BASE_URL         # controlled-vocabulary API root
    VOCAB_TIMEOUT_MS       # per-request timeout (default 10000)
    VOCAB_CACHE_PATH       # JSON cache file for fetched vocabularies
    DEFAULT_COUNTRY=FR     # phone number parsing region
*/

import * as os from 'node:os';
import * as path from 'node:path';
import { isSupportedCountry, type CountryCode } from 'libphonenumber-js';

export interface Settings {
  historyMaxDepth: number;
  userTemplatesDir: string;
  defaultTemplate: string;
  vocabBaseUrl: string;
  vocabTimeoutMs: number;
  vocabCachePath: string | null;
  defaultCountry: CountryCode;
}

const APP_DIR = 'sheetcheck';

function country(raw: string | undefined, fallback: CountryCode): CountryCode {
  const code = (raw || '').trim().toUpperCase();
  return isSupportedCountry(code) ? code : fallback;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function userConfigDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'darwin') return path.join(os.homedir(), 'Library', 'Application Support', APP_DIR);
  if (platform === 'win32') return path.join(env.APPDATA || os.homedir(), APP_DIR);
  return path.join(env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), APP_DIR);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    historyMaxDepth: positiveInt(env.HISTORY_MAX_DEPTH, 500),
    userTemplatesDir: env.TEMPLATES_USER_DIR || path.join(userConfigDir(env), 'templates'),
    defaultTemplate: env.DEFAULT_TEMPLATE || 'generic_default',
    vocabBaseUrl: env.VOCAB_BASE_URL || 'https://api.nakala.fr',
    vocabTimeoutMs: positiveInt(env.VOCAB_TIMEOUT_MS, 10_000),
    vocabCachePath: env.VOCAB_CACHE_PATH || null,
    defaultCountry: country(env.DEFAULT_COUNTRY, 'FR'),
  };
}
