import path from 'path';
import { z } from 'zod';

import { AppError, zodIssues } from './errors';
import { LogLevel } from './logger';
import { DEFAULT_THRESHOLD } from './match/matcher';

export const DEFAULT_CATALOG_PATH = path.join(__dirname, '..', 'data', 'allergens.json');

// Layout of the @tesseract.js-data/<lang> packages for the default LSTM model
const TRAINEDDATA_DIR = '4.0.0_best_int';

/** Local language data installed from npm, if the package for `lang` is present. */
export function bundledLangPath(lang: string): string | undefined {
  try {
    const manifest = require.resolve(`@tesseract.js-data/${lang}/package.json`);
    return path.join(path.dirname(manifest), TRAINEDDATA_DIR);
  } catch {
    return undefined;
  }
}

const EnvSchema = z.object({
  CATALOG_PATH: z.string().trim().min(1).default(DEFAULT_CATALOG_PATH),
  MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_THRESHOLD),
  OCR_LANG: z.string().trim().min(1).default('eng'),
  OCR_LANG_PATH: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
});

export interface AppConfig {
  catalogPath: string;
  threshold: number;
  ocrLang: string;
  ocrLangPath?: string;
  logLevel: LogLevel;
}

/**
 * Read settings from the environment. OCR language data defaults to the
 * matching `@tesseract.js-data` package. Callers that want `.env` support load
 * it with dotenv first; this function only looks at `env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // blank entries from a .env template fall back to defaults
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new AppError('CONFIG_INVALID', 'Invalid environment configuration', {
      details: zodIssues(parsed.error)
    });
  }

  const { CATALOG_PATH, MATCH_THRESHOLD, OCR_LANG, OCR_LANG_PATH, LOG_LEVEL } = parsed.data;
  return {
    catalogPath: path.resolve(CATALOG_PATH),
    threshold: MATCH_THRESHOLD,
    ocrLang: OCR_LANG,
    ocrLangPath: OCR_LANG_PATH ?? bundledLangPath(OCR_LANG),
    logLevel: LOG_LEVEL
  };
}
