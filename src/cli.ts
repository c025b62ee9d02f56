#!/usr/bin/env node
/**
 * Scan an ingredient label from the terminal.
 *
 * Usage:
 *   allergen-scan label.jpg --profile milk,peanut
 *   allergen-scan --text "Contains: wheat flour, m1lk powder" --threshold 0.7
 *
 * Prints the scan response as JSON. Exit codes: 0 success, 1 failed scan or
 * fatal startup error, 2 bad arguments.
 */

import { config as loadEnv } from 'dotenv';

import { parseArgs, USAGE } from './cliArgs';
import { loadConfig } from './config';
import { CatalogStore } from './data/catalogStore';
import { toErrorBody } from './errors';
import { createLogger } from './logger';
import { parseProfile } from './profile/profile';
import { ScanService } from './scan/scanService';
import { TesseractOcrEngine } from './scan/tesseractOcr';

async function main(): Promise<number> {
  loadEnv();

  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    return 2;
  }
  const { options } = parsed;

  const config = loadConfig();
  const logger = createLogger('cli', config.logLevel);

  const store = CatalogStore.fromFile(config.catalogPath);
  logger.info(`catalog ${store.version} loaded`, { allergens: store.listAllergens().length });

  const service = new ScanService({
    store,
    ocr: new TesseractOcrEngine({ lang: config.ocrLang, langPath: config.ocrLangPath, logger }),
    threshold: options.threshold ?? config.threshold,
    logger: createLogger('scan', config.logLevel)
  });
  const profile = parseProfile(options.profile, store.listAllergens());

  const response =
    options.text !== undefined ? service.scanText(options.text, profile) : await service.scanFile(options.image ?? '', profile);

  process.stdout.write(`${JSON.stringify(response, null, 2)}\n`);
  return response.success ? 0 : 1;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('[cli] fatal:', toErrorBody(error));
      process.exitCode = 1;
    }
  );
}
