import fs from 'fs';

import { CatalogStore } from '../data/catalogStore';
import { HarmfulIngredient } from '../data/types';
import { AppError, ErrorBody, OcrError, toErrorBody } from '../errors';
import { createLogger, Logger } from '../logger';
import { DEFAULT_THRESHOLD, filterByProfile, match } from '../match/matcher';
import { Profile } from '../profile/profile';
import { AssessedMatch, assessMatches, Severity, summarize } from '../risk/engine';
import { computeHealthScore, predictAllergens, safeAlternativesFor } from '../risk/insights';
import { OcrEngine, OcrResult } from './ocrTypes';

export interface ScanHitBody {
  term: string;
  score: number;
}

export interface ScanMatchBody {
  allergen: string;
  display_name: string;
  severity: Severity;
  hits: ScanHitBody[];
  max_score: number;
}

export interface ScanSuccess {
  success: true;
  raw_text: string;
  matches: ScanMatchBody[];
  profile_matches: ScanMatchBody[];
  precautionary: boolean;
  message: string;
  safe_alternatives: Record<string, string[]>;
  health_score: number;
  health_found: HarmfulIngredient[];
  predictive_allergens: string[];
}

export interface ScanFailure {
  success: false;
  error: ErrorBody;
}

export type ScanResponse = ScanSuccess | ScanFailure;

export interface ScanServiceOptions {
  store: CatalogStore;
  ocr: OcrEngine;
  threshold?: number;
  logger?: Logger;
}

function toMatchBody(item: AssessedMatch): ScanMatchBody {
  return {
    allergen: item.allergen,
    display_name: item.displayName,
    severity: item.severity,
    hits: item.hits.map((hit) => ({ term: hit.term, score: hit.score })),
    max_score: item.maxScore
  };
}

/**
 * OCR -> match -> profile filter -> response body. Only OCR and input
 * problems become failure responses; anything else thrown while matching is a
 * defect and propagates to the caller.
 */
export class ScanService {
  private readonly store: CatalogStore;
  private readonly ocr: OcrEngine;
  private readonly threshold: number;
  private readonly logger: Logger;

  constructor(options: ScanServiceOptions) {
    this.store = options.store;
    this.ocr = options.ocr;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this.logger = options.logger ?? createLogger('scan');
  }

  scanText(rawText: string, profile: Profile): ScanSuccess {
    const { store } = this;
    const matches = match(rawText, store.catalog, this.threshold);
    const assessment = assessMatches(rawText, matches, {
      precautionaryPhrases: store.precautionaryPhrases,
      displayName: (allergen) => store.displayName(allergen)
    });
    const health = computeHealthScore(rawText, store.harmfulIngredients);

    this.logger.info('scan complete', {
      matches: matches.length,
      high: assessment.highCount,
      medium: assessment.mediumCount,
      low: assessment.lowCount
    });

    return {
      success: true,
      raw_text: rawText,
      matches: assessment.items.map(toMatchBody),
      profile_matches: filterByProfile(assessment.items, profile).map(toMatchBody),
      precautionary: assessment.precautionary,
      message: summarize(assessment, profile),
      safe_alternatives: safeAlternativesFor(
        matches.map((found) => found.allergen),
        store
      ),
      health_score: health.score,
      health_found: health.found,
      predictive_allergens: predictAllergens(rawText, store.predictiveRisks)
    };
  }

  async scanImage(image: Buffer, profile: Profile): Promise<ScanResponse> {
    if (image.length === 0) {
      return this.fail(new AppError('BAD_REQUEST', 'No image provided.'));
    }

    let result: OcrResult;
    try {
      result = await this.ocr.recognize(image);
    } catch (error) {
      if (error instanceof OcrError) {
        return this.fail(error);
      }
      throw error;
    }

    this.logger.debug('ocr finished', { engine: result.engine, confidence: result.confidence, chars: result.rawText.length });
    return this.scanText(result.rawText, profile);
  }

  async scanFile(filePath: string, profile: Profile): Promise<ScanResponse> {
    let image: Buffer;
    try {
      image = await fs.promises.readFile(filePath);
    } catch (error) {
      return this.fail(new AppError('BAD_REQUEST', `Cannot read image at ${filePath}.`, { cause: error }));
    }
    return this.scanImage(image, profile);
  }

  private fail(error: AppError): ScanFailure {
    this.logger.warn('scan failed', { code: error.code, message: error.message });
    return { success: false, error: toErrorBody(error) };
  }
}
