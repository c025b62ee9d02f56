import os from 'os';
import path from 'path';

import { CatalogStore } from '../data/catalogStore';
import { OcrError } from '../errors';
import { createLogger } from '../logger';
import { OcrEngine, OcrResult } from './ocrTypes';
import { ScanService } from './scanService';

const fixturesDir = path.join(__dirname, '..', 'data', '__fixtures__');
const store = CatalogStore.fromFile(path.join(fixturesDir, 'catalog.json'));

class FakeOcr implements OcrEngine {
  calls = 0;

  constructor(private readonly outcome: string | Error) {}

  async recognize(_image: Buffer): Promise<OcrResult> {
    this.calls += 1;
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return { rawText: this.outcome, engine: 'tesseract', confidence: 90 };
  }
}

function serviceFor(outcome: string | Error): { service: ScanService; ocr: FakeOcr } {
  const ocr = new FakeOcr(outcome);
  const service = new ScanService({ store, ocr, threshold: 0.8, logger: createLogger('scan', 'silent') });
  return { service, ocr };
}

const LABEL = 'Milk chocolate (sugar, cocoa butter, whole m1lk powder, soy lecithin), preservative: sodium benzoate. May contain peanuts.';
const image = Buffer.from('fake image bytes');

describe('ScanService.scanImage', () => {
  it('returns matches, profile matches and label insights', async () => {
    const { service } = serviceFor(LABEL);
    const response = await service.scanImage(image, new Set(['peanut', 'sulfites']));

    expect(response).toEqual({
      success: true,
      raw_text: LABEL,
      matches: [
        {
          allergen: 'milk',
          display_name: 'Milk / Dairy',
          severity: 'high',
          hits: [{ term: 'milk', score: 1 }],
          max_score: 1
        },
        {
          allergen: 'peanut',
          display_name: 'Peanut',
          severity: 'medium',
          hits: [{ term: 'peanut', score: 1 }],
          max_score: 1
        },
        {
          allergen: 'soy',
          display_name: 'soy',
          severity: 'high',
          hits: [
            { term: 'soy', score: 1 },
            { term: 'soya lecithin', score: 0.846 }
          ],
          max_score: 1
        }
      ],
      profile_matches: [
        {
          allergen: 'peanut',
          display_name: 'Peanut',
          severity: 'medium',
          hits: [{ term: 'peanut', score: 1 }],
          max_score: 1
        }
      ],
      precautionary: true,
      message: 'Medium risk (precautionary statement): Peanut',
      safe_alternatives: {
        milk: ['Oat milk'],
        peanut: ['Sunflower seed butter'],
        soy: []
      },
      health_score: 65,
      health_found: [
        { ingredient: 'sugar', weight: 20 },
        { ingredient: 'sodium benzoate', weight: 15 }
      ],
      predictive_allergens: ['milk', 'peanut']
    });
  });

  it('treats an empty OCR result as a scan with nothing found', async () => {
    const { service } = serviceFor('');
    const response = await service.scanImage(image, new Set(['milk']));

    expect(response.success).toBe(true);
    if (response.success) {
      expect(response.matches).toEqual([]);
      expect(response.profile_matches).toEqual([]);
      expect(response.message).toBe('No allergens detected.');
      expect(response.health_score).toBe(100);
    }
  });

  it('surfaces OCR failures as a failed scan', async () => {
    const { service } = serviceFor(new OcrError('Could not read text from image: corrupt PNG'));
    const response = await service.scanImage(image, new Set());

    expect(response).toEqual({
      success: false,
      error: { code: 'OCR_FAILED', message: 'Could not read text from image: corrupt PNG' }
    });
  });

  it('rejects an empty image without calling OCR', async () => {
    const { service, ocr } = serviceFor(LABEL);
    const response = await service.scanImage(Buffer.alloc(0), new Set());

    expect(response).toEqual({ success: false, error: { code: 'BAD_REQUEST', message: 'No image provided.' } });
    expect(ocr.calls).toBe(0);
  });

  it('lets unexpected errors propagate', async () => {
    const { service } = serviceFor(new TypeError('bug in engine adapter'));
    await expect(service.scanImage(image, new Set())).rejects.toThrow('bug in engine adapter');
  });
});

describe('ScanService.scanFile', () => {
  it('reads the image from disk', async () => {
    const { service, ocr } = serviceFor('whey protein');
    const response = await service.scanFile(path.join(fixturesDir, 'catalog.json'), new Set(['milk']));

    expect(ocr.calls).toBe(1);
    expect(response.success && response.message).toBe('High risk: Milk / Dairy');
  });

  it('reports a missing file as a bad request', async () => {
    const { service } = serviceFor(LABEL);
    const missing = path.join(os.tmpdir(), 'no-such-label-image.jpg');
    const response = await service.scanFile(missing, new Set());

    expect(response).toEqual({
      success: false,
      error: { code: 'BAD_REQUEST', message: `Cannot read image at ${missing}.` }
    });
  });
});

describe('ScanService.scanText', () => {
  it('grades an ingredient listed after a precaution sentence as high', () => {
    const { service } = serviceFor('');
    const response = service.scanText('May contain traces of peanut.\nIngredients: sugar, milk powder.', new Set(['milk', 'peanut']));

    expect(response.profile_matches.map((item) => [item.allergen, item.severity])).toEqual([
      ['milk', 'high'],
      ['peanut', 'medium']
    ]);
    expect(response.message).toBe('High risk: Milk / Dairy\nMedium risk (precautionary statement): Peanut');
  });

  it('hands out copies of catalog data', () => {
    const { service } = serviceFor('');
    const first = service.scanText('milk', new Set());
    first.safe_alternatives.milk.push('Cow milk');

    expect(service.scanText('milk', new Set()).safe_alternatives).toEqual({ milk: ['Oat milk'] });
    expect(store.safeAlternatives('milk')).toEqual(['Oat milk']);
  });

  it('is deterministic for identical input', () => {
    const { service } = serviceFor('');
    const first = JSON.stringify(service.scanText(LABEL, new Set(['milk'])));
    expect(JSON.stringify(service.scanText(LABEL, new Set(['milk'])))).toBe(first);
  });
});
