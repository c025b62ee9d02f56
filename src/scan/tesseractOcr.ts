import Tesseract from 'tesseract.js';

import { OcrError } from '../errors';
import { Logger } from '../logger';
import { OcrEngine, OcrResult } from './ocrTypes';

export interface TesseractOptions {
  lang: string;
  /** Directory (or URL) holding `<lang>.traineddata`. */
  langPath?: string;
  logger?: Logger;
}

export class TesseractOcrEngine implements OcrEngine {
  constructor(private readonly options: TesseractOptions) {}

  async recognize(image: Buffer): Promise<OcrResult> {
    const { lang, langPath, logger } = this.options;
    if (!langPath) {
      throw new OcrError(`No language data for "${lang}". Install @tesseract.js-data/${lang} or set OCR_LANG_PATH.`);
    }

    try {
      const { data } = await Tesseract.recognize(image, lang, { langPath });
      logger?.debug('tesseract finished', { confidence: data.confidence });
      return { rawText: data.text || '', engine: 'tesseract', confidence: data.confidence };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OcrError(`Could not read text from image: ${reason}`, { cause: error });
    }
  }
}
