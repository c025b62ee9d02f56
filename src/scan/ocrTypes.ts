export type OcrEngineName = 'tesseract';

export interface OcrResult {
  /** Recognized text with its line breaks kept; clause grading reads them. */
  rawText: string;
  engine: OcrEngineName;
  /** Mean word confidence, 0-100, when the engine reports one. */
  confidence?: number;
}

/** Turns an image payload into text. Failures surface as `OcrError`. */
export interface OcrEngine {
  recognize(image: Buffer): Promise<OcrResult>;
}
