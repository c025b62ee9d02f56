export { loadConfig, bundledLangPath, AppConfig, DEFAULT_CATALOG_PATH } from './config';
export { CatalogStore, catalogFromRecord, loadCatalogFromRoot } from './data/catalogStore';
export { normalize, clauseStarts, tokenize, foldOcrSlips, findPhrase, Token, TokenType } from './data/parser';
export { AllergenCatalog, AllergenEntry, CatalogPack, HarmfulIngredient, PredictiveRisk } from './data/types';
export { AppError, CatalogLoadError, OcrError, ErrorBody, ErrorCode, toErrorBody } from './errors';
export { createLogger, Logger, LogLevel } from './logger';
export { match, filterByProfile, AllergenMatch, MatchHit, DEFAULT_THRESHOLD } from './match/matcher';
export { similarity, SLIP_EDIT_COST, PLAIN_EDIT_COST, MIN_FUZZY_LENGTH, Span } from './match/similarity';
export { parseProfile, toggleAllergen, serializeProfile, Profile } from './profile/profile';
export { assessMatches, summarize, AssessedMatch, RiskAssessment, Severity } from './risk/engine';
export { computeHealthScore, predictAllergens, safeAlternativesFor, HealthScore } from './risk/insights';
export { OcrEngine, OcrEngineName, OcrResult } from './scan/ocrTypes';
export { ScanService, ScanResponse, ScanSuccess, ScanFailure, ScanMatchBody } from './scan/scanService';
export { TesseractOcrEngine } from './scan/tesseractOcr';
