import fs from 'fs';
import path from 'path';
import { ZodError } from 'zod';

import { CatalogLoadError, zodIssues } from '../errors';
import { CatalogPackSchema } from './schema';
import { AllergenCatalog, AllergenEntry, CatalogPack, HarmfulIngredient, PredictiveRisk } from './types';

function freezeCatalog(entries: Iterable<[string, readonly string[]]>): AllergenCatalog {
  const map = new Map<string, readonly string[]>();
  for (const [name, aliases] of entries) {
    map.set(name, Object.freeze([...aliases]));
  }
  return map;
}

function freezePack(pack: CatalogPack): CatalogPack {
  for (const entry of pack.allergens) {
    Object.freeze(entry.aliases);
    Object.freeze(entry.safe_alternatives);
    Object.freeze(entry);
  }
  for (const risk of pack.predictive_risks) {
    Object.freeze(risk.possible_allergens);
    Object.freeze(risk);
  }
  pack.harmful_ingredients.forEach((entry) => Object.freeze(entry));
  Object.freeze(pack.allergens);
  Object.freeze(pack.precautionary_phrases);
  Object.freeze(pack.predictive_risks);
  Object.freeze(pack.harmful_ingredients);
  return Object.freeze(pack);
}

function parsePack(value: unknown, source: string): CatalogPack {
  try {
    return CatalogPackSchema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new CatalogLoadError(`Malformed allergen catalog (${source})`, {
        cause: error,
        details: zodIssues(error)
      });
    }
    throw error;
  }
}

export class CatalogStore {
  readonly catalog: AllergenCatalog;
  private readonly pack: CatalogPack;
  private readonly entries: Map<string, AllergenEntry> = new Map();

  private constructor(pack: CatalogPack) {
    this.pack = freezePack(pack);
    for (const entry of pack.allergens) {
      this.entries.set(entry.name, entry);
    }
    this.catalog = freezeCatalog(pack.allergens.map((entry): [string, string[]] => [entry.name, entry.aliases]));
  }

  static fromFile(filePath: string): CatalogStore {
    let payload: string;
    try {
      payload = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new CatalogLoadError(`Cannot read allergen catalog at ${filePath}`, { cause: error });
    }

    let value: unknown;
    try {
      value = JSON.parse(payload);
    } catch (error) {
      throw new CatalogLoadError(`Allergen catalog at ${filePath} is not valid JSON`, { cause: error });
    }

    return new CatalogStore(parsePack(value, filePath));
  }

  static fromPack(value: unknown): CatalogStore {
    return new CatalogStore(parsePack(value, 'in-memory pack'));
  }

  get version(): string {
    return this.pack.version;
  }

  get precautionaryPhrases(): readonly string[] {
    return this.pack.precautionary_phrases;
  }

  get predictiveRisks(): readonly PredictiveRisk[] {
    return this.pack.predictive_risks;
  }

  get harmfulIngredients(): readonly HarmfulIngredient[] {
    return this.pack.harmful_ingredients;
  }

  listAllergens(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  displayName(name: string): string {
    return this.entries.get(name)?.display_name ?? name;
  }

  safeAlternatives(name: string): readonly string[] {
    return this.entries.get(name)?.safe_alternatives ?? [];
  }
}

/**
 * Build a catalog straight from `{ name: aliases }`, applying the same rules
 * as a pack file.
 */
export function catalogFromRecord(record: Record<string, string[]>): AllergenCatalog {
  const pack = parsePack(
    {
      version: 'inline',
      allergens: Object.entries(record).map(([name, aliases]) => ({ name, aliases }))
    },
    'inline record'
  );
  return freezeCatalog(pack.allergens.map((entry): [string, string[]] => [entry.name, entry.aliases]));
}

export function loadCatalogFromRoot(rootDir: string): CatalogStore {
  const filePath = path.join(rootDir, 'data', 'allergens.json');
  return CatalogStore.fromFile(filePath);
}
