import { CatalogStore } from '../data/catalogStore';
import { findPhrase, normalize } from '../data/parser';
import { HarmfulIngredient, PredictiveRisk } from '../data/types';

export interface HealthScore {
  score: number;
  found: HarmfulIngredient[];
}

const MAX_HEALTH_SCORE = 100;

// "sugar" also counts "sugars"
function mentions(text: string, phrase: string): boolean {
  return findPhrase(text, phrase) >= 0 || findPhrase(text, `${phrase}s`) >= 0;
}

export function computeHealthScore(rawText: string, harmful: readonly HarmfulIngredient[]): HealthScore {
  const text = normalize(rawText);
  const found = text ? harmful.filter((entry) => mentions(text, entry.ingredient)).map((entry) => ({ ...entry })) : [];
  const penalty = found.reduce((sum, entry) => sum + entry.weight, 0);
  return { score: Math.max(0, MAX_HEALTH_SCORE - penalty), found };
}

/** Allergens implied by foods named on the label (chocolate -> milk). */
export function predictAllergens(rawText: string, rules: readonly PredictiveRisk[]): string[] {
  const text = normalize(rawText);
  if (!text) {
    return [];
  }

  const predicted = new Set<string>();
  for (const rule of rules) {
    if (mentions(text, rule.food_item)) {
      for (const allergen of rule.possible_allergens) {
        predicted.add(allergen);
      }
    }
  }
  return Array.from(predicted).sort();
}

export function safeAlternativesFor(allergens: readonly string[], store: CatalogStore): Record<string, string[]> {
  const alternatives: Record<string, string[]> = {};
  for (const allergen of allergens) {
    alternatives[allergen] = [...store.safeAlternatives(allergen)];
  }
  return alternatives;
}
