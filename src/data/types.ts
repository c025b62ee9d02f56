/** Canonical allergen name -> alias terms. Frozen once built. */
export type AllergenCatalog = ReadonlyMap<string, readonly string[]>;

export interface AllergenEntry {
  name: string;
  display_name: string;
  aliases: string[];
  safe_alternatives: string[];
}

export interface PredictiveRisk {
  food_item: string;
  possible_allergens: string[];
}

export interface HarmfulIngredient {
  ingredient: string;
  weight: number;
}

export interface CatalogPack {
  version: string;
  allergens: AllergenEntry[];
  precautionary_phrases: string[];
  predictive_risks: PredictiveRisk[];
  harmful_ingredients: HarmfulIngredient[];
}
