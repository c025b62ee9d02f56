import { z } from 'zod';

import { normalize } from './parser';
import { CatalogPack } from './types';

export const DEFAULT_PRECAUTIONARY_PHRASES = [
  'may contain',
  'may also contain',
  'produced in a facility',
  'made in a factory',
  'made on shared equipment',
  'traces of'
];

const trimmed = z.string().trim().min(1);

const AllergenEntrySchema = z.object({
  name: trimmed.toLowerCase(),
  display_name: z.string().trim().optional(),
  aliases: z.array(trimmed).min(1, 'alias list must not be empty'),
  safe_alternatives: z.array(trimmed).default([])
});

const PredictiveRiskSchema = z.object({
  food_item: trimmed,
  possible_allergens: z.array(trimmed.toLowerCase()).min(1)
});

const HarmfulIngredientSchema = z.object({
  ingredient: trimmed,
  weight: z.number().int().positive()
});

export const CatalogPackSchema: z.ZodType<CatalogPack, z.ZodTypeDef, unknown> = z
  .object({
    version: trimmed,
    allergens: z.array(AllergenEntrySchema),
    precautionary_phrases: z.array(trimmed).default(DEFAULT_PRECAUTIONARY_PHRASES),
    predictive_risks: z.array(PredictiveRiskSchema).default([]),
    harmful_ingredients: z.array(HarmfulIngredientSchema).default([])
  })
  .superRefine((pack, ctx) => {
    const names = new Set<string>();
    pack.allergens.forEach((entry, index) => {
      if (names.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['allergens', index, 'name'],
          message: `duplicate allergen name "${entry.name}"`
        });
      }
      names.add(entry.name);

      entry.aliases.forEach((alias, aliasIndex) => {
        if (!normalize(alias)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['allergens', index, 'aliases', aliasIndex],
            message: `alias "${alias}" has no letters or digits`
          });
        }
      });
    });

    pack.predictive_risks.forEach((risk, index) => {
      for (const allergen of risk.possible_allergens) {
        if (!names.has(allergen)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['predictive_risks', index, 'possible_allergens'],
            message: `unknown allergen "${allergen}"`
          });
        }
      }
    });
  })
  .transform((pack) => ({
    ...pack,
    allergens: pack.allergens.map((entry) => ({
      ...entry,
      display_name: entry.display_name || entry.name
    }))
  }));
