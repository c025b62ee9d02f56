import { catalogFromRecord } from '../data/catalogStore';
import { AllergenMatch, filterByProfile, match } from './matcher';

const catalog = catalogFromRecord({
  peanut: ['peanut', 'arachis'],
  milk: ['milk', 'lactose']
});

const names = (matches: AllergenMatch[]) => matches.map((found) => found.allergen);

describe('match', () => {
  it('finds exact aliases and breaks score ties by name', () => {
    expect(match('contains arachis oil and milk solids', catalog, 0.6)).toEqual([
      {
        allergen: 'milk',
        maxScore: 1,
        hits: [{ term: 'milk', score: 1, matched: 'milk', start: 25, end: 29, spans: [{ start: 25, end: 29 }] }]
      },
      {
        allergen: 'peanut',
        maxScore: 1,
        hits: [{ term: 'arachis', score: 1, matched: 'arachis', start: 9, end: 16, spans: [{ start: 9, end: 16 }] }]
      }
    ]);
  });

  it('returns nothing for labels without allergens', () => {
    expect(match('sugar, water, salt', catalog, 0.6)).toEqual([]);
  });

  it('tolerates OCR character slips', () => {
    expect(match('m1lk powder', catalog, 0.6)).toEqual([
      {
        allergen: 'milk',
        maxScore: 0.9,
        hits: [{ term: 'milk', score: 0.9, matched: 'm1lk', start: 0, end: 4, spans: [{ start: 0, end: 4 }] }]
      }
    ]);
  });

  it('sorts hits by score, then alias', () => {
    const dairy = catalogFromRecord({ milk: ['whey', 'milk', 'lactose'] });
    const [found] = match('milk whey lact0se', dairy);
    expect(found.hits.map((hit) => [hit.term, hit.score])).toEqual([
      ['milk', 1],
      ['whey', 1],
      ['lactose', 0.943]
    ]);
  });

  it('matches additive codes however the label writes them', () => {
    const additives = catalogFromRecord({ soy: ['lecithin (e322)'], sulfites: ['e220'] });
    const found = match('Emulsifier: Lecithin (E 322). Preservative INS 220', additives);
    expect(found.map((item) => [item.allergen, item.hits[0].matched])).toEqual([
      ['soy', 'lecithin e322'],
      ['sulfites', 'e220']
    ]);
  });

  it('does not mistake ordinary label words for allergens', () => {
    const lookalikes = catalogFromRecord({
      mustard: ['mustard'],
      sulfites: ['sulfite'],
      tree_nuts: ['praline'],
      egg: ['egg', 'e1105']
    });
    expect(match('Water, calcium sulfate, custard powder, proline, eggplant, invertase (E1103)', lookalikes)).toEqual([]);
  });

  it('matches aliases outside the Latin alphabet', () => {
    const soy = catalogFromRecord({ soy: ['大豆'], milk: ['Молоко'] });
    expect(match('原材料: 大豆, молоко', soy).map((found) => [found.allergen, found.hits[0].matched])).toEqual([
      ['milk', 'молоко'],
      ['soy', '大豆']
    ]);
  });

  it('scores one hit per distinct normalized alias', () => {
    const duplicated = catalogFromRecord({ milk: ['Milk', 'milk'] });
    expect(match('milk', duplicated)[0].hits).toEqual([
      { term: 'Milk', score: 1, matched: 'milk', start: 0, end: 4, spans: [{ start: 0, end: 4 }] }
    ]);
  });

  it('returns an empty list for blank text or an empty catalog', () => {
    expect(match('  \n\t ', catalog)).toEqual([]);
    expect(match('milk', new Map())).toEqual([]);
  });

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => match('milk', catalog, 1.5)).toThrow(RangeError);
    expect(() => match('milk', catalog, Number.NaN)).toThrow(RangeError);
  });

  it('is deterministic', () => {
    const text = 'Ingredients: wheat flour, m1lk powder, lact0se, peanvt oil, arachis';
    expect(JSON.stringify(match(text, catalog))).toBe(JSON.stringify(match(text, catalog)));
  });

  it('narrows results monotonically as the threshold rises', () => {
    const text = 'Ingredients: wheat flour, m1lk powder, lact0se, peanvt oil, arachis';
    const hitsAt = (threshold: number) =>
      match(text, catalog, threshold).flatMap((found) => found.hits.map((hit) => `${found.allergen}:${hit.term}`));

    expect(hitsAt(0.6)).toEqual(['peanut:arachis', 'peanut:peanut', 'milk:lactose', 'milk:milk']);
    expect(hitsAt(0.8)).toEqual(['peanut:arachis', 'milk:lactose', 'milk:milk']);
    expect(hitsAt(0.95)).toEqual(['peanut:arachis']);

    const thresholds = [0, 0.5, 0.6, 0.8, 0.95, 1];
    for (let i = 1; i < thresholds.length; i++) {
      const lower = new Set(hitsAt(thresholds[i - 1]));
      for (const hit of hitsAt(thresholds[i])) {
        expect(lower.has(hit)).toBe(true);
      }
    }
  });
});

describe('filterByProfile', () => {
  const matches = match('contains arachis oil and milk solids', catalog, 0.6);

  it('returns nothing for an empty profile', () => {
    expect(filterByProfile(matches, new Set())).toEqual([]);
  });

  it('keeps every match, in order, for the full catalog', () => {
    expect(filterByProfile(matches, new Set(catalog.keys()))).toEqual(matches);
  });

  it('keeps only declared allergens', () => {
    expect(names(filterByProfile(matches, new Set(['peanut', 'sesame'])))).toEqual(['peanut']);
  });
});
