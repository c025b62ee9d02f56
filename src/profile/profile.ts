import { z } from 'zod';

/** Allergens a user has declared sensitivity to. Owned by the caller. */
export type Profile = ReadonlySet<string>;

const StoredProfileSchema = z.union([
  z.array(z.string()),
  z.string().transform((value) => value.split(','))
]);

/**
 * Read a stored profile: a JSON array of names or a comma-separated string.
 * Names are trimmed and lowercased; when `known` is given, names outside it
 * are dropped.
 */
export function parseProfile(value: unknown, known?: Iterable<string>): Profile {
  const names = StoredProfileSchema.parse(value ?? []);
  const allowed = known ? new Set(known) : undefined;
  const profile = new Set<string>();

  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (name && (!allowed || allowed.has(name))) {
      profile.add(name);
    }
  }

  return profile;
}

export function toggleAllergen(profile: Profile, name: string): Profile {
  const next = new Set(profile);
  if (next.has(name)) {
    next.delete(name);
  } else {
    next.add(name);
  }
  return next;
}

export function serializeProfile(profile: Profile): string[] {
  return Array.from(profile).sort();
}
