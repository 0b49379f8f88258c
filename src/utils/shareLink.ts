import { z } from 'zod';
import type { EntryInit, MacroEntry } from './macroEntry';
import { createLogger } from './logger';

const HASH_PREFIX = 'recipe=';

const quantity = z.number().finite().nonnegative();

const sharedEntrySchema = z.object({
  label: z.string().default(''),
  protein: quantity,
  fat: quantity,
  totalCarb: quantity,
  fiber: quantity,
  servings: quantity.default(1),
});

const recipePayloadSchema = z.object({
  name: z.string().optional(),
  entries: z.array(sharedEntrySchema),
});

export type RecipePayload = z.infer<typeof recipePayloadSchema>;

export interface SharedRecipe {
  name: string;
  entries: EntryInit[];
}

const logger = createLogger('share-link');

function toBase64Url(bytes: Uint8Array): string {
  let binary = '';
  bytes.forEach((byte) => {
    binary += String.fromCharCode(byte);
  });
  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

function fromBase64Url(encoded: string): Uint8Array {
  const base64 = encoded.replace(/-/g, '+').replace(/_/g, '/');
  const padded = base64 + '='.repeat((4 - (base64.length % 4)) % 4);
  const binary = atob(padded);
  return Uint8Array.from(binary, (char) => char.charCodeAt(0));
}

export function encodeRecipe(name: string, entries: readonly Readonly<MacroEntry>[]): string {
  const trimmedName = name.trim();
  const payload: RecipePayload = {
    ...(trimmedName ? { name: trimmedName } : {}),
    entries: entries.map((entry) => ({
      label: entry.label,
      protein: entry.proteinGrams,
      fat: entry.fatGrams,
      totalCarb: entry.totalCarbGrams,
      fiber: entry.fiberGrams,
      servings: entry.servings,
    })),
  };
  return toBase64Url(new TextEncoder().encode(JSON.stringify(payload)));
}

/**
 * Returns null for anything that is not a well-formed recipe payload.
 */
export function decodeRecipe(encoded: string): SharedRecipe | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(fromBase64Url(encoded)));
  } catch (error) {
    logger.warn('Ignoring unreadable recipe link', error);
    return null;
  }

  const result = recipePayloadSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn('Ignoring malformed recipe link', result.error.issues);
    return null;
  }

  return {
    name: result.data.name ?? '',
    entries: result.data.entries.map((entry) => ({
      label: entry.label,
      proteinGrams: entry.protein,
      fatGrams: entry.fat,
      totalCarbGrams: entry.totalCarb,
      fiberGrams: entry.fiber,
      servings: entry.servings,
    })),
  };
}

export function readRecipeFromHash(hash: string): SharedRecipe | null {
  const trimmed = hash.startsWith('#') ? hash.slice(1) : hash;
  if (!trimmed.startsWith(HASH_PREFIX)) {
    return null;
  }
  return decodeRecipe(trimmed.slice(HASH_PREFIX.length));
}

export function buildRecipeHash(name: string, entries: readonly Readonly<MacroEntry>[]): string {
  return `#${HASH_PREFIX}${encodeRecipe(name, entries)}`;
}
