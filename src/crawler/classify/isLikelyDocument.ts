import type { ClassifierRules } from '../../types.js';

export const RECIPE_KEYWORDS: readonly string[] = ['ингредиент', 'рецепт', 'приготовление'];

export const DEFAULT_CLASSIFIER_RULES: ClassifierRules = Object.freeze({
  minBytes: 800,
  fallbackBytes: 2_000,
  keywords: RECIPE_KEYWORDS,
});

/**
 * Cheap lexical check for "is this a real recipe page". The size floor is
 * applied before the keyword scan, so a short page never passes on keywords
 * alone. Long pages pass even without a keyword.
 */
export function isLikelyDocument(
  body: string | null | undefined,
  rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES,
): boolean {
  if (!body) {
    return false;
  }

  const size = Buffer.byteLength(body, 'utf8');
  if (size < rules.minBytes) {
    return false;
  }

  const lower = body.toLowerCase();
  if (rules.keywords.some((keyword) => lower.includes(keyword.toLowerCase()))) {
    return true;
  }

  return size > rules.fallbackBytes;
}
