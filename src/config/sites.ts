import { DEFAULT_CLASSIFIER_RULES } from '../crawler/classify/isLikelyDocument.js';
import type { SiteConfig } from '../types.js';

export const DEFAULT_SITES: readonly SiteConfig[] = [
  {
    key: 'povarenok',
    urlTemplate: 'https://www.povarenok.ru/recipes/show/{}/',
    startId: 20_000,
    step: -1,
    classifier: DEFAULT_CLASSIFIER_RULES,
  },
  {
    key: 'koolinar',
    urlTemplate: 'https://www.koolinar.ru/recipe/view/{}',
    startId: 150_000,
    step: -1,
    classifier: DEFAULT_CLASSIFIER_RULES,
  },
];
