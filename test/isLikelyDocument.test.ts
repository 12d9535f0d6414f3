import { describe, expect, it } from 'vitest';

import {
  DEFAULT_CLASSIFIER_RULES,
  isLikelyDocument,
} from '../src/crawler/classify/isLikelyDocument.js';

describe('isLikelyDocument', () => {
  it('rejects missing and empty bodies', () => {
    expect(isLikelyDocument(null)).toBe(false);
    expect(isLikelyDocument(undefined)).toBe(false);
    expect(isLikelyDocument('')).toBe(false);
  });

  it('rejects a 799-byte body without keywords', () => {
    expect(isLikelyDocument('a'.repeat(799))).toBe(false);
  });

  it('accepts a 2001-byte body without keywords', () => {
    expect(isLikelyDocument('a'.repeat(2001))).toBe(true);
  });

  it('rejects bodies between the floor and the fallback threshold without keywords', () => {
    expect(isLikelyDocument('a'.repeat(800))).toBe(false);
    expect(isLikelyDocument('a'.repeat(2000))).toBe(false);
  });

  it('applies the size floor before the keyword scan', () => {
    const body = `рецепт${'a'.repeat(88)}`;
    expect(Buffer.byteLength(body, 'utf8')).toBe(100);
    expect(isLikelyDocument(body)).toBe(false);
  });

  it('matches keywords case-insensitively once the floor is met', () => {
    const body = `РЕЦЕПТ${'a'.repeat(788)}`;
    expect(Buffer.byteLength(body, 'utf8')).toBe(800);
    expect(isLikelyDocument(body)).toBe(true);
  });

  it('measures size in UTF-8 bytes rather than characters', () => {
    expect(isLikelyDocument('ж'.repeat(399))).toBe(false);
    expect(isLikelyDocument('ж'.repeat(1001))).toBe(true);
  });

  it('honours custom rules', () => {
    const rules = { minBytes: 10, fallbackBytes: 1_000, keywords: ['Recipe'] };
    expect(isLikelyDocument('my recipe page', rules)).toBe(true);
    expect(isLikelyDocument('my dessert page', rules)).toBe(false);
  });

  it('tolerates malformed markup', () => {
    const body = `<div><p${'<'.repeat(900)}ингредиенты`;
    expect(isLikelyDocument(body, DEFAULT_CLASSIFIER_RULES)).toBe(true);
  });
});
