import { describe, it, expect } from 'vitest';
import { containsRecipeSchema } from '../schema.js';

function page(jsonLd: unknown): string {
  return `<html><head><script type="application/ld+json">${JSON.stringify(jsonLd)}</script></head><body></body></html>`;
}

describe('containsRecipeSchema', () => {
  it('detects a top-level Recipe', () => {
    expect(containsRecipeSchema(page({ '@context': 'https://schema.org', '@type': 'Recipe', name: 'Stew' }))).toBe(true);
  });

  it('detects Recipe among several types', () => {
    expect(containsRecipeSchema(page({ '@type': ['Recipe', 'NewsArticle'] }))).toBe(true);
  });

  it('detects Recipe inside @graph and lists', () => {
    expect(
      containsRecipeSchema(page({ '@graph': [{ '@type': 'WebPage' }, { '@type': 'Recipe' }] })),
    ).toBe(true);
    expect(containsRecipeSchema(page([{ '@type': 'Organization' }, { '@type': 'Recipe' }]))).toBe(true);
  });

  it('ignores malformed JSON-LD blocks', () => {
    const html = `<script type="application/ld+json">{ broken</script>${page({ '@type': 'Recipe' })}`;
    expect(containsRecipeSchema(html)).toBe(true);
  });

  it('falls back to ingredient and instruction wording', () => {
    expect(containsRecipeSchema('<h2>Ingredients</h2><ul></ul><h2>Method</h2>')).toBe(true);
    expect(containsRecipeSchema('<h2>Ingredients</h2><p>Buy them.</p>')).toBe(false);
  });

  it('rejects ordinary articles', () => {
    expect(containsRecipeSchema(page({ '@type': 'Article', headline: 'Kitchen news' }))).toBe(false);
  });
});
