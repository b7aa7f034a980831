import { JSDOM } from 'jsdom';

function isRecipeType(type: unknown): boolean {
  if (typeof type === 'string') return type === 'Recipe';
  if (Array.isArray(type)) return type.some((t) => t === 'Recipe');
  return false;
}

function containsRecipeNode(node: unknown): boolean {
  if (Array.isArray(node)) {
    return node.some(containsRecipeNode);
  }
  if (node === null || typeof node !== 'object') return false;

  if ('@type' in node && isRecipeType(node['@type'])) return true;
  return '@graph' in node ? containsRecipeNode(node['@graph']) : false;
}

/**
 * Does the page look like a recipe? JSON-LD `Recipe` (directly, in a list, or
 * inside an `@graph`) decides first; otherwise both an ingredients and an
 * instructions signal must appear in the markup.
 */
export function containsRecipeSchema(html: string): boolean {
  const doc = new JSDOM(html).window.document;

  for (const script of Array.from(doc.querySelectorAll('script[type="application/ld+json"]'))) {
    let data: unknown;
    try {
      data = JSON.parse(script.textContent ?? '');
    } catch {
      continue; // malformed block, try the next one
    }
    if (containsRecipeNode(data)) return true;
  }

  const text = html.toLowerCase();
  const hasIngredients = text.includes('ingredient');
  const hasInstructions =
    text.includes('instruction') || text.includes('direction') || text.includes('method');
  return hasIngredients && hasInstructions;
}
