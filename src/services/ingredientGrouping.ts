import type { FlatProduct, GroupedRow, IngredientGroup, OptionalNumber, ScoredProduct } from "../types/contracts.js";
import { textLength, toTitleCase } from "../utils/normalize.js";
import { canonicalIngredientKey } from "./ingredientNormalizer.js";

const TOKEN_SEPARATOR_RE = /[,\n|]/;
const DEFAULT_TOP_N = 3;

/** Canonical ingredient keys mentioned by one product, first sighting first. */
export function splitIngredientTokens(ingredients: string): string[] {
  const keys = ingredients
    .split(TOKEN_SEPARATOR_RE)
    .map((token) => canonicalIngredientKey(token))
    .filter((key) => key.length > 0);
  return Array.from(new Set(keys));
}

// Name length plus brand length. A rough proxy, not a relevance signal.
export function scoreProduct(product: FlatProduct): number {
  return textLength(product.name) + textLength(product.brand);
}

/**
 * Indexes products by canonical ingredient and keeps the `topN` best scored
 * per ingredient. Ties keep batch order. Groups appear in order of first
 * sighting.
 */
export function groupProducts(products: readonly FlatProduct[], topN: number = DEFAULT_TOP_N): Map<string, IngredientGroup> {
  const members = new Map<string, ScoredProduct[]>();

  for (const product of products) {
    if (!product.ingredients) {
      continue;
    }

    const score = scoreProduct(product);
    for (const key of splitIngredientTokens(product.ingredients)) {
      const bucket = members.get(key);
      if (bucket) {
        bucket.push({ product, score });
      } else {
        members.set(key, [{ product, score }]);
      }
    }
  }

  const groups = new Map<string, IngredientGroup>();
  for (const [ingredient, entries] of members) {
    const ranked = [...entries].sort((left, right) => right.score - left.score).slice(0, Math.max(topN, 0));
    groups.set(ingredient, {
      ingredient,
      label: toTitleCase(ingredient),
      totalProducts: entries.length,
      ranked
    });
  }
  return groups;
}

export function buildGroupedRows(groups: ReadonlyMap<string, IngredientGroup>): GroupedRow[] {
  const rows: GroupedRow[] = [];
  for (const group of groups.values()) {
    group.ranked.forEach((entry, index) => {
      rows.push({
        keyIngredient: group.label,
        productRank: index + 1,
        productName: entry.product.name,
        brand: entry.product.brand,
        priceUsd: formatPriceUsd(entry.product.price),
        productScore: entry.score
      });
    });
  }
  return rows;
}

/** Prices arrive in cents; an absent price renders as empty text. */
export function formatPriceUsd(price: OptionalNumber): string {
  return price.kind === "present" ? `$${(price.value / 100).toFixed(2)}` : "";
}

/** Largest groups by product count, ties in first-sighting order. */
export function summarizeGroups(
  groups: ReadonlyMap<string, IngredientGroup>,
  limit: number = 5
): Array<{ label: string; products: number }> {
  return Array.from(groups.values())
    .sort((left, right) => right.totalProducts - left.totalProducts)
    .slice(0, limit)
    .map((group) => ({ label: group.label, products: group.totalProducts }));
}
