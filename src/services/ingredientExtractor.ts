import {
  GENERIC_CATEGORY_TERMS,
  INGREDIENT_KEYWORDS,
  PRODUCT_TYPE_INDICATORS
} from "../config/skincareVocabulary.js";
import { toTitleCase } from "../utils/normalize.js";

/**
 * Candidate ingredient tokens for a product, inferred from its category
 * breadcrumb. Order: keyword hits, product-type descriptions, then the most
 * specific category. Duplicates are kept; grouping dedupes later.
 */
export function extractCandidates(categories: readonly string[]): string[] {
  const searchText = categories.join(" ").toLowerCase();
  const candidates: string[] = [];

  for (const keyword of INGREDIENT_KEYWORDS) {
    if (searchText.includes(keyword)) {
      candidates.push(toTitleCase(keyword));
    }
  }

  for (const [indicator, description] of PRODUCT_TYPE_INDICATORS) {
    if (searchText.includes(indicator)) {
      candidates.push(description);
    }
  }

  const lastCategory = categories[categories.length - 1];
  if (lastCategory !== undefined && !GENERIC_CATEGORY_TERMS.has(lastCategory.toLowerCase())) {
    candidates.push(lastCategory);
  }

  return candidates;
}
