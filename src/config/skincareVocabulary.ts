// Keyword lists for inferring ingredients from category text. Snapklik
// listings carry no ingredient field.

export const INGREDIENT_KEYWORDS: readonly string[] = [
  // Acids
  "glycolic",
  "salicylic",
  "hyaluronic",
  "niacinamide",
  "retinol",
  "vitamin c",
  "lactic",
  "mandelic",
  "azelaic",
  "kojic",
  "ferulic",
  "ascorbic",
  // Botanicals and extracts
  "aloe",
  "snail",
  "witch hazel",
  "green tea",
  "chamomile",
  "calendula",
  "rosehip",
  "jojoba",
  "argan",
  "coconut",
  "shea",
  "cucumber",
  // Other actives
  "ceramide",
  "peptide",
  "collagen",
  "caffeine",
  "zinc",
  "copper",
  "squalane",
  "tocopherol",
  "retinoid"
];

export const PRODUCT_TYPE_INDICATORS: ReadonlyArray<readonly [indicator: string, description: string]> = [
  ["serum", "treatment serum"],
  ["toner", "facial toner"],
  ["cleanser", "facial cleanser"],
  ["moisturizer", "face moisturizer"],
  ["mask", "face mask"],
  ["scrub", "exfoliating scrub"],
  ["oil", "facial oil"],
  ["essence", "skin essence"]
];

/** Checked in order; the first key contained in the value wins. */
export const INGREDIENT_SYNONYMS: ReadonlyArray<readonly [match: string, canonical: string]> = [
  ["vitamin c", "Ascorbic Acid"],
  ["ascorbic acid", "Ascorbic Acid"],
  ["hyaluronic", "Hyaluronic Acid"],
  ["hyaluronic acid", "Hyaluronic Acid"],
  ["niacinamide", "Niacinamide"],
  ["salicylic", "Salicylic Acid"],
  ["glycolic", "Glycolic Acid"],
  ["lactic", "Lactic Acid"],
  ["retinol", "Retinol"],
  ["vitamin e", "Tocopherol"],
  ["tocopherol", "Tocopherol"]
];

// Breadcrumb levels too broad to stand in for an ingredient.
export const GENERIC_CATEGORY_TERMS: ReadonlySet<string> = new Set([
  "skin care",
  "face",
  "body",
  "beauty & personal care"
]);

export const GENERIC_FALLBACK_TERMS: ReadonlySet<string> = new Set([
  ...GENERIC_CATEGORY_TERMS,
  "eyes"
]);

export const SKIN_CONCERNS: readonly string[] = [
  "acne",
  "dark spots",
  "hyperpigmentation",
  "wrinkle",
  "dryness",
  "sensitivity",
  "blemish",
  "pore",
  "anti-aging",
  "hydrating"
];
