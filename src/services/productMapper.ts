import { GENERIC_FALLBACK_TERMS, SKIN_CONCERNS } from "../config/skincareVocabulary.js";
import type { FlatProduct, OptionalNumber, RawProduct } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { isRecord } from "../utils/normalize.js";
import { extractCandidates } from "./ingredientExtractor.js";

const PRODUCT_URL_BASE = "https://snapklik.com/en-gb/product";
const SIZE_RE = /\b(\d+\.?\d*\s*(ml|g|oz|fl\s?oz|count|pack))\b/i;
const LIST_SEPARATOR = " | ";

const log = createChildLogger({ module: "productMapper" });

export type MapProductsResult = {
  products: FlatProduct[];
  skipped: number;
};

export function mapProduct(raw: RawProduct): FlatProduct {
  const name = textField(raw, "text", "name");
  const productId = textField(raw, "skid", "id");
  const slug = textField(raw, "slug");
  const categories = resolveCategories(raw);

  return {
    name,
    brand: textField(raw, "brand"),
    description: textField(raw, "description"),
    price: numberField(raw.price),
    listPrice: numberField(raw.listPrice),
    score: numberField(raw.score),
    images: textField(raw, "image", "images"),
    productId,
    sourceUrl: slug && productId ? `${PRODUCT_URL_BASE}/${slug}/${productId}` : "",
    badge: textField(raw, "badge"),
    rankName: textField(raw, "rankName"),
    ingredients: resolveIngredients(categories).join(LIST_SEPARATOR),
    sizeVolume: resolveSize(raw, name),
    skinConcern: matchConcerns(categories).join(LIST_SEPARATOR),
    productLine: textField(raw, "line"),
    barcode: textField(raw, "barcode")
  };
}

/** Maps a page of hits; a hit that is not an object or fails to map is skipped. */
export function mapProducts(hits: readonly unknown[]): MapProductsResult {
  const products: FlatProduct[] = [];
  let skipped = 0;

  hits.forEach((hit, index) => {
    if (!isRecord(hit)) {
      skipped += 1;
      log.warn({ msg: "Skipping hit that is not an object", index });
      return;
    }

    try {
      products.push(mapProduct(hit));
    } catch (error) {
      skipped += 1;
      log.warn({
        msg: "Failed to map product",
        index,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  });

  return { products, skipped };
}

export function resolveCategories(raw: RawProduct): string[] {
  const direct = parseCategoryValue(raw.categories);
  if (direct && direct.length > 0) {
    return direct;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (key === "categories" || !key.toLowerCase().includes("categories")) {
      continue;
    }
    const parsed = parseCategoryValue(value);
    if (parsed && parsed.length > 0) {
      return parsed;
    }
  }

  return [];
}

function parseCategoryValue(value: unknown): string[] | null {
  if (Array.isArray(value)) {
    return onlyStrings(value);
  }

  if (typeof value !== "string" || !value.trim()) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? onlyStrings(parsed) : [value];
  } catch {
    return [value];
  }
}

function resolveIngredients(categories: string[]): string[] {
  const candidates = extractCandidates(categories);
  if (candidates.length > 0) {
    return candidates;
  }

  const specific = categories.filter((category) => category && !GENERIC_FALLBACK_TERMS.has(category.toLowerCase()));
  return specific.length > 0 ? specific : categories;
}

function resolveSize(raw: RawProduct, name: string): string {
  const { OptionMap: primary, options: secondary } = raw;
  const optionMap = isRecord(primary) ? primary : isRecord(secondary) ? secondary : {};

  for (const [key, value] of Object.entries(optionMap)) {
    const rendered = renderValue(value);
    if (key.toLowerCase().includes("size") || rendered.toLowerCase().includes("size")) {
      if (rendered) {
        return rendered;
      }
      break;
    }
  }

  return name.match(SIZE_RE)?.[0] ?? "";
}

function matchConcerns(categories: string[]): string[] {
  const concerns: string[] = [];
  for (const category of categories) {
    const lowered = category.toLowerCase();
    for (const concern of SKIN_CONCERNS) {
      if (lowered.includes(concern)) {
        concerns.push(concern);
      }
    }
  }
  return concerns;
}

function textField(raw: RawProduct, ...keys: string[]): string {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
    if (Array.isArray(value)) {
      return onlyStrings(value).join(LIST_SEPARATOR);
    }
  }
  return "";
}

function numberField(value: unknown): OptionalNumber {
  return typeof value === "number" && Number.isFinite(value)
    ? { kind: "present", value }
    : { kind: "absent" };
}

function renderValue(value: unknown): string {
  if (value == null) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

function onlyStrings(values: unknown[]): string[] {
  return values.filter((item): item is string => typeof item === "string");
}
