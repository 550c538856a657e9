import { existsSync, readFileSync } from "node:fs";
import type { RawProduct } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { isRecord } from "../utils/normalize.js";

// The search page inlines its hits as JSON objects; they are salvaged with
// increasingly loose patterns when the page cannot be parsed as a whole.
const PRODUCT_FRAGMENT_RE = /\{[^{]*"skid":"[^"]*"[^}]*"categories":\[[^\]]*\][^}]*\}/g;
const SKID_RE = /"skid":"([^"]+)"/;
const TEXT_RE = /"text":"([^"]+)"/;
const CATEGORIES_RE = /"categories":(\[[^\]]*\])/;
const BRAND_RE = /"brand":"([^"]*)"/;
const PRICE_RE = /"price":([0-9]+)/;
const LIST_PRICE_RE = /"listPrice":([0-9]+)/;
const SCORE_RE = /"score":([0-9]+)/;
const IMAGE_RE = /"image":"([^"]*)"/;
const SLUG_RE = /"slug":"([^"]*)"/;
const BADGE_RE = /"badge":"([^"]*)"/;
const RANK_NAME_RE = /"rankName":"([^"]*)"/;
const OPTION_MAP_RE = /"OptionMap":(\{[^}]*\})/;

const log = createChildLogger({ module: "htmlSnapshot" });

export function loadHTMLSnapshot(path: string): RawProduct[] {
  if (!existsSync(path)) {
    log.warn({ msg: "HTML snapshot not found", path });
    return [];
  }

  const products = parseProductsFromHTML(readFileSync(path, "utf8"));
  log.info({ msg: "Parsed HTML snapshot", path, products: products.length });
  return products;
}

export function parseProductsFromHTML(html: string): RawProduct[] {
  const fromFragments = parseProductFragments(html);
  if (fromFragments.length > 0) {
    return fromFragments;
  }

  const zipped = zipLooseFields(html);
  if (zipped.length > 0) {
    return zipped;
  }

  const skids = allGroups(SKID_RE, html);
  const texts = allGroups(TEXT_RE, html);
  const count = Math.min(skids.length, texts.length);
  const products: RawProduct[] = [];
  for (let index = 0; index < count; index += 1) {
    products.push({ skid: skids[index], text: texts[index] });
  }
  return products;
}

function parseProductFragments(html: string): RawProduct[] {
  const products: RawProduct[] = [];

  for (const match of html.matchAll(PRODUCT_FRAGMENT_RE)) {
    const fragment = match[0];
    let parsed: unknown;
    try {
      parsed = JSON.parse(fragment);
    } catch {
      const salvaged = salvageFragment(fragment);
      if (salvaged) {
        products.push(salvaged);
      }
      continue;
    }

    if (isRecord(parsed) && "skid" in parsed && "categories" in parsed) {
      products.push(parsed);
    }
  }

  return products;
}

function salvageFragment(fragment: string): RawProduct | null {
  const skid = firstGroup(SKID_RE, fragment);
  const text = firstGroup(TEXT_RE, fragment);
  const categoriesJSON = firstGroup(CATEGORIES_RE, fragment);
  if (skid === undefined || categoriesJSON === undefined) {
    return null;
  }

  try {
    const categories: unknown = JSON.parse(categoriesJSON);
    const brand = firstGroup(BRAND_RE, fragment) ?? "";

    if (text === undefined) {
      return { skid, text: "", categories, brand };
    }

    const optionMap = firstGroup(OPTION_MAP_RE, fragment);
    return {
      skid,
      text,
      categories,
      brand,
      price: integerOrEmpty(firstGroup(PRICE_RE, fragment)),
      listPrice: integerOrEmpty(firstGroup(LIST_PRICE_RE, fragment)),
      score: integerOrEmpty(firstGroup(SCORE_RE, fragment)),
      image: firstGroup(IMAGE_RE, fragment) ?? "",
      slug: firstGroup(SLUG_RE, fragment) ?? "",
      badge: firstGroup(BADGE_RE, fragment) ?? "",
      rankName: firstGroup(RANK_NAME_RE, fragment) ?? "",
      OptionMap: optionMap === undefined ? {} : JSON.parse(optionMap)
    };
  } catch (error) {
    log.debug({
      msg: "Dropping unreadable product fragment",
      skid,
      error: error instanceof Error ? error.message : String(error)
    });
    return null;
  }
}

function zipLooseFields(html: string): RawProduct[] {
  const skids = allGroups(SKID_RE, html);
  const texts = allGroups(TEXT_RE, html);
  const categories = allGroups(CATEGORIES_RE, html);
  const brands = allGroups(BRAND_RE, html);
  const count = Math.min(skids.length, texts.length, categories.length);
  const products: RawProduct[] = [];

  for (let index = 0; index < count; index += 1) {
    try {
      products.push({
        skid: skids[index],
        text: texts[index],
        categories: JSON.parse(categories[index] ?? ""),
        brand: brands[index] ?? ""
      });
    } catch {
      log.debug({ msg: "Skipping unreadable categories list", index });
    }
  }

  return products;
}

function firstGroup(pattern: RegExp, text: string): string | undefined {
  return text.match(pattern)?.[1];
}

function allGroups(pattern: RegExp, text: string): string[] {
  const global = new RegExp(pattern.source, "g");
  const values: string[] = [];
  for (const match of text.matchAll(global)) {
    if (match[1] !== undefined) {
      values.push(match[1]);
    }
  }
  return values;
}

function integerOrEmpty(value: string | undefined): number | "" {
  return value === undefined ? "" : Number.parseInt(value, 10);
}
