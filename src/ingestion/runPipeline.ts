import { randomUUID } from "node:crypto";
import { getEnv, type Env } from "../config/env.js";
import { buildGroupedRows, groupProducts, summarizeGroups } from "../services/ingredientGrouping.js";
import { mapProducts } from "../services/productMapper.js";
import { fetchAllProducts } from "../services/snapklikClient.js";
import { logger } from "../utils/logger.js";
import { GROUPED_COLUMNS, PRODUCT_COLUMNS, groupedRowToCells, productToCells, writeCSV } from "./csvExport.js";
import { loadHTMLSnapshot } from "./htmlSnapshot.js";

export type PipelineOptions = {
  apiURL: string;
  searchTerm: string;
  pageDelayMs: number;
  maxPages: number;
  timeoutMs: number;
  htmlSnapshotPath: string;
  productsCsvPath: string;
  groupedCsvPath: string;
  topN: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<unknown>;
};

export type PipelineSummary = {
  runId: string;
  status: "success" | "partial" | "empty" | "failed";
  source: "api" | "html_snapshot" | "none";
  startedAt: string;
  finishedAt: string;
  hits: number;
  products: number;
  skipped: number;
  groups: number;
  rows: number;
  topGroups: Array<{ label: string; products: number }>;
  outputs: string[];
};

export function pipelineOptionsFromEnv(env: Env): PipelineOptions {
  return {
    apiURL: env.SNAPKLIK_API_URL,
    searchTerm: env.SNAPKLIK_SEARCH_TERM,
    pageDelayMs: env.SNAPKLIK_PAGE_DELAY_MS,
    maxPages: env.SNAPKLIK_MAX_PAGES,
    timeoutMs: env.SNAPKLIK_TIMEOUT_MS,
    htmlSnapshotPath: env.HTML_SNAPSHOT_PATH,
    productsCsvPath: env.PRODUCTS_CSV_PATH,
    groupedCsvPath: env.GROUPED_CSV_PATH,
    topN: env.GROUP_TOP_N
  };
}

export async function runPipeline(options: PipelineOptions = pipelineOptionsFromEnv(getEnv())): Promise<PipelineSummary> {
  const runId = randomUUID();
  const startedAt = new Date().toISOString();
  const log = logger.child({ runId });

  const fetched = await fetchAllProducts({
    apiURL: options.apiURL,
    searchTerm: options.searchTerm,
    timeoutMs: options.timeoutMs,
    pageDelayMs: options.pageDelayMs,
    maxPages: options.maxPages,
    fetchImpl: options.fetchImpl,
    sleep: options.sleep
  });

  let source: PipelineSummary["source"] = "api";
  let hits = fetched.hits;
  if (fetched.status === "failed") {
    log.warn({ msg: "Search API unavailable, using HTML snapshot", path: options.htmlSnapshotPath });
    hits = loadHTMLSnapshot(options.htmlSnapshotPath);
    source = hits.length > 0 ? "html_snapshot" : "none";
  }

  const summary: PipelineSummary = {
    runId,
    status: "failed",
    source,
    startedAt,
    finishedAt: startedAt,
    hits: hits.length,
    products: 0,
    skipped: 0,
    groups: 0,
    rows: 0,
    topGroups: [],
    outputs: []
  };

  if (source === "none") {
    log.error({ msg: "Failed to fetch product data" });
    return finish(summary);
  }

  const { products, skipped } = mapProducts(hits);
  summary.products = products.length;
  summary.skipped = skipped;

  if (products.length === 0) {
    log.warn({ msg: "No product data scraped", hits: hits.length });
    return finish({ ...summary, status: "empty" });
  }

  writeCSV(options.productsCsvPath, PRODUCT_COLUMNS, products.map(productToCells));
  log.info({ msg: "Product table written", path: options.productsCsvPath, rows: products.length });

  const groups = groupProducts(products, options.topN);
  const rows = buildGroupedRows(groups);
  writeCSV(options.groupedCsvPath, GROUPED_COLUMNS, rows.map(groupedRowToCells));
  log.info({ msg: "Grouped table written", path: options.groupedCsvPath, rows: rows.length });

  const topGroups = summarizeGroups(groups);
  log.info({ msg: "Grouped products by key ingredient", products: products.length, groups: groups.size, topGroups });

  return finish({
    ...summary,
    status: fetched.status === "partial" ? "partial" : "success",
    groups: groups.size,
    rows: rows.length,
    topGroups,
    outputs: [options.productsCsvPath, options.groupedCsvPath]
  });
}

function finish(summary: PipelineSummary): PipelineSummary {
  return { ...summary, finishedAt: new Date().toISOString() };
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runPipeline()
    .then((summary) => {
      console.log(JSON.stringify(summary, null, 2));
      if (summary.status === "failed") {
        process.exitCode = 1;
      }
    })
    .catch((error) => {
      logger.error({ msg: "Pipeline failed", error: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
    });
}
