import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { FlatProduct, GroupedRow, OptionalNumber } from "../types/contracts.js";

export type CSVCell = string | number;

export const PRODUCT_COLUMNS = [
  "Product Name",
  "Brand Name",
  "Product Description",
  "Price",
  "List Price",
  "Score",
  "Product Images",
  "Product ID",
  "Source URL",
  "Badge",
  "Rank Name",
  "Ingredients",
  "Size/Volume",
  "Skin Concern",
  "Product Line Name",
  "Barcode (EAN/UPC)"
] as const;

export const GROUPED_COLUMNS = [
  "Key Ingredient",
  "Product Rank",
  "Product Name",
  "Brand",
  "Price (USD)",
  "Product Score"
] as const;

export function productToCells(product: FlatProduct): CSVCell[] {
  return [
    product.name,
    product.brand,
    product.description,
    renderOptionalNumber(product.price),
    renderOptionalNumber(product.listPrice),
    renderOptionalNumber(product.score),
    product.images,
    product.productId,
    product.sourceUrl,
    product.badge,
    product.rankName,
    product.ingredients,
    product.sizeVolume,
    product.skinConcern,
    product.productLine,
    product.barcode
  ];
}

export function groupedRowToCells(row: GroupedRow): CSVCell[] {
  return [row.keyIngredient, row.productRank, row.productName, row.brand, row.priceUsd, row.productScore];
}

export function toCSV(columns: readonly string[], rows: readonly CSVCell[][]): string {
  const lines = [columns, ...rows].map((cells: readonly CSVCell[]) => cells.map(escapeCell).join(","));
  return `${lines.join("\n")}\n`;
}

export function writeCSV(path: string, columns: readonly string[], rows: readonly CSVCell[][]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, toCSV(columns, rows), "utf8");
}

function renderOptionalNumber(value: OptionalNumber): CSVCell {
  return value.kind === "present" ? value.value : "";
}

function escapeCell(cell: CSVCell): string {
  const text = String(cell);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
