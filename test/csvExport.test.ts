import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  GROUPED_COLUMNS,
  PRODUCT_COLUMNS,
  groupedRowToCells,
  productToCells,
  toCSV,
  writeCSV
} from "../src/ingestion/csvExport.js";
import { mapProduct } from "../src/services/productMapper.js";

test("toCSV quotes cells with separators and quotes", () => {
  const csv = toCSV(["a", "b"], [
    ["x", 1],
    ["he said \"hi\"", "a,b"]
  ]);
  assert.equal(csv, "a,b\nx,1\n\"he said \"\"hi\"\"\",\"a,b\"\n");
});

test("product table header lists the output columns in order", () => {
  const header = toCSV(PRODUCT_COLUMNS, []);
  assert.equal(
    header,
    "Product Name,Brand Name,Product Description,Price,List Price,Score,Product Images,Product ID,Source URL,Badge,Rank Name,Ingredients,Size/Volume,Skin Concern,Product Line Name,Barcode (EAN/UPC)\n"
  );
  assert.equal(toCSV(GROUPED_COLUMNS, []), "Key Ingredient,Product Rank,Product Name,Brand,Price (USD),Product Score\n");
});

test("productToCells renders absent numbers as empty cells", () => {
  const cells = productToCells(mapProduct({ skid: "X1", price: 1999 }));
  assert.equal(cells.length, PRODUCT_COLUMNS.length);
  assert.deepEqual(cells, ["", "", "", 1999, "", "", "", "X1", "", "", "", "", "", "", "", ""]);
});

test("groupedRowToCells follows the grouped column order", () => {
  assert.deepEqual(
    groupedRowToCells({
      keyIngredient: "Retinol",
      productRank: 1,
      productName: "Night Cream",
      brand: "Nox",
      priceUsd: "$25.00",
      productScore: 14
    }),
    ["Retinol", 1, "Night Cream", "Nox", "$25.00", 14]
  );
});

test("writeCSV creates missing directories", () => {
  const dir = mkdtempSync(join(tmpdir(), "csv-export-"));
  try {
    const path = join(dir, "nested", "out.csv");
    writeCSV(path, ["Key"], [["value"]]);
    assert.equal(readFileSync(path, "utf8"), "Key\nvalue\n");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
