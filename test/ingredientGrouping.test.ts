import test from "node:test";
import assert from "node:assert/strict";
import {
  buildGroupedRows,
  formatPriceUsd,
  groupProducts,
  scoreProduct,
  splitIngredientTokens,
  summarizeGroups
} from "../src/services/ingredientGrouping.js";
import type { FlatProduct } from "../src/types/contracts.js";

function product(overrides: Partial<FlatProduct>): FlatProduct {
  return {
    name: "",
    brand: "",
    description: "",
    price: { kind: "absent" },
    listPrice: { kind: "absent" },
    score: { kind: "absent" },
    images: "",
    productId: "",
    sourceUrl: "",
    badge: "",
    rankName: "",
    ingredients: "",
    sizeVolume: "",
    skinConcern: "",
    productLine: "",
    barcode: "",
    ...overrides
  };
}

test("splitIngredientTokens normalizes, filters and dedupes tokens", () => {
  assert.deepEqual(splitIngredientTokens("Hyaluronic | treatment serum | Hyaluronic Acid Serum"), [
    "hyaluronic acid",
    "treatment serum"
  ]);
  assert.deepEqual(splitIngredientTokens("Aqua (Water)*, Glycerin 3%\nZn"), ["aqua", "glycerin"]);
});

test("scoreProduct adds name and brand length", () => {
  assert.equal(scoreProduct(product({ name: "Night Balm", brand: "Lumen" })), 15);
});

test("groupProducts keeps the three best scored products per ingredient", () => {
  const products = ["A", "Bbbbb", "Cc", "Ddddddd", "Eee"].map((name) =>
    product({ name, ingredients: "Retinol" })
  );

  const groups = groupProducts(products);
  const retinol = groups.get("retinol");
  assert.ok(retinol);
  assert.equal(retinol?.label, "Retinol");
  assert.equal(retinol?.totalProducts, 5);
  assert.deepEqual(
    retinol?.ranked.map((entry) => [entry.product.name, entry.score]),
    [
      ["Ddddddd", 7],
      ["Bbbbb", 5],
      ["Eee", 3]
    ]
  );

  const rows = buildGroupedRows(groups);
  assert.deepEqual(
    rows.map((row) => [row.keyIngredient, row.productRank, row.productScore]),
    [
      ["Retinol", 1, 7],
      ["Retinol", 2, 5],
      ["Retinol", 3, 3]
    ]
  );
});

test("groupProducts ranks shared ingredients across products", () => {
  const serum = product({
    name: "Hydrating Serum 30ml",
    brand: "Lumen",
    price: { kind: "present", value: 1999 },
    ingredients: "Hyaluronic Acid | Retinol"
  });
  const balm = product({ name: "Night Balm", brand: "Lumen", ingredients: "Hyaluronic Acid" });

  const groups = groupProducts([balm, serum]);
  assert.deepEqual(Array.from(groups.keys()), ["hyaluronic acid", "retinol"]);

  assert.deepEqual(buildGroupedRows(groups), [
    {
      keyIngredient: "Hyaluronic Acid",
      productRank: 1,
      productName: "Hydrating Serum 30ml",
      brand: "Lumen",
      priceUsd: "$19.99",
      productScore: 25
    },
    {
      keyIngredient: "Hyaluronic Acid",
      productRank: 2,
      productName: "Night Balm",
      brand: "Lumen",
      priceUsd: "",
      productScore: 15
    },
    {
      keyIngredient: "Retinol",
      productRank: 1,
      productName: "Hydrating Serum 30ml",
      brand: "Lumen",
      priceUsd: "$19.99",
      productScore: 25
    }
  ]);

  assert.deepEqual(summarizeGroups(groups), [
    { label: "Hyaluronic Acid", products: 2 },
    { label: "Retinol", products: 1 }
  ]);
});

test("groupProducts keeps batch order for equal scores", () => {
  const groups = groupProducts([
    product({ name: "Alpha", brand: "X", ingredients: "Zinc Oxide" }),
    product({ name: "Bravo", brand: "X", ingredients: "Zinc Oxide" })
  ]);
  assert.deepEqual(
    groups.get("zinc oxide")?.ranked.map((entry) => entry.product.name),
    ["Alpha", "Bravo"]
  );
});

test("groupProducts counts a product once per ingredient", () => {
  const groups = groupProducts([product({ name: "Retinol Night", ingredients: "Retinol | retinol 1%" })]);
  assert.equal(groups.size, 1);
  assert.equal(groups.get("retinol")?.totalProducts, 1);
});

test("groupProducts skips products without ingredient text", () => {
  assert.equal(groupProducts([product({ name: "Mystery" })]).size, 0);
  assert.equal(groupProducts([]).size, 0);
  assert.deepEqual(buildGroupedRows(new Map()), []);
});

test("formatPriceUsd renders cents as dollars and absent prices as empty text", () => {
  assert.equal(formatPriceUsd({ kind: "present", value: 1999 }), "$19.99");
  assert.equal(formatPriceUsd({ kind: "present", value: 500 }), "$5.00");
  assert.equal(formatPriceUsd({ kind: "absent" }), "");
});
