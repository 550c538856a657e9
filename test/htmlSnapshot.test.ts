import test from "node:test";
import assert from "node:assert/strict";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadHTMLSnapshot, parseProductsFromHTML } from "../src/ingestion/htmlSnapshot.js";

test("parseProductsFromHTML reads inlined product objects", () => {
  const html = `<script>window.__DATA__={"data":{"hits":[{"skid":"S1","text":"Aloe Gel","categories":["Skin Care","Aloe Vera"],"brand":"Verde","price":1250}]}}</script>`;
  assert.deepEqual(parseProductsFromHTML(html), [
    { skid: "S1", text: "Aloe Gel", categories: ["Skin Care", "Aloe Vera"], brand: "Verde", price: 1250 }
  ]);
});

test("parseProductsFromHTML salvages fields from broken objects", () => {
  const html = `<script>{"skid":"S2","text":"Snail Mucin","categories":["Skin Care","Snail Essence"],"price":2400,"slug":"snail-mucin",rating:4.5}</script>`;
  assert.deepEqual(parseProductsFromHTML(html), [
    {
      skid: "S2",
      text: "Snail Mucin",
      categories: ["Skin Care", "Snail Essence"],
      brand: "",
      price: 2400,
      listPrice: "",
      score: "",
      image: "",
      slug: "snail-mucin",
      badge: "",
      rankName: "",
      OptionMap: {}
    }
  ]);
});

test("parseProductsFromHTML keeps a minimal record when the name is missing", () => {
  const html = `{"skid":"S3","categories":["Face"],"brand":"Plain",}`;
  assert.deepEqual(parseProductsFromHTML(html), [
    { skid: "S3", text: "", categories: ["Face"], brand: "Plain" }
  ]);
});

test("parseProductsFromHTML zips loose fields when no object matches", () => {
  const html = `{"categories":["Skin Care","Retinol Creams"],"skid":"S4","text":"Night Retinol","brand":"Nox"}`;
  assert.deepEqual(parseProductsFromHTML(html), [
    { skid: "S4", text: "Night Retinol", categories: ["Skin Care", "Retinol Creams"], brand: "Nox" }
  ]);
});

test("parseProductsFromHTML pairs ids and names as a last resort", () => {
  const html = `<div data-p='{"skid":"S5"}'></div><div data-p='{"text":"Plain Wash"}'></div>`;
  assert.deepEqual(parseProductsFromHTML(html), [{ skid: "S5", text: "Plain Wash" }]);
  assert.deepEqual(parseProductsFromHTML("<html></html>"), []);
});

test("loadHTMLSnapshot returns nothing for a missing file", () => {
  assert.deepEqual(loadHTMLSnapshot(join(tmpdir(), "missing-snapshot-for-test.html")), []);
});
