import test from "node:test";
import assert from "node:assert/strict";
import { DriverValueStore, resolutionKeys } from "../lib/drivers/value-store";

test("get returns the exact monthly value", () => {
  const store = new DriverValueStore();
  store.set("coal_price", 2025, 3, 10);

  assert.equal(store.get("coal_price", 2025, 3).toNumber(), 10);
});

test("monthly value wins over the annual value of the same year", () => {
  const store = new DriverValueStore();
  store.set("coal_price", 2025, null, 7);
  store.set("coal_price", 2025, 3, 10);

  assert.equal(store.get("coal_price", 2025, 3).toNumber(), 10);
  assert.equal(store.get("coal_price", 2025, 4).toNumber(), 7);
});

test("plant values fall back through plant annual, system monthly, system annual", () => {
  const store = new DriverValueStore();
  store.set("coal_price", 2025, null, 7);
  store.set("coal_price", 2025, 3, 10);
  store.set("coal_price", 2025, 3, 20, 1);

  assert.equal(store.get("coal_price", 2025, 3, 1).toNumber(), 20);
  // No plant annual yet: system annual
  assert.equal(store.get("coal_price", 2025, 4, 1).toNumber(), 7);

  store.set("coal_price", 2025, null, 15, 1);
  assert.equal(store.get("coal_price", 2025, 4, 1).toNumber(), 15);
  // Other plants only see system values
  assert.equal(store.get("coal_price", 2025, 3, 2).toNumber(), 10);
});

test("missing values resolve to the supplied default", () => {
  const store = new DriverValueStore();

  assert.equal(store.get("missing", 2025, 1).toNumber(), 0);
  assert.equal(store.get("missing", 2025, 1, null, 42).toNumber(), 42);
  // Other years are not consulted
  store.set("missing", 2024, null, 5);
  assert.equal(store.get("missing", 2025, 1, null, 42).toNumber(), 42);
});

test("last write for a key wins", () => {
  const store = new DriverValueStore();
  store.set("x", 2025, 1, 1);
  store.set("x", 2025, 1, 2);

  assert.equal(store.get("x", 2025, 1).toNumber(), 2);
  assert.equal(store.size, 1);
});

test("getAllMonths resolves every month with fallback", () => {
  const store = new DriverValueStore();
  store.set("z", 2025, null, 5);
  store.set("z", 2025, 6, 9);

  const months = store.getAllMonths("z", 2025);
  assert.deepEqual(
    Object.entries(months).map(([month, value]) => [Number(month), value.toNumber()]),
    [
      [1, 5], [2, 5], [3, 5], [4, 5], [5, 5], [6, 9],
      [7, 5], [8, 5], [9, 5], [10, 5], [11, 5], [12, 5],
    ]
  );
});

test("has checks the exact key only", () => {
  const store = new DriverValueStore();
  store.set("x", 2025, null, 1);

  assert.equal(store.has("x", 2025, null), true);
  assert.equal(store.has("x", 2025, 1), false);
  assert.equal(store.has("x", 2025, null, 1), false);
});

test("clear removes one driver or everything", () => {
  const store = new DriverValueStore();
  store.set("a", 2025, 1, 1);
  store.set("b", 2025, 1, 2);
  store.set("a", 2025, 2, 3, 4);

  assert.deepEqual(store.storedDrivers(), ["a", "b"]);

  store.clear("a");
  assert.deepEqual(store.storedDrivers(), ["b"]);
  assert.equal(store.size, 1);

  store.clear();
  assert.equal(store.size, 0);
});

test("entries filters by driver and keeps period details", () => {
  const store = new DriverValueStore();
  store.set("a", 2025, 1, 1);
  store.set("b", 2025, null, "2.5", 3);

  const entries = store.entries("b");
  assert.equal(entries.length, 1);
  assert.equal(entries[0].plantId, 3);
  assert.equal(entries[0].month, null);
  assert.equal(entries[0].value.toString(), "2.5");
  assert.equal(store.entries().length, 2);
});

test("resolutionKeys skips plant keys for system lookups", () => {
  assert.equal(resolutionKeys("x", 2025, 1, null).length, 2);
  assert.equal(resolutionKeys("x", 2025, 1, 7).length, 4);
});
