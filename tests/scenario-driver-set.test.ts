import test from "node:test";
import assert from "node:assert/strict";
import { canonicalize, computeHash } from "../lib/crypto";
import { createDefaultFuelModel } from "../lib/drivers/default-drivers";
import { InvalidPeriodError } from "../lib/drivers/errors";
import { Decimal } from "../lib/math";
import {
  applyDriverSet,
  compareDriverSets,
  driverSetFromRows,
  exportModelDrivers,
  parseScenarioDriverSet,
  serializeDriverSet,
  type ScenarioDriverSet,
} from "../lib/drivers/scenario-driver-set";
import { recordingLogger } from "./helpers/in-memory-repository";

const quietModel = () => createDefaultFuelModel({ logger: recordingLogger() });

const sampleSet = (): ScenarioDriverSet => ({
  scenarioId: 3,
  year: 2025,
  drivers: {
    coal_price_eastern: { annual: 55, monthly: { 3: 50 }, plant_specific: { 1: { annual: 60, monthly: {} } } },
    use_factor: { annual: null, monthly: { 1: 80, 2: 82 }, plant_specific: {} },
  },
});

test("canonicalize sorts keys at every level", () => {
  assert.equal(
    canonicalize({ b: 1, a: [1, { d: null, c: "x" }] }),
    '{"a":[1,{"c":"x","d":null}],"b":1}'
  );
  assert.equal(computeHash({ a: 1, b: 2 }), computeHash({ b: 2, a: 1 }));
});

test("canonicalize writes Decimals as numbers and drops undefined fields", () => {
  assert.equal(canonicalize({ value: new Decimal("1.50"), note: undefined }), '{"value":1.5}');
  assert.equal(computeHash({ a: new Decimal(2) }), computeHash({ a: 2 }));
});

test("exportModelDrivers groups stored values of one year", () => {
  const model = quietModel();
  model.setValue("coal_price_eastern", 2025, null, 55);
  model.setValue("coal_price_eastern", 2025, 3, 50);
  model.setValue("coal_price_eastern", 2025, null, 60, 1);
  model.setValue("coal_price_eastern", 2024, null, 40);

  assert.deepEqual(exportModelDrivers(model, 2025, 3).drivers, {
    coal_price_eastern: { annual: 55, monthly: { 3: 50 }, plant_specific: { 1: { annual: 60, monthly: {} } } },
  });
});

test("driverSetFromRows reads period strings and drops other years", () => {
  const set = driverSetFromRows(7, 2025, [
    { driverName: "use_factor", plantId: null, period: "202501", value: "80" },
    { driverName: "use_factor", plantId: null, period: "2025", value: 85 },
    { driverName: "use_factor", plantId: null, period: "202412", value: 70 },
  ]);

  assert.deepEqual(set, {
    scenarioId: 7,
    year: 2025,
    drivers: { use_factor: { annual: 85, monthly: { 1: 80 }, plant_specific: {} } },
  });
});

test("driverSetFromRows rejects malformed periods", () => {
  assert.throws(
    () => driverSetFromRows(1, 2025, [{ driverName: "x", plantId: null, period: "2025-1", value: 1 }]),
    InvalidPeriodError
  );
});

test("serialized sets parse back to the same values", () => {
  const json = serializeDriverSet(sampleSet(), new Date("2025-01-02T00:00:00.000Z"));

  assert.equal(json.exportedAt, "2025-01-02T00:00:00.000Z");
  assert.equal(json.checksum, computeHash(sampleSet().drivers));
  assert.deepEqual(parseScenarioDriverSet(JSON.parse(JSON.stringify(json))), sampleSet());
});

test("a full export round trip restores every stored value", () => {
  const source = quietModel();
  source.setValue("coal_price_eastern", 2025, null, 58.25);
  source.setValue("coal_price_eastern", 2025, 7, 61.5);
  source.setValue("coal_price_eastern", 2025, null, 63, 2);
  source.setValue("coal_price_eastern", 2025, 12, 64.75, 2);
  source.setValue("use_factor", 2025, 4, 71);
  source.setValue("capacity_mw", 2025, null, 1000, 1);

  const wire = JSON.parse(JSON.stringify(serializeDriverSet(exportModelDrivers(source, 2025, 4))));
  const target = source.copy();
  const result = applyDriverSet(target, parseScenarioDriverSet(wire), recordingLogger());

  assert.equal(result.applied, 6);
  for (const entry of source.values.entries()) {
    const month = entry.month ?? 1;
    assert.equal(target.values.has(entry.driverName, entry.year, entry.month, entry.plantId), true);
    assert.equal(
      target.getValue(entry.driverName, entry.year, month, entry.plantId).toNumber(),
      source.getValue(entry.driverName, entry.year, month, entry.plantId).toNumber()
    );
  }
  assert.equal(target.getValue("coal_price_eastern", 2025, 12, 2).toNumber(), 64.75);
  assert.equal(target.getValue("coal_price_eastern", 2025, 11, 2).toNumber(), 63);
  assert.equal(target.getValue("coal_price_eastern", 2025, 7).toNumber(), 61.5);
});

test("plant values in a request body reach the model", () => {
  const model = quietModel();
  const set = parseScenarioDriverSet({
    year: 2025,
    drivers: { capacity_mw: { annual: 1000, plant_specific: { 1: { annual: 500 } } } },
  });

  applyDriverSet(model, set, recordingLogger());

  assert.equal(model.getValue("capacity_mw", 2025, 1, 1).toNumber(), 500);
  assert.equal(model.getValue("capacity_mw", 2025, 1).toNumber(), 1000);
  assert.equal(model.getValue("capacity_mw", 2025, 1, 2).toNumber(), 1000);
});

test("applyDriverSet writes values and skips unknown drivers", () => {
  const model = quietModel();
  const logger = recordingLogger();
  const set = sampleSet();
  set.drivers.ghost = { annual: 1, monthly: {}, plant_specific: {} };

  const result = applyDriverSet(model, set, logger);

  assert.deepEqual(result, { applied: 5, skippedDrivers: ["ghost"] });
  assert.deepEqual(logger.warnings, ["[ScenarioDrivers] Unknown driver in import: ghost"]);
  assert.equal(model.getValue("coal_price_eastern", 2025, 3).toNumber(), 50);
  assert.equal(model.getValue("coal_price_eastern", 2025, 4).toNumber(), 55);
  assert.equal(model.getValue("coal_price_eastern", 2025, 4, 1).toNumber(), 60);
  assert.equal(model.getValue("use_factor", 2025, 2).toNumber(), 82);
  assert.equal(model.getValue("use_factor", 2025, 3).toNumber(), 85);
});

test("parseScenarioDriverSet defaults scenarioId and missing sections", () => {
  assert.deepEqual(parseScenarioDriverSet({ year: 2025, drivers: { x: { annual: 1 } } }), {
    scenarioId: 0,
    year: 2025,
    drivers: { x: { annual: 1, monthly: {}, plant_specific: {} } },
  });
});

test("parseScenarioDriverSet rejects invalid input", () => {
  const cases: [unknown, string][] = [
    [null, "Driver set must be an object"],
    [{ drivers: {} }, "year: expected a finite number"],
    [{ year: 25, drivers: {} }, "year: invalid year 25"],
    [{ year: 2025 }, "drivers: expected an object"],
    [{ year: 2025, drivers: { x: { annual: "1" } } }, "drivers.x.annual: expected a finite number"],
    [{ year: 2025, drivers: { x: { monthly: { 13: 1 } } } }, 'drivers.x.monthly: invalid month "13"'],
    [{ year: 2025, drivers: { x: { plant_specific: { abc: {} } } } }, 'drivers.x.plant_specific: invalid plant id "abc"'],
    [
      { year: 2025, drivers: { x: { annual: 1, plantSpecific: { 1: { annual: 2 } } } } },
      'drivers.x: unknown field "plantSpecific" (expected annual, monthly, plant_specific)',
    ],
    [
      { year: 2025, drivers: { x: { plant_specific: { 1: { annual: 2, weekly: {} } } } } },
      'drivers.x.plant_specific.1: unknown field "weekly" (expected annual, monthly)',
    ],
    [{ year: 2025, drivers: { x: { plant_specific: { 1: 5 } } } }, "drivers.x.plant_specific.1: expected an object"],
    [{ year: 2025, drivers: { x: 5 } }, "drivers.x: expected an object"],
  ];

  for (const [input, message] of cases) {
    assert.throws(() => parseScenarioDriverSet(input), { name: "InvalidDriverSetError", message });
  }
});

test("a checksum that does not match the drivers is rejected", () => {
  const json = serializeDriverSet(sampleSet());
  const tampered = { ...json, drivers: { ...json.drivers, use_factor: { annual: 90, monthly: {}, plant_specific: {} } } };

  assert.throws(() => parseScenarioDriverSet(tampered), {
    name: "InvalidDriverSetError",
    message: "checksum: does not match drivers",
  });
  assert.deepEqual(parseScenarioDriverSet({ ...tampered, checksum: undefined }).drivers.use_factor, {
    annual: 90,
    monthly: {},
    plant_specific: {},
  });
});

test("compareDriverSets classifies every driver", () => {
  const a: ScenarioDriverSet = {
    scenarioId: 1,
    year: 2025,
    drivers: {
      x: { annual: 1, monthly: { 1: 2 }, plant_specific: {} },
      y: { annual: 1, monthly: {}, plant_specific: {} },
      z: { annual: 5, monthly: {}, plant_specific: {} },
    },
  };
  const b: ScenarioDriverSet = {
    scenarioId: 2,
    year: 2025,
    drivers: {
      w: { annual: 9, monthly: {}, plant_specific: {} },
      x: { annual: 1, monthly: { 1: 2 }, plant_specific: {} },
      y: { annual: 2, monthly: {}, plant_specific: {} },
    },
  };

  const result = compareDriverSets(a, b);

  assert.equal(result.scenarioAId, 1);
  assert.equal(result.scenarioBId, 2);
  assert.equal(result.totalDrivers, 4);
  assert.deepEqual(result.same, ["x"]);
  assert.deepEqual(result.differences.map((d) => d.driver), ["y"]);
  assert.equal(result.differences[0].scenarioB.annual, 2);
  assert.deepEqual(result.onlyInA, ["z"]);
  assert.deepEqual(result.onlyInB, ["w"]);
  assert.deepEqual(
    [result.sameCount, result.differentCount, result.onlyInACount, result.onlyInBCount],
    [1, 1, 1, 1]
  );
});
