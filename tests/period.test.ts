import test from "node:test";
import assert from "node:assert/strict";
import { InvalidPeriodError } from "../lib/drivers/errors";
import { daysInMonth, formatPeriod, hoursInMonth, parsePeriod } from "../lib/drivers/period";

test("formatPeriod writes YYYYMM for months and YYYY for annual values", () => {
  assert.equal(formatPeriod(2025, 3), "202503");
  assert.equal(formatPeriod(2025, 12), "202512");
  assert.equal(formatPeriod(2025, null), "2025");
});

test("parsePeriod reads both period forms", () => {
  assert.deepEqual(parsePeriod("202503"), { year: 2025, month: 3 });
  assert.deepEqual(parsePeriod("2025"), { year: 2025, month: null });
  assert.deepEqual(parsePeriod(" 202511 "), { year: 2025, month: 11 });
});

test("parsePeriod rejects malformed periods", () => {
  for (const bad of ["20253", "202513", "202500", "25", "2025-03", ""]) {
    assert.throws(() => parsePeriod(bad), InvalidPeriodError, bad);
  }
});

test("formatPeriod validates year and month", () => {
  assert.throws(() => formatPeriod(2025, 0), InvalidPeriodError);
  assert.throws(() => formatPeriod(2025.5, 1), InvalidPeriodError);
});

test("month lengths follow the calendar", () => {
  assert.equal(daysInMonth(2025, 1), 31);
  assert.equal(daysInMonth(2025, 2), 28);
  assert.equal(daysInMonth(2024, 2), 29);
  assert.equal(daysInMonth(2025, 4), 30);
  assert.equal(hoursInMonth(2025, 1), 744);
});
