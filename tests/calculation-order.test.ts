import test from "node:test";
import assert from "node:assert/strict";
import { computeCalculationOrder } from "../lib/drivers/calculation-order";
import { defineDriver } from "../lib/drivers/driver";
import { CircularDependencyError } from "../lib/drivers/errors";
import type { Driver } from "../lib/drivers/types";

const input = (name: string) => defineDriver({ name, driverType: "INPUT" });
const calculated = (name: string, dependsOn: string[]) =>
  defineDriver({ name, driverType: "CALCULATED", dependsOn });

const byName = (...drivers: Driver[]) => new Map(drivers.map((d) => [d.name, d]));

test("dependencies come before their dependents", () => {
  const order = computeCalculationOrder(
    byName(calculated("d", ["b", "c"]), calculated("b", ["a"]), calculated("c", ["a"]), input("a"))
  );

  assert.deepEqual(order, ["a", "b", "c", "d"]);
});

test("independent drivers keep registration order", () => {
  const order = computeCalculationOrder(byName(input("z"), input("y"), input("x")));

  assert.deepEqual(order, ["z", "y", "x"]);
});

test("a shared dependency is emitted once", () => {
  const order = computeCalculationOrder(
    byName(input("price"), calculated("cost", ["price"]), calculated("margin", ["price", "cost"]))
  );

  assert.deepEqual(order, ["price", "cost", "margin"]);
});

test("unregistered dependencies are skipped", () => {
  const order = computeCalculationOrder(byName(calculated("e", ["missing"])));

  assert.deepEqual(order, ["e"]);
});

test("a cycle throws with the offending path", () => {
  assert.throws(
    () => computeCalculationOrder(byName(calculated("x", ["y"]), calculated("y", ["x"]))),
    (error: unknown) => {
      assert.ok(error instanceof CircularDependencyError);
      assert.equal(error.driverName, "x");
      assert.deepEqual(error.path, ["x", "y", "x"]);
      assert.equal(error.message, "Circular dependency detected involving: x (x -> y -> x)");
      return true;
    }
  );
});

test("a self-dependency is a cycle", () => {
  assert.throws(() => computeCalculationOrder(byName(calculated("s", ["s"]))), CircularDependencyError);
});
