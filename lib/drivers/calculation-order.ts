// lib/drivers/calculation-order.ts
// Topological ordering of drivers by declared dependency

import { CircularDependencyError } from './errors';
import type { Driver } from './types';

/**
 * Order drivers so every driver comes after everything in its `dependsOn`.
 *
 * Depth-first visit in registration order:
 * - a driver met again while still on the active path is a cycle
 * - finished drivers are emitted once (diamonds are safe)
 * - dependencies that are not registered are skipped; they are reported by
 *   DriverRegistry.validateDependencies() instead
 */
export function computeCalculationOrder(drivers: ReadonlyMap<string, Driver>): string[] {
  const visited = new Set<string>();
  const visiting = new Set<string>();
  const path: string[] = [];
  const order: string[] = [];

  const visit = (name: string): void => {
    if (visiting.has(name)) {
      const start = path.indexOf(name);
      throw new CircularDependencyError(name, [...path.slice(start), name]);
    }
    if (visited.has(name)) return;

    visiting.add(name);
    path.push(name);

    const driver = drivers.get(name);
    if (driver) {
      for (const dep of driver.dependsOn) {
        if (drivers.has(dep)) visit(dep);
      }
    }

    path.pop();
    visiting.delete(name);
    visited.add(name);
    order.push(name);
  };

  for (const name of drivers.keys()) {
    if (!visited.has(name)) visit(name);
  }

  return order;
}
