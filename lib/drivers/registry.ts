import { computeCalculationOrder } from './calculation-order';
import { checkDriver, isCalculated } from './driver';
import { UnknownDriverError } from './errors';
import type { Driver, DriverCategory, DriverIssue, DriverLogger } from './types';

export interface DriverRegistryOptions {
  logger?: DriverLogger;
}

/**
 * Holds driver definitions by name.
 *
 * Registration is permissive: configuration problems come back as issues
 * (and are logged) but never stop a driver from being registered.
 */
export class DriverRegistry {
  private drivers = new Map<string, Driver>();
  private order: string[] = [];
  private orderDirty = true;
  private logger: DriverLogger;

  constructor(options: DriverRegistryOptions = {}) {
    this.logger = options.logger ?? console;
  }

  get size(): number {
    return this.drivers.size;
  }

  register(driver: Driver): DriverIssue[] {
    const issues = checkDriver(driver);

    if (this.drivers.has(driver.name)) {
      issues.push({
        code: 'OVERWRITTEN',
        driver: driver.name,
        message: `Overwriting existing driver: ${driver.name}`,
      });
    }

    for (const issue of issues) {
      this.logger.warn(`[DriverRegistry] ${issue.message}`);
    }

    this.drivers.set(driver.name, driver);
    this.orderDirty = true;

    return issues;
  }

  registerMany(drivers: readonly Driver[]): DriverIssue[] {
    return drivers.flatMap((driver) => this.register(driver));
  }

  has(name: string): boolean {
    return this.drivers.has(name);
  }

  get(name: string): Driver {
    const driver = this.drivers.get(name);
    if (!driver) throw new UnknownDriverError(name);
    return driver;
  }

  names(): string[] {
    return [...this.drivers.keys()];
  }

  definitions(): Driver[] {
    return [...this.drivers.values()];
  }

  byCategory(category: DriverCategory): Driver[] {
    return this.definitions().filter((d) => d.category === category);
  }

  /** Non-calculated drivers (user inputs) */
  inputs(): Driver[] {
    return this.definitions().filter((d) => !isCalculated(d));
  }

  calculated(): Driver[] {
    return this.definitions().filter(isCalculated);
  }

  /**
   * Dependencies naming drivers that are not registered. Does not throw;
   * run it before evaluation to surface configuration errors early.
   */
  validateDependencies(): DriverIssue[] {
    const issues: DriverIssue[] = [];
    for (const driver of this.drivers.values()) {
      for (const dep of driver.dependsOn) {
        if (!this.drivers.has(dep)) {
          issues.push({
            code: 'UNKNOWN_DEPENDENCY',
            driver: driver.name,
            dependency: dep,
            message: `Driver '${driver.name}' depends on unknown driver '${dep}'`,
          });
        }
      }
    }
    return issues;
  }

  /**
   * Driver names in dependency order. Cached until the driver set changes.
   * Throws CircularDependencyError on a cycle.
   */
  calculationOrder(): readonly string[] {
    if (this.orderDirty) {
      this.order = computeCalculationOrder(this.drivers);
      this.orderDirty = false;
    }
    return this.order;
  }

  /** Same definitions, registered without re-running diagnostics. */
  clone(): DriverRegistry {
    const copy = new DriverRegistry({ logger: this.logger });
    copy.drivers = new Map(this.drivers);
    return copy;
  }
}
