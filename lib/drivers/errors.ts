// ============================================================================
// Error Types
// ============================================================================

export type DriverErrorCode =
  | 'UNKNOWN_DRIVER'
  | 'CIRCULAR_DEPENDENCY'
  | 'INVALID_PERIOD'
  | 'INVALID_DRIVER_SET';

export class DriverModelError extends Error {
  constructor(
    public code: DriverErrorCode,
    message: string,
    public httpStatus: number = 400
  ) {
    super(message);
    this.name = 'DriverModelError';
  }
}

export class UnknownDriverError extends DriverModelError {
  constructor(public driverName: string) {
    super('UNKNOWN_DRIVER', `Unknown driver: ${driverName}`);
    this.name = 'UnknownDriverError';
  }
}

export class CircularDependencyError extends DriverModelError {
  /**
   * @param driverName the driver re-entered while still being visited
   * @param path the active visit path, ending with `driverName`
   */
  constructor(
    public driverName: string,
    public path: string[] = [driverName]
  ) {
    super(
      'CIRCULAR_DEPENDENCY',
      `Circular dependency detected involving: ${driverName} (${path.join(' -> ')})`
    );
    this.name = 'CircularDependencyError';
  }
}

export class InvalidPeriodError extends DriverModelError {
  constructor(message: string) {
    super('INVALID_PERIOD', message);
    this.name = 'InvalidPeriodError';
  }
}

export class InvalidDriverSetError extends DriverModelError {
  constructor(message: string) {
    super('INVALID_DRIVER_SET', message);
    this.name = 'InvalidDriverSetError';
  }
}
