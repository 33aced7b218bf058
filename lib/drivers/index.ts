// lib/drivers/index.ts
// Driver-based forecasting engine - Module Exports

export * from './types';
export * from './errors';
export * from './period';
export * from './driver';
export * from './calculation';
export * from './calculation-order';
export * from './value-store';
export * from './registry';
export * from './fuel-model';
export * from './default-drivers';
export * from './scenario-driver-set';
export * from './repository';
export * from './scenario-drivers';
export * from './projections';
