import { Queue } from 'bullmq';
import { redis } from './redis';
import type { ScenarioDriverSet } from './drivers/scenario-driver-set';

export const SCENARIO_QUEUE_NAME = process.env.QUEUE_NAME || 'fuel-forecast-jobs';

// Producer side; worker.ts consumes
export const scenarioQueue = new Queue(SCENARIO_QUEUE_NAME, {
  connection: redis,
  defaultJobOptions: {
    attempts: 3,
    backoff: {
      type: 'exponential',
      delay: 1000,
    },
    removeOnComplete: 100,
    removeOnFail: 500,
  },
});

export type CopyScenarioDriversJobData = {
  sourceScenarioId: number;
  targetScenarioId: number;
  year: number;
  overwrite?: boolean;
  updatedBy?: string | null;
};

export type ImportScenarioDriversJobData = {
  scenarioId: number;
  driverSet: ScenarioDriverSet;
  updatedBy?: string | null;
};
