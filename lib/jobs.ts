/**
 * Scenario driver job handlers, independent of BullMQ so they can run in
 * tests against any ScenarioDriverRepository.
 *
 * Job Types:
 * - CopyScenarioDriversJob
 * - ImportScenarioDriversJob
 */

import {
  copyScenarioDrivers,
  importScenarioDrivers,
  parseScenarioDriverSet,
  type ScenarioDriverOptions,
  type ScenarioDriverRepository,
} from './drivers';
import type { CopyScenarioDriversJobData, ImportScenarioDriversJobData } from './queue';

export const SCENARIO_JOB_NAMES = ['CopyScenarioDriversJob', 'ImportScenarioDriversJob'] as const;

export type ScenarioJobName = (typeof SCENARIO_JOB_NAMES)[number];

export type ScenarioJobResult =
  | { status: 'COMPLETED'; name: ScenarioJobName; saved: number }
  | { status: 'UNKNOWN_JOB_TYPE'; name: string };

export async function processScenarioJob(
  name: string,
  data: unknown,
  repo: ScenarioDriverRepository,
  options: ScenarioDriverOptions = {}
): Promise<ScenarioJobResult> {
  const logger = options.logger ?? console;

  switch (name) {
    case 'CopyScenarioDriversJob': {
      const job = readCopyJob(data);
      logger.log(
        `[Worker] 📋 Copying drivers: scenario ${job.sourceScenarioId} → ${job.targetScenarioId} (${job.year})`
      );
      const saved = await copyScenarioDrivers(repo, job.sourceScenarioId, job.targetScenarioId, job.year, {
        ...options,
        overwrite: job.overwrite ?? false,
        updatedBy: job.updatedBy ?? null,
      });
      return { status: 'COMPLETED', name, saved };
    }

    case 'ImportScenarioDriversJob': {
      const job = readImportJob(data);
      logger.log(`[Worker] 📥 Importing drivers into scenario ${job.scenarioId} (${job.driverSet.year})`);
      const saved = await importScenarioDrivers(repo, job.scenarioId, job.driverSet, job.updatedBy ?? null, options);
      return { status: 'COMPLETED', name, saved };
    }

    default:
      logger.warn(`[Worker] ⚠️  Unknown job type: ${name}`);
      return { status: 'UNKNOWN_JOB_TYPE', name };
  }
}

// ============================================================================
// Payload checks (job data arrives as untyped JSON from Redis)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInt(source: Record<string, unknown>, field: string): number {
  const value = source[field];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`[Worker] Invalid job data: ${field} must be an integer`);
  }
  return value;
}

function readUpdatedBy(source: Record<string, unknown>): string | null {
  return typeof source.updatedBy === 'string' ? source.updatedBy : null;
}

function readCopyJob(data: unknown): CopyScenarioDriversJobData {
  if (!isRecord(data)) throw new Error('[Worker] Invalid job data: expected an object');
  return {
    sourceScenarioId: readInt(data, 'sourceScenarioId'),
    targetScenarioId: readInt(data, 'targetScenarioId'),
    year: readInt(data, 'year'),
    overwrite: data.overwrite === true,
    updatedBy: readUpdatedBy(data),
  };
}

function readImportJob(data: unknown): ImportScenarioDriversJobData {
  if (!isRecord(data)) throw new Error('[Worker] Invalid job data: expected an object');
  return {
    scenarioId: readInt(data, 'scenarioId'),
    driverSet: parseScenarioDriverSet(data.driverSet),
    updatedBy: readUpdatedBy(data),
  };
}
