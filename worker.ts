/**
 * Fuel Forecast Worker (BullMQ)
 *
 * Job Types:
 * - CopyScenarioDriversJob
 * - ImportScenarioDriversJob
 *
 * Engine work is synchronous; each job builds its own FuelModel and
 * discards it. Retries (see lib/queue.ts) cover database/Redis failures.
 */

import { Worker, Job } from 'bullmq';
import { redis } from './lib/redis';
import { pool } from './lib/db';
import { processScenarioJob, SCENARIO_JOB_NAMES } from './lib/jobs';
import { SCENARIO_QUEUE_NAME, scenarioQueue } from './lib/queue';
import { scenarioRepository } from './lib/scenario-repository';

console.log('[Worker] Starting Fuel Forecast Worker...');
console.log(`[Worker] Queue: ${SCENARIO_QUEUE_NAME}`);
console.log(`[Worker] Redis: ${process.env.REDIS_URL || 'localhost:6379'}`);

if (!process.env.DATABASE_URL) {
  console.warn('[Worker] ⚠️  WARNING: DATABASE_URL is not set. Using the local default connection.');
}

// ============================================================================
// Worker Definition
// ============================================================================

const worker = new Worker(
  SCENARIO_QUEUE_NAME,
  async (job: Job) => {
    console.log(`[Worker] 🔄 Processing Job: ${job.name} (ID: ${job.id})`);

    try {
      return await processScenarioJob(job.name, job.data, scenarioRepository);
    } catch (error) {
      console.error(`[Worker] ❌ Job ${job.name} failed:`, error);
      throw error;
    }
  },
  {
    connection: redis,
    concurrency: parseInt(process.env.WORKER_CONCURRENCY || '3'),
  }
);

// ============================================================================
// Event Handlers
// ============================================================================

worker.on('completed', (job) => {
  console.log(`[Worker] ✅ Job ${job.id} (${job.name}) completed!`);
});

worker.on('failed', (job, err) => {
  console.error(`[Worker] ❌ Job ${job?.id} (${job?.name}) failed: ${err.message}`);
});

worker.on('error', (err) => {
  console.error('[Worker] ⚠️  Worker error:', err);
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function shutdown(signal: string) {
  console.log(`[Worker] 🛑 ${signal} received, shutting down gracefully...`);
  await worker.close();
  await scenarioQueue.close();
  await pool.end();
  await redis.quit();
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      console.error('[Worker] ❌ Shutdown failed:', err);
      process.exit(1);
    });
  });
}

console.log(`[Worker] ✅ Worker listening on queue: ${SCENARIO_QUEUE_NAME}`);
console.log('[Worker] 📝 Available job types:');
for (const name of SCENARIO_JOB_NAMES) console.log(`  - ${name}`);
