import Redis, { type RedisOptions } from 'ioredis';

// REDIS_URL wins over REDIS_HOST / REDIS_PORT
const redisUrl = () =>
  process.env.REDIS_URL ?? `redis://${process.env.REDIS_HOST || 'localhost'}:${process.env.REDIS_PORT || '6379'}`;

const options: RedisOptions = {
  maxRetriesPerRequest: null, // BullMQ workers block on the connection
  lazyConnect: true, // Driver reads never touch the scenario job queue
};

const globalForRedis = global as unknown as { redis?: Redis };

function connect(): Redis {
  const client = new Redis(redisUrl(), options);
  client.on('error', (err) => {
    console.error('[Redis] Scenario queue connection error:', err.message);
  });
  return client;
}

/** Shared connection for the scenario job queue and worker */
export const redis = globalForRedis.redis ?? connect();

if (process.env.NODE_ENV !== 'production') globalForRedis.redis = redis;
