import { createClient, RedisClientType } from 'redis';

let redisClient: RedisClientType | null = null;
let connectionPromise: Promise<RedisClientType> | null = null;
let configuredUrl: string | null = null;

/**
 * Set the Redis URL used for the next connection. Takes precedence over REDIS_URL.
 */
export function configureRedis(url: string): void {
  configuredUrl = url;
}

/**
 * Get or create a Redis client connection.
 * Returns null if no URL has been configured and REDIS_URL is not set.
 */
export async function getRedisClient(): Promise<RedisClientType | null> {
  const redisUrl = configuredUrl ?? process.env.REDIS_URL;

  if (!redisUrl) {
    return null;
  }

  // Return existing client if connected
  if (redisClient?.isOpen) {
    return redisClient;
  }

  // Return pending connection promise if one exists
  if (connectionPromise) {
    return connectionPromise;
  }

  // Create new connection
  connectionPromise = (async () => {
    try {
      const client = createClient({ url: redisUrl });

      client.on('error', (err) => {
        console.error('[Redis] Client error:', err);
      });

      client.on('connect', () => {
        console.log('[Redis] Connected');
      });

      await client.connect();
      redisClient = client as RedisClientType;
      return redisClient;
    } catch (error) {
      console.error('[Redis] Failed to connect:', error);
      connectionPromise = null;
      throw error;
    }
  })();

  return connectionPromise;
}

/**
 * Check if Redis is available
 */
export async function isRedisAvailable(): Promise<boolean> {
  try {
    const client = await getRedisClient();
    return client !== null && client.isOpen;
  } catch {
    return false;
  }
}

async function requireRedisClient(): Promise<RedisClientType> {
  const client = await getRedisClient();
  if (!client) {
    throw new Error('Redis is not configured (no URL configured and REDIS_URL is not set)');
  }
  return client;
}

/**
 * Store JSON under a key only if the key doesn't exist yet (SET NX).
 * Returns true when this call created the key.
 * Unlike the read helpers, errors propagate: callers rely on the answer for deduplication.
 */
export async function redisSetJsonIfAbsent<T>(key: string, value: T): Promise<boolean> {
  const client = await requireRedisClient();
  const result = await client.set(key, JSON.stringify(value), { NX: true });
  return result === 'OK';
}

/**
 * Get a value from Redis
 */
export async function redisGet(key: string): Promise<string | null> {
  try {
    const client = await getRedisClient();
    if (!client) return null;

    return await client.get(key);
  } catch (error) {
    console.error('[Redis] GET error:', error);
    return null;
  }
}

/**
 * Get JSON data from Redis
 */
export async function redisGetJson<T>(key: string): Promise<T | null> {
  const value = await redisGet(key);
  if (!value) return null;

  try {
    return JSON.parse(value) as T;
  } catch {
    return null;
  }
}

/**
 * Close the Redis connection
 */
export async function closeRedis(): Promise<void> {
  if (redisClient?.isOpen) {
    await redisClient.quit();
    redisClient = null;
    connectionPromise = null;
  }
}
