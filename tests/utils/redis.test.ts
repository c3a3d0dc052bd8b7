import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// Mock redis module
const mockRedisClient = {
  isOpen: true,
  connect: vi.fn().mockResolvedValue(undefined),
  quit: vi.fn().mockResolvedValue(undefined),
  get: vi.fn(),
  set: vi.fn(),
  on: vi.fn(),
};

vi.mock('redis', () => ({
  createClient: vi.fn(() => mockRedisClient),
}));

describe('Redis utilities', () => {
  beforeEach(() => {
    vi.resetModules();
    vi.clearAllMocks();
    mockRedisClient.isOpen = true;
    mockRedisClient.connect.mockResolvedValue(undefined);
  });

  afterEach(() => {
    delete process.env.REDIS_URL;
    vi.restoreAllMocks();
  });

  describe('getRedisClient', () => {
    it('should return null when REDIS_URL is not set', async () => {
      delete process.env.REDIS_URL;
      const { getRedisClient } = await import('../../src/utils/redis.js');
      const client = await getRedisClient();
      expect(client).toBeNull();
    });

    it('should connect once and reuse the client', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      const { getRedisClient } = await import('../../src/utils/redis.js');

      const first = await getRedisClient();
      const second = await getRedisClient();

      expect(first).toBe(second);
      expect(mockRedisClient.connect).toHaveBeenCalledTimes(1);
    });

    it('should surface connection failures', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      vi.spyOn(console, 'error').mockImplementation(() => {});
      mockRedisClient.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      const { getRedisClient } = await import('../../src/utils/redis.js');

      await expect(getRedisClient()).rejects.toThrow('ECONNREFUSED');
    });
  });

  describe('configureRedis', () => {
    it('should connect to the configured URL without REDIS_URL', async () => {
      delete process.env.REDIS_URL;
      const { configureRedis, getRedisClient } = await import('../../src/utils/redis.js');
      const { createClient } = await import('redis');

      configureRedis('redis://events.internal:6380');
      const client = await getRedisClient();

      expect(client).toBe(mockRedisClient);
      expect(createClient).toHaveBeenCalledWith({ url: 'redis://events.internal:6380' });
    });

    it('should take precedence over REDIS_URL', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      const { configureRedis, getRedisClient } = await import('../../src/utils/redis.js');
      const { createClient } = await import('redis');

      configureRedis('redis://events.internal:6380');
      await getRedisClient();

      expect(createClient).toHaveBeenCalledWith({ url: 'redis://events.internal:6380' });
    });
  });

  describe('isRedisAvailable', () => {
    it('should return false when REDIS_URL is not set', async () => {
      delete process.env.REDIS_URL;
      const { isRedisAvailable } = await import('../../src/utils/redis.js');
      expect(await isRedisAvailable()).toBe(false);
    });

    it('should return true when Redis is connected', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      const { isRedisAvailable } = await import('../../src/utils/redis.js');
      expect(await isRedisAvailable()).toBe(true);
    });

    it('should return false when the connection fails', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      vi.spyOn(console, 'error').mockImplementation(() => {});
      mockRedisClient.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      const { isRedisAvailable } = await import('../../src/utils/redis.js');
      expect(await isRedisAvailable()).toBe(false);
    });
  });

  describe('redisSetJsonIfAbsent', () => {
    it('should set the key with NX and report that it was created', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      mockRedisClient.set.mockResolvedValue('OK');
      const { redisSetJsonIfAbsent } = await import('../../src/utils/redis.js');

      const created = await redisSetJsonIfAbsent('webhook:event:evt-1', { id: 'evt-1' });

      expect(created).toBe(true);
      expect(mockRedisClient.set).toHaveBeenCalledWith('webhook:event:evt-1', '{"id":"evt-1"}', { NX: true });
    });

    it('should report an existing key', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      mockRedisClient.set.mockResolvedValue(null);
      const { redisSetJsonIfAbsent } = await import('../../src/utils/redis.js');

      expect(await redisSetJsonIfAbsent('webhook:event:evt-1', { id: 'evt-1' })).toBe(false);
    });

    it('should throw when Redis is not configured', async () => {
      delete process.env.REDIS_URL;
      const { redisSetJsonIfAbsent } = await import('../../src/utils/redis.js');

      await expect(redisSetJsonIfAbsent('key', {})).rejects.toThrow('Redis is not configured (no URL configured and REDIS_URL is not set)');
    });

    it('should propagate command errors', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      mockRedisClient.set.mockRejectedValue(new Error('READONLY'));
      const { redisSetJsonIfAbsent } = await import('../../src/utils/redis.js');

      await expect(redisSetJsonIfAbsent('key', {})).rejects.toThrow('READONLY');
    });
  });

  describe('redisGet', () => {
    it('should return null when Redis is not available', async () => {
      delete process.env.REDIS_URL;
      const { redisGet } = await import('../../src/utils/redis.js');
      expect(await redisGet('key')).toBeNull();
    });

    it('should return value when exists', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      mockRedisClient.get.mockResolvedValue('value');
      const { redisGet } = await import('../../src/utils/redis.js');
      expect(await redisGet('key')).toBe('value');
    });

    it('should return null on a command error', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      vi.spyOn(console, 'error').mockImplementation(() => {});
      mockRedisClient.get.mockRejectedValue(new Error('timeout'));
      const { redisGet } = await import('../../src/utils/redis.js');
      expect(await redisGet('key')).toBeNull();
    });
  });

  describe('redisGetJson', () => {
    it('should parse stored JSON', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      mockRedisClient.get.mockResolvedValue('{"id":"evt-1","received_at":1700000000}');
      const { redisGetJson } = await import('../../src/utils/redis.js');

      expect(await redisGetJson('json-key')).toEqual({ id: 'evt-1', received_at: 1700000000 });
    });

    it('should return null for invalid JSON', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      mockRedisClient.get.mockResolvedValue('invalid-json');
      const { redisGetJson } = await import('../../src/utils/redis.js');

      expect(await redisGetJson('json-key')).toBeNull();
    });
  });

  describe('closeRedis', () => {
    it('should close the connection', async () => {
      process.env.REDIS_URL = 'redis://localhost:6379';
      const { getRedisClient, closeRedis } = await import('../../src/utils/redis.js');

      await getRedisClient();
      await closeRedis();

      expect(mockRedisClient.quit).toHaveBeenCalled();
    });
  });
});
