import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import {
  validateToken,
  validateEnvironment,
  getConfig,
} from '../../src/auth/middleware.js';

describe('auth/middleware', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('validateToken', () => {
    let mockReq: Partial<Request>;
    let mockRes: Partial<Response>;
    let mockNext: NextFunction;
    let jsonMock: Mock;
    let statusMock: Mock;

    beforeEach(() => {
      jsonMock = vi.fn();
      statusMock = vi.fn().mockReturnValue({ json: jsonMock });

      mockReq = {
        headers: {},
        query: {},
      };
      mockRes = {
        status: statusMock,
        json: jsonMock,
      };
      mockNext = vi.fn();
    });

    it('should call next() with valid token', () => {
      process.env.MCP_AUTH_TOKEN = 'valid-secret-token';
      mockReq.query = { token: 'valid-secret-token' };

      validateToken(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(statusMock).not.toHaveBeenCalled();
    });

    it('should return 401 when token is missing', () => {
      process.env.MCP_AUTH_TOKEN = 'valid-secret-token';
      mockReq.query = {};

      validateToken(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(401);
      expect(jsonMock).toHaveBeenCalledWith({ error: 'Authentication token required' });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should return 403 when token is invalid', () => {
      process.env.MCP_AUTH_TOKEN = 'valid-secret-token';
      mockReq.query = { token: 'wrong-token' };

      validateToken(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(403);
      expect(jsonMock).toHaveBeenCalledWith({ error: 'Invalid authentication token' });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should return 500 when MCP_AUTH_TOKEN is not set', () => {
      delete process.env.MCP_AUTH_TOKEN;
      mockReq.query = { token: 'some-token' };

      validateToken(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(500);
      expect(jsonMock).toHaveBeenCalledWith({ error: 'Server configuration error' });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should use constant-time comparison for tokens', () => {
      process.env.MCP_AUTH_TOKEN = 'secret';

      // Test with same length but different content
      mockReq.query = { token: 'secreX' };
      validateToken(mockReq as Request, mockRes as Response, mockNext);
      expect(statusMock).toHaveBeenCalledWith(403);

      statusMock.mockClear();
      jsonMock.mockClear();

      // Test with different length
      mockReq.query = { token: 'sec' };
      validateToken(mockReq as Request, mockRes as Response, mockNext);
      expect(statusMock).toHaveBeenCalledWith(403);
    });

    it('should accept a bearer token', () => {
      process.env.MCP_AUTH_TOKEN = 'valid-secret-token';
      mockReq.headers = { authorization: 'Bearer valid-secret-token' };

      validateToken(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
    });

    it('should prefer the bearer token over the query parameter', () => {
      process.env.MCP_AUTH_TOKEN = 'valid-secret-token';
      mockReq.headers = { authorization: 'Bearer wrong-token' };
      mockReq.query = { token: 'valid-secret-token' };

      validateToken(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(403);
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should ignore a repeated token query parameter', () => {
      process.env.MCP_AUTH_TOKEN = 'valid-secret-token';
      mockReq.query = { token: ['valid-secret-token', 'valid-secret-token'] };

      validateToken(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(401);
    });
  });

  describe('validateEnvironment', () => {
    beforeEach(() => {
      process.env.MCP_AUTH_TOKEN = 'auth-token';
      process.env.INTERVALS_API_KEY = 'intervals-key';
      process.env.INTERVALS_ATHLETE_ID = 'i12345';
    });

    it('should not throw when all required variables are set', () => {
      expect(() => validateEnvironment()).not.toThrow();
    });

    it('should throw when MCP_AUTH_TOKEN is missing', () => {
      delete process.env.MCP_AUTH_TOKEN;

      expect(() => validateEnvironment()).toThrow('Missing required environment variables: MCP_AUTH_TOKEN');
    });

    it('should list all missing variables', () => {
      delete process.env.INTERVALS_API_KEY;
      delete process.env.INTERVALS_ATHLETE_ID;

      expect(() => validateEnvironment()).toThrow(
        'Missing required environment variables: INTERVALS_API_KEY, INTERVALS_ATHLETE_ID'
      );
    });

    it('should not require the optional variables', () => {
      delete process.env.WEBHOOK_SECRET;
      delete process.env.REDIS_URL;
      delete process.env.DOWNLOAD_DIR;

      expect(() => validateEnvironment()).not.toThrow();
    });
  });

  describe('getConfig', () => {
    beforeEach(() => {
      process.env.MCP_AUTH_TOKEN = 'auth-token';
      process.env.INTERVALS_API_KEY = 'intervals-key';
      process.env.INTERVALS_ATHLETE_ID = 'i12345';
      delete process.env.PORT;
      delete process.env.INTERVALS_BASE_URL;
      delete process.env.INTERVALS_MAX_RETRIES;
      delete process.env.INTERVALS_RETRY_BASE_DELAY_MS;
      delete process.env.WEBHOOK_SECRET;
      delete process.env.REDIS_URL;
      delete process.env.DOWNLOAD_DIR;
    });

    it('should return basic config with defaults', () => {
      expect(getConfig()).toEqual({
        port: 3000,
        mcpAuthToken: 'auth-token',
        intervals: {
          apiKey: 'intervals-key',
          athleteId: 'i12345',
          baseUrl: undefined,
          retry: { maxRetries: 3, baseDelayMs: 100 },
        },
        webhookSecret: null,
        redisUrl: null,
        downloadDir: null,
      });
    });

    it('should return custom port when set', () => {
      process.env.PORT = '8080';

      expect(getConfig().port).toBe(8080);
    });

    it('should read the retry policy and base URL', () => {
      process.env.INTERVALS_MAX_RETRIES = '5';
      process.env.INTERVALS_RETRY_BASE_DELAY_MS = '0';
      process.env.INTERVALS_BASE_URL = 'http://localhost:8080';

      const config = getConfig();

      expect(config.intervals.retry).toEqual({ maxRetries: 5, baseDelayMs: 0 });
      expect(config.intervals.baseUrl).toBe('http://localhost:8080');
    });

    it('should reject an invalid retry count', () => {
      process.env.INTERVALS_MAX_RETRIES = 'lots';

      expect(() => getConfig()).toThrow("INTERVALS_MAX_RETRIES must be a non-negative integer, got 'lots'");
    });

    it('should reject a negative retry delay', () => {
      process.env.INTERVALS_RETRY_BASE_DELAY_MS = '-5';

      expect(() => getConfig()).toThrow("INTERVALS_RETRY_BASE_DELAY_MS must be a non-negative integer, got '-5'");
    });

    it('should return the optional settings when set', () => {
      process.env.WEBHOOK_SECRET = 'test-secret';
      process.env.REDIS_URL = 'redis://localhost:6379';
      process.env.DOWNLOAD_DIR = '/var/downloads';

      const config = getConfig();

      expect(config.webhookSecret).toBe('test-secret');
      expect(config.redisUrl).toBe('redis://localhost:6379');
      expect(config.downloadDir).toBe('/var/downloads');
    });
  });
});
