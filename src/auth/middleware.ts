import type { Request, Response, NextFunction } from 'express';
import type { IntervalsConfig } from '../types/index.js';

/**
 * Validate MCP authentication token from Authorization header or query parameter.
 * Supports:
 * - Authorization: Bearer <token> (preferred for Streamable HTTP)
 * - ?token=<token>
 */
export function validateToken(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const expectedToken = process.env.MCP_AUTH_TOKEN;

  if (!expectedToken) {
    console.error('MCP_AUTH_TOKEN environment variable not set');
    res.status(500).json({ error: 'Server configuration error' });
    return;
  }

  // Try Authorization header first (Bearer token)
  let providedToken: string | undefined;
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    providedToken = authHeader.slice(7);
  }

  // Fall back to query parameter
  if (!providedToken && typeof req.query.token === 'string') {
    providedToken = req.query.token;
  }

  if (!providedToken) {
    res.status(401).json({ error: 'Authentication token required' });
    return;
  }

  // Constant-time comparison to prevent timing attacks
  if (!secureCompare(providedToken, expectedToken)) {
    res.status(403).json({ error: 'Invalid authentication token' });
    return;
  }

  next();
}

/**
 * Constant-time string comparison to prevent timing attacks.
 */
function secureCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }

  return result === 0;
}

/**
 * Load and validate all required environment variables.
 * Throws if any required variable is missing.
 */
export function validateEnvironment(): void {
  const required = [
    'MCP_AUTH_TOKEN',
    'INTERVALS_API_KEY',
    'INTERVALS_ATHLETE_ID',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}`
    );
  }
}

function parseIntegerEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

export interface AppConfig {
  port: number;
  mcpAuthToken: string;
  intervals: IntervalsConfig;
  webhookSecret: string | null;
  redisUrl: string | null;
  downloadDir: string | null;
}

/**
 * Get configuration from environment variables.
 */
export function getConfig(): AppConfig {
  return {
    port: parseIntegerEnv('PORT', 3000),
    mcpAuthToken: process.env.MCP_AUTH_TOKEN ?? '',
    intervals: {
      apiKey: process.env.INTERVALS_API_KEY ?? '',
      athleteId: process.env.INTERVALS_ATHLETE_ID ?? '',
      baseUrl: process.env.INTERVALS_BASE_URL || undefined,
      retry: {
        maxRetries: parseIntegerEnv('INTERVALS_MAX_RETRIES', 3),
        baseDelayMs: parseIntegerEnv('INTERVALS_RETRY_BASE_DELAY_MS', 100),
      },
    },
    webhookSecret: process.env.WEBHOOK_SECRET || null,
    redisUrl: process.env.REDIS_URL || null,
    downloadDir: process.env.DOWNLOAD_DIR || null,
  };
}
