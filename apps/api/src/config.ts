import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Validates that a string is a valid URL
 */
function isValidUrl(str: string): boolean {
  try {
    new URL(str);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates that a port number is in valid range (1-65535)
 */
function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isPositiveInteger(value: string): boolean {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0;
}

/**
 * Validates environment variable configuration at startup.
 * Throws an error if any provided value is unusable.
 */
function validateEnvConfig(): void {
  const errors: string[] = [];

  const port = process.env.PORT;
  if (port) {
    const portNum = parseInt(port, 10);
    if (isNaN(portNum) || !isValidPort(portNum)) {
      errors.push(`PORT must be a valid port number (1-65535): ${port}`);
    }
  }

  // CORS_ORIGIN should be a valid URL or '*'
  const corsOrigin = process.env.CORS_ORIGIN;
  if (corsOrigin && corsOrigin !== '*' && !isValidUrl(corsOrigin)) {
    errors.push(`CORS_ORIGIN must be a valid URL or '*': ${corsOrigin}`);
  }

  const rateLimitWindow = process.env.RATE_LIMIT_WINDOW_MS;
  if (rateLimitWindow && !isPositiveInteger(rateLimitWindow)) {
    errors.push(`RATE_LIMIT_WINDOW_MS must be a positive integer: ${rateLimitWindow}`);
  }

  const rateLimitMax = process.env.RATE_LIMIT_MAX;
  if (rateLimitMax && !isPositiveInteger(rateLimitMax)) {
    errors.push(`RATE_LIMIT_MAX must be a positive integer: ${rateLimitMax}`);
  }

  const bodyLimit = process.env.BODY_LIMIT;
  if (bodyLimit && !/^\d+(b|kb|mb)?$/i.test(bodyLimit)) {
    errors.push(`BODY_LIMIT must be a size such as 100kb or 1mb: ${bodyLimit}`);
  }

  if (errors.length > 0) {
    throw new Error(
      'Invalid environment configuration:\n  - ' + errors.join('\n  - ')
    );
  }
}

const nodeEnv = process.env.NODE_ENV;
if (!nodeEnv) {
  // Using process.stderr.write for early startup warning (before logger is available)
  process.stderr.write('WARNING: NODE_ENV not set - defaulting to production mode\n');
}
const isDevelopment = nodeEnv === 'development';

// Default values
const DEFAULT_PORT = 3001;
const DEFAULT_HOST = '0.0.0.0';
const RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000; // 15 minutes
const RATE_LIMIT_MAX_REQUESTS = 1000;
const DEFAULT_BODY_LIMIT = '100kb';

// Validate before anything below parses the values
validateEnvConfig();

export const config = {
  port: parseInt(process.env.PORT || String(DEFAULT_PORT), 10),
  host: process.env.HOST || DEFAULT_HOST,
  nodeEnv: process.env.NODE_ENV || 'production',
  isDevelopment,

  database: {
    path: process.env.DATABASE_PATH || join(__dirname, '../../../data/servers.sqlite'),
  },

  http: {
    bodyLimit: process.env.BODY_LIMIT || DEFAULT_BODY_LIMIT,
  },

  security: {
    rateLimitWindow: parseInt(process.env.RATE_LIMIT_WINDOW_MS || String(RATE_LIMIT_WINDOW_MS), 10),
    rateLimitMax: parseInt(process.env.RATE_LIMIT_MAX || String(RATE_LIMIT_MAX_REQUESTS), 10),
  },

  cors: {
    origin: process.env.CORS_ORIGIN || (isDevelopment ? '*' : ''),
  },
};

export type Config = typeof config;
