import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { ErrorCodes, HealthStatusValues } from '@server-registry/shared';
import serversRouter from './routes/servers.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';
import { requireJsonBody } from './middleware/contentType.js';
import { config } from '../config.js';
import { getDb } from '../db/index.js';
import { serverRegistry } from '../services/serverRegistry.js';
import { isShuttingDown } from '../lib/shutdown.js';
import { createRequestLogger } from '../lib/logger.js';

interface ReadinessCheck {
  status: 'healthy' | 'unhealthy';
  message?: string;
  latency?: number;
}

export function createApi(): express.Application {
  const app = express();

  // Trust proxy for correct IP detection behind reverse proxy
  app.set('trust proxy', 1);

  app.use(helmet());

  // Request ID middleware for tracing
  app.use((req, _res, next) => {
    const header = req.headers['x-request-id'];
    req.requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
    next();
  });

  const apiLimiter = rateLimit({
    windowMs: config.security.rateLimitWindow,
    limit: config.security.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: {
        code: ErrorCodes.RATE_LIMIT_EXCEEDED,
        message: 'Too many requests, please try again later',
      },
    },
    skip: () => config.isDevelopment, // Skip rate limiting in development
  });

  const corsOptions: cors.CorsOptions = {
    origin: config.isDevelopment ? true : config.cors.origin || false,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
  };
  app.use(cors(corsOptions));

  // Body parsing
  app.use(requireJsonBody);
  app.use(express.json({ limit: config.http.bodyLimit }));

  // Request logging
  app.use(createRequestLogger());

  app.use('/api', apiLimiter);

  // Liveness probe
  app.get('/health', (_req, res) => {
    if (isShuttingDown()) {
      res.status(503).json({ status: HealthStatusValues.SHUTTING_DOWN, timestamp: new Date().toISOString() });
      return;
    }
    res.json({ status: HealthStatusValues.OK, timestamp: new Date().toISOString() });
  });

  // Readiness probe
  app.get('/ready', (_req, res) => {
    const checks: Record<string, ReadinessCheck> = {};
    let allHealthy = true;

    try {
      const start = Date.now();
      getDb().prepare('SELECT 1').get();
      checks.database = { status: 'healthy', latency: Date.now() - start };
    } catch (err) {
      checks.database = { status: 'unhealthy', message: err instanceof Error ? err.message : 'Unknown error' };
      allHealthy = false;
    }

    if (allHealthy) {
      try {
        checks.servers = { status: 'healthy', message: `${serverRegistry.count()} server(s) registered` };
      } catch (err) {
        checks.servers = { status: 'unhealthy', message: err instanceof Error ? err.message : 'Unknown error' };
        allHealthy = false;
      }
    }

    res.status(allHealthy ? 200 : 503).json({
      status: allHealthy ? HealthStatusValues.READY : HealthStatusValues.NOT_READY,
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/servers', serversRouter);

  // Error handling
  app.use('/api/*', notFoundHandler);
  app.use(errorHandler);

  return app;
}
