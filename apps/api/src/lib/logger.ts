import pino from 'pino';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { config } from '../config.js';

// Create transport options based on environment
const transport = config.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'HH:MM:ss',
      },
    }
  : undefined;

// Create the base logger
export const logger = pino({
  level: process.env.LOG_LEVEL || (config.isDevelopment ? 'debug' : 'info'),
  transport,
  base: {
    env: config.nodeEnv,
  },
});

// Create child loggers for different components
export const apiLogger = logger.child({ component: 'api' });
export const dbLogger = logger.child({ component: 'database' });
export const cliLogger = logger.child({ component: 'cli' });

// Request logger middleware
export function createRequestLogger(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const requestId = req.requestId || 'unknown';

    apiLogger.info({
      type: 'request',
      requestId,
      method: req.method,
      url: req.originalUrl,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });

    // Log response on finish
    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

      apiLogger[level]({
        type: 'response',
        requestId,
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        duration,
      });
    });

    next();
  };
}

export default logger;
