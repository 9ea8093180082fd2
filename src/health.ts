// MARK: - Health Check Server
// Express server for liveness checks and basic counters

import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import { logger } from './utils/logger';

export interface HealthStatusSource {
  isSlackConnected(): boolean;
  getInflightCount(): number;
}

let server: Server | null = null;
let activePort: number | null = null;

// Global counters
export const metrics = {
  computationsCompleted: 0,
  computationsFailed: 0,
  duplicateTriggers: 0,
};

export function createHealthApp(source: HealthStatusSource): Express {
  const app = express();

  app.get('/health', (req: Request, res: Response) => {
    const connected = source.isSlackConnected();
    const health = {
      status: connected ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        slack: connected ? 'connected' : 'disconnected',
      },
    };

    res.status(connected ? 200 : 503).json(health);
  });

  app.get('/metrics', (req: Request, res: Response) => {
    res.json({
      memory: process.memoryUsage(),
      uptime: process.uptime(),
      computationsCompleted: metrics.computationsCompleted,
      computationsFailed: metrics.computationsFailed,
      duplicateTriggers: metrics.duplicateTriggers,
      inflight: source.getInflightCount(),
    });
  });

  app.get('/', (req: Request, res: Response) => {
    res.json({
      name: 'Non-Engagers Bot',
      version: '1.0.0',
      status: 'running',
    });
  });

  return app;
}

/**
 * Start health server. Falls back to an ephemeral port only when the
 * preferred port was not pinned by configuration.
 */
export async function startHealthServer(app: Express, preferredPort: number, allowFallback: boolean): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const attemptListen = (port: number, canFallback: boolean): void => {
      const instance = app.listen(port, () => {
        server = instance;
        const address = instance.address();
        activePort = address && typeof address === 'object' ? address.port : port;
        logger.info('Health server started', { port: activePort });
        resolve();
      });

      instance.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error('Health server port already in use', { port });

          if (canFallback) {
            logger.warn('Attempting to start health server on an ephemeral port');
            instance.close(() => attemptListen(0, false));
            return;
          }

          reject(new Error(`Port ${port} is already in use for health server`));
          return;
        }

        reject(error);
      });
    };

    attemptListen(preferredPort, allowFallback);
  });
}

export async function stopHealthServer(): Promise<void> {
  const running = server;
  if (!running) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    running.close(error => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });

  logger.info('Health server stopped', { port: activePort });
  server = null;
  activePort = null;
}
