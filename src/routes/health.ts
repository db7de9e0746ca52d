/**
 * Health Check Routes
 *
 * Unauthenticated endpoints for:
 * - Basic health check
 * - Version info
 */

import { Router } from 'express';
import type { ServerInfo } from '../mcp/server';

export function createHealthRouter(serverInfo: ServerInfo): Router {
  const healthRouter = Router();

  /**
   * GET /api/v1/health
   */
  healthRouter.get('/', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /api/v1/health/version
   */
  healthRouter.get('/version', (req, res) => {
    res.json({
      name: serverInfo.name,
      version: serverInfo.version,
      nodeVersion: process.version,
      environment: process.env.NODE_ENV || 'development',
      uptime: process.uptime(),
    });
  });

  return healthRouter;
}
