/**
 * Device Routes
 *
 * Read-only view of the running device for operators:
 * - Current operating mode
 * - Registered tools
 * - Recent tool call history
 */

import { Router } from 'express';
import { z } from 'zod';
import type { Application } from '../core/application';
import type { SqliteToolCallLog } from '../db/toolLog';

const historyQuerySchema = z.object({
  tool: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export function createDeviceRouter(app: Application, toolLog: SqliteToolCallLog): Router {
  const deviceRouter = Router();

  /**
   * GET /api/v1/device/state
   */
  deviceRouter.get('/state', (req, res) => {
    res.json({ state: app.getDeviceState() });
  });

  /**
   * GET /api/v1/device/tools
   */
  deviceRouter.get('/tools', (req, res) => {
    res.json({
      sealed: app.mcp.isSealed,
      tools: app.mcp.getTools().map(tool => ({ name: tool.name, userOnly: tool.userOnly })),
    });
  });

  /**
   * GET /api/v1/device/history?tool=&limit=
   */
  deviceRouter.get('/history', (req, res) => {
    const query = historyQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'Invalid query', details: query.error.issues });
      return;
    }

    res.json({
      history: toolLog.getHistory({ toolName: query.data.tool, limit: query.data.limit }),
    });
  });

  return deviceRouter;
}
