/**
 * Device Control Core - Host Server
 *
 * This server handles:
 * - MCP over WebSocket (/mcp) for the LLM orchestrator
 * - Device operating mode (state machine)
 * - Tool execution on the single application queue
 * - Settings and tool call history (SQLite)
 * - Health and device status endpoints
 */

import { loadConfig, AppConfig } from './services/config';
import http from 'http';
import express, { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { WebSocketServer } from 'ws';

import { logger } from './services/logger';
import { initDatabase } from './db/init';
import { SqliteSettingsStore } from './db/settings';
import { SqliteToolCallLog } from './db/toolLog';
import { DeviceStateMachine } from './core/deviceStateMachine';
import { Application } from './core/application';
import { HttpFirmwareUpdater } from './core/firmwareUpdater';
import { SimulatedBoard } from './board/simulatedBoard';
import { requireAuth } from './middleware/auth';
import { createHealthRouter } from './routes/health';
import { createDeviceRouter } from './routes/device';
import { setupMcpWebSocket } from './routes/mcp';

// =============================================================================
// COMPOSITION
// =============================================================================

export interface Device {
  config: AppConfig;
  app: Application;
  toolLog: SqliteToolCallLog;
  close(): void;
}

export function createDevice(config: AppConfig): Device {
  const db = initDatabase(config.DATABASE_PATH);
  const settings = new SqliteSettingsStore(db);
  const toolLog = new SqliteToolCallLog(db);
  const stateMachine = new DeviceStateMachine();

  const board = new SimulatedBoard({
    name: config.BOARD_NAME,
    version: config.FIRMWARE_VERSION,
    settings,
    getDeviceState: () => stateMachine.getState(),
    cameraImagePath: config.CAMERA_IMAGE_PATH,
  });

  const app = new Application({
    stateMachine,
    board,
    settings,
    history: toolLog,
    firmware: new HttpFirmwareUpdater(config.FIRMWARE_STAGING_PATH),
    serverInfo: { name: config.BOARD_NAME, version: config.FIRMWARE_VERSION },
    power: {
      restart: () => {
        logger.warn('Restart requested, exiting for the supervisor to restart us');
        db.close();
        process.exit(0);
      },
    },
  });

  return { config, app, toolLog, close: () => db.close() };
}

export function createHttpApp(device: Device): express.Express {
  const { config, app, toolLog } = device;
  const httpApp = express();

  httpApp.use(helmet());

  httpApp.use(rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX_REQUESTS,
    message: { error: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  }));

  httpApp.use(express.json({ limit: '1mb' }));

  // Request logging
  httpApp.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.http(`${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`, {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        ip: req.ip,
      });
    });
    next();
  });

  httpApp.use('/api/v1/health', createHealthRouter({ name: config.BOARD_NAME, version: config.FIRMWARE_VERSION }));
  httpApp.use('/api/v1/device', requireAuth(config.MCP_AUTH_SECRET), createDeviceRouter(app, toolLog));

  httpApp.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  httpApp.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    });
    res.status(500).json({ error: config.NODE_ENV === 'production' ? 'Internal server error' : err.message });
  });

  return httpApp;
}

// =============================================================================
// STARTUP
// =============================================================================

function start(): void {
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
    process.exit(1);
  });

  let device: Device;
  try {
    device = createDevice(loadConfig());
  } catch (error) {
    logger.error('Failed to start device', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }

  const { config, app } = device;

  // Registration must be complete before any MCP traffic is accepted
  if (!app.start()) {
    logger.error('Device failed to reach idle');
    process.exit(1);
  }

  const server = http.createServer(createHttpApp(device));
  const wss = new WebSocketServer({ server, path: '/mcp' });
  setupMcpWebSocket(wss, app, config.MCP_AUTH_SECRET);

  server.listen(config.PORT, () => {
    logger.info(`Device control core running on port ${config.PORT}`);
    logger.info(`   Board: ${config.BOARD_NAME} ${config.FIRMWARE_VERSION}`);
    logger.info(`   Tools: ${app.mcp.size}`);
    logger.info(`   MCP auth: ${config.MCP_AUTH_SECRET ? 'required' : 'disabled'}`);
  });

  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down gracefully');
    wss.close();
    server.close(() => {
      device.close();
      process.exit(0);
    });
  });
}

if (require.main === module) {
  start();
}
