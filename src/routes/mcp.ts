/**
 * MCP WebSocket Endpoint
 *
 * Carries MCP text messages between the orchestrator and the device:
 * - One text frame is one JSON-RPC message
 * - Binary frames are ignored
 * - A new orchestrator connection replaces the previous one
 */

import type { IncomingMessage } from 'http';
import { WebSocket, WebSocketServer, RawData } from 'ws';
import type { Application } from '../core/application';
import { verifyBearer } from '../middleware/auth';
import { componentLogger } from '../services/logger';

const log = componentLogger('McpSocket');

/** RFC 6455 policy violation */
export const CLOSE_POLICY_VIOLATION = 1008;

// =============================================================================
// CONNECTION
// =============================================================================

export interface SocketHandle {
  transmit(text: string): void;
  close(code: number, reason: string): void;
}

/**
 * Transport-independent half of a connection, driven by the socket events.
 */
export class McpConnection {
  private attached = false;
  private readonly send = (text: string) => this.socket.transmit(text);

  constructor(
    private readonly app: Application,
    private readonly socket: SocketHandle,
    private readonly secret: string | undefined
  ) {}

  get isAttached(): boolean {
    return this.attached;
  }

  /**
   * Authenticate and bind this connection as the MCP channel.
   */
  open(authorization: string | undefined): boolean {
    const auth = verifyBearer(authorization, this.secret);
    if (!auth.ok) {
      log.warn('Rejected MCP connection', { reason: auth.reason });
      this.socket.close(CLOSE_POLICY_VIOLATION, 'Unauthorized');
      return false;
    }

    this.app.attachChannel(this.send);
    this.attached = true;
    log.info('Orchestrator connected', { subject: auth.claims?.sub ?? 'anonymous' });
    return true;
  }

  receive(data: RawData, isBinary: boolean): void {
    if (!this.attached) return;
    if (isBinary) {
      log.warn('Ignoring binary frame');
      return;
    }
    this.app.mcp.parseMessage(rawDataToString(data));
  }

  closed(): void {
    if (!this.attached) return;
    this.attached = false;
    this.app.detachChannel(this.send);
    log.info('Orchestrator disconnected');
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

// =============================================================================
// SERVER
// =============================================================================

export function setupMcpWebSocket(wss: WebSocketServer, app: Application, secret: string | undefined): void {
  let current: WebSocket | null = null;

  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    const connection = new McpConnection(app, {
      transmit: text => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.send(text);
        }
      },
      close: (code, reason) => ws.close(code, reason),
    }, secret);

    if (!connection.open(req.headers.authorization)) {
      return;
    }

    if (current && current !== ws) {
      current.close(1000, 'Replaced by a new connection');
    }
    current = ws;

    ws.on('message', (data, isBinary) => connection.receive(data, isBinary));

    ws.on('close', () => {
      connection.closed();
      if (current === ws) {
        current = null;
      }
    });

    ws.on('error', error => {
      log.error('MCP socket error', { error: error.message });
    });
  });
}
