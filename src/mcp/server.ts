/**
 * MCP Server
 *
 * JSON-RPC 2.0 endpoint (MCP 2024-11-05) through which the orchestrator
 * discovers and invokes device tools:
 * - initialize: capability negotiation and server info
 * - tools/list: cursor pagination under a fixed payload budget
 * - tools/call: argument binding, then execution on the application queue
 *
 * The registry is filled during startup and sealed before the transport
 * opens; after that it is only read.
 */

import { z } from 'zod';
import { McpTool, JsonValue, ToolCallback, ToolJson } from './tool';
import { BoundArguments, PropertyList } from './property';
import { createCommonTools } from './commonTools';
import { createUserOnlyTools } from './userTools';
import type { ToolContext } from './context';
import type { ToolCallRecorder } from '../db/toolLog';
import { componentLogger, auditLog } from '../services/logger';

const log = componentLogger('MCP');

export const PROTOCOL_VERSION = '2024-11-05';

/** Serialized size limit of one tools/list result */
export const MAX_PAYLOAD_SIZE = 8000;

/** Room left for the closing brackets and the nextCursor member */
const PAYLOAD_RESERVE = 30;

// =============================================================================
// TYPES
// =============================================================================

export interface ServerInfo {
  name: string;
  version: string;
}

export interface McpServerOptions extends ToolContext {
  serverInfo: ServerInfo;
  /** Outbound text channel to the orchestrator */
  send: (message: string) => void;
  /** Optional persistent history of tools/call outcomes */
  history?: ToolCallRecorder;
}

export interface ToolRegistrar {
  addTool(tool: McpTool): boolean;
  addTool(name: string, description: string, properties: PropertyList, callback: ToolCallback): boolean;
  addUserOnlyTool(name: string, description: string, properties: PropertyList, callback: ToolCallback): boolean;
}

export interface ToolsListResult {
  tools: ToolJson[];
  nextCursor?: string;
}

type ToolsListOutcome =
  | { ok: true; result: ToolsListResult }
  | { ok: false; error: string };

// =============================================================================
// ENVELOPE SCHEMAS
// =============================================================================

const paramsSchema = z.record(z.unknown());

const headerSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
});

const routingSchema = z.object({
  params: paramsSchema.optional(),
  id: z.number(),
});

const visionSchema = z.object({
  url: z.string(),
  token: z.string().optional().catch(undefined),
});

const listParamsSchema = z.object({
  cursor: z.string().optional().catch(undefined),
  withUserTools: z.boolean().optional().catch(undefined),
});

function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

// =============================================================================
// SERVER
// =============================================================================

export class McpServer implements ToolRegistrar {
  private tools: McpTool[] = [];
  private sealed = false;

  constructor(private readonly options: McpServerOptions) {}

  // ---------------------------------------------------------------------------
  // Registry
  // ---------------------------------------------------------------------------

  get size(): number {
    return this.tools.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  getTools(): readonly McpTool[] {
    return this.tools;
  }

  findTool(name: string): McpTool | undefined {
    return this.tools.find(tool => tool.name === name);
  }

  addTool(tool: McpTool): boolean;
  addTool(name: string, description: string, properties: PropertyList, callback: ToolCallback): boolean;
  addTool(
    toolOrName: McpTool | string,
    description = '',
    properties: PropertyList = new PropertyList(),
    callback?: ToolCallback
  ): boolean {
    if (typeof toolOrName !== 'string') {
      return this.register(toolOrName);
    }
    if (!callback) {
      throw new Error(`Tool ${toolOrName} needs a callback`);
    }
    return this.register(new McpTool(toolOrName, description, properties, callback));
  }

  addUserOnlyTool(name: string, description: string, properties: PropertyList, callback: ToolCallback): boolean {
    return this.register(new McpTool(name, description, properties, callback, { userOnly: true }));
  }

  /**
   * Register the common tools ahead of everything registered so far.
   */
  addCommonTools(): void {
    const earlierTools = this.tools;
    this.tools = [];

    for (const tool of createCommonTools(this.options)) {
      if (earlierTools.some(existing => existing.name === tool.name)) {
        log.warn(`Tool ${tool.name} already added`);
        continue;
      }
      this.register(tool);
    }

    this.tools.push(...earlierTools);
  }

  addUserOnlyTools(): void {
    for (const tool of createUserOnlyTools(this.options)) {
      this.register(tool);
    }
  }

  /**
   * Freeze the registry. Must happen before protocol traffic is accepted.
   */
  seal(): void {
    this.sealed = true;
    log.info(`Tool registry sealed with ${this.tools.length} tools`);
  }

  private register(tool: McpTool): boolean {
    if (this.sealed) {
      log.warn(`Tool ${tool.name} rejected: registry is sealed`);
      return false;
    }
    if (this.findTool(tool.name)) {
      log.warn(`Tool ${tool.name} already added`);
      return false;
    }

    log.info(`Add tool: ${tool.name}${tool.userOnly ? ' [user]' : ''}`);
    this.tools.push(tool);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Inbound messages
  // ---------------------------------------------------------------------------

  /**
   * Handle one inbound text message. Envelopes without a usable id are
   * dropped without a reply: there is nothing to correlate one with.
   */
  parseMessage(message: string): void {
    let json: unknown;
    try {
      json = JSON.parse(message);
    } catch {
      log.error(`Failed to parse MCP message: ${message}`);
      return;
    }

    const header = headerSchema.safeParse(json);
    if (!header.success) {
      log.error('Invalid JSONRPC envelope', { issues: header.error.issues.map(issue => issue.path.join('.')) });
      return;
    }

    const method = header.data.method;
    if (method.startsWith('notifications')) {
      return;
    }

    const routing = routingSchema.safeParse(json);
    if (!routing.success) {
      const badParams = routing.error.issues.some(issue => issue.path[0] === 'params');
      log.error(`${badParams ? 'Invalid params' : 'Invalid id'} for method: ${method}`);
      return;
    }

    const { id, params } = routing.data;

    switch (method) {
      case 'initialize':
        this.handleInitialize(id, params);
        break;
      case 'tools/list':
        this.handleToolsList(id, params);
        break;
      case 'tools/call':
        this.handleToolsCall(id, params);
        break;
      default:
        log.error(`Method not implemented: ${method}`);
        this.replyError(id, `Method not implemented: ${method}`);
    }
  }

  private handleInitialize(id: number, params: Record<string, unknown> | undefined): void {
    const capabilities = paramsSchema.safeParse(params?.capabilities);
    if (capabilities.success) {
      this.parseCapabilities(capabilities.data);
    }

    this.replyResult(id, {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { tools: {} },
      serverInfo: {
        name: this.options.serverInfo.name,
        version: this.options.serverInfo.version,
      },
    });
  }

  private parseCapabilities(capabilities: Record<string, unknown>): void {
    const vision = visionSchema.safeParse(capabilities.vision);
    if (!vision.success) return;

    const camera = this.options.board.capabilities.camera;
    if (camera) {
      camera.setExplainUrl(vision.data.url, vision.data.token ?? '');
      log.info('Vision endpoint configured', { url: vision.data.url });
    }
  }

  private handleToolsList(id: number, params: Record<string, unknown> | undefined): void {
    const parsed = listParamsSchema.parse(params ?? {});
    const outcome = this.getToolsList(parsed.cursor ?? '', parsed.withUserTools ?? false);

    if (!outcome.ok) {
      log.error(`tools/list: ${outcome.error}`);
      this.replyError(id, outcome.error);
      return;
    }
    this.replyResult(id, outcome.result);
  }

  /**
   * Build one page of the tool listing.
   *
   * The page starts at the tool named `cursor` (the first tool when empty).
   * Entries are appended while the serialized page stays within
   * MAX_PAYLOAD_SIZE; the first entry that does not fit becomes nextCursor.
   * A page that cannot hold even its first entry is an error, whether or not
   * it is a continuation.
   */
  getToolsList(cursor: string, withUserTools: boolean): ToolsListOutcome {
    let startIndex = 0;
    if (cursor !== '') {
      startIndex = this.tools.findIndex(tool => tool.name === cursor);
      if (startIndex < 0) {
        return { ok: true, result: { tools: [] } };
      }
    }

    const entries: ToolJson[] = [];
    let used = byteLength('{"tools":[');
    let nextCursor: string | undefined;

    for (const tool of this.tools.slice(startIndex)) {
      if (tool.userOnly && !withUserTools) continue;

      const entry = tool.toJSON();
      const size = byteLength(JSON.stringify(entry)) + 1;
      if (used + size + PAYLOAD_RESERVE > MAX_PAYLOAD_SIZE) {
        nextCursor = tool.name;
        break;
      }
      entries.push(entry);
      used += size;
    }

    if (nextCursor !== undefined && entries.length === 0) {
      return { ok: false, error: `Failed to add tool ${nextCursor} because of payload size limit` };
    }

    return {
      ok: true,
      result: nextCursor === undefined ? { tools: entries } : { tools: entries, nextCursor },
    };
  }

  private handleToolsCall(id: number, params: Record<string, unknown> | undefined): void {
    if (params === undefined) {
      log.error('tools/call: Missing params');
      this.replyError(id, 'Missing params');
      return;
    }

    const name = params.name;
    if (typeof name !== 'string') {
      log.error('tools/call: Missing name');
      this.replyError(id, 'Missing name');
      return;
    }

    let args: Record<string, unknown> | undefined;
    if (params.arguments !== undefined) {
      const parsedArgs = paramsSchema.safeParse(params.arguments);
      if (!parsedArgs.success) {
        log.error('tools/call: Invalid arguments');
        this.replyError(id, 'Invalid arguments');
        return;
      }
      args = parsedArgs.data;
    }

    this.doToolCall(id, name, args);
  }

  private doToolCall(id: number, toolName: string, rawArgs: Record<string, unknown> | undefined): void {
    const tool = this.findTool(toolName);
    if (!tool) {
      log.error(`tools/call: Unknown tool: ${toolName}`);
      this.replyError(id, `Unknown tool: ${toolName}`);
      return;
    }

    const bound = tool.properties.bind(rawArgs);
    if (!bound.ok) {
      log.error(`tools/call: ${bound.error}`, { tool: toolName });
      this.recordCall(id, tool, rawArgs ?? {}, 'rejected', bound.error, 0);
      this.replyError(id, bound.error);
      return;
    }

    const args = bound.arguments;
    this.options.app.schedule(() => this.executeTool(id, tool, args), `tools/call ${toolName}`);
  }

  private async executeTool(id: number, tool: McpTool, args: BoundArguments): Promise<void> {
    const startedAt = Date.now();
    const outcome = await tool.call(args);
    const durationMs = Date.now() - startedAt;

    if (outcome.ok) {
      this.recordCall(id, tool, args.toJSON(), 'success', outcome.value, durationMs);
      this.replyResult(id, outcome.value);
    } else {
      log.error(`tools/call: ${outcome.error}`, { tool: tool.name });
      this.recordCall(id, tool, args.toJSON(), 'error', outcome.error, durationMs);
      this.replyError(id, outcome.error);
    }
  }

  private recordCall(
    requestId: number,
    tool: McpTool,
    args: Record<string, unknown>,
    status: 'success' | 'error' | 'rejected',
    result: unknown,
    executionTimeMs: number
  ): void {
    auditLog('TOOL_CALL', { requestId, tool: tool.name, userOnly: tool.userOnly, status, executionTimeMs });

    if (!this.options.history) return;
    try {
      this.options.history.record({ requestId, toolName: tool.name, arguments: args, status, result, executionTimeMs });
    } catch (error) {
      log.error('Failed to record tool call', {
        tool: tool.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Replies
  // ---------------------------------------------------------------------------

  private replyResult(id: number, result: JsonValue | ToolsListResult): void {
    this.options.send(JSON.stringify({ jsonrpc: '2.0', id, result }));
  }

  private replyError(id: number, message: string): void {
    this.options.send(JSON.stringify({ jsonrpc: '2.0', id, error: { message } }));
  }
}
