/**
 * Tool Definition
 *
 * A named, described, typed device capability that the orchestrator can
 * discover through tools/list and invoke through tools/call.
 */

import { BoundArguments, PropertyList, PropertySchema } from './property';

// =============================================================================
// VALUES
// =============================================================================

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type ReturnValue = boolean | string | JsonObject;

/**
 * Result of running a tool callback. Callbacks may throw; invocation never
 * does.
 */
export type ToolOutcome =
  | { ok: true; value: ReturnValue }
  | { ok: false; error: string };

export type ToolCallback = (args: BoundArguments) => ReturnValue | Promise<ReturnValue>;

export interface ToolJson {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, PropertySchema>;
    required?: string[];
  };
  annotations?: {
    audience: string[];
  };
}

// =============================================================================
// TOOL
// =============================================================================

export class McpTool {
  readonly name: string;
  readonly description: string;
  readonly properties: PropertyList;
  readonly userOnly: boolean;
  private readonly callback: ToolCallback;

  constructor(
    name: string,
    description: string,
    properties: PropertyList,
    callback: ToolCallback,
    options: { userOnly?: boolean } = {}
  ) {
    this.name = name;
    this.description = description;
    this.properties = properties;
    this.callback = callback;
    this.userOnly = options.userOnly ?? false;
  }

  toJSON(): ToolJson {
    const required = this.properties.getRequired();
    const json: ToolJson = {
      name: this.name,
      description: this.description,
      inputSchema: {
        type: 'object',
        properties: this.properties.toJSON(),
        ...(required.length > 0 ? { required } : {}),
      },
    };
    if (this.userOnly) {
      json.annotations = { audience: ['user'] };
    }
    return json;
  }

  /**
   * Run the callback with already-bound arguments.
   */
  async call(args: BoundArguments): Promise<ToolOutcome> {
    try {
      const value = await this.callback(args);
      return { ok: true, value };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}
