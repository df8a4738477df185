/**
 * Tool definition types
 *
 * A tool declares its parameters once. The same declaration drives the
 * MCP `tools/list` schema, argument decoding and required-key checks.
 */

import type { Configuration } from '../config.js';
import type { Envelope } from '../envelope.js';
import type { Logger } from '../logger.js';
import type { PlatformClient } from '../platform-client.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Decoded arguments of one call
 */
export type ToolParams = Record<string, JsonValue | undefined>;

/** Wire type of an argument; nested values travel as encoded strings */
export type ParameterType = 'string' | 'integer' | 'number' | 'boolean';

/**
 * `json`: a JSON-encoded string decoded before the call.
 * `csv`: a comma-separated string decoded into a string array.
 */
export type ParameterFormat = 'json' | 'csv';

export interface ParameterDefinition {
  type: ParameterType;
  description: string;
  required?: boolean;
  default?: JsonValue;
  format?: ParameterFormat;
  enum?: string[];
}

export interface ToolContext {
  config: Configuration;
  client: PlatformClient;
  logger: Logger;
}

/**
 * Never rejects: every failure comes back as a `success: false` envelope
 */
export type ToolHandler = (ctx: ToolContext, params: ToolParams) => Promise<Envelope>;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ParameterDefinition>;
  handler: ToolHandler;
}
