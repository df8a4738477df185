/**
 * Building blocks for tool definitions
 *
 * `defineTool` wraps a handler so it checks required parameters first and
 * turns anything thrown into a failure envelope. `requestTool` covers the
 * common shape: one request against a path template, body copied from
 * named parameters, decoded body returned as `data`.
 */

import {
  errorToEnvelope,
  mergeOptional,
  ok,
  requireParams,
  resolveProjectId,
  stringParam,
  type Envelope,
  type FieldMap,
} from '../envelope.js';
import { ValidationError } from '../errors.js';
import type { HttpMethod } from '../interceptors.js';
import type { ApiVersion } from '../platform-client.js';
import type {
  JsonObject,
  JsonValue,
  ParameterDefinition,
  ToolContext,
  ToolDefinition,
  ToolParams,
} from '../types/tool.js';

export const PROJECT_ID_PARAM: ParameterDefinition = {
  type: 'string',
  description: 'Project ID. Defaults to the configured PROJECT_ID.',
};

export const ENVIRONMENT_VARIABLES_PARAM: ParameterDefinition = {
  type: 'string',
  format: 'json',
  description: 'Environment variables as a JSON object, e.g. {"KEY": "value"}.',
};

export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, ParameterDefinition>;
  run: (ctx: ToolContext, params: ToolParams) => Promise<Envelope>;
}

export function requiredKeys(parameters: Record<string, ParameterDefinition>): string[] {
  return Object.entries(parameters)
    .filter(([, param]) => param.required)
    .map(([name]) => name);
}

export function defineTool(spec: ToolSpec): ToolDefinition {
  const required = requiredKeys(spec.parameters);

  return {
    name: spec.name,
    description: spec.description,
    parameters: spec.parameters,
    handler: async (ctx, params) => {
      try {
        requireParams(params, required);
        return await spec.run(ctx, params);
      } catch (error) {
        return errorToEnvelope(error);
      }
    },
  };
}

export function isRecord(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Array under `key` of a decoded body, or the body itself when it is an array
 */
export function listField(data: JsonValue | undefined, key: string): JsonValue[] {
  if (Array.isArray(data)) return data;
  if (isRecord(data)) {
    const value = data[key];
    if (Array.isArray(value)) return value;
  }
  return [];
}

export function idOf(data: JsonValue | undefined): string | undefined {
  if (!isRecord(data)) return undefined;
  const id = data.id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : undefined;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Fill `{param}` placeholders with URL-encoded parameter values
 */
export function expandPath(template: string, params: ToolParams): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => {
    const value = stringParam(params, key);
    if (value === undefined) {
      throw new ValidationError(`Missing required parameters: ${key}`, { missing: [key] });
    }
    return encodeURIComponent(value);
  });
}

export function toQuery(values: Record<string, JsonValue>): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    query[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return query;
}

export type RequestBody = Record<string, JsonValue>;

export interface RequestToolSpec {
  name: string;
  description: string;
  /** `project_id` is added automatically for project-scoped tools */
  parameters: Record<string, ParameterDefinition>;
  method: HttpMethod;
  /** Resource path below the project (or below `/api/{version}` for global tools) */
  path: string | ((params: ToolParams) => string);
  scope?: 'project' | 'global';
  version?: ApiVersion;
  /** Parameters copied into the JSON body */
  body?: FieldMap;
  /** Builds the body itself; takes precedence over `body` */
  buildBody?: (params: ToolParams, ctx: ToolContext) => RequestBody | Promise<RequestBody>;
  query?: FieldMap;
  message: string | ((params: ToolParams, data: JsonValue | undefined) => string);
  /** Extra envelope keys derived from the response, next to `data` */
  result?: (data: JsonValue | undefined, params: ToolParams) => Record<string, unknown>;
}

function resolvePath(spec: RequestToolSpec, ctx: ToolContext, params: ToolParams): string {
  const template = typeof spec.path === 'function' ? spec.path(params) : spec.path;
  const resource = expandPath(template, params);

  if (spec.scope === 'global') {
    return ctx.client.globalPath(resource, spec.version);
  }
  return ctx.client.projectPath(resolveProjectId(params, ctx.config), resource, spec.version);
}

async function buildBody(
  spec: RequestToolSpec,
  ctx: ToolContext,
  params: ToolParams
): Promise<RequestBody | undefined> {
  if (spec.buildBody) return spec.buildBody(params, ctx);
  if (spec.body === undefined) return undefined;
  return mergeOptional({}, params, spec.body);
}

export function requestTool(spec: RequestToolSpec): ToolDefinition {
  const parameters = spec.scope === 'global'
    ? spec.parameters
    : { ...spec.parameters, project_id: PROJECT_ID_PARAM };

  return defineTool({
    name: spec.name,
    description: spec.description,
    parameters,
    run: async (ctx, params) => {
      const path = resolvePath(spec, ctx, params);
      const body = await buildBody(spec, ctx, params);
      const query = spec.query ? toQuery(mergeOptional({}, params, spec.query)) : undefined;

      const { data } = await ctx.client.call(spec.method, path, { body, params: query });

      const message = typeof spec.message === 'function' ? spec.message(params, data) : spec.message;
      const extra = spec.result ? spec.result(data, params) : {};
      return ok(message, { ...(data !== undefined ? { data } : {}), ...extra });
    },
  });
}
