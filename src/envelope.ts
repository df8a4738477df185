/**
 * Result envelope and the parameter helpers every tool shares
 */

import type { Configuration } from './config.js';
import {
  ConfigurationError,
  MCPError,
  RemoteApplicationError,
  ResponseParseError,
  ValidationError,
} from './errors.js';
import type { JsonValue, ToolParams } from './types/tool.js';

/**
 * Uniform tool result: `success` and `message` always, plus
 * operation-specific keys (`data`, `job_id`, `deleted_count`, ...)
 */
export interface Envelope {
  success: boolean;
  message: string;
  [key: string]: unknown;
}

export function ok(message: string, extra: Record<string, unknown> = {}): Envelope {
  return { success: true, message, ...extra };
}

export function fail(message: string, extra: Record<string, unknown> = {}): Envelope {
  return { success: false, message, ...extra };
}

/**
 * Single conversion point from a thrown value to a failure envelope
 */
export function errorToEnvelope(error: unknown): Envelope {
  if (error instanceof RemoteApplicationError) {
    return fail(error.message, { details: error.payload });
  }
  if (error instanceof ResponseParseError) {
    return fail(error.message, { raw_response: error.rawResponse });
  }
  if (error instanceof MCPError) {
    return fail(error.message);
  }
  if (error instanceof Error) {
    return fail(`Unexpected error: ${error.message}`);
  }
  return fail(`Unexpected error: ${String(error)}`);
}

/**
 * Present means not undefined, not null, not a blank string, not an empty list
 */
export function isPresent(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

export function missingRequired(params: ToolParams, required: readonly string[]): string[] {
  return required.filter(key => !isPresent(params[key]));
}

/**
 * @throws ValidationError naming every missing key
 */
export function requireParams(params: ToolParams, required: readonly string[]): void {
  const missing = missingRequired(params, required);
  if (missing.length > 0) {
    throw new ValidationError(`Missing required parameters: ${missing.join(', ')}`, { missing });
  }
}

/**
 * String form of a scalar parameter, or undefined when absent or blank
 */
export function stringParam(params: ToolParams, key: string): string | undefined {
  const value = params[key];
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/**
 * Explicit `project_id` parameter first, then the configured default
 */
export function resolveProjectId(params: ToolParams, config: Configuration): string {
  const projectId = stringParam(params, 'project_id') ?? config.projectId;
  if (!projectId) {
    throw new ConfigurationError(
      'Project ID is required but not provided in parameters or configuration'
    );
  }
  return projectId;
}

/**
 * Parameter names copied under the same key, or a `param -> body field` map
 */
export type FieldMap = readonly string[] | Readonly<Record<string, string>>;

function isFieldList(fields: FieldMap): fields is readonly string[] {
  return Array.isArray(fields);
}

/**
 * Copy the parameters named in `fields` into `base`, skipping absent ones.
 * Nothing is ever sent as null.
 */
export function mergeOptional(
  base: Record<string, JsonValue>,
  params: ToolParams,
  fields: FieldMap
): Record<string, JsonValue> {
  const entries: [string, string][] = isFieldList(fields)
    ? fields.map((name): [string, string] => [name, name])
    : Object.entries(fields);

  const merged: Record<string, JsonValue> = { ...base };
  for (const [param, field] of entries) {
    const value = params[param];
    if (value !== undefined && value !== null) {
      merged[field] = value;
    }
  }
  return merged;
}
