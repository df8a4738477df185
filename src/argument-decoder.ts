/**
 * Decode MCP call arguments into a tool's parameter mapping
 *
 * MCP clients send scalars. Lists arrive comma-separated, nested
 * structures JSON-encoded; numbers and booleans may arrive as strings.
 * Decoding failures are ValidationErrors raised before any request.
 */

import { ValidationError } from './errors.js';
import type { JsonValue, ParameterDefinition, ToolParams } from './types/tool.js';

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function invalid(name: string, expected: string): ValidationError {
  return new ValidationError(`Invalid value for ${name}: expected ${expected}`, { parameter: name });
}

function decodeJson(name: string, raw: unknown): JsonValue {
  if (typeof raw === 'string') {
    try {
      return JSON.parse(raw);
    } catch {
      throw new ValidationError(`Invalid JSON for ${name}`, { parameter: name });
    }
  }
  // Clients that can send structured values skip the encoding step
  if (isJsonValue(raw)) {
    return raw;
  }
  throw new ValidationError(`Invalid JSON for ${name}`, { parameter: name });
}

function decodeCsv(name: string, raw: unknown): string[] {
  if (typeof raw === 'string') {
    return raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
  if (Array.isArray(raw) && raw.every(item => typeof item === 'string' || typeof item === 'number')) {
    return raw.map(item => String(item).trim()).filter(item => item.length > 0);
  }
  throw invalid(name, 'comma-separated list');
}

function decodeScalar(name: string, param: ParameterDefinition, raw: unknown): JsonValue {
  switch (param.type) {
    case 'integer': {
      if (typeof raw === 'number' && Number.isInteger(raw)) return raw;
      if (typeof raw === 'string' && /^-?\d+$/.test(raw.trim())) return Number(raw.trim());
      throw invalid(name, 'integer');
    }
    case 'number': {
      if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
      if (typeof raw === 'string') {
        const parsed = Number(raw.trim());
        if (Number.isFinite(parsed)) return parsed;
      }
      throw invalid(name, 'number');
    }
    case 'boolean': {
      if (typeof raw === 'boolean') return raw;
      if (typeof raw === 'string') {
        const normalized = raw.trim().toLowerCase();
        if (normalized === 'true') return true;
        if (normalized === 'false') return false;
      }
      throw invalid(name, 'boolean');
    }
    case 'string': {
      if (typeof raw === 'string') return raw;
      if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
      throw invalid(name, 'string');
    }
  }
}

function isBlank(raw: unknown): boolean {
  return raw === undefined || raw === null || (typeof raw === 'string' && raw.trim() === '');
}

/**
 * Decode `args` against the declared parameters.
 *
 * Undeclared keys are dropped. Absent or blank arguments take the declared
 * default, or stay absent. Enum membership is checked after decoding.
 */
export function decodeArguments(
  parameters: Record<string, ParameterDefinition>,
  args: Record<string, unknown>
): ToolParams {
  const params: ToolParams = {};

  for (const [name, param] of Object.entries(parameters)) {
    const raw = args[name];

    if (isBlank(raw)) {
      if (param.default !== undefined) {
        params[name] = param.default;
      }
      continue;
    }

    let value: JsonValue;
    if (param.format === 'json') {
      value = decodeJson(name, raw);
    } else if (param.format === 'csv') {
      value = decodeCsv(name, raw);
    } else {
      value = decodeScalar(name, param, raw);
    }

    if (param.enum && typeof value === 'string' && !param.enum.includes(value)) {
      throw new ValidationError(
        `Invalid value for ${name}. Must be one of: ${param.enum.join(', ')}`,
        { parameter: name }
      );
    }

    params[name] = value;
  }

  return params;
}
