/**
 * Structured error types for the workbench MCP server
 *
 * Every failure a tool can hit maps onto one of these classes. Tools never
 * let them escape: `errorToEnvelope` (envelope.ts) turns them into the
 * `{ success: false, message }` result.
 */

import { randomUUID } from 'crypto';

export class MCPError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MCPError';
  }
}

/**
 * Missing or malformed caller input, detected before any network call
 */
export class ValidationError extends MCPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Missing host, API key or project ID
 */
export class ConfigurationError extends MCPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Connection failure, timeout, or a non-2xx response without a JSON body
 */
export class TransportError extends MCPError {
  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', { statusCode, ...details });
    this.name = 'TransportError';
  }
}

/**
 * The platform answered with a decodable body that reports an error.
 *
 * `payload` is the body's `error` value (or the whole body for non-2xx
 * responses without one) and is surfaced to the caller as `details`.
 */
export class RemoteApplicationError extends MCPError {
  constructor(
    message: string,
    public payload: unknown,
    statusCode?: number
  ) {
    super(message, 'REMOTE_APPLICATION_ERROR', { statusCode });
    this.name = 'RemoteApplicationError';
  }
}

/**
 * 2xx response whose body is not JSON
 */
export class ResponseParseError extends MCPError {
  constructor(
    message: string,
    public rawResponse: string,
    statusCode?: number
  ) {
    super(message, 'RESPONSE_PARSE_ERROR', { statusCode });
    this.name = 'ResponseParseError';
  }
}

/**
 * Generate a correlation ID for tying a client-facing error to its log line
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Helper function to check if an error is an MCPError
 */
export function isMCPError(error: unknown): error is MCPError {
  return error instanceof MCPError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isMCPError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
