/**
 * Application constants
 *
 * Magic numbers and fixed names used across the client and tools.
 */

/**
 * Time conversion constants
 */
export const TIME = {
  MS_PER_SECOND: 1000,
  MS_PER_MINUTE: 60000,
} as const;

/**
 * HTTP status codes
 */
export const HTTP_STATUS = {
  OK: 200,
  MULTIPLE_CHOICES: 300,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export const DEFAULTS = {
  REQUEST_TIMEOUT_MS: 30 * TIME.MS_PER_SECOND,
  UPLOAD_DELAY_MS: 500,
  API_VERSION: 'v2',
} as const;

/**
 * Directories skipped by folder upload unless the caller passes its own list
 */
export const DEFAULT_IGNORED_FOLDERS: readonly string[] = [
  'node_modules',
  '.git',
  '.vscode',
  'dist',
  'out',
];

/**
 * Longest slice of a non-JSON error body carried into an error message
 */
export const MAX_ERROR_BODY_LENGTH = 500;

export const SERVER_INFO = {
  name: 'workbench-mcp',
  version: '0.1.0',
} as const;
