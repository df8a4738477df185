/**
 * Library exports for programmatic usage
 */
export { WorkbenchMCPServer, type ServerOptions } from './mcp-server.js';
export { loadConfig, type Configuration } from './config.js';
export { normalizeHost } from './host.js';
export { PlatformClient, interpretResponse, type ApiResult, type ApiVersion } from './platform-client.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger, type Logger } from './logger.js';
export { ok, fail, errorToEnvelope, mergeOptional, type Envelope } from './envelope.js';
export * from './errors.js';
export { allTools } from './tools/index.js';
export { defineTool, requestTool } from './tools/request-tool.js';
export type { ToolDefinition, ParameterDefinition, ToolParams, ToolContext } from './types/tool.js';
