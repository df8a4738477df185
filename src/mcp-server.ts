/**
 * Main MCP server implementation
 *
 * Holds the tool registry, decodes call arguments, runs tools and returns
 * each result envelope as formatted JSON text. Served over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import { decodeArguments } from './argument-decoder.js';
import type { Configuration } from './config.js';
import { SERVER_INFO } from './constants.js';
import { errorToEnvelope, fail, type Envelope } from './envelope.js';
import { ConfigurationError, generateCorrelationId, isMCPError, toError } from './errors.js';
import type { FetchFn } from './interceptors.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { PlatformClient } from './platform-client.js';
import { ToolGenerator } from './tool-generator.js';
import { allTools } from './tools/index.js';
import type { ToolContext, ToolDefinition } from './types/tool.js';

export interface ServerOptions {
  logger?: Logger;
  /** Defaults to every built-in tool */
  tools?: ToolDefinition[];
  /** Replaces the global fetch for platform requests */
  fetch?: FetchFn;
}

export class WorkbenchMCPServer {
  private server: Server;
  private logger: Logger;
  private tools = new Map<string, ToolDefinition>();
  private toolGenerator = new ToolGenerator();
  private context: ToolContext;

  constructor(config: Configuration, options: ServerOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger();

    for (const tool of options.tools ?? allTools) {
      if (this.tools.has(tool.name)) {
        throw new ConfigurationError(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }

    const client = new PlatformClient(config, { logger: this.logger, fetch: options.fetch });
    this.context = { config, client, logger: this.logger };

    this.server = new Server(
      {
        name: SERVER_INFO.name,
        version: SERVER_INFO.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  listTools(): Tool[] {
    return [...this.tools.values()].map(tool => this.toolGenerator.generateTool(tool));
  }

  /**
   * Run one tool. Always resolves to an envelope; faults that escape a
   * tool are logged under a correlation ID that is echoed to the caller.
   */
  async callTool(name: string, args: Record<string, unknown> = {}): Promise<Envelope> {
    const tool = this.tools.get(name);
    if (!tool) {
      return fail(`Unknown tool: ${name}`);
    }

    const started = Date.now();
    let envelope: Envelope;

    try {
      const params = decodeArguments(tool.parameters, args);
      envelope = await tool.handler(this.context, params);
    } catch (error) {
      if (isMCPError(error)) {
        envelope = errorToEnvelope(error);
      } else {
        const correlationId = generateCorrelationId();
        this.logger.error('Tool call failed', toError(error), { correlationId, tool: name });
        envelope = fail(`Internal error (correlation ID: ${correlationId})`);
      }
    }

    this.logger.info('Tool call completed', {
      tool: name,
      success: envelope.success,
      durationMs: Date.now() - started,
    });

    return envelope;
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.listTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const envelope = await this.callTool(request.params.name, request.params.arguments ?? {});

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(envelope, null, 2),
          },
        ],
      };
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async runStdio(): Promise<void> {
    await this.connect(new StdioServerTransport());
    this.logger.info('MCP server running on stdio', { tools: this.tools.size });
  }

  async stop(): Promise<void> {
    await this.server.close();
  }
}
