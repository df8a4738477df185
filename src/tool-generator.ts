/**
 * MCP tool metadata from tool definitions
 *
 * Produces the name, description and JSON Schema listed by `tools/list`.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ParameterDefinition, ToolDefinition } from './types/tool.js';

const FORMAT_HINTS: Record<string, string> = {
  json: 'JSON-encoded string.',
  csv: 'Comma-separated list.',
};

export class ToolGenerator {
  generateTool(toolDef: ToolDefinition): Tool {
    return {
      name: toolDef.name,
      description: toolDef.description,
      inputSchema: this.generateInputSchema(toolDef),
    };
  }

  private generateInputSchema(toolDef: ToolDefinition): Tool['inputSchema'] {
    const properties: Record<string, Record<string, unknown>> = {};
    const required: string[] = [];

    for (const [name, param] of Object.entries(toolDef.parameters)) {
      properties[name] = this.parameterToJsonSchema(param);
      if (param.required) {
        required.push(name);
      }
    }

    return {
      type: 'object',
      properties,
      required: required.length > 0 ? required : undefined,
    };
  }

  private parameterToJsonSchema(param: ParameterDefinition): Record<string, unknown> {
    const hint = param.format ? FORMAT_HINTS[param.format] : undefined;
    const schema: Record<string, unknown> = {
      type: param.type,
      description: hint ? `${param.description} ${hint}` : param.description,
    };

    if (param.enum) {
      schema.enum = param.enum;
    }

    if (param.default !== undefined) {
      schema.default = param.default;
    }

    return schema;
  }
}
