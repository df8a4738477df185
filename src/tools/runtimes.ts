/**
 * Runtime catalog tool
 */

import { ok } from '../envelope.js';
import type { ToolDefinition } from '../types/tool.js';
import { defineTool, isRecord, listField } from './request-tool.js';

export const getRuntimes = defineTool({
  name: 'get_runtimes',
  description: 'List the runtimes (editions, kernels, images) available for jobs, models and applications.',
  parameters: {},
  run: async ctx => {
    const { data } = await ctx.client.get(ctx.client.globalPath('runtimes'));

    const runtimes = listField(data, 'runtimes').filter(isRecord).map(runtime => ({
      identifier: runtime.image_identifier ?? runtime.runtime_identifier ?? null,
      edition: runtime.edition ?? null,
      type: runtime.image_type ?? null,
      kernel: runtime.kernel ?? null,
      description: runtime.short_description ?? runtime.description ?? null,
    }));

    return ok(`Found ${runtimes.length} available runtimes`, { runtimes, count: runtimes.length });
  },
});

export const runtimeTools: ToolDefinition[] = [getRuntimes];
