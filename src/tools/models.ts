/**
 * Model tools: create, list, read and delete models
 */

import type { ToolDefinition } from '../types/tool.js';
import { idOf, listField, requestTool } from './request-tool.js';

const MODEL_ID = { type: 'string', description: 'Model ID.', required: true } as const;

export const createModel = requestTool({
  name: 'create_model',
  description: 'Create a model entry that builds and deployments attach to.',
  parameters: {
    name: { type: 'string', description: 'Model name.', required: true },
    description: { type: 'string', description: 'Model description.' },
    disable_authentication: { type: 'boolean', description: 'Serve the model without API key checks.' },
  },
  method: 'POST',
  path: 'models',
  body: ['name', 'description', 'disable_authentication'],
  message: params => `Model '${String(params.name)}' created successfully`,
  result: data => ({ model_id: idOf(data) ?? null }),
});

export const listModels = requestTool({
  name: 'list_models',
  description: 'List the models of a project.',
  parameters: {},
  method: 'GET',
  path: 'models',
  message: (_params, data) => `Found ${listField(data, 'models').length} models`,
});

/**
 * Pinned to API v1, which the platform still serves for single-model reads
 */
export const getModel = requestTool({
  name: 'get_model',
  description: 'Get details of a model.',
  parameters: { model_id: MODEL_ID },
  method: 'GET',
  version: 'v1',
  path: 'models/{model_id}',
  message: 'Model retrieved successfully',
});

export const deleteModel = requestTool({
  name: 'delete_model',
  description: 'Delete a model with its builds and deployments.',
  parameters: { model_id: MODEL_ID },
  method: 'DELETE',
  path: 'models/{model_id}',
  message: params => `Model ${String(params.model_id)} deleted successfully`,
});

export const modelTools: ToolDefinition[] = [createModel, listModels, getModel, deleteModel];
