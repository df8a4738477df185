/**
 * Experiment tools: CRUD for experiment tracking
 */

import type { ToolDefinition } from '../types/tool.js';
import { idOf, listField, requestTool } from './request-tool.js';

const EXPERIMENT_ID = { type: 'string', description: 'Experiment ID.', required: true } as const;

export const createExperiment = requestTool({
  name: 'create_experiment',
  description: 'Create an experiment for tracking runs, metrics and parameters.',
  parameters: {
    name: { type: 'string', description: 'Experiment name.', required: true },
    description: { type: 'string', description: 'Experiment description.' },
  },
  method: 'POST',
  path: 'experiments',
  body: ['name', 'description'],
  message: params => `Experiment '${String(params.name)}' created successfully`,
  result: data => ({ experiment_id: idOf(data) ?? null }),
});

export const listExperiments = requestTool({
  name: 'list_experiments',
  description: 'List the experiments of a project.',
  parameters: {},
  method: 'GET',
  path: 'experiments',
  message: (_params, data) => `Found ${listField(data, 'experiments').length} experiments`,
});

export const getExperiment = requestTool({
  name: 'get_experiment',
  description: 'Get details of an experiment.',
  parameters: { experiment_id: EXPERIMENT_ID },
  method: 'GET',
  path: 'experiments/{experiment_id}',
  message: 'Experiment retrieved successfully',
});

export const updateExperiment = requestTool({
  name: 'update_experiment',
  description: 'Rename an experiment or change its description.',
  parameters: {
    experiment_id: EXPERIMENT_ID,
    name: { type: 'string', description: 'Experiment name.' },
    description: { type: 'string', description: 'Experiment description.' },
  },
  method: 'PATCH',
  path: 'experiments/{experiment_id}',
  body: ['name', 'description'],
  message: params => `Experiment ${String(params.experiment_id)} updated successfully`,
});

export const deleteExperiment = requestTool({
  name: 'delete_experiment',
  description: 'Delete an experiment and its runs.',
  parameters: { experiment_id: EXPERIMENT_ID },
  method: 'DELETE',
  path: 'experiments/{experiment_id}',
  message: params => `Experiment ${String(params.experiment_id)} deleted successfully`,
});

export const experimentTools: ToolDefinition[] = [
  createExperiment,
  listExperiments,
  getExperiment,
  updateExperiment,
  deleteExperiment,
];
