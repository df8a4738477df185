/**
 * Experiment run tools: CRUD plus batch delete and batch logging
 */

import { ValidationError } from '../errors.js';
import type { ParameterDefinition, ToolDefinition } from '../types/tool.js';
import { idOf, requestTool } from './request-tool.js';

const EXPERIMENT_ID = { type: 'string', description: 'Experiment ID.', required: true } as const;
const RUN_ID = { type: 'string', description: 'Experiment run ID.', required: true } as const;

const RUN_FIELDS: Record<string, ParameterDefinition> = {
  name: { type: 'string', description: 'Run name.' },
  description: { type: 'string', description: 'Run description.' },
  metrics: {
    type: 'string',
    format: 'json',
    description: 'Metrics as JSON, e.g. [{"key": "accuracy", "value": 0.93}].',
  },
  parameters: {
    type: 'string',
    format: 'json',
    description: 'Parameters as JSON, e.g. [{"key": "lr", "value": "0.01"}].',
  },
  tags: {
    type: 'string',
    format: 'json',
    description: 'Tags as JSON, e.g. [{"key": "team", "value": "search"}].',
  },
};

const RUN_FIELD_NAMES = Object.keys(RUN_FIELDS);

export const createExperimentRun = requestTool({
  name: 'create_experiment_run',
  description: 'Create a run inside an experiment.',
  parameters: { experiment_id: EXPERIMENT_ID, ...RUN_FIELDS },
  method: 'POST',
  path: 'experiments/{experiment_id}/runs',
  body: RUN_FIELD_NAMES,
  message: params => `Experiment run created in experiment ${String(params.experiment_id)}`,
  result: data => ({ run_id: idOf(data) ?? null }),
});

export const getExperimentRun = requestTool({
  name: 'get_experiment_run',
  description: 'Get details of an experiment run.',
  parameters: { experiment_id: EXPERIMENT_ID, run_id: RUN_ID },
  method: 'GET',
  path: 'experiments/{experiment_id}/runs/{run_id}',
  message: 'Experiment run retrieved successfully',
});

export const updateExperimentRun = requestTool({
  name: 'update_experiment_run',
  description: 'Update an experiment run. Only the given fields change.',
  parameters: { experiment_id: EXPERIMENT_ID, run_id: RUN_ID, ...RUN_FIELDS },
  method: 'PATCH',
  path: 'experiments/{experiment_id}/runs/{run_id}',
  body: RUN_FIELD_NAMES,
  message: params => `Experiment run ${String(params.run_id)} updated successfully`,
});

export const deleteExperimentRun = requestTool({
  name: 'delete_experiment_run',
  description: 'Delete an experiment run.',
  parameters: { experiment_id: EXPERIMENT_ID, run_id: RUN_ID },
  method: 'DELETE',
  path: 'experiments/{experiment_id}/runs/{run_id}',
  message: params => `Experiment run ${String(params.run_id)} deleted successfully`,
});

export const deleteExperimentRunBatch = requestTool({
  name: 'delete_experiment_run_batch',
  description: 'Delete several runs of an experiment in one request.',
  parameters: {
    experiment_id: EXPERIMENT_ID,
    run_ids: { type: 'string', format: 'csv', description: 'Run IDs to delete.', required: true },
  },
  method: 'DELETE',
  path: 'experiments/{experiment_id}/runs-batch',
  body: { run_ids: 'ids' },
  message: params => {
    const count = Array.isArray(params.run_ids) ? params.run_ids.length : 0;
    return `Deleted ${count} experiment runs`;
  },
});

export const logExperimentRunBatch = requestTool({
  name: 'log_experiment_run_batch',
  description: 'Log metrics, parameters and tags for several runs of an experiment in one request.',
  parameters: {
    experiment_id: EXPERIMENT_ID,
    run_updates: {
      type: 'string',
      format: 'json',
      description: 'JSON array of run updates, e.g. [{"run_id": "r1", "metrics": [{"key": "loss", "value": 0.2}]}].',
      required: true,
    },
  },
  method: 'POST',
  path: 'experiments/{experiment_id}/run-batch',
  buildBody: params => {
    const runs = params.run_updates;
    if (!Array.isArray(runs)) {
      throw new ValidationError('run_updates must be a JSON array', { parameter: 'run_updates' });
    }
    return { runs };
  },
  message: params => {
    const count = Array.isArray(params.run_updates) ? params.run_updates.length : 0;
    return `Logged updates for ${count} experiment runs`;
  },
});

export const experimentRunTools: ToolDefinition[] = [
  createExperimentRun,
  getExperimentRun,
  updateExperimentRun,
  deleteExperimentRun,
  deleteExperimentRunBatch,
  logExperimentRunBatch,
];
