/**
 * Model deployment tools: deploy builds, list, read and stop deployments
 */

import { stringParam } from '../envelope.js';
import { ValidationError } from '../errors.js';
import type { ToolDefinition, ToolParams } from '../types/tool.js';
import { ENVIRONMENT_VARIABLES_PARAM, idOf, listField, requestTool } from './request-tool.js';

const MODEL_ID = { type: 'string', description: 'Model ID.', required: true } as const;
const DEPLOYMENT_ID = { type: 'string', description: 'Deployment ID.', required: true } as const;

export const createModelDeployment = requestTool({
  name: 'create_model_deployment',
  description: 'Deploy a model build as a serving endpoint.',
  parameters: {
    model_id: MODEL_ID,
    build_id: { type: 'string', description: 'Build to deploy.', required: true },
    name: { type: 'string', description: 'Deployment name.', required: true },
    cpu: { type: 'number', description: 'vCPUs per replica.', default: 1 },
    memory: { type: 'number', description: 'Memory in GB per replica.', default: 2 },
    replica_count: { type: 'integer', description: 'Fixed replica count.', default: 1 },
    min_replica_count: { type: 'integer', description: 'Autoscaling lower bound.' },
    max_replica_count: { type: 'integer', description: 'Autoscaling upper bound.' },
    nvidia_gpu: { type: 'integer', description: 'GPUs per replica.' },
    enable_auth: { type: 'boolean', description: 'Require an API key for predictions.', default: true },
    target_node_selector: { type: 'string', description: 'Node selector for scheduling replicas.' },
    environment_variables: ENVIRONMENT_VARIABLES_PARAM,
  },
  method: 'POST',
  path: 'models/{model_id}/deployments',
  body: [
    'name',
    'build_id',
    'cpu',
    'memory',
    'replica_count',
    'min_replica_count',
    'max_replica_count',
    'nvidia_gpu',
    'enable_auth',
    'target_node_selector',
    'environment_variables',
  ],
  message: params => `Deployment '${String(params.name)}' created for model ${String(params.model_id)}`,
  result: data => ({ deployment_id: idOf(data) ?? null }),
});

function deploymentListPath(params: ToolParams): string {
  const modelId = stringParam(params, 'model_id');
  const buildId = stringParam(params, 'build_id');

  if (buildId && !modelId) {
    throw new ValidationError('model_id is required when build_id is given', { parameter: 'model_id' });
  }
  if (modelId && buildId) return 'models/{model_id}/builds/{build_id}/deployments';
  if (modelId) return 'models/{model_id}/deployments';
  return 'model-deployments';
}

export const listModelDeployments = requestTool({
  name: 'list_model_deployments',
  description: 'List model deployments, narrowed to a model or to one of its builds.',
  parameters: {
    model_id: { type: 'string', description: 'Only list deployments of this model.' },
    build_id: { type: 'string', description: 'Only list deployments of this build. Needs model_id.' },
  },
  method: 'GET',
  path: deploymentListPath,
  message: (_params, data) => `Found ${listField(data, 'model_deployments').length} model deployments`,
});

/**
 * Pinned to API v1 like get_model
 */
export const getModelDeployment = requestTool({
  name: 'get_model_deployment',
  description: 'Get details of a model deployment.',
  parameters: { model_id: MODEL_ID, deployment_id: DEPLOYMENT_ID },
  method: 'GET',
  version: 'v1',
  path: 'models/{model_id}/deployments/{deployment_id}',
  message: 'Model deployment retrieved successfully',
});

export const stopModelDeployment = requestTool({
  name: 'stop_model_deployment',
  description: 'Stop a running model deployment.',
  parameters: { model_id: MODEL_ID, deployment_id: DEPLOYMENT_ID },
  method: 'POST',
  path: 'models/{model_id}/deployments/{deployment_id}/stop',
  message: params => `Model deployment ${String(params.deployment_id)} stopped`,
});

export const modelDeploymentTools: ToolDefinition[] = [
  createModelDeployment,
  listModelDeployments,
  getModelDeployment,
  stopModelDeployment,
];
