/**
 * Model build tools: start a build, list and read builds
 */

import { readFile } from 'fs/promises';
import { mergeOptional, stringParam } from '../envelope.js';
import type { ToolDefinition } from '../types/tool.js';
import { ENVIRONMENT_VARIABLES_PARAM, idOf, listField, requestTool } from './request-tool.js';
import { statIfExists } from './local-files.js';

const BUILD_FIELDS = [
  'file_path',
  'function_name',
  'kernel',
  'runtime_identifier',
  'replica_size',
  'cpu',
  'memory',
  'nvidia_gpu',
  'use_custom_docker_image',
  'custom_docker_image',
  'environment_variables',
] as const;

/**
 * `file_path` naming an existing local file is replaced by that file's
 * contents; any other value is sent unchanged.
 */
export const createModelBuild = requestTool({
  name: 'create_model_build',
  description: 'Build a model from a source file and the function that serves predictions.',
  parameters: {
    model_id: { type: 'string', description: 'Model ID.', required: true },
    file_path: {
      type: 'string',
      description: 'Source file path in the project. A path to an existing local file sends its contents instead.',
      required: true,
    },
    function_name: { type: 'string', description: 'Function in the file that handles requests.', required: true },
    kernel: { type: 'string', description: 'Kernel, e.g. python3.' },
    runtime_identifier: { type: 'string', description: 'Runtime image identifier.' },
    replica_size: { type: 'string', description: 'Replica size profile.' },
    cpu: { type: 'number', description: 'vCPUs per replica.', default: 1 },
    memory: { type: 'number', description: 'Memory in GB per replica.', default: 2 },
    nvidia_gpu: { type: 'integer', description: 'GPUs per replica.' },
    use_custom_docker_image: { type: 'boolean', description: 'Build on a custom image.' },
    custom_docker_image: { type: 'string', description: 'Custom image reference.' },
    environment_variables: ENVIRONMENT_VARIABLES_PARAM,
  },
  method: 'POST',
  path: 'models/{model_id}/builds',
  buildBody: async params => {
    const body = mergeOptional({}, params, BUILD_FIELDS);
    const filePath = stringParam(params, 'file_path');
    if (filePath !== undefined) {
      const stats = await statIfExists(filePath);
      if (stats?.isFile()) {
        body.file_path = await readFile(filePath, 'utf8');
      }
    }
    return body;
  },
  message: params => `Model build started for model ${String(params.model_id)}`,
  result: data => ({ build_id: idOf(data) ?? null }),
});

export const listModelBuilds = requestTool({
  name: 'list_model_builds',
  description: 'List model builds, for one model or across the project.',
  parameters: {
    model_id: { type: 'string', description: 'Only list builds of this model.' },
  },
  method: 'GET',
  path: params => (stringParam(params, 'model_id') ? 'models/{model_id}/builds' : 'model-builds'),
  message: (_params, data) => `Found ${listField(data, 'model_builds').length} model builds`,
});

export const getModelBuild = requestTool({
  name: 'get_model_build',
  description: 'Get details of a model build.',
  parameters: {
    model_id: { type: 'string', description: 'Model ID.', required: true },
    build_id: { type: 'string', description: 'Build ID.', required: true },
  },
  method: 'GET',
  path: 'models/{model_id}/builds/{build_id}',
  message: 'Model build retrieved successfully',
});

export const modelBuildTools: ToolDefinition[] = [createModelBuild, listModelBuilds, getModelBuild];
