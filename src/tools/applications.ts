/**
 * Application tools: CRUD plus restart and stop
 */

import { ok, resolveProjectId } from '../envelope.js';
import type { ToolDefinition } from '../types/tool.js';
import {
  ENVIRONMENT_VARIABLES_PARAM,
  PROJECT_ID_PARAM,
  defineTool,
  idOf,
  listField,
  requestTool,
} from './request-tool.js';

const APPLICATION_ID = { type: 'string', description: 'Application ID.', required: true } as const;

export const createApplication = requestTool({
  name: 'create_application',
  description: 'Create a long-running web application served from a project script.',
  parameters: {
    name: { type: 'string', description: 'Application name.', required: true },
    script: { type: 'string', description: 'Script that starts the application.', required: true },
    subdomain: { type: 'string', description: 'Subdomain the application is served under.' },
    description: { type: 'string', description: 'Application description.' },
    kernel: { type: 'string', description: 'Kernel, e.g. python3.', default: 'python3' },
    cpu: { type: 'number', description: 'vCPUs.', default: 1 },
    memory: { type: 'number', description: 'Memory in GB.', default: 1 },
    nvidia_gpu: { type: 'integer', description: 'GPUs.', default: 0 },
    runtime_identifier: { type: 'string', description: 'Runtime image identifier.' },
    environment_variables: ENVIRONMENT_VARIABLES_PARAM,
  },
  method: 'POST',
  path: 'applications',
  body: [
    'name',
    'script',
    'subdomain',
    'description',
    'kernel',
    'cpu',
    'memory',
    'nvidia_gpu',
    'runtime_identifier',
    'environment_variables',
  ],
  message: params => `Application '${String(params.name)}' created successfully`,
  result: data => ({ application_id: idOf(data) ?? null }),
});

export const listApplications = defineTool({
  name: 'list_applications',
  description: 'List the applications of a project.',
  parameters: { project_id: PROJECT_ID_PARAM },
  run: async (ctx, params) => {
    const projectId = resolveProjectId(params, ctx.config);
    const { data } = await ctx.client.get(ctx.client.projectPath(projectId, 'applications'));
    const applications = listField(data, 'applications');
    return ok(`Found ${applications.length} applications`, { applications, count: applications.length });
  },
});

export const getApplication = requestTool({
  name: 'get_application',
  description: 'Get details of an application.',
  parameters: { application_id: APPLICATION_ID },
  method: 'GET',
  path: 'applications/{application_id}',
  message: 'Application retrieved successfully',
  result: (_data, params) => ({ application_id: params.application_id ?? null }),
});

export const updateApplication = requestTool({
  name: 'update_application',
  description: 'Update an application. Only the given fields change.',
  parameters: {
    application_id: APPLICATION_ID,
    name: { type: 'string', description: 'Application name.' },
    description: { type: 'string', description: 'Application description.' },
    cpu: { type: 'number', description: 'vCPUs.' },
    memory: { type: 'number', description: 'Memory in GB.' },
    nvidia_gpu: { type: 'integer', description: 'GPUs.' },
    runtime_identifier: { type: 'string', description: 'Runtime image identifier.' },
    environment_variables: ENVIRONMENT_VARIABLES_PARAM,
  },
  method: 'PATCH',
  path: 'applications/{application_id}',
  body: ['name', 'description', 'cpu', 'memory', 'nvidia_gpu', 'runtime_identifier', 'environment_variables'],
  message: params => `Application ${String(params.application_id)} updated successfully`,
});

export const restartApplication = requestTool({
  name: 'restart_application',
  description: 'Restart an application.',
  parameters: { application_id: APPLICATION_ID },
  method: 'POST',
  path: 'applications/{application_id}/restart',
  message: params => `Application ${String(params.application_id)} restarted`,
});

export const stopApplication = requestTool({
  name: 'stop_application',
  description: 'Stop a running application.',
  parameters: { application_id: APPLICATION_ID },
  method: 'POST',
  path: 'applications/{application_id}/stop',
  message: params => `Application ${String(params.application_id)} stopped`,
});

export const deleteApplication = requestTool({
  name: 'delete_application',
  description: 'Delete an application.',
  parameters: { application_id: APPLICATION_ID },
  method: 'DELETE',
  path: 'applications/{application_id}',
  message: params => `Application ${String(params.application_id)} deleted successfully`,
});

export const applicationTools: ToolDefinition[] = [
  createApplication,
  listApplications,
  getApplication,
  updateApplication,
  restartApplication,
  stopApplication,
  deleteApplication,
];
