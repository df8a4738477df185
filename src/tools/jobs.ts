/**
 * Job tools: CRUD plus bulk delete
 */

import { fail, mergeOptional, ok, resolveProjectId } from '../envelope.js';
import type { JsonValue, ToolDefinition } from '../types/tool.js';
import {
  ENVIRONMENT_VARIABLES_PARAM,
  PROJECT_ID_PARAM,
  defineTool,
  idOf,
  isRecord,
  listField,
  requestTool,
} from './request-tool.js';

const JOB_FIELDS = [
  'name',
  'script',
  'kernel',
  'cpu',
  'memory',
  'nvidia_gpu',
  'runtime_identifier',
  'environment_variables',
] as const;

/**
 * `2024-05-01T10:00:00Z` -> `2024-05-01 10:00:00 UTC`; unparseable values pass through
 */
export function formatTimestamp(value: JsonValue | undefined): JsonValue {
  if (typeof value !== 'string' || value.length === 0) return value ?? null;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export const createJob = requestTool({
  name: 'create_job',
  description: 'Create a job that runs a script in the project.',
  parameters: {
    name: { type: 'string', description: 'Job name.', required: true },
    script: { type: 'string', description: 'Script path relative to the project root.', required: true },
    kernel: { type: 'string', description: 'Kernel, e.g. python3.', default: 'python3' },
    cpu: { type: 'number', description: 'vCPUs.', default: 1 },
    memory: { type: 'number', description: 'Memory in GB.', default: 1 },
    nvidia_gpu: { type: 'integer', description: 'GPUs.', default: 0 },
    runtime_identifier: { type: 'string', description: 'Runtime image identifier.' },
    environment_variables: ENVIRONMENT_VARIABLES_PARAM,
  },
  method: 'POST',
  path: 'jobs',
  buildBody: (params, ctx) => {
    const body = mergeOptional({}, params, JOB_FIELDS);
    if (body.runtime_identifier === undefined && ctx.config.defaultRuntimeIdentifier) {
      body.runtime_identifier = ctx.config.defaultRuntimeIdentifier;
    }
    return body;
  },
  message: params => `Job '${String(params.name)}' created successfully`,
  result: data => ({ job_id: idOf(data) ?? null }),
});

export const listJobs = defineTool({
  name: 'list_jobs',
  description: 'List the jobs of a project.',
  parameters: { project_id: PROJECT_ID_PARAM },
  run: async (ctx, params) => {
    const projectId = resolveProjectId(params, ctx.config);
    const { data } = await ctx.client.get(ctx.client.projectPath(projectId, 'jobs'));

    const jobs = listField(data, 'jobs').filter(isRecord).map(job => ({
      id: job.id ?? null,
      name: job.name ?? null,
      status: job.status ?? null,
      created_at: formatTimestamp(job.created_at),
      script: job.script ?? null,
      cpu: job.cpu ?? null,
      memory: job.memory ?? null,
      gpu: job.nvidia_gpu ?? 0,
    }));

    return ok(`Found ${jobs.length} jobs`, { jobs, count: jobs.length });
  },
});

export const getJob = requestTool({
  name: 'get_job',
  description: 'Get details of a job.',
  parameters: {
    job_id: { type: 'string', description: 'Job ID.', required: true },
  },
  method: 'GET',
  path: 'jobs/{job_id}',
  message: 'Job retrieved successfully',
});

export const updateJob = requestTool({
  name: 'update_job',
  description: 'Update a job. Only the given fields change.',
  parameters: {
    job_id: { type: 'string', description: 'Job ID.', required: true },
    name: { type: 'string', description: 'Job name.' },
    script: { type: 'string', description: 'Script path.' },
    kernel: { type: 'string', description: 'Kernel.' },
    cpu: { type: 'number', description: 'vCPUs.' },
    memory: { type: 'number', description: 'Memory in GB.' },
    nvidia_gpu: { type: 'integer', description: 'GPUs.' },
    runtime_identifier: { type: 'string', description: 'Runtime image identifier.' },
    environment_variables: ENVIRONMENT_VARIABLES_PARAM,
  },
  method: 'PATCH',
  path: 'jobs/{job_id}',
  body: JOB_FIELDS,
  message: params => `Job ${String(params.job_id)} updated successfully`,
});

export const deleteJob = requestTool({
  name: 'delete_job',
  description: 'Delete a job.',
  parameters: {
    job_id: { type: 'string', description: 'Job ID.', required: true },
  },
  method: 'DELETE',
  path: 'jobs/{job_id}',
  message: params => `Job ${String(params.job_id)} deleted successfully`,
});

interface DeletedJob {
  id: string;
  name: JsonValue;
}

interface FailedJob extends DeletedJob {
  error: string;
}

/**
 * Lists the project's jobs, then deletes them one at a time. A failed
 * delete is recorded and the rest still run; nothing is rolled back.
 */
export const deleteAllJobs = defineTool({
  name: 'delete_all_jobs',
  description: 'Delete every job in a project. Reports which deletions failed.',
  parameters: { project_id: PROJECT_ID_PARAM },
  run: async (ctx, params) => {
    const projectId = resolveProjectId(params, ctx.config);
    const { data } = await ctx.client.get(ctx.client.projectPath(projectId, 'jobs'));
    const jobs = listField(data, 'jobs').filter(isRecord);

    const deleted: DeletedJob[] = [];
    const failed: FailedJob[] = [];

    if (jobs.length === 0) {
      return ok('No jobs found to delete', {
        deleted_count: 0,
        deleted_jobs: deleted,
        failed_count: 0,
        failed_jobs: failed,
      });
    }

    for (const job of jobs) {
      const id = idOf(job);
      const name = job.name ?? null;
      if (id === undefined) {
        failed.push({ id: '', name, error: 'Job has no id' });
        continue;
      }

      try {
        await ctx.client.delete(ctx.client.projectPath(projectId, `jobs/${encodeURIComponent(id)}`));
        deleted.push({ id, name });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        ctx.logger.warn('Job deletion failed', { projectId, jobId: id, error: message });
        failed.push({ id, name, error: message });
      }
    }

    const summary = {
      deleted_count: deleted.length,
      deleted_jobs: deleted,
      failed_count: failed.length,
      failed_jobs: failed,
    };

    if (failed.length > 0) {
      return fail(`Deleted ${deleted.length} jobs, but failed to delete ${failed.length} jobs`, summary);
    }
    return ok(`Successfully deleted all ${deleted.length} jobs`, summary);
  },
});

export const jobTools: ToolDefinition[] = [
  createJob,
  listJobs,
  getJob,
  updateJob,
  deleteJob,
  deleteAllJobs,
];
