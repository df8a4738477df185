/**
 * Job run tools: start, list, read and stop runs of a job
 */

import type { ToolDefinition } from '../types/tool.js';
import { ENVIRONMENT_VARIABLES_PARAM, idOf, listField, requestTool } from './request-tool.js';

const JOB_ID = { type: 'string', description: 'Job ID.', required: true } as const;
const RUN_ID = { type: 'string', description: 'Job run ID.', required: true } as const;

export const createJobRun = requestTool({
  name: 'create_job_run',
  description: 'Start a run of an existing job.',
  parameters: {
    job_id: JOB_ID,
    runtime_identifier: { type: 'string', description: 'Runtime image identifier override.' },
    environment_variables: ENVIRONMENT_VARIABLES_PARAM,
    override_config: {
      type: 'string',
      format: 'json',
      description: 'Resource overrides for this run as a JSON object, e.g. {"cpu": 2}.',
    },
  },
  method: 'POST',
  path: 'jobs/{job_id}/runs',
  body: ['runtime_identifier', 'environment_variables', 'override_config'],
  message: params => `Job run started for job ${String(params.job_id)}`,
  result: data => ({ run_id: idOf(data) ?? null }),
});

export const listJobRuns = requestTool({
  name: 'list_job_runs',
  description: 'List the runs of a job.',
  parameters: { job_id: JOB_ID },
  method: 'GET',
  path: 'jobs/{job_id}/runs',
  message: (_params, data) => `Found ${listField(data, 'job_runs').length} job runs`,
});

export const getJobRun = requestTool({
  name: 'get_job_run',
  description: 'Get details of a job run.',
  parameters: { job_id: JOB_ID, run_id: RUN_ID },
  method: 'GET',
  path: 'jobs/{job_id}/runs/{run_id}',
  message: 'Job run retrieved successfully',
});

export const stopJobRun = requestTool({
  name: 'stop_job_run',
  description: 'Stop a running job run.',
  parameters: { job_id: JOB_ID, run_id: RUN_ID },
  method: 'POST',
  path: 'jobs/{job_id}/runs/{run_id}/stop',
  message: params => `Job run ${String(params.run_id)} stopped`,
});

export const jobRunTools: ToolDefinition[] = [createJobRun, listJobRuns, getJobRun, stopJobRun];
