/**
 * Project tools: name lookup, listing, batch reads and updates
 */

import { fail, ok, stringParam } from '../envelope.js';
import type { JsonValue, ToolDefinition } from '../types/tool.js';
import { defineTool, isRecord, listField, requestTool } from './request-tool.js';

const LIST_ALL = '*';

function ownerName(owner: JsonValue | undefined): JsonValue {
  if (isRecord(owner)) {
    return owner.username ?? owner.name ?? null;
  }
  return owner ?? null;
}

export const getProjectId = defineTool({
  name: 'get_project_id',
  description: 'Look up a project ID by project name. Pass "*" to list every project with its ID.',
  parameters: {
    project_name: {
      type: 'string',
      description: 'Exact project name, or "*" for all projects.',
      required: true,
    },
  },
  run: async (ctx, params) => {
    const projectName = stringParam(params, 'project_name') ?? '';
    const { data } = await ctx.client.get(ctx.client.globalPath('projects'));
    const projects = listField(data, 'projects').filter(isRecord);

    if (projectName === LIST_ALL) {
      const summaries = projects.map(project => ({
        name: project.name ?? null,
        id: project.id ?? null,
        owner: ownerName(project.owner),
      }));
      return ok(`Found ${summaries.length} projects`, { projects: summaries, count: summaries.length });
    }

    const match = projects.find(project => project.name === projectName);
    if (!match) {
      return fail(`No project found with name: ${projectName}`);
    }

    return ok(`Found project '${projectName}'`, {
      project_id: match.id ?? null,
      project_name: match.name ?? null,
      project_info: match,
    });
  },
});

export const listProjects = requestTool({
  name: 'list_projects',
  description: 'List the projects visible to the API key.',
  parameters: {},
  scope: 'global',
  method: 'GET',
  path: 'projects',
  message: (_params, data) => `Found ${listField(data, 'projects').length} projects`,
  result: data => ({ count: listField(data, 'projects').length }),
});

export const getProject = requestTool({
  name: 'get_project',
  description: 'Get details of a project.',
  parameters: {},
  method: 'GET',
  path: '',
  message: 'Project retrieved successfully',
});

export const batchListProjects = requestTool({
  name: 'batch_list_projects',
  description: 'Get several projects by ID in one request.',
  parameters: {
    project_ids: {
      type: 'string',
      format: 'csv',
      description: 'Project IDs to fetch.',
      required: true,
    },
  },
  scope: 'global',
  method: 'POST',
  path: 'projects/batchList',
  body: { project_ids: 'ids' },
  message: (_params, data) => `Retrieved ${listField(data, 'projects').length} projects`,
});

export const updateProject = requestTool({
  name: 'update_project',
  description: 'Update project name, summary, template or visibility. Only the given fields change.',
  parameters: {
    name: { type: 'string', description: 'New project name.' },
    summary: { type: 'string', description: 'Project summary.' },
    template: { type: 'string', description: 'Project template.' },
    public: { type: 'boolean', description: 'Make the project public.' },
    disable_git_repo: { type: 'boolean', description: 'Disable the project git repository.' },
  },
  method: 'PATCH',
  path: '',
  body: ['name', 'summary', 'template', 'public', 'disable_git_repo'],
  message: 'Project updated successfully',
});

export const projectTools: ToolDefinition[] = [
  getProjectId,
  listProjects,
  getProject,
  batchListProjects,
  updateProject,
];
