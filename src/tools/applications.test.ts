import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import {
  getStoredResource,
  resetMockServer,
  seedResource,
  startMockServer,
  stopMockServer,
} from '../testing/mock-workbench-server.js';
import { createTestContext, invokeTool } from '../testing/test-context.js';
import {
  createApplication,
  deleteApplication,
  getApplication,
  listApplications,
  restartApplication,
  stopApplication,
  updateApplication,
} from './applications.js';

describe('application tools', () => {
  beforeAll(() => startMockServer());
  afterEach(() => resetMockServer());
  afterAll(() => stopMockServer());

  it('creates an application with default resources', async () => {
    const result = await invokeTool(createApplication, createTestContext(), {
      name: 'dashboard',
      script: 'app.py',
      subdomain: 'churn-dash',
    });

    expect(result).toMatchObject({ success: true, message: "Application 'dashboard' created successfully" });
    expect(getStoredResource('proj-1', 'applications', String(result.application_id))).toMatchObject({
      name: 'dashboard',
      script: 'app.py',
      subdomain: 'churn-dash',
      kernel: 'python3',
      cpu: 1,
      memory: 1,
      nvidia_gpu: 0,
    });
  });

  it('lists applications with a count', async () => {
    seedResource('proj-1', 'applications', { name: 'a' });
    seedResource('proj-1', 'applications', { name: 'b' });

    const result = await invokeTool(listApplications, createTestContext());

    expect(result).toMatchObject({ success: true, message: 'Found 2 applications', count: 2 });
  });

  it('echoes the application ID on reads', async () => {
    const app = seedResource('proj-1', 'applications', { name: 'dashboard' });
    const result = await invokeTool(getApplication, createTestContext(), { application_id: app.id });
    expect(result).toMatchObject({ success: true, application_id: app.id, data: { name: 'dashboard' } });
  });

  it('updates, stops, restarts and deletes an application', async () => {
    const app = seedResource('proj-1', 'applications', { name: 'dashboard', status: 'running' });
    const ctx = createTestContext();

    const updated = await invokeTool(updateApplication, ctx, { application_id: app.id, memory: '8' });
    expect(updated).toMatchObject({ success: true, data: { memory: 8, name: 'dashboard' } });

    const stopped = await invokeTool(stopApplication, ctx, { application_id: app.id });
    expect(stopped).toMatchObject({ success: true, message: `Application ${app.id} stopped`, data: { status: 'stopped' } });

    const restarted = await invokeTool(restartApplication, ctx, { application_id: app.id });
    expect(restarted).toMatchObject({ success: true, data: { status: 'running' } });

    const deleted = await invokeTool(deleteApplication, ctx, { application_id: app.id });
    expect(deleted).toEqual({ success: true, message: `Application ${app.id} deleted successfully` });
    expect(getStoredResource('proj-1', 'applications', app.id)).toBeUndefined();
  });

  it('reports a missing application', async () => {
    const result = await invokeTool(stopApplication, createTestContext(), { application_id: 'app-x' });
    expect(result).toEqual({
      success: false,
      message: 'API error: app-x not found',
      details: { message: 'app-x not found' },
    });
  });
});
