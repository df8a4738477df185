/**
 * Canned platform data for tests
 */

export const MOCK_HOST = 'https://workbench.example.com';
export const MOCK_API_KEY = 'test-secret';
export const CREATED_AT = '2024-05-01T10:00:00.000Z';

export const mockProjects = [
  {
    id: 'proj-1',
    name: 'churn-model',
    owner: { username: 'analyst' },
    summary: 'Customer churn experiments',
    visibility: 'private',
  },
  {
    id: 'proj-2',
    name: 'forecasting',
    owner: { username: 'planner' },
    summary: 'Demand forecasting',
    visibility: 'organization',
  },
];

export const mockRuntimes = [
  {
    image_identifier: 'registry.example.com/runtimes/python3.10-standard:2024.02',
    edition: 'Standard',
    image_type: 'ml_runtime',
    kernel: 'Python 3.10',
    short_description: 'Standard Python 3.10 runtime',
  },
  {
    image_identifier: 'registry.example.com/runtimes/python3.10-cuda:2024.02',
    edition: 'Nvidia GPU',
    image_type: 'ml_runtime',
    kernel: 'Python 3.10',
    short_description: 'Python 3.10 with CUDA',
  },
];
