import type { ToolDefinition } from '../types/tool.js';
import { applicationTools } from './applications.js';
import { experimentRunTools } from './experiment-runs.js';
import { experimentTools } from './experiments.js';
import { fileTools } from './files.js';
import { jobRunTools } from './job-runs.js';
import { jobTools } from './jobs.js';
import { modelBuildTools } from './model-builds.js';
import { modelDeploymentTools } from './model-deployments.js';
import { modelTools } from './models.js';
import { projectTools } from './projects.js';
import { runtimeTools } from './runtimes.js';

/**
 * Every tool the server exposes, in listing order
 */
export const allTools: ToolDefinition[] = [
  ...projectTools,
  ...runtimeTools,
  ...jobTools,
  ...jobRunTools,
  ...experimentTools,
  ...experimentRunTools,
  ...modelTools,
  ...modelBuildTools,
  ...modelDeploymentTools,
  ...applicationTools,
  ...fileTools,
];
