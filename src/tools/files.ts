/**
 * Project file tools: upload (single file or whole folder), list, delete
 * and metadata updates
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { DEFAULT_IGNORED_FOLDERS } from '../constants.js';
import { fail, ok, resolveProjectId, stringParam } from '../envelope.js';
import { ValidationError } from '../errors.js';
import type { ToolDefinition } from '../types/tool.js';
import { PROJECT_ID_PARAM, defineTool, requestTool } from './request-tool.js';
import { statIfExists, walkFiles } from './local-files.js';

/**
 * `dir/name`, or just `name` when the directory is empty after trimming slashes
 */
export function targetPathFor(targetName: string, targetDir: string | undefined): { dir: string; path: string } {
  const dir = (targetDir ?? '').replace(/^\/+|\/+$/g, '');
  return { dir, path: dir ? `${dir}/${targetName}` : targetName };
}

export const uploadFile = defineTool({
  name: 'upload_file',
  description: 'Upload one local file into the project, optionally renamed or placed in a directory.',
  parameters: {
    file_path: { type: 'string', description: 'Local path of the file to upload.', required: true },
    target_name: { type: 'string', description: 'File name in the project. Defaults to the local name.' },
    target_dir: { type: 'string', description: 'Directory in the project. Defaults to the project root.' },
    project_id: PROJECT_ID_PARAM,
  },
  run: async (ctx, params) => {
    const filePath = stringParam(params, 'file_path') ?? '';
    const stats = await statIfExists(filePath);
    if (!stats?.isFile()) {
      throw new ValidationError(`${filePath} is not a valid file`, { file_path: filePath });
    }

    const projectId = resolveProjectId(params, ctx.config);
    const targetName = stringParam(params, 'target_name') ?? path.basename(filePath);
    const target = targetPathFor(targetName, stringParam(params, 'target_dir'));

    const content = await readFile(filePath);
    const { data } = await ctx.client.uploadFile(projectId, target.path, content);

    return ok(`Successfully uploaded file: ${target.path}`, {
      file_path: filePath,
      target_name: targetName,
      target_dir: target.dir,
      target_path: target.path,
      ...(data !== undefined ? { data } : {}),
    });
  },
});

interface FailedUpload {
  file: string;
  error: string;
}

/**
 * Uploads files one at a time with a pause between them. Failed files are
 * collected and the walk continues.
 */
export const uploadFolder = defineTool({
  name: 'upload_folder',
  description: 'Upload every file of a local folder into the project, keeping relative paths.',
  parameters: {
    folder_path: { type: 'string', description: 'Local folder to upload.', required: true },
    ignore_folders: {
      type: 'string',
      format: 'csv',
      description: `Directory names to skip at any depth. Defaults to ${DEFAULT_IGNORED_FOLDERS.join(', ')}.`,
    },
    project_id: PROJECT_ID_PARAM,
  },
  run: async (ctx, params) => {
    const folderPath = stringParam(params, 'folder_path') ?? '';
    const stats = await statIfExists(folderPath);
    if (!stats?.isDirectory()) {
      throw new ValidationError(`${folderPath} is not a valid directory`, { folder_path: folderPath });
    }

    const projectId = resolveProjectId(params, ctx.config);
    const requested = Array.isArray(params.ignore_folders)
      ? params.ignore_folders.filter((name): name is string => typeof name === 'string')
      : [];
    const ignored = new Set(requested.length > 0 ? requested : DEFAULT_IGNORED_FOLDERS);

    const { files, unreadable } = await walkFiles(folderPath, ignored);
    const uploaded: string[] = [];
    const failed: FailedUpload[] = unreadable.map(dir => ({ file: dir.relativePath, error: dir.error }));
    for (const dir of unreadable) {
      ctx.logger.warn('Directory could not be read', { projectId, directory: dir.relativePath, error: dir.error });
    }

    for (const [index, file] of files.entries()) {
      if (index > 0 && ctx.config.uploadDelayMs > 0) {
        await delay(ctx.config.uploadDelayMs);
      }

      try {
        const content = await readFile(file.absolutePath);
        await ctx.client.uploadFile(projectId, file.relativePath, content);
        uploaded.push(file.relativePath);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        ctx.logger.warn('File upload failed', { projectId, file: file.relativePath, error: message });
        failed.push({ file: file.relativePath, error: message });
      }
    }

    const summary = {
      successful_count: uploaded.length,
      failed_count: failed.length,
      results: { success: uploaded, failed },
    };

    if (failed.length > 0) {
      return fail(
        `Upload completed with errors. Successfully uploaded ${uploaded.length} files, failed to upload ${failed.length} files.`,
        summary
      );
    }
    return ok(`Upload completed. Successfully uploaded ${uploaded.length} files.`, summary);
  },
});

export const listProjectFiles = requestTool({
  name: 'list_project_files',
  description: 'List files and directories in the project, at the root or under a path.',
  parameters: {
    path: { type: 'string', description: 'Directory to list. Defaults to the project root.' },
  },
  method: 'GET',
  path: 'files',
  query: ['path'],
  message: 'Successfully listed project files',
});

export const updateProjectFileMetadata = requestTool({
  name: 'update_project_file_metadata',
  description: 'Update the description or hidden flag of a project file.',
  parameters: {
    file_path: { type: 'string', description: 'Path of the file in the project.', required: true },
    description: { type: 'string', description: 'New file description.' },
    hidden: { type: 'boolean', description: 'Hide the file in the project browser.' },
  },
  method: 'PATCH',
  path: 'files',
  query: { file_path: 'path' },
  body: ['description', 'hidden'],
  message: params => `Metadata updated for file ${String(params.file_path)}`,
});

export const deleteProjectFile = requestTool({
  name: 'delete_project_file',
  description: 'Delete a file or directory from the project.',
  parameters: {
    file_path: { type: 'string', description: 'Path of the file in the project.', required: true },
  },
  method: 'DELETE',
  path: 'files',
  query: { file_path: 'path' },
  message: params => `File ${String(params.file_path)} deleted successfully`,
});

export const fileTools: ToolDefinition[] = [
  uploadFile,
  uploadFolder,
  listProjectFiles,
  updateProjectFileMetadata,
  deleteProjectFile,
];
