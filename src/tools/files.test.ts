import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { chmod, mkdir, mkdtemp, readdir, rm, symlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { http, HttpResponse } from 'msw';
import {
  MOCK_HOST,
  getUploads,
  mockServer,
  resetMockServer,
  startMockServer,
  stopMockServer,
  trackRequests,
} from '../testing/mock-workbench-server.js';
import { createTestContext, invokeTool } from '../testing/test-context.js';
import {
  deleteProjectFile,
  listProjectFiles,
  targetPathFor,
  updateProjectFileMetadata,
  uploadFile,
  uploadFolder,
} from './files.js';
import { walkFiles, type ReadDirectory } from './local-files.js';

let workDir: string;

beforeAll(async () => {
  startMockServer();
  workDir = await mkdtemp(path.join(tmpdir(), 'workbench-files-'));

  await writeFile(path.join(workDir, 'report.csv'), 'a,b\n1,2\n');

  const folder = path.join(workDir, 'project');
  await mkdir(path.join(folder, 'src'), { recursive: true });
  await mkdir(path.join(folder, 'node_modules', 'pkg'), { recursive: true });
  await writeFile(path.join(folder, 'a.txt'), 'alpha');
  await writeFile(path.join(folder, 'src', 'main.py'), 'print(1)\n');
  await writeFile(path.join(folder, 'node_modules', 'pkg', 'index.js'), 'module.exports = {};\n');

  const linked = path.join(workDir, 'linked');
  await mkdir(linked);
  await writeFile(path.join(linked, 'real.txt'), 'real');
  await symlink(path.join(linked, 'real.txt'), path.join(linked, 'link.txt'));
  await symlink(path.join(folder, 'src'), path.join(linked, 'dirlink'));
});

afterEach(() => resetMockServer());

afterAll(async () => {
  stopMockServer();
  await rm(workDir, { recursive: true, force: true });
});

describe('targetPathFor', () => {
  it('joins directory and name without stray slashes', () => {
    expect(targetPathFor('report.csv', '/data/raw/')).toEqual({ dir: 'data/raw', path: 'data/raw/report.csv' });
    expect(targetPathFor('report.csv', undefined)).toEqual({ dir: '', path: 'report.csv' });
    expect(targetPathFor('report.csv', '///')).toEqual({ dir: '', path: 'report.csv' });
  });
});

describe('walkFiles', () => {
  it('walks in name order and skips ignored directories', async () => {
    const { files, unreadable } = await walkFiles(path.join(workDir, 'project'), new Set(['node_modules']));
    expect(files.map(file => file.relativePath)).toEqual(['a.txt', 'src/main.py']);
    expect(unreadable).toEqual([]);
  });

  it('lists symlinked files without following symlinked directories', async () => {
    const { files } = await walkFiles(path.join(workDir, 'linked'), new Set());
    expect(files.map(file => file.relativePath)).toEqual(['link.txt', 'real.txt']);
  });

  it('reports a directory it cannot read and keeps walking', async () => {
    const root = path.join(workDir, 'project');
    const readDir: ReadDirectory = async dir => {
      if (dir === path.join(root, 'src')) {
        throw new Error('EACCES: permission denied');
      }
      return readdir(dir, { withFileTypes: true });
    };

    const { files, unreadable } = await walkFiles(root, new Set(['node_modules']), readDir);

    expect(files.map(file => file.relativePath)).toEqual(['a.txt']);
    expect(unreadable).toEqual([{ relativePath: 'src', error: 'EACCES: permission denied' }]);
  });
});

describe('upload_file', () => {
  it('uploads into the target directory', async () => {
    const source = path.join(workDir, 'report.csv');

    const result = await invokeTool(uploadFile, createTestContext(), { file_path: source, target_dir: '/data/' });

    expect(result).toEqual({
      success: true,
      message: 'Successfully uploaded file: data/report.csv',
      file_path: source,
      target_name: 'report.csv',
      target_dir: 'data',
      target_path: 'data/report.csv',
    });
    expect(getUploads()).toEqual([{ projectId: 'proj-1', path: 'data/report.csv', content: 'a,b\n1,2\n' }]);
  });

  it('renames the file when a target name is given', async () => {
    const result = await invokeTool(uploadFile, createTestContext(), {
      file_path: path.join(workDir, 'report.csv'),
      target_name: 'latest.csv',
    });

    expect(result).toMatchObject({ success: true, target_path: 'latest.csv', target_dir: '' });
  });

  it('refuses paths that are not files, without a request', async () => {
    const missing = path.join(workDir, 'nope.csv');
    const tracker = trackRequests();

    const result = await invokeTool(uploadFile, createTestContext(), { file_path: missing });
    const directory = await invokeTool(uploadFile, createTestContext(), { file_path: workDir });
    tracker.stop();

    expect(result).toEqual({ success: false, message: `${missing} is not a valid file` });
    expect(directory).toEqual({ success: false, message: `${workDir} is not a valid file` });
    expect(tracker.requests).toEqual([]);
  });
});

describe('upload_folder', () => {
  it('uploads every file outside the default ignored folders', async () => {
    const result = await invokeTool(uploadFolder, createTestContext(), { folder_path: path.join(workDir, 'project') });

    expect(result).toEqual({
      success: true,
      message: 'Upload completed. Successfully uploaded 2 files.',
      successful_count: 2,
      failed_count: 0,
      results: { success: ['a.txt', 'src/main.py'], failed: [] },
    });
    expect(getUploads().map(upload => upload.path)).toEqual(['a.txt', 'src/main.py']);
  });

  it('replaces the ignored folders when given', async () => {
    const result = await invokeTool(uploadFolder, createTestContext(), {
      folder_path: path.join(workDir, 'project'),
      ignore_folders: 'src',
    });

    expect(result.results).toEqual({ success: ['a.txt', 'node_modules/pkg/index.js'], failed: [] });
  });

  it('reports files that failed and keeps going', async () => {
    mockServer.use(
      http.put(`${MOCK_HOST}/api/v2/projects/proj-1/files`, async ({ request }) => {
        const form = await request.formData();
        if (form.has('a.txt')) {
          return HttpResponse.json({ message: 'quota exceeded' }, { status: 507 });
        }
        return new HttpResponse(null, { status: 204 });
      })
    );

    const result = await invokeTool(uploadFolder, createTestContext(), { folder_path: path.join(workDir, 'project') });

    expect(result).toEqual({
      success: false,
      message: 'Upload completed with errors. Successfully uploaded 1 files, failed to upload 1 files.',
      successful_count: 1,
      failed_count: 1,
      results: {
        success: ['src/main.py'],
        failed: [{ file: 'a.txt', error: 'API error: quota exceeded' }],
      },
    });
  });

  it('uploads symlinked files', async () => {
    const tracker = trackRequests();
    const result = await invokeTool(uploadFolder, createTestContext(), { folder_path: path.join(workDir, 'linked') });
    tracker.stop();

    expect(result).toMatchObject({
      success: true,
      successful_count: 2,
      results: { success: ['link.txt', 'real.txt'], failed: [] },
    });
    expect(tracker.requests).toHaveLength(2);
    expect(getUploads().map(upload => upload.content)).toEqual(['real', 'real']);
  });

  // root reads any directory regardless of its mode
  it.skipIf(process.getuid?.() === 0)('counts an unreadable directory as a failure', async () => {
    const folder = await mkdtemp(path.join(workDir, 'locked-'));
    await writeFile(path.join(folder, 'ok.txt'), 'ok');
    await mkdir(path.join(folder, 'secret'));
    await writeFile(path.join(folder, 'secret', 'hidden.txt'), 'hidden');
    await chmod(path.join(folder, 'secret'), 0o000);

    try {
      const result = await invokeTool(uploadFolder, createTestContext(), { folder_path: folder });

      expect(result).toMatchObject({
        success: false,
        successful_count: 1,
        failed_count: 1,
        results: { success: ['ok.txt'] },
      });
    } finally {
      await chmod(path.join(folder, 'secret'), 0o755);
    }
  });

  it('refuses a path that is not a directory', async () => {
    const file = path.join(workDir, 'report.csv');
    const result = await invokeTool(uploadFolder, createTestContext(), { folder_path: file });
    expect(result).toEqual({ success: false, message: `${file} is not a valid directory` });
  });
});

describe('project file tools', () => {
  it('lists, annotates and deletes uploaded files', async () => {
    const ctx = createTestContext();
    await invokeTool(uploadFile, ctx, { file_path: path.join(workDir, 'report.csv'), target_dir: 'data' });

    const listed = await invokeTool(listProjectFiles, ctx, { path: 'data' });
    expect(listed).toEqual({
      success: true,
      message: 'Successfully listed project files',
      data: { files: [{ path: 'data/report.csv', file_size: '8', is_dir: false }] },
    });

    const tracker = trackRequests();
    const updated = await invokeTool(updateProjectFileMetadata, ctx, {
      file_path: 'data/report.csv',
      description: 'Quarterly numbers',
      hidden: 'false',
    });
    tracker.stop();
    expect(updated).toEqual({
      success: true,
      message: 'Metadata updated for file data/report.csv',
      data: {
        path: 'data/report.csv',
        file_size: '8',
        is_dir: false,
        description: 'Quarterly numbers',
        hidden: false,
      },
    });
    expect(tracker.requests).toEqual([
      'PATCH https://workbench.example.com/api/v2/projects/proj-1/files?path=data%2Freport.csv',
    ]);

    const deleted = await invokeTool(deleteProjectFile, ctx, { file_path: 'data/report.csv' });
    expect(deleted).toEqual({
      success: true,
      message: 'File data/report.csv deleted successfully',
      data: {},
    });
    expect(getUploads()).toEqual([]);
  });

  it('needs the file path to update metadata', async () => {
    const result = await invokeTool(updateProjectFileMetadata, createTestContext(), { hidden: 'true' });
    expect(result).toEqual({ success: false, message: 'Missing required parameters: file_path' });
  });

  it('surfaces a missing file on delete', async () => {
    const result = await invokeTool(deleteProjectFile, createTestContext(), { file_path: 'ghost.txt' });
    expect(result).toEqual({
      success: false,
      message: 'API error: file ghost.txt not found',
      details: { message: 'file ghost.txt not found' },
    });
  });
});
