/**
 * File-system tools scoped to the workspace sandbox.
 *
 * Missing files and directories are reported as plain outcomes rather than
 * failures; anything else that goes wrong is left to the soft-fail boundary.
 */

import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { z } from 'zod';

import { ToolExecutionError } from '../errors.js';

import { defineTool } from './tool-factory.js';
import type { ToolSpec } from './types.js';
import { isNotFound, type WorkspaceSandbox } from './workspace.js';

export const ReadFileParams = z.object({
  path: z.string().min(1).describe('File path relative to the workspace'),
});

export const WriteFileParams = z.object({
  path: z.string().min(1).describe('File path relative to the workspace'),
  content: z.string().describe('Full file content; replaces any existing content'),
});

export const ListFilesParams = z.object({
  directory: z.string().min(1).default('.').describe('Directory relative to the workspace'),
});

async function statOrUndefined(target: string) {
  try {
    return await stat(target);
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}

export function createFileSystemTools(sandbox: WorkspaceSandbox): ToolSpec[] {
  const readFileTool = defineTool({
    kind: 'file-read',
    description: 'Read the contents of a file in the workspace',
    usage: 'readFile(path)',
    failurePrefix: 'Error reading file',
    parameters: ReadFileParams,
    execute: async ({ path }) => {
      const target = await sandbox.resolveForIo(path);
      const stats = await statOrUndefined(target);
      if (!stats) {
        return `File not found: ${path}`;
      }
      if (stats.isDirectory()) {
        throw new ToolExecutionError('readFile', `${path} is a directory`);
      }
      return readFile(target, 'utf-8');
    },
  });

  const writeFileTool = defineTool({
    kind: 'file-write',
    description: 'Write content to a file in the workspace, creating directories as needed',
    usage: 'writeFile(path, content)',
    failurePrefix: 'Error writing file',
    parameters: WriteFileParams,
    execute: async ({ path, content }) => {
      const target = await sandbox.resolveForIo(path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, 'utf-8');
      return `File written successfully: ${path}`;
    },
  });

  const listFilesTool = defineTool({
    kind: 'file-list',
    description: 'List the entries of a workspace directory',
    usage: 'listFiles(directory = ".")',
    failurePrefix: 'Error listing files',
    parameters: ListFilesParams,
    execute: async ({ directory }) => {
      const target = await sandbox.resolveForIo(directory);
      const stats = await statOrUndefined(target);
      if (!stats || !stats.isDirectory()) {
        return `Directory not found: ${directory}`;
      }
      const names = (await readdir(target)).sort();
      return `Files in ${directory}: ${names.length > 0 ? names.join(', ') : '(empty)'}`;
    },
  });

  return [readFileTool, writeFileTool, listFilesTool];
}
