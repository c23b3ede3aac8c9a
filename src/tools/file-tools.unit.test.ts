import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  symlinkSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { PathEscapeError, ToolExecutionError } from '../errors.js';
import { Logger } from '../utils/logger.js';

import { createFileSystemTools } from './file-tools.js';
import { bindTool } from './tool-factory.js';
import type { Tool } from './types.js';
import { WorkspaceSandbox } from './workspace.js';

describe('file-system tools', () => {
  let baseDir: string;
  let root: string;
  let tools: Tool[];

  function toolNamed(name: string): Tool {
    const found = tools.find((tool) => tool.name === name);
    if (!found) {
      throw new Error(`missing tool ${name}`);
    }
    return found;
  }

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'file-tools-test-'));
    root = join(baseDir, 'workspace');
    mkdirSync(root);
    tools = createFileSystemTools(new WorkspaceSandbox(root)).map((spec) =>
      bindTool(spec, 'fs', Logger.silent()),
    );
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
  });

  it('defines readFile, writeFile and listFiles in that order', () => {
    expect(tools.map((tool) => [tool.kind, tool.name, tool.usage])).toEqual([
      ['file-read', 'readFile', 'readFile(path)'],
      ['file-write', 'writeFile', 'writeFile(path, content)'],
      ['file-list', 'listFiles', 'listFiles(directory = ".")'],
    ]);
  });

  describe('writeFile / readFile', () => {
    it('writes a file, creating directories, and reads it back', async () => {
      // When writing into a nested path
      const written = await toolNamed('writeFile').invoke({ path: 'notes/plan.md', content: 'step 1' });

      // Then the file should exist on disk and read back unchanged
      expect(written).toEqual({ ok: true, text: 'File written successfully: notes/plan.md' });
      expect(readFileSync(join(root, 'notes', 'plan.md'), 'utf-8')).toBe('step 1');
      await expect(toolNamed('readFile').invoke({ path: 'notes/plan.md' })).resolves.toEqual({
        ok: true,
        text: 'step 1',
      });
    });

    it('overwrites existing content', async () => {
      // Given an existing file
      writeFileSync(join(root, 'a.txt'), 'old');

      // When writing new content
      await toolNamed('writeFile').invoke({ path: 'a.txt', content: 'new' });

      // Then only the new content should remain
      expect(readFileSync(join(root, 'a.txt'), 'utf-8')).toBe('new');
    });

    it('reports a missing file as text', async () => {
      await expect(toolNamed('readFile').invoke({ path: 'nope.txt' })).resolves.toEqual({
        ok: true,
        text: 'File not found: nope.txt',
      });
    });

    it('fails softly when reading a directory', async () => {
      // Given a directory
      mkdirSync(join(root, 'notes'));

      // When reading it
      const outcome = await toolNamed('readFile').invoke({ path: 'notes' });

      // Then a failed outcome with the action prefix should be returned
      expect(outcome.ok).toBe(false);
      expect(outcome.text).toBe('Error reading file: notes is a directory');
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(ToolExecutionError);
      }
    });
  });

  describe('listFiles', () => {
    it('lists the workspace root sorted by name by default', async () => {
      // Given files and a directory
      writeFileSync(join(root, 'b.txt'), '');
      writeFileSync(join(root, 'a.txt'), '');
      mkdirSync(join(root, 'notes'));

      // When listing without arguments
      const outcome = await toolNamed('listFiles').invoke({});

      // Then names should be sorted
      expect(outcome).toEqual({ ok: true, text: 'Files in .: a.txt, b.txt, notes' });
    });

    it('marks an empty directory', async () => {
      mkdirSync(join(root, 'empty'));
      await expect(toolNamed('listFiles').invoke({ directory: 'empty' })).resolves.toEqual({
        ok: true,
        text: 'Files in empty: (empty)',
      });
    });

    it('reports missing directories and files as not found', async () => {
      writeFileSync(join(root, 'a.txt'), '');
      await expect(toolNamed('listFiles').invoke({ directory: 'missing' })).resolves.toEqual({
        ok: true,
        text: 'Directory not found: missing',
      });
      await expect(toolNamed('listFiles').invoke({ directory: 'a.txt' })).resolves.toEqual({
        ok: true,
        text: 'Directory not found: a.txt',
      });
    });
  });

  describe('containment', () => {
    it('refuses to write outside the workspace', async () => {
      // When writing through a parent traversal
      const outcome = await toolNamed('writeFile').invoke({ path: '../escaped.txt', content: 'x' });

      // Then nothing should be written and the failure should say why
      expect(outcome.ok).toBe(false);
      expect(outcome.text).toBe('Error writing file: Path escapes workspace: ../escaped.txt');
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(PathEscapeError);
      }
      expect(existsSync(join(baseDir, 'escaped.txt'))).toBe(false);
    });

    it('refuses to write through a dangling symlink that points outside', async () => {
      // Given a workspace link to a file outside that does not exist yet
      symlinkSync('../outside.txt', join(root, 'link.txt'));

      // When writing to the link
      const outcome = await toolNamed('writeFile').invoke({ path: 'link.txt', content: 'escaped' });

      // Then the write should be refused and no file created outside
      expect(outcome.text).toBe('Error writing file: Path escapes workspace: link.txt');
      expect(existsSync(join(baseDir, 'outside.txt'))).toBe(false);
    });

    it('refuses to read outside the workspace', async () => {
      // Given a file next to the workspace
      writeFileSync(join(baseDir, 'secret.txt'), 'test-secret');

      // When reading it by relative and absolute path
      const relative = await toolNamed('readFile').invoke({ path: '../secret.txt' });
      const absolute = await toolNamed('readFile').invoke({ path: join(baseDir, 'secret.txt') });

      // Then both should fail without revealing content
      expect(relative.ok).toBe(false);
      expect(absolute.ok).toBe(false);
      expect(relative.text).toBe('Error reading file: Path escapes workspace: ../secret.txt');
    });

    it('refuses to list outside the workspace', async () => {
      const outcome = await toolNamed('listFiles').invoke({ directory: '..' });
      expect(outcome).toMatchObject({ ok: false, text: 'Error listing files: Path escapes workspace: ..' });
    });
  });

  describe('argument validation', () => {
    it('fails softly on missing arguments', async () => {
      await expect(toolNamed('writeFile').invoke({ path: 'a.txt' })).resolves.toMatchObject({
        ok: false,
        text: 'Error writing file: Invalid arguments: content: Required',
      });
      await expect(toolNamed('readFile').invoke(undefined)).resolves.toMatchObject({
        ok: false,
        text: 'Error reading file: Invalid arguments: path: Required',
      });
    });

    it('fails softly on wrong argument types', async () => {
      await expect(toolNamed('readFile').invoke({ path: 42 })).resolves.toMatchObject({
        ok: false,
        text: 'Error reading file: Invalid arguments: path: Expected string, received number',
      });
    });
  });
});
