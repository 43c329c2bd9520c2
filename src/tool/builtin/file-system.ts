// pattern: Imperative Shell

/**
 * File operations confined to one root directory.
 * Every path the model supplies is resolved against the root; anything that
 * resolves outside it is refused before the filesystem is touched.
 */

import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { Stats } from 'node:fs';
import type { Tool, ToolExecutionResult } from '../types.js';
import { errorMessage, toolFailure, toolSuccess } from '../contract.js';

export const FILE_SYSTEM_TOOL_NAME = 'file_system';

const FILE_ACTIONS = ['create_file', 'read_file', 'edit_file', 'delete_file', 'list_files'] as const;

type FileAction = (typeof FILE_ACTIONS)[number];

export type FileSystemToolOptions = {
  readonly root: string;
};

export type FileEntry = {
  name: string;
  path: string;
  is_dir: boolean;
  size_bytes: number | null;
  modified: number;
};

function isFileAction(value: unknown): value is FileAction {
  return typeof value === 'string' && FILE_ACTIONS.some((action) => action === value);
}

function stringParam(params: Record<string, unknown>, name: string): string | undefined {
  const value = params[name];
  return typeof value === 'string' ? value : undefined;
}

/** Translate a `*` / `?` file pattern into an anchored regular expression. */
export function patternToRegExp(pattern: string): RegExp {
  let source = '';
  for (const char of pattern) {
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function statIfExists(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (error) {
    if (isMissing(error)) {
      return undefined;
    }
    throw error;
  }
}

export function createFileSystemTool(options: FileSystemToolOptions): Tool {
  const root = resolve(options.root);

  // Returns undefined for paths that escape the root.
  function confine(path: string): { absolute: string; display: string } | undefined {
    const absolute = resolve(root, path);
    const rel = relative(root, absolute);
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      return undefined;
    }
    return { absolute, display: rel === '' ? '.' : rel };
  }

  const fail = (error: string): ToolExecutionResult => toolFailure(FILE_SYSTEM_TOOL_NAME, error);
  const ok = (result: Record<string, unknown>): ToolExecutionResult =>
    toolSuccess(FILE_SYSTEM_TOOL_NAME, result);

  async function createFile(params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const filePath = stringParam(params, 'file_path');
    if (filePath === undefined) {
      return fail('file_path required');
    }
    const target = confine(filePath);
    if (!target) {
      return fail(`path is outside the allowed root: ${filePath}`);
    }

    await mkdir(dirname(target.absolute), { recursive: true });
    await writeFile(target.absolute, stringParam(params, 'content') ?? '', 'utf-8');
    const info = await stat(target.absolute);

    return ok({ file_path: target.display, size_bytes: info.size, message: 'File created successfully' });
  }

  async function readFileAction(params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const filePath = stringParam(params, 'file_path');
    if (filePath === undefined) {
      return fail('file_path required');
    }
    const target = confine(filePath);
    if (!target) {
      return fail(`path is outside the allowed root: ${filePath}`);
    }

    const info = await statIfExists(target.absolute);
    if (!info) {
      return fail(`File not found: ${target.display}`);
    }
    if (!info.isFile()) {
      return fail(`Not a file: ${target.display}`);
    }

    const content = await readFile(target.absolute, 'utf-8');
    return ok({ file_path: target.display, content, size_bytes: info.size });
  }

  async function editFile(params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const filePath = stringParam(params, 'file_path');
    const content = stringParam(params, 'content');
    if (filePath === undefined || content === undefined) {
      return fail('file_path and content required');
    }
    const target = confine(filePath);
    if (!target) {
      return fail(`path is outside the allowed root: ${filePath}`);
    }

    if (!(await statIfExists(target.absolute))) {
      return fail(`File not found: ${target.display}`);
    }

    await writeFile(target.absolute, content, 'utf-8');
    const info = await stat(target.absolute);
    return ok({ file_path: target.display, size_bytes: info.size, message: 'File edited successfully' });
  }

  async function deleteFile(params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const filePath = stringParam(params, 'file_path');
    if (filePath === undefined) {
      return fail('file_path required');
    }
    const target = confine(filePath);
    if (!target) {
      return fail(`path is outside the allowed root: ${filePath}`);
    }
    if (target.absolute === root) {
      return fail('refusing to delete the root directory');
    }

    const info = await statIfExists(target.absolute);
    if (!info) {
      return fail(`File not found: ${target.display}`);
    }

    const isDir = info.isDirectory();
    await rm(target.absolute, { recursive: isDir });
    return ok({
      file_path: target.display,
      message: isDir ? 'Directory deleted successfully' : 'File deleted successfully',
    });
  }

  async function listFiles(params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const directory = stringParam(params, 'directory') ?? '.';
    const pattern = stringParam(params, 'pattern') ?? '*';
    const target = confine(directory);
    if (!target) {
      return fail(`path is outside the allowed root: ${directory}`);
    }

    const info = await statIfExists(target.absolute);
    if (!info) {
      return fail(`Directory not found: ${target.display}`);
    }
    if (!info.isDirectory()) {
      return fail(`Not a directory: ${target.display}`);
    }

    const matcher = patternToRegExp(pattern);
    const names = (await readdir(target.absolute)).filter((name) => matcher.test(name)).sort();

    const files: Array<FileEntry> = [];
    for (const name of names) {
      const absolute = join(target.absolute, name);
      const entry = await stat(absolute);
      files.push({
        name,
        path: relative(root, absolute),
        is_dir: entry.isDirectory(),
        size_bytes: entry.isFile() ? entry.size : null,
        modified: entry.mtimeMs / 1000,
      });
    }

    return ok({ directory: target.display, pattern, files, count: files.length });
  }

  const handlers: Record<FileAction, (params: Record<string, unknown>) => Promise<ToolExecutionResult>> = {
    create_file: createFile,
    read_file: readFileAction,
    edit_file: editFile,
    delete_file: deleteFile,
    list_files: listFiles,
  };

  return {
    definition: {
      name: FILE_SYSTEM_TOOL_NAME,
      description:
        'Manage files in the workspace: create, read, edit and delete files, and list a directory. ' +
        'Paths are relative to the workspace root.',
      parameters_schema: {
        type: 'object',
        properties: {
          action: {
            type: 'string',
            enum: FILE_ACTIONS,
            description: 'The file action to perform',
          },
          file_path: {
            type: 'string',
            description: 'Path of the file, relative to the workspace root (required for file actions)',
          },
          content: {
            type: 'string',
            description: 'File content (for create_file and edit_file)',
          },
          directory: {
            type: 'string',
            description: 'Directory to list (for list_files, default the workspace root)',
          },
          pattern: {
            type: 'string',
            description: "Name pattern with * and ? wildcards (for list_files, e.g. '*.txt')",
          },
        },
        required: ['action'],
      },
    },

    async execute(params) {
      const action = params['action'];
      if (!isFileAction(action)) {
        return fail(`Unknown action: ${String(action)}`);
      }

      try {
        return await handlers[action](params);
      } catch (error) {
        return fail(`Error executing ${action}: ${errorMessage(error)}`);
      }
    },
  };
}
