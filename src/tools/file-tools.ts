// Virtual file system tools: ls, read_file, write_file

import { z } from 'zod';
import { BaseTool } from './base-tool.js';
import type { ToolDefinition, ToolExecutionContext } from './types.js';

export const EMPTY_FILE_SYSTEM_MESSAGE = 'File system is empty. No files created yet.';

function formatSize(content: string): string {
  return `${(Buffer.byteLength(content, 'utf-8') / 1024).toFixed(1)} KB`;
}

const lsSchema = z.object({});

export class ListVirtualFilesTool extends BaseTool<typeof lsSchema> {
  readonly definition: ToolDefinition = {
    name: 'ls',
    description: 'List every file in the shared virtual file system (search results, issue dumps, notes) with its size.',
    parameters: {
      type: 'object',
      properties: {},
    },
  };

  protected readonly schema = lsSchema;

  protected async executeInternal(_args: z.infer<typeof lsSchema>, context: ToolExecutionContext): Promise<string> {
    const names = Object.keys(context.state.files).sort();
    if (names.length === 0) {
      return EMPTY_FILE_SYSTEM_MESSAGE;
    }

    const lines = [`Virtual file system (${names.length} file${names.length === 1 ? '' : 's'}):`];
    for (const name of names) {
      lines.push(`  ${name} (${formatSize(context.state.files[name])})`);
    }
    lines.push('', "Use read_file('filename') to view contents.");
    return lines.join('\n');
  }
}

const readFileSchema = z.object({
  filename: z.string().min(1),
});

export class ReadVirtualFileTool extends BaseTool<typeof readFileSchema> {
  readonly definition: ToolDefinition = {
    name: 'read_file',
    description: 'Read a file from the shared virtual file system. Use ls to see what exists.',
    parameters: {
      type: 'object',
      properties: {
        filename: { type: 'string', description: 'Exact filename as shown by ls' },
      },
      required: ['filename'],
    },
  };

  protected readonly schema = readFileSchema;

  protected async executeInternal(args: z.infer<typeof readFileSchema>, context: ToolExecutionContext): Promise<string> {
    const { files } = context.state;
    if (!Object.prototype.hasOwnProperty.call(files, args.filename)) {
      const available = Object.keys(files).sort();
      if (available.length === 0) {
        return `File '${args.filename}' not found. ${EMPTY_FILE_SYSTEM_MESSAGE}`;
      }
      return `File '${args.filename}' not found.\n\nAvailable files:\n${available.map((name) => `  - ${name}`).join('\n')}`;
    }
    return `# ${args.filename}\n\n${files[args.filename]}`;
  }
}

const writeFileSchema = z.object({
  filename: z.string().min(1),
  content: z.string(),
});

export class WriteVirtualFileTool extends BaseTool<typeof writeFileSchema> {
  readonly definition: ToolDefinition = {
    name: 'write_file',
    description: 'Create or overwrite a file in the shared virtual file system, e.g. to save findings for the final report.',
    parameters: {
      type: 'object',
      properties: {
        filename: { type: 'string', description: 'Filename, e.g. "findings.md"' },
        content: { type: 'string', description: 'Full file content' },
      },
      required: ['filename', 'content'],
    },
  };

  protected readonly schema = writeFileSchema;

  protected async executeInternal(args: z.infer<typeof writeFileSchema>, context: ToolExecutionContext): Promise<string> {
    const { files } = context.state;
    const isNew = !Object.prototype.hasOwnProperty.call(files, args.filename);
    files[args.filename] = args.content;
    return `${isNew ? 'Created' : 'Updated'} file: ${args.filename} (${formatSize(args.content)})`;
  }
}
