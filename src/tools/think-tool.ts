// Reflection checkpoint

import { z } from 'zod';
import { BaseTool } from './base-tool.js';
import type { ToolDefinition } from './types.js';

export const REFLECTION_PREVIEW_CHARS = 100;

const thinkSchema = z.object({
  reflection: z.string().min(1),
});

export class ThinkTool extends BaseTool<typeof thinkSchema> {
  readonly definition: ToolDefinition = {
    name: 'think_tool',
    description: `Pause and reflect on progress. Use after search results or before deciding next steps:
what did I find, what is still missing, is it enough to answer?`,
    parameters: {
      type: 'object',
      properties: {
        reflection: { type: 'string', description: 'Findings, gaps and the next decision' },
      },
      required: ['reflection'],
    },
  };

  protected readonly schema = thinkSchema;

  protected async executeInternal(args: z.infer<typeof thinkSchema>): Promise<string> {
    const preview = args.reflection.length > REFLECTION_PREVIEW_CHARS
      ? `${args.reflection.slice(0, REFLECTION_PREVIEW_CHARS)}...`
      : args.reflection;
    return `Reflection recorded: ${preview}`;
  }
}
