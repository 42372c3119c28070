// Base Tool abstract class with Zod validation

import { z } from 'zod';
import type { Tool, ToolDefinition, ToolExecutionContext, ToolExecutionResult } from './types.js';
import { formatUserError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Render a tool failure for the model. Validation problems list each field;
 * everything else goes through the user-facing error format.
 */
export function formatToolError(error: unknown): string {
  if (error instanceof z.ZodError) {
    const fieldErrors = error.errors.map(err => {
      const field = err.path.join('.') || '(arguments)';
      return `  - ${field}: ${err.message}`;
    }).join('\n');
    return `Validation error:\n${fieldErrors}`;
  }
  return formatUserError(error);
}

export abstract class BaseTool<TSchema extends z.ZodTypeAny = z.ZodTypeAny> implements Tool {
  abstract readonly definition: ToolDefinition;
  protected abstract readonly schema: TSchema;

  async execute(args: unknown, context: ToolExecutionContext): Promise<ToolExecutionResult> {
    try {
      // Validate arguments
      const validatedArgs: z.infer<TSchema> = this.schema.parse(args ?? {});

      // Execute tool logic
      const result = await this.executeInternal(validatedArgs, context);

      return {
        success: true,
        output: result,
      };
    } catch (error) {
      logger.child(this.definition.name).debug(`failed: ${getErrorMessage(error)}`);
      return {
        success: false,
        error: formatToolError(error),
      };
    }
  }

  protected abstract executeInternal(args: z.infer<TSchema>, context: ToolExecutionContext): Promise<string>;
}
