// To-do list tools for planning an investigation

import { z } from 'zod';
import { BaseTool } from './base-tool.js';
import type { ToolDefinition, ToolExecutionContext } from './types.js';
import type { TodoItem, TodoStatus } from '../agent/state.js';
import { TODO_STATUSES } from '../agent/state.js';

export const NO_TODOS_MESSAGE = 'No TODOs exist. Use write_todos() first.';

const STATUS_MARKERS: Record<TodoStatus, string> = {
  pending: '[ ]',
  in_progress: '[~]',
  done: '[x]',
};

const todoStatusSchema = z.enum(['pending', 'in_progress', 'done']);

export function renderTodos(todos: readonly TodoItem[]): string {
  return todos.map((todo, idx) => `${idx + 1}. ${STATUS_MARKERS[todo.status]} ${todo.text}`).join('\n');
}

function boundsError(index: number, todos: readonly TodoItem[]): string | undefined {
  if (todos.length === 0) return NO_TODOS_MESSAGE;
  if (index < 1 || index > todos.length) {
    return `Invalid index ${index}. Valid range: 1-${todos.length}`;
  }
  return undefined;
}

const writeTodosSchema = z.object({
  todos: z.array(
    z.union([
      z.string().min(1).transform((text): TodoItem => ({ text, status: 'pending' })),
      z.object({ text: z.string().min(1), status: todoStatusSchema.default('pending') }),
    ])
  ),
});

export class WriteTodosTool extends BaseTool<typeof writeTodosSchema> {
  readonly definition: ToolDefinition = {
    name: 'write_todos',
    description: 'Replace the whole TODO list with a new plan. Call this first to break the request into steps.',
    parameters: {
      type: 'object',
      properties: {
        todos: {
          type: 'array',
          description: 'Plan items: plain strings (pending) or { text, status } with status pending | in_progress | done',
          items: {
            anyOf: [
              { type: 'string' },
              {
                type: 'object',
                properties: {
                  text: { type: 'string' },
                  status: { type: 'string', enum: [...TODO_STATUSES] },
                },
                required: ['text'],
              },
            ],
          },
        },
      },
      required: ['todos'],
    },
  };

  protected readonly schema = writeTodosSchema;

  protected async executeInternal(args: z.infer<typeof writeTodosSchema>, context: ToolExecutionContext): Promise<string> {
    context.state.todos = args.todos.map((todo) => ({ text: todo.text, status: todo.status }));
    if (context.state.todos.length === 0) {
      return 'Cleared the TODO list.';
    }
    return `Created ${context.state.todos.length} TODO items:\n${renderTodos(context.state.todos)}`;
  }
}

const readTodosSchema = z.object({});

export class ReadTodosTool extends BaseTool<typeof readTodosSchema> {
  readonly definition: ToolDefinition = {
    name: 'read_todos',
    description: 'Show the current TODO list with each item\'s status.',
    parameters: {
      type: 'object',
      properties: {},
    },
  };

  protected readonly schema = readTodosSchema;

  protected async executeInternal(_args: z.infer<typeof readTodosSchema>, context: ToolExecutionContext): Promise<string> {
    const { todos } = context.state;
    if (todos.length === 0) {
      return 'No TODOs set yet. Use write_todos() to create a plan.';
    }
    return `Current TODO list (${todos.length} items):\n${renderTodos(todos)}`;
  }
}

const markTodoDoneSchema = z.object({
  index: z.number().int(),
});

export class MarkTodoDoneTool extends BaseTool<typeof markTodoDoneSchema> {
  readonly definition: ToolDefinition = {
    name: 'mark_todo_done',
    description: 'Mark one TODO item as done, by its 1-based index from read_todos.',
    parameters: {
      type: 'object',
      properties: {
        index: { type: 'number', description: '1-based index' },
      },
      required: ['index'],
    },
  };

  protected readonly schema = markTodoDoneSchema;

  protected async executeInternal(args: z.infer<typeof markTodoDoneSchema>, context: ToolExecutionContext): Promise<string> {
    const { todos } = context.state;
    const error = boundsError(args.index, todos);
    if (error) return error;

    const todo = todos[args.index - 1];
    todo.status = 'done';
    return `Marked TODO #${args.index} as done: ${todo.text}`;
  }
}

const updateTodoStatusSchema = z.object({
  index: z.number().int(),
  status: todoStatusSchema,
});

export class UpdateTodoStatusTool extends BaseTool<typeof updateTodoStatusSchema> {
  readonly definition: ToolDefinition = {
    name: 'update_todo_status',
    description: 'Set the status of one TODO item (pending, in_progress or done), by its 1-based index.',
    parameters: {
      type: 'object',
      properties: {
        index: { type: 'number', description: '1-based index' },
        status: { type: 'string', enum: [...TODO_STATUSES] },
      },
      required: ['index', 'status'],
    },
  };

  protected readonly schema = updateTodoStatusSchema;

  protected async executeInternal(args: z.infer<typeof updateTodoStatusSchema>, context: ToolExecutionContext): Promise<string> {
    const { todos } = context.state;
    const error = boundsError(args.index, todos);
    if (error) return error;

    const todo = todos[args.index - 1];
    todo.status = args.status;
    return `TODO #${args.index} is now ${args.status}: ${todo.text}`;
  }
}
