// Shared state for one investigation: transcript, virtual files, to-dos

import type { ChatMessage } from '../llm/types.js';

export type TodoStatus = 'pending' | 'in_progress' | 'done';

export const TODO_STATUSES: readonly TodoStatus[] = ['pending', 'in_progress', 'done'];

export interface TodoItem {
  text: string;
  status: TodoStatus;
}

/** Filename → content. Keys are unique by construction. */
export type FileTable = Record<string, string>;

export interface SharedState {
  /** Append-only; see appendMessages */
  messages: ChatMessage[];
  files: FileTable;
  todos: TodoItem[];
  /** "owner/name" */
  currentRepo: string | null;
  issueUrl: string | null;
}

export function createInitialState(overrides: Partial<SharedState> = {}): SharedState {
  return {
    messages: overrides.messages ? [...overrides.messages] : [],
    files: overrides.files ? { ...overrides.files } : {},
    todos: overrides.todos ? overrides.todos.map((todo) => ({ ...todo })) : [],
    currentRepo: overrides.currentRepo ?? null,
    issueUrl: overrides.issueUrl ?? null,
  };
}

/**
 * Messages reducer: new turns are concatenated, never substituted.
 */
export function appendMessages(state: SharedState, turns: ChatMessage[]): SharedState {
  state.messages.push(...turns);
  return state;
}

/**
 * Frozen shallow copy of a file table, as seen by a sub-agent at spawn.
 */
export function snapshotFiles(files: FileTable): Readonly<FileTable> {
  return Object.freeze({ ...files });
}

/**
 * Right-biased key-wise union: every key in `delta` lands in `parent` with
 * the delta's content; keys absent from `delta` are left alone.
 */
export function mergeFiles(parent: FileTable, delta: Readonly<FileTable>): FileTable {
  for (const [name, content] of Object.entries(delta)) {
    parent[name] = content;
  }
  return parent;
}

/**
 * Keys of `current` that are new or changed relative to `base`.
 */
export function diffFiles(base: Readonly<FileTable>, current: Readonly<FileTable>): FileTable {
  const delta: FileTable = {};
  for (const [name, content] of Object.entries(current)) {
    if (!Object.prototype.hasOwnProperty.call(base, name) || base[name] !== content) {
      delta[name] = content;
    }
  }
  return delta;
}

/**
 * Isolated state for a sub-agent: the task as its only message, a private
 * copy of the snapshot, no inherited plan.
 */
export function createSubAgentState(parent: SharedState, task: string, snapshot?: Readonly<FileTable>): SharedState {
  return {
    messages: [{ role: 'user', content: task }],
    files: { ...(snapshot ?? parent.files) },
    todos: [],
    currentRepo: parent.currentRepo,
    issueUrl: parent.issueUrl,
  };
}

export function getLastAssistantMessage(messages: readonly ChatMessage[]): string | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message.role === 'assistant' && message.content.trim()) {
      return message.content;
    }
  }
  return undefined;
}
