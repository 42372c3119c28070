// Which tools an agent may call

import type { ToolDefinition, ToolName } from '../tools/types.js';

/**
 * Built from an optional list of tool names: no list lifts every
 * restriction, an empty list allows nothing.
 */
export class ToolAllowlist {
  private readonly names: ReadonlySet<string> | null;

  constructor(allowedTools?: readonly ToolName[]) {
    this.names = allowedTools === undefined ? null : new Set<string>(allowedTools);
  }

  get restricted(): boolean {
    return this.names !== null;
  }

  allows(toolName: string): boolean {
    return this.names === null || this.names.has(toolName);
  }

  /** Definitions the model is shown, in registry order */
  filter(definitions: ToolDefinition[]): ToolDefinition[] {
    return this.names === null ? definitions : definitions.filter((definition) => this.allows(definition.name));
  }

  describe(): string {
    if (this.names === null) return 'all tools';
    if (this.names.size === 0) return 'no tools';
    return Array.from(this.names).join(', ');
  }
}
