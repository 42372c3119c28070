// Tool Registry

import type { Tool, ToolDefinition, ToolExecutionContext, ToolExecutionResult, ToolName } from './types.js';
import { isToolName } from './types.js';
import { ListVirtualFilesTool, ReadVirtualFileTool, WriteVirtualFileTool } from './file-tools.js';
import { WriteTodosTool, ReadTodosTool, MarkTodoDoneTool, UpdateTodoStatusTool } from './todo-tools.js';
import { ThinkTool } from './think-tool.js';
import { ExtractStackTraceTool, ParseErrorFromIssueTool } from './analysis-tools.js';
import {
  GetRepositoryInfoTool,
  SearchCodeInRepoTool,
  ReadFileFromRepoTool,
  ListRepositoryStructureTool,
  GetIssueDetailsTool,
} from './github-tools.js';
import { SearchErrorSolutionTool, SearchDocumentationTool } from './search-tools.js';
import type { WebResearchDeps } from './search-tools.js';
import type { GitHubApi } from '../github/client.js';

export class ToolRegistry {
  private tools: Map<ToolName, Tool> = new Map();

  /**
   * Names are checked here, once, so dispatch never meets an unknown tool
   * it was configured with.
   */
  register(tool: Tool): void {
    const name: string = tool.definition.name;
    if (!isToolName(name)) {
      throw new Error(`Unknown tool name: ${name}`);
    }
    if (this.tools.has(name)) {
      throw new Error(`Tool already registered: ${name}`);
    }
    this.tools.set(name, tool);
  }

  has(name: string): boolean {
    return isToolName(name) && this.tools.has(name);
  }

  get(name: string): Tool | undefined {
    return isToolName(name) ? this.tools.get(name) : undefined;
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  getNames(): ToolName[] {
    return Array.from(this.tools.keys());
  }

  getDefinitions(): ToolDefinition[] {
    return this.getAll().map((tool) => tool.definition);
  }

  async execute(name: string, args: unknown, context: ToolExecutionContext): Promise<ToolExecutionResult> {
    const tool = this.get(name);
    if (!tool) {
      return { success: false, error: `Tool not found: ${name}` };
    }
    return tool.execute(args, context);
  }
}

export interface ToolDependencies {
  github: GitHubApi;
  research: WebResearchDeps;
}

/**
 * Everything except delegation. Sub-agents draw their allow-lists from this
 * set; the coordinator adds the task tool on top.
 */
export function createBaseToolRegistry(deps: ToolDependencies): ToolRegistry {
  const registry = new ToolRegistry();

  registry.register(new ListVirtualFilesTool());
  registry.register(new ReadVirtualFileTool());
  registry.register(new WriteVirtualFileTool());

  registry.register(new WriteTodosTool());
  registry.register(new ReadTodosTool());
  registry.register(new MarkTodoDoneTool());
  registry.register(new UpdateTodoStatusTool());
  registry.register(new ThinkTool());

  registry.register(new ExtractStackTraceTool());
  registry.register(new ParseErrorFromIssueTool());

  registry.register(new GetRepositoryInfoTool(deps.github));
  registry.register(new SearchCodeInRepoTool(deps.github));
  registry.register(new ReadFileFromRepoTool(deps.github));
  registry.register(new ListRepositoryStructureTool(deps.github));
  registry.register(new GetIssueDetailsTool(deps.github));

  registry.register(new SearchErrorSolutionTool(deps.research));
  registry.register(new SearchDocumentationTool(deps.research));

  return registry;
}

// Re-export types
export * from './types.js';
export * from './base-tool.js';
