import { NO_SUBAGENT_RESPONSE, TaskTool } from './task-tool.js';
import { ToolRegistry, createBaseToolRegistry } from './index.js';
import { createInitialState } from '../agent/state.js';
import { TOOL_NOT_AVAILABLE_MESSAGE } from '../agent/tool-runner.js';
import { SUBAGENT_ROLES } from '../agent/subagent-roles.js';
import { FakeGitHub, FakeSearch, ScriptedLLMClient, callTools, final, makeResearchDeps, toolCall } from '../test/fakes.js';
import type { LLMClient } from '../llm/types.js';

function makeTaskTool(llmClient: LLMClient, subAgentMaxSteps = 5, subAgentRegistry?: ToolRegistry): TaskTool {
  const research = makeResearchDeps({
    search: new FakeSearch([{ title: 'Known bug', url: 'https://x.example/bug', snippet: 'upgrade' }]),
    summarize: async () => ({ filename: 'known_bug.md', summary: 'Upgrade to 2.1' }),
  });
  return new TaskTool({
    llmClient,
    subAgentRegistry: subAgentRegistry ?? createBaseToolRegistry({ github: new FakeGitHub(), research }),
    subAgentMaxSteps,
  });
}

describe('TaskTool', () => {
  it('refuses unknown sub-agent types without running anything', async () => {
    const llm = new ScriptedLLMClient([]);
    const state = createInitialState({ files: { a: '1' } });

    const result = await makeTaskTool(llm).execute({ description: 'x', subagent_type: 'wizard' }, { state });

    expect(result.output).toBe('Unknown sub-agent type: wizard. Available: repo-investigator, error-researcher');
    expect(state.files).toEqual({ a: '1' });
    expect(llm.calls).toHaveLength(0);
  });

  it('merges the files a sub-agent creates and keeps the parent\'s', async () => {
    const llm = new ScriptedLLMClient([
      callTools(toolCall('search_error_solution', { error_message: 'boom' })),
      final('Root cause: X'),
    ]);
    const state = createInitialState({ files: { a: 'old' }, messages: [{ role: 'user', content: 'parent' }] });

    const result = await makeTaskTool(llm).execute(
      { description: 'Research boom', subagent_type: 'error-researcher' },
      { state }
    );

    const created = Object.keys(state.files).filter((name) => name !== 'a');
    expect(created).toHaveLength(1);
    expect(created[0]).toMatch(/^known_bug_[0-9a-f]{8}\.md$/);
    expect(state.files.a).toBe('old');
    expect(result.output).toBe(
      [
        '## Sub-agent report: error-researcher',
        '',
        '**Task:** Research boom',
        '',
        'Root cause: X',
        '',
        '---',
        `Files updated: 1 (${created[0]})`,
      ].join('\n')
    );
    // The sub-agent's transcript stays private
    expect(state.messages).toEqual([{ role: 'user', content: 'parent' }]);
  });

  it('starts the sub-agent from the task, its role prompt and its allowed tools', async () => {
    const llm = new ScriptedLLMClient([callTools(toolCall('read_file', { filename: 'notes.md' })), final('ok')]);
    const state = createInitialState({ files: { 'notes.md': 'n' }, messages: [{ role: 'user', content: 'secret' }] });

    await makeTaskTool(llm).execute({ description: 'Find the loader', subagent_type: 'repo-investigator' }, { state });

    const first = llm.calls[0];
    expect(first.messages).toEqual([
      { role: 'system', content: SUBAGENT_ROLES['repo-investigator'].systemPrompt },
      { role: 'user', content: 'Find the loader' },
    ]);
    expect(first.tools.map((tool) => tool.name).sort()).toEqual(
      [...SUBAGENT_ROLES['repo-investigator'].allowedTools].sort()
    );
    expect(llm.calls[1].messages[3]).toMatchObject({ role: 'tool', content: '# notes.md\n\nn' });
  });

  it('refuses tools outside the role\'s allow-list', async () => {
    const llm = new ScriptedLLMClient([
      callTools(toolCall('write_file', { filename: 'a', content: 'overwritten' })),
      final('done'),
    ]);
    const state = createInitialState({ files: { a: 'original' } });

    const result = await makeTaskTool(llm).execute(
      { description: 'Try to write', subagent_type: 'repo-investigator' },
      { state }
    );

    expect(llm.calls[1].messages[3]).toMatchObject({ role: 'tool', content: `Error: ${TOOL_NOT_AVAILABLE_MESSAGE}` });
    expect(state.files).toEqual({ a: 'original' });
    expect(result.output?.split('\n').slice(-1)).toEqual(['Files updated: 0']);
  });

  it('reports a sub-agent that ran out of steps', async () => {
    const llm = new ScriptedLLMClient([], callTools(toolCall('think_tool', { reflection: 'still looking' })));
    const state = createInitialState();

    const result = await makeTaskTool(llm, 2).execute({ description: 't', subagent_type: 'repo-investigator' }, { state });

    expect(llm.calls).toHaveLength(2);
    expect(result.output).toBe(
      [
        '## Sub-agent report: repo-investigator',
        '',
        '**Task:** t',
        '',
        NO_SUBAGENT_RESPONSE,
        '',
        '---',
        'Stopped after 2 steps: step budget reached.',
        'Files updated: 0',
      ].join('\n')
    );
  });

  it('reports an LLM failure inside the sub-agent', async () => {
    const llm: LLMClient = { complete: jest.fn().mockRejectedValue(new Error('model unavailable')) };

    const result = await makeTaskTool(llm).execute(
      { description: 't', subagent_type: 'error-researcher' },
      { state: createInitialState() }
    );

    expect(result.success).toBe(true);
    expect(result.output?.split('\n').slice(-2)).toEqual(['Stopped after an error: model unavailable', 'Files updated: 0']);
  });

  it('says so when none of the role\'s tools are registered', async () => {
    const llm = new ScriptedLLMClient([]);
    const result = await makeTaskTool(llm, 5, new ToolRegistry()).execute(
      { description: 't', subagent_type: 'repo-investigator' },
      { state: createInitialState() }
    );
    expect(result.output).toBe('No tools available for repo-investigator');
  });
});
