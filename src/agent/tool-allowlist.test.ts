import { ToolAllowlist } from './tool-allowlist.js';
import type { ToolDefinition, ToolName } from '../tools/types.js';

function def(name: ToolName): ToolDefinition {
  return { name, description: name, parameters: { type: 'object', properties: {} } };
}

describe('ToolAllowlist', () => {
  test('allows every tool without a list', () => {
    const allowlist = new ToolAllowlist();

    expect(allowlist.restricted).toBe(false);
    expect(allowlist.allows('write_file')).toBe(true);
    expect(allowlist.filter([def('ls'), def('read_file')])).toHaveLength(2);
    expect(allowlist.describe()).toBe('all tools');
  });

  test('allows nothing with an empty list', () => {
    const allowlist = new ToolAllowlist([]);

    expect(allowlist.allows('read_file')).toBe(false);
    expect(allowlist.filter([def('ls'), def('read_file')])).toEqual([]);
    expect(allowlist.describe()).toBe('no tools');
  });

  test('keeps listed definitions in registry order', () => {
    const allowlist = new ToolAllowlist(['think_tool', 'read_file']);
    const filtered = allowlist.filter([def('read_file'), def('write_file'), def('think_tool')]);

    expect(filtered.map((d) => d.name)).toEqual(['read_file', 'think_tool']);
  });

  test('denies unlisted and unknown names', () => {
    const allowlist = new ToolAllowlist(['read_file']);

    expect(allowlist.allows('write_file')).toBe(false);
    expect(allowlist.allows('made_up')).toBe(false);
    expect(allowlist.allows('read_file')).toBe(true);
    expect(allowlist.describe()).toBe('read_file');
  });
});
