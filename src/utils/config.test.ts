import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  deepMerge,
  getConfigFile,
  getConfigValue,
  getCredentialStatus,
  getDefaultConfig,
  maskSecret,
  parseConfig,
  redactConfig,
  resolveLLMConfig,
  setConfigValue,
  validateConfig,
} from './config.js';
import { ConfigurationError, ValidationError } from './errors.js';

const fullEnv = {
  GITHUB_TOKEN: 'ghp_test-secret-token',
  TAVILY_API_KEY: 'tvly-test-secret',
  OPENAI_API_KEY: 'sk-test-secret-key',
};

describe('getDefaultConfig', () => {
  it('reads credentials and limits from the environment', () => {
    const config = getDefaultConfig({ ...fullEnv, MAX_CONCURRENT_RESEARCH_UNITS: '2', SUBAGENT_MAX_STEPS: '4' });

    expect(config.github.token).toBe('ghp_test-secret-token');
    expect(config.search.apiKey).toBe('tvly-test-secret');
    expect(config.llm.provider).toBe('openai');
    expect(config.llm.model).toBe('gpt-4o-mini');
    expect(config.agent.maxConcurrentResearchUnits).toBe(2);
    expect(config.agent.subAgentMaxSteps).toBe(4);
    expect(config.agent.coordinatorMaxSteps).toBe(25);
  });

  it('falls back to defaults for unusable numbers', () => {
    const config = getDefaultConfig({ MAX_SEARCH_RESULTS: 'many', MAX_RESEARCHER_ITERATIONS: '0' });

    expect(config.search.maxResults).toBe(3);
    expect(config.agent.maxResearcherIterations).toBe(3);
  });

  it('picks anthropic when only its key is present', () => {
    const config = getDefaultConfig({ ANTHROPIC_API_KEY: 'test-secret' });

    expect(config.llm.provider).toBe('anthropic');
    expect(config.llm.endpoint).toBe('https://api.anthropic.com');
  });

  it('honors an explicit provider', () => {
    const config = getDefaultConfig({ LLM_PROVIDER: 'Ollama' });

    expect(config.llm.provider).toBe('ollama');
    expect(config.llm.endpoint).toBe('http://localhost:11434/v1');
  });
});

describe('validateConfig', () => {
  it('accepts a complete configuration', () => {
    expect(validateConfig(getDefaultConfig(fullEnv))).toEqual({ valid: true, missing: [] });
  });

  it('lists every missing credential', () => {
    expect(validateConfig(getDefaultConfig({}))).toEqual({
      valid: false,
      missing: ['GITHUB_TOKEN', 'TAVILY_API_KEY', 'OPENAI_API_KEY or ANTHROPIC_API_KEY'],
    });
  });

  it('accepts either LLM key', () => {
    const config = getDefaultConfig({ GITHUB_TOKEN: 'test-secret', TAVILY_API_KEY: 'test-secret', ANTHROPIC_API_KEY: 'test-secret' });
    expect(validateConfig(config).valid).toBe(true);
  });
});

describe('parseConfig', () => {
  it('rejects out-of-range values', () => {
    const config = deepMerge(getDefaultConfig({}), { agent: { subAgentMaxSteps: 0 } });
    expect(() => parseConfig(config)).toThrow(ConfigurationError);
  });
});

describe('maskSecret', () => {
  it('hides short or empty values entirely', () => {
    expect(maskSecret(undefined)).toBe('Not set');
    expect(maskSecret('short')).toBe('Not set');
  });

  it('keeps only the ends of longer values', () => {
    expect(maskSecret('abcd-test-secret-wxyz')).toBe('abcd...wxyz');
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces leaves', () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: [1] }, { a: { c: 3 }, d: [2] })).toEqual({
      a: { b: 1, c: 3 },
      d: [2],
    });
  });
});

describe('redaction', () => {
  it('masks every credential', () => {
    const redacted = redactConfig(getDefaultConfig(fullEnv));

    expect(redacted.github.token).toBe('ghp_...oken');
    expect(redacted.search.apiKey).toBe('tvly...cret');
    expect(redacted.llm.openaiApiKey).toBe('sk-t...-key');
    expect(redacted.llm.anthropicApiKey).toBe('Not set');
  });

  it('reports which credentials are set', () => {
    const status = getCredentialStatus(getDefaultConfig(fullEnv));

    expect(status.map((entry) => [entry.name, entry.set])).toEqual([
      ['GITHUB_TOKEN', true],
      ['TAVILY_API_KEY', true],
      ['OPENAI_API_KEY', true],
      ['ANTHROPIC_API_KEY', false],
    ]);
  });
});

describe('resolveLLMConfig', () => {
  it('chooses the key of the configured provider', () => {
    const settings = getDefaultConfig({ ...fullEnv, ANTHROPIC_API_KEY: 'anthropic-test-secret', LLM_PROVIDER: 'anthropic' }).llm;
    expect(resolveLLMConfig(settings).apiKey).toBe('anthropic-test-secret');
  });

  it('sends no key to ollama', () => {
    const settings = getDefaultConfig({ ...fullEnv, LLM_PROVIDER: 'ollama' }).llm;
    expect(resolveLLMConfig(settings).apiKey).toBeUndefined();
  });
});

describe('config file', () => {
  const originalHome = process.env.ISSUE_SCOUT_HOME;
  let home: string;

  beforeEach(async () => {
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'issue-scout-config-'));
    process.env.ISSUE_SCOUT_HOME = home;
  });

  afterEach(async () => {
    if (originalHome === undefined) {
      delete process.env.ISSUE_SCOUT_HOME;
    } else {
      process.env.ISSUE_SCOUT_HOME = originalHome;
    }
    await fs.rm(home, { recursive: true, force: true });
  });

  it('stores a value as JSON and reads it back', async () => {
    await setConfigValue('agent.subAgentMaxSteps', '6');

    const stored: unknown = JSON.parse(await fs.readFile(getConfigFile(), 'utf-8'));
    expect(stored).toEqual({ agent: { subAgentMaxSteps: 6 } });
    await expect(getConfigValue('agent.subAgentMaxSteps')).resolves.toBe(6);
  });

  it('stores non-JSON values as strings', async () => {
    await setConfigValue('llm.model', 'gpt-4o');

    await expect(getConfigValue('llm.model')).resolves.toBe('gpt-4o');
  });

  it('refuses to store credentials', async () => {
    await expect(setConfigValue('github.token', 'test-secret')).rejects.toBeInstanceOf(ValidationError);
  });

  it('refuses values the loader would reject', async () => {
    await expect(setConfigValue('agent.subAgentMaxSteps', '-1')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('reads values from a given configuration without touching disk', async () => {
    const config = getDefaultConfig(fullEnv);
    await expect(getConfigValue('search.maxResults', config)).resolves.toBe(3);
    await expect(getConfigValue('search.nothing', config)).resolves.toBeUndefined();
  });
});
