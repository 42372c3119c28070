// Configuration management

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { LLMConfig, LLMProvider } from '../llm/types.js';
import { LLM_PROVIDERS } from '../llm/types.js';
import { ConfigurationError, ValidationError, getErrorMessage } from './errors.js';
import { isRecord } from './http.js';

// Load .env file
dotenv.config();

const llmSettingsSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'ollama']),
  endpoint: z.string(),
  model: z.string(),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  requestTimeoutMs: z.number().int().positive(),
  openaiApiKey: z.string(),
  anthropicApiKey: z.string(),
});

const appConfigSchema = z.object({
  github: z.object({
    token: z.string(),
    apiUrl: z.string(),
  }),
  search: z.object({
    apiKey: z.string(),
    endpoint: z.string(),
    maxResults: z.number().int().positive(),
    fetchTimeoutMs: z.number().int().positive(),
  }),
  llm: llmSettingsSchema,
  agent: z.object({
    subAgentMaxSteps: z.number().int().positive(),
    coordinatorMaxSteps: z.number().int().positive(),
    maxConcurrentResearchUnits: z.number().int().positive(),
    maxResearcherIterations: z.number().int().positive(),
  }),
});

export type LLMSettings = z.infer<typeof llmSettingsSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

type JsonObject = Record<string, unknown>;

/**
 * `~/.issue-scout`, or ISSUE_SCOUT_HOME when set (tests and portable installs)
 */
export function getConfigDir(): string {
  const override = process.env.ISSUE_SCOUT_HOME?.trim();
  return override || path.join(os.homedir(), '.issue-scout');
}

export function getConfigFile(): string {
  return path.join(getConfigDir(), 'config.json');
}

// Provider defaults (inline to avoid circular imports)
const PROVIDER_CONFIGS: Record<LLMProvider, { endpoint: string; model: string }> = {
  openai: {
    endpoint: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
  },
  anthropic: {
    endpoint: 'https://api.anthropic.com',
    model: 'claude-3-5-sonnet-latest',
  },
  ollama: {
    endpoint: 'http://localhost:11434/v1',
    model: 'qwen2.5-coder:7b',
  },
};

function isProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

function getDefaultProvider(env: NodeJS.ProcessEnv): LLMProvider {
  const envProvider = env.LLM_PROVIDER?.trim().toLowerCase();
  if (envProvider && isProvider(envProvider)) {
    return envProvider;
  }
  if (!env.OPENAI_API_KEY && env.ANTHROPIC_API_KEY) {
    return 'anthropic';
  }
  return 'openai';
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Defaults and environment variables. Secrets only ever come from here,
 * never from the config file.
 */
export function getDefaultConfig(
  env: NodeJS.ProcessEnv = process.env,
  providerOverride?: LLMProvider
): AppConfig {
  const provider = providerOverride ?? getDefaultProvider(env);
  const providerDefaults = PROVIDER_CONFIGS[provider];

  return {
    github: {
      token: env.GITHUB_TOKEN || '',
      apiUrl: env.GITHUB_API_URL || 'https://api.github.com',
    },
    search: {
      apiKey: env.TAVILY_API_KEY || '',
      endpoint: 'https://api.tavily.com/search',
      maxResults: readInt(env.MAX_SEARCH_RESULTS, 3),
      fetchTimeoutMs: 30_000,
    },
    llm: {
      provider,
      endpoint: env.LLM_ENDPOINT || providerDefaults.endpoint,
      model: env.LLM_MODEL || providerDefaults.model,
      maxTokens: 4096,
      temperature: 0,
      requestTimeoutMs: 120_000,
      openaiApiKey: env.OPENAI_API_KEY || '',
      anthropicApiKey: env.ANTHROPIC_API_KEY || '',
    },
    agent: {
      subAgentMaxSteps: readInt(env.SUBAGENT_MAX_STEPS, 10),
      coordinatorMaxSteps: readInt(env.COORDINATOR_MAX_STEPS, 25),
      maxConcurrentResearchUnits: readInt(env.MAX_CONCURRENT_RESEARCH_UNITS, 3),
      maxResearcherIterations: readInt(env.MAX_RESEARCHER_ITERATIONS, 3),
    },
  };
}

async function readConfigFile(): Promise<JsonObject> {
  let raw: string;
  try {
    raw = await fs.readFile(getConfigFile(), 'utf-8');
  } catch {
    // No config file yet
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${getConfigFile()}`, {
      reason: getErrorMessage(error),
      suggestion: 'Fix or delete the config file, then retry.',
    });
  }
  return isRecord(parsed) ? parsed : {};
}

export function parseConfig(candidate: unknown): AppConfig {
  const result = appConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError('Invalid configuration', { reason: details });
  }
  return result.data;
}

export async function loadConfig(): Promise<AppConfig> {
  const fileConfig = await readConfigFile();
  // A provider chosen in the file brings its own endpoint and model defaults
  const fileLLM = fileConfig.llm;
  const fileProvider = isRecord(fileLLM) && typeof fileLLM.provider === 'string' && isProvider(fileLLM.provider)
    ? fileLLM.provider
    : undefined;
  const defaults = getDefaultConfig(process.env, fileProvider);
  const merged = deepMerge(defaults, fileConfig);
  // Secrets come from the environment only, whatever the file says
  return parseConfig(
    deepMerge(merged, {
      github: { token: defaults.github.token },
      search: { apiKey: defaults.search.apiKey },
      llm: {
        openaiApiKey: defaults.llm.openaiApiKey,
        anthropicApiKey: defaults.llm.anthropicApiKey,
      },
    })
  );
}

const SECRET_KEYS = new Set(['github.token', 'search.apiKey', 'llm.openaiApiKey', 'llm.anthropicApiKey']);

export async function getConfigValue(key: string, source?: AppConfig): Promise<unknown> {
  let value: unknown = source ?? (await loadConfig());

  for (const k of key.split('.')) {
    value = isRecord(value) ? value[k] : undefined;
  }

  return value;
}

/**
 * Persist one dotted key to the config file. The value is parsed as JSON
 * when possible, otherwise stored as a string. Secrets are refused: they
 * belong in the environment.
 */
export async function setConfigValue(key: string, value: string): Promise<void> {
  if (SECRET_KEYS.has(key)) {
    throw new ValidationError(`Refusing to store ${key} in the config file`, {
      suggestion: 'Put credentials in your .env file instead.',
    });
  }

  const keys = key.split('.').filter(Boolean);
  if (keys.length === 0) {
    throw new ValidationError('Config key must not be empty', {
      suggestion: 'Use a dotted key such as agent.subAgentMaxSteps.',
    });
  }

  let parsedValue: unknown;
  try {
    parsedValue = JSON.parse(value);
  } catch {
    parsedValue = value;
  }

  const fileConfig = await readConfigFile();
  const update: JsonObject = {};
  let cursor = update;
  for (let i = 0; i < keys.length - 1; i++) {
    const next: JsonObject = {};
    cursor[keys[i]] = next;
    cursor = next;
  }
  cursor[keys[keys.length - 1]] = parsedValue;

  const newFileConfig = deepMerge(fileConfig, update);
  // Reject values the loader would refuse later
  parseConfig(deepMerge(getDefaultConfig(), newFileConfig));

  await fs.mkdir(getConfigDir(), { recursive: true });
  await fs.writeFile(getConfigFile(), JSON.stringify(newFileConfig, null, 2), 'utf-8');
}

export function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  const result: JsonObject = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    if (isRecord(sourceValue)) {
      result[key] = deepMerge(isRecord(targetValue) ? targetValue : {}, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }
  return result;
}

export interface ConfigValidation {
  valid: boolean;
  missing: string[];
}

/**
 * True only when GitHub, search and at least one LLM credential are present.
 */
export function validateConfig(config: AppConfig): ConfigValidation {
  const missing: string[] = [];

  if (!config.github.token) missing.push('GITHUB_TOKEN');
  if (!config.search.apiKey) missing.push('TAVILY_API_KEY');

  if (!config.llm.openaiApiKey && !config.llm.anthropicApiKey) missing.push('OPENAI_API_KEY or ANTHROPIC_API_KEY');

  return { valid: missing.length === 0, missing };
}

export function maskSecret(value: string | undefined): string {
  if (!value || value.length < 8) return 'Not set';
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

/**
 * Resolve the client configuration for the configured provider.
 */
export function resolveLLMConfig(settings: LLMSettings): LLMConfig {
  let apiKey: string | undefined;
  switch (settings.provider) {
    case 'openai':
      apiKey = settings.openaiApiKey || undefined;
      break;
    case 'anthropic':
      apiKey = settings.anthropicApiKey || undefined;
      break;
    case 'ollama':
      apiKey = undefined;
      break;
  }

  return {
    provider: settings.provider,
    endpoint: settings.endpoint,
    apiKey,
    model: settings.model,
    maxTokens: settings.maxTokens,
    temperature: settings.temperature,
    requestTimeoutMs: settings.requestTimeoutMs,
  };
}

export interface CredentialStatus {
  name: string;
  display: string;
  set: boolean;
}

export function getCredentialStatus(config: AppConfig): CredentialStatus[] {
  const entries: Array<[string, string]> = [
    ['GITHUB_TOKEN', config.github.token],
    ['TAVILY_API_KEY', config.search.apiKey],
    ['OPENAI_API_KEY', config.llm.openaiApiKey],
    ['ANTHROPIC_API_KEY', config.llm.anthropicApiKey],
  ];
  return entries.map(([name, value]) => ({ name, display: maskSecret(value), set: Boolean(value) }));
}

/**
 * Copy of the configuration with every credential masked, for display.
 */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    github: { ...config.github, token: maskSecret(config.github.token) },
    search: { ...config.search, apiKey: maskSecret(config.search.apiKey) },
    llm: {
      ...config.llm,
      openaiApiKey: maskSecret(config.llm.openaiApiKey),
      anthropicApiKey: maskSecret(config.llm.anthropicApiKey),
    },
  };
}
