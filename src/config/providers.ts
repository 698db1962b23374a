/**
 * Provider profiles.
 *
 * Built-in connection defaults for the supported OpenAI-compatible
 * backends, merged with whatever the config files say about them.
 */

import { ConfigError } from '../errors/index.js';
import type { OpenAICompatibleConfig } from '../providers/types.js';
import type { ProviderProfile, ValidatedUserConfig } from './schema.js';

export interface BuiltinProvider {
  baseUrl: string;
  model: string;
  /** Environment variable holding the key, after TIDECODE_API_KEY */
  apiKeyEnv?: string;
  /** Runs on this machine; no API key needed */
  local: boolean;
}

export const DEFAULT_PROVIDER = 'lm_studio';

export const BUILTIN_PROVIDERS: Record<string, BuiltinProvider> = {
  lm_studio: {
    baseUrl: 'http://localhost:1234/v1',
    model: 'qwen/qwen3-4b-2507',
    local: true,
  },
  ollama: {
    baseUrl: 'http://localhost:11434/v1',
    model: 'qwen3:4b',
    local: true,
  },
  openai: {
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-5',
    apiKeyEnv: 'OPENAI_API_KEY',
    local: false,
  },
  mistral: {
    baseUrl: 'https://api.mistral.ai/v1',
    model: 'mistral-small-latest',
    apiKeyEnv: 'MISTRAL_API_KEY',
    local: false,
  },
};

export interface ProviderOverrides {
  provider?: string;
  model?: string;
  baseUrl?: string;
}

/**
 * Names of every known profile: built-ins plus those defined in config.
 */
export function listProviderNames(config: ValidatedUserConfig): string[] {
  return [...new Set([...Object.keys(BUILTIN_PROVIDERS), ...Object.keys(config.providers ?? {})])];
}

/**
 * Work out the connection settings for the active provider.
 *
 * Precedence for each field: CLI override, config profile, built-in
 * default. The API key falls back to TIDECODE_API_KEY and then to the
 * provider's conventional variable.
 */
export function resolveProvider(
  config: ValidatedUserConfig,
  overrides: ProviderOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): OpenAICompatibleConfig {
  const name = overrides.provider ?? config.provider ?? DEFAULT_PROVIDER;
  const builtin: BuiltinProvider | undefined = BUILTIN_PROVIDERS[name];
  const profile: ProviderProfile = config.providers?.[name] ?? {};

  const baseUrl = overrides.baseUrl ?? profile.baseUrl ?? builtin?.baseUrl;
  const model = overrides.model ?? profile.model ?? builtin?.model;

  if (!baseUrl || !model) {
    const missing = !baseUrl ? 'baseUrl' : 'model';
    throw new ConfigError(
      builtin || config.providers?.[name]
        ? `Provider '${name}' has no ${missing} configured`
        : `Unknown provider '${name}'. Known providers: ${listProviderNames(config).join(', ')}`,
      { provider: name }
    );
  }

  const apiKey =
    profile.apiKey || env.TIDECODE_API_KEY || (builtin?.apiKeyEnv ? env[builtin.apiKeyEnv] : undefined);

  return {
    name,
    baseUrl,
    model,
    ...(apiKey ? { apiKey } : {}),
    ...(profile.temperature !== undefined && { temperature: profile.temperature }),
    ...(profile.maxTokens !== undefined && { maxTokens: profile.maxTokens }),
  };
}
