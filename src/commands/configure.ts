/**
 * Interactive setup command.
 *
 * Usage: tidecode configure
 */

import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import {
  BUILTIN_PROVIDERS,
  DEFAULT_PROVIDER,
  listProviderNames,
  type BuiltinProvider,
} from '../config/providers.js';
import { loadConfig, saveUserConfig } from '../config/config-manager.js';
import type { ProviderProfile, ValidatedUserConfig } from '../config/schema.js';
import { logger } from '../integrations/utilities/logger.js';

/** Asks one question and resolves with the raw answer */
export type AskFn = (question: string) => Promise<string>;

export interface ConfigureIO {
  ask: AskFn;
  print: (message: string) => void;
}

/**
 * Walk through provider, base URL, model and API key, and return the
 * updated user config. Empty answers keep the shown default.
 */
export async function promptForConfig(current: ValidatedUserConfig, io: ConfigureIO): Promise<ValidatedUserConfig> {
  const names = listProviderNames(current);
  const currentProvider = current.provider ?? DEFAULT_PROVIDER;

  io.print('Select provider:');
  names.forEach((name, i) => io.print(`  ${i + 1}) ${name}`));
  const providerAnswer = (await io.ask(`Choice [${currentProvider}]: `)).trim();

  let provider = currentProvider;
  const choice = Number(providerAnswer);
  if (Number.isInteger(choice) && choice >= 1 && choice <= names.length) {
    provider = names[choice - 1];
  } else if (providerAnswer) {
    provider = providerAnswer;
  }

  const builtin: BuiltinProvider | undefined = BUILTIN_PROVIDERS[provider];
  const existing: ProviderProfile = current.providers?.[provider] ?? {};
  const defaultBaseUrl = existing.baseUrl ?? builtin?.baseUrl ?? '';
  const defaultModel = existing.model ?? builtin?.model ?? '';

  const baseUrl = (await io.ask(`Base URL [${defaultBaseUrl}]: `)).trim() || defaultBaseUrl;
  const model = (await io.ask(`Model [${defaultModel}]: `)).trim() || defaultModel;

  let apiKey = existing.apiKey;
  if (builtin?.local) {
    io.print('Local provider - no API key needed.');
  } else {
    const envHint = builtin?.apiKeyEnv ? ` (blank to use ${builtin.apiKeyEnv} or TIDECODE_API_KEY)` : '';
    const answer = (await io.ask(`API key${envHint}: `)).trim();
    if (answer) apiKey = answer;
  }

  return {
    ...current,
    provider,
    providers: {
      ...current.providers,
      [provider]: {
        ...existing,
        ...(baseUrl ? { baseUrl } : {}),
        ...(model ? { model } : {}),
        ...(apiKey ? { apiKey } : {}),
      },
    },
  };
}

export async function runConfigure(): Promise<void> {
  const rl = createInterface({ input: stdin, output: stdout });
  const io: ConfigureIO = {
    ask: question => rl.question(question),
    print: message => {
      stdout.write(`${message}\n`);
    },
  };

  try {
    io.print('\ntidecode setup\n');
    const { config, warnings } = loadConfig({ skipProject: true });
    for (const warning of warnings) {
      io.print(`warning: ${warning}`);
    }

    const updated = await promptForConfig(config, io);
    const path = await saveUserConfig(updated);
    logger.info('Config saved', { path, provider: updated.provider });
    io.print(`\nConfiguration saved to ${path}`);
  } finally {
    rl.close();
  }
}
