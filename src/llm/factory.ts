import type { LLMProvider, ProviderConfig, ProviderKind } from './types.js';
import { AnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
import { OLLAMA_DEFAULTS, OPENAI_DEFAULTS, OpenAICompatibleProvider } from './openai-compatible.js';
import type { Environment } from '../config/env.js';
import { SkeinError } from '../utils/errors.js';
import { isDebugEnabled } from '../utils/debug.js';

const PROVIDER_KINDS: readonly ProviderKind[] = ['anthropic', 'ollama', 'openai'];

function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}

/**
 * Read provider selection from the merged environment:
 * SKEIN_PROVIDER (anthropic | ollama | openai), SKEIN_MODEL, SKEIN_BASE_URL
 * and the selected provider's API key.
 */
export function resolveProviderConfig(env: Environment): ProviderConfig {
  const kind = (env.SKEIN_PROVIDER || 'anthropic').trim().toLowerCase();
  if (!isProviderKind(kind)) {
    throw SkeinError.config(
      `Unknown provider '${kind}'. Supported providers: ${PROVIDER_KINDS.join(', ')}`
    );
  }

  const model = env.SKEIN_MODEL || undefined;
  const baseUrl = env.SKEIN_BASE_URL || undefined;
  const debug = isDebugEnabled(env);

  switch (kind) {
    case 'anthropic': {
      const apiKey = env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw SkeinError.credentials('ANTHROPIC_API_KEY not set. Add it to your environment or .env file.');
      }
      return { kind, model, apiKey, debug };
    }
    case 'openai': {
      const apiKey = env.OPENAI_API_KEY;
      if (!apiKey) {
        throw SkeinError.credentials('OPENAI_API_KEY not set. Add it to your environment or .env file.');
      }
      return { kind, model, apiKey, baseUrl, debug };
    }
    case 'ollama':
      return { kind, model, baseUrl, debug };
  }
}

export function createProviderFromConfig(config: ProviderConfig): LLMProvider {
  switch (config.kind) {
    case 'anthropic':
      return new AnthropicProvider(config.apiKey ?? '', config.model ?? DEFAULT_ANTHROPIC_MODEL, { debug: config.debug });
    case 'openai':
      return new OpenAICompatibleProvider({
        name: 'openai',
        model: config.model ?? OPENAI_DEFAULTS.model,
        baseUrl: config.baseUrl ?? OPENAI_DEFAULTS.baseUrl,
        apiKey: config.apiKey ?? '',
        debug: config.debug,
      });
    case 'ollama':
      return new OpenAICompatibleProvider({
        name: 'ollama',
        model: config.model ?? OLLAMA_DEFAULTS.model,
        baseUrl: config.baseUrl ?? OLLAMA_DEFAULTS.baseUrl,
        apiKey: OLLAMA_DEFAULTS.apiKey,
        debug: config.debug,
      });
  }
}

/**
 * Select and construct the provider. Throws a credentials SkeinError when
 * the selected provider's key is missing, before any request is made.
 */
export function createProvider(env: Environment): LLMProvider {
  return createProviderFromConfig(resolveProviderConfig(env));
}
