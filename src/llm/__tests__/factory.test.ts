import { describe, it, expect } from 'vitest';
import { createProvider, resolveProviderConfig } from '../factory.js';
import { AnthropicProvider } from '../anthropic.js';
import { OpenAICompatibleProvider } from '../openai-compatible.js';
import { ErrorCode, SkeinError } from '../../utils/errors.js';

describe('resolveProviderConfig', () => {
  it('should default to anthropic', () => {
    expect(resolveProviderConfig({ ANTHROPIC_API_KEY: 'test-secret' })).toEqual({
      kind: 'anthropic',
      model: undefined,
      apiKey: 'test-secret',
      debug: false,
    });
  });

  it('should fail fast with a credentials error when the key is missing', () => {
    let caught: unknown;
    try {
      resolveProviderConfig({});
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SkeinError);
    expect(caught).toMatchObject({
      code: ErrorCode.CREDENTIALS,
      message: 'ANTHROPIC_API_KEY not set. Add it to your environment or .env file.',
    });
  });

  it('should require OPENAI_API_KEY for openai', () => {
    expect(() => resolveProviderConfig({ SKEIN_PROVIDER: 'openai' })).toThrow('OPENAI_API_KEY not set');
  });

  it('should not require a key for ollama', () => {
    expect(resolveProviderConfig({ SKEIN_PROVIDER: 'ollama', SKEIN_MODEL: 'qwen2.5' })).toEqual({
      kind: 'ollama',
      model: 'qwen2.5',
      baseUrl: undefined,
      debug: false,
    });
  });

  it('should read the debug switch from the merged environment', () => {
    expect(resolveProviderConfig({ SKEIN_PROVIDER: 'ollama', SKEIN_DEBUG: 'true' }).debug).toBe(true);
  });

  it('should reject an unknown provider as a config error', () => {
    expect(() => resolveProviderConfig({ SKEIN_PROVIDER: 'gemini' })).toThrow(
      "Unknown provider 'gemini'. Supported providers: anthropic, ollama, openai"
    );
  });
});

describe('createProvider', () => {
  it('should build the native backend with the default model', () => {
    const provider = createProvider({ ANTHROPIC_API_KEY: 'test-secret' });
    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.model).toBe('claude-sonnet-4-6');
  });

  it('should build the compatibility backend for ollama with presets', () => {
    const provider = createProvider({ SKEIN_PROVIDER: 'ollama' });
    expect(provider).toBeInstanceOf(OpenAICompatibleProvider);
    expect(provider.name).toBe('ollama');
    expect(provider.model).toBe('llama3.1');
  });

  it('should honour the model override for openai', () => {
    const provider = createProvider({ SKEIN_PROVIDER: 'OpenAI', OPENAI_API_KEY: 'test-secret', SKEIN_MODEL: 'gpt-4o-mini' });
    expect(provider.name).toBe('openai');
    expect(provider.model).toBe('gpt-4o-mini');
  });
});
