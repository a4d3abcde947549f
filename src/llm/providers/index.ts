import { RcaConfig, ProviderSettings } from '../../config/RcaConfig';
import { ErrorKind, RcaError } from '../../errors';
import { ProviderName } from '../../types';
import { AnthropicProvider } from './AnthropicProvider';
import { LLMProvider } from './LLMProvider';
import { OpenAIProvider } from './OpenAIProvider';

export { AnthropicProvider } from './AnthropicProvider';
export { OpenAIProvider } from './OpenAIProvider';
export { BaseProvider, RCA_SYSTEM_PROMPT, classifyProviderError, classifyStatus } from './LLMProvider';
export type { LLMProvider, ProviderCallOptions } from './LLMProvider';

export function createProvider(name: ProviderName, settings: ProviderSettings): LLMProvider {
  switch (settings.kind) {
    case 'openai':
      return new OpenAIProvider(name, settings);
    case 'anthropic':
      return new AnthropicProvider(name, settings);
    case 'openai-compatible':
      if (!settings.baseUrl) {
        throw new RcaError(ErrorKind.ConfigurationError, `Provider '${name}' is OpenAI-compatible but has no baseUrl`);
      }
      return new OpenAIProvider(name, settings);
  }
}

/** One provider instance per configured entry, keyed by name. */
export function createConfiguredProviders(config: RcaConfig): Map<ProviderName, LLMProvider> {
  const providers = new Map<ProviderName, LLMProvider>();
  for (const [name, settings] of Object.entries(config.providers)) {
    providers.set(name, createProvider(name, settings));
  }
  return providers;
}
