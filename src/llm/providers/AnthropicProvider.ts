import Anthropic from '@anthropic-ai/sdk';
import { ErrorKind } from '../../errors';
import { ProviderFailure, ProviderName } from '../../types';
import { BaseProvider, ProviderCallOptions, RCA_SYSTEM_PROMPT, classifyProviderError, classifyStatus } from './LLMProvider';

export class AnthropicProvider extends BaseProvider {
  private client: Anthropic;

  constructor(name: ProviderName, settings: { apiKey: string; model: string; baseUrl?: string }) {
    super(name, settings.model);
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      maxRetries: 0
    });
  }

  protected async complete(prompt: string, options: ProviderCallOptions): Promise<string | null | undefined> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        system: RCA_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }]
      },
      { timeout: options.timeoutMs }
    );

    return response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
  }

  protected classify(error: unknown): ProviderFailure {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return { kind: ErrorKind.ProviderTimeout, message: `${this.name} request timed out` };
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return { kind: ErrorKind.ProviderUnavailable, message: error.message, transient: true };
    }
    if (error instanceof Anthropic.APIError && error.status !== undefined) {
      // 529: overloaded
      return classifyStatus(error.status, error.message);
    }
    return classifyProviderError(error);
  }
}
