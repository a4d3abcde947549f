import OpenAI from 'openai';
import { ErrorKind } from '../../errors';
import { ProviderFailure, ProviderName } from '../../types';
import { BaseProvider, ProviderCallOptions, RCA_SYSTEM_PROMPT, classifyProviderError, classifyStatus } from './LLMProvider';

/**
 * Chat-completions provider. Also used for OpenAI-compatible endpoints
 * (OpenRouter, internal LLM proxies) by passing their base URL.
 */
export class OpenAIProvider extends BaseProvider {
  private client: OpenAI;

  constructor(name: ProviderName, settings: { apiKey: string; model: string; baseUrl?: string }) {
    super(name, settings.model);
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseUrl,
      maxRetries: 0 // the gateway owns retries
    });
  }

  protected async complete(prompt: string, options: ProviderCallOptions): Promise<string | null | undefined> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: RCA_SYSTEM_PROMPT },
          { role: 'user', content: prompt }
        ],
        temperature: options.temperature,
        max_tokens: options.maxTokens
      },
      { timeout: options.timeoutMs }
    );
    return completion.choices[0]?.message?.content;
  }

  protected classify(error: unknown): ProviderFailure {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return { kind: ErrorKind.ProviderTimeout, message: `${this.name} request timed out` };
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return { kind: ErrorKind.ProviderUnavailable, message: error.message, transient: true };
    }
    if (error instanceof OpenAI.APIError && error.status !== undefined) {
      // OpenAI reports exhausted credit as a 429 with this code.
      if (error.code === 'insufficient_quota') {
        return { kind: ErrorKind.ProviderQuotaError, message: error.message };
      }
      return classifyStatus(error.status, error.message);
    }
    return classifyProviderError(error);
  }
}
