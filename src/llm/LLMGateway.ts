import { RcaConfig } from '../config/RcaConfig';
import { ErrorKind, RcaError, errorMessage } from '../errors';
import { Logger, createLogger } from '../logging/Logger';
import { InvokeOptions, ProviderFailure, ProviderName, RawModelReply } from '../types';
import { sleep, withTimeout } from '../utils/timeout';
import { createConfiguredProviders } from './providers';
import { LLMProvider } from './providers/LLMProvider';

export interface GatewaySettings {
  /** Fixed pause before the single retry of a transient failure. */
  retryBackoffMs: number;
}

/**
 * Preferred provider first, then every other configured provider in its
 * configured order. Unknown or missing preference leaves the order as is.
 */
export function resolveProviderOrder(preferred: ProviderName | undefined, configured: readonly ProviderName[]): ProviderName[] {
  if (!preferred || !configured.includes(preferred)) {
    return [...configured];
  }
  return [preferred, ...configured.filter((name) => name !== preferred)];
}

/**
 * Uniform entry point over every configured provider. Providers are tried one
 * at a time in preference order; the first success wins and the last failure
 * is returned when none succeeds.
 */
export class LLMGateway {
  private logger: Logger;

  constructor(
    private providers: ReadonlyMap<ProviderName, LLMProvider>,
    private settings: GatewaySettings,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('Gateway');
  }

  static fromConfig(config: RcaConfig, logger?: Logger): LLMGateway {
    return new LLMGateway(createConfiguredProviders(config), { retryBackoffMs: config.llm.retryBackoffMs }, logger);
  }

  get providerNames(): ProviderName[] {
    return [...this.providers.keys()];
  }

  async invoke(prompt: string, preference: readonly ProviderName[], options: InvokeOptions): Promise<RawModelReply> {
    if (preference.length === 0) {
      throw new RcaError(ErrorKind.ConfigurationError, 'No LLM provider is configured');
    }

    let last: RawModelReply | undefined;
    for (const name of preference) {
      const provider = this.providers.get(name);
      if (!provider) {
        this.logger.warn(`Provider '${name}' is not configured, skipping`);
        last = this.failed(name, 0, { kind: ErrorKind.ConfigurationError, message: `provider '${name}' is not configured` });
        continue;
      }

      last = await this.attemptWithRetry(provider, prompt, options);
      if (last.succeeded) {
        this.logger.info(`${name} answered in ${last.latencyMs}ms`);
        return last;
      }
      this.logger.warn(`${name} failed: ${last.error?.kind ?? 'unknown'} ${last.error?.message ?? ''}`.trim());
    }

    // preference is non-empty, so at least one attempt was recorded
    return last ?? this.failed(preference[preference.length - 1], 0, { kind: ErrorKind.ProviderUnavailable, message: 'no attempt made' });
  }

  private async attemptWithRetry(provider: LLMProvider, prompt: string, options: InvokeOptions): Promise<RawModelReply> {
    const first = await this.attempt(provider, prompt, options);
    if (first.succeeded || !first.error?.transient) {
      return first;
    }

    this.logger.debug(`Retrying ${provider.name} after transient error in ${this.settings.retryBackoffMs}ms`);
    await sleep(this.settings.retryBackoffMs);
    const second = await this.attempt(provider, prompt, options);
    return { ...second, latencyMs: first.latencyMs + second.latencyMs };
  }

  /** One provider call bounded by the timeout; never rejects. */
  private attempt(provider: LLMProvider, prompt: string, options: InvokeOptions): Promise<RawModelReply> {
    const started = Date.now();
    const call = provider.invoke(prompt, options).catch((error: unknown) =>
      this.failed(provider.name, Date.now() - started, {
        kind: ErrorKind.MalformedProviderResponse,
        message: errorMessage(error)
      })
    );

    return withTimeout(call, options.timeoutMs, () =>
      this.failed(provider.name, Date.now() - started, {
        kind: ErrorKind.ProviderTimeout,
        message: `no reply within ${options.timeoutMs}ms`
      })
    );
  }

  private failed(provider: ProviderName, latencyMs: number, error: ProviderFailure): RawModelReply {
    return { provider, text: '', latencyMs, succeeded: false, error };
  }
}
