import { ErrorKind, RcaError, errorMessage } from '../../errors';
import { ProviderFailure, ProviderName, RawModelReply } from '../../types';

export const RCA_SYSTEM_PROMPT = 'You are an expert technical analyst specializing in root cause analysis.';

export interface ProviderCallOptions {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

/**
 * Capability every provider variant implements. `invoke` never rejects: failures
 * come back as a reply with `succeeded: false` and a classified error.
 */
export interface LLMProvider {
  readonly name: ProviderName;
  readonly model: string;
  invoke(prompt: string, options: ProviderCallOptions): Promise<RawModelReply>;
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ECONNABORTED', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_SOCKET']);

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  return Reflect.get(error, key);
}

export function classifyStatus(status: number, message: string): ProviderFailure {
  if (status === 401 || status === 403) {
    return { kind: ErrorKind.ProviderAuthError, message };
  }
  if (status === 402 || status === 429) {
    return { kind: ErrorKind.ProviderQuotaError, message };
  }
  if (status === 408) {
    return { kind: ErrorKind.ProviderTimeout, message };
  }
  if (status === 404) {
    return { kind: ErrorKind.ConfigurationError, message: `model or endpoint not found: ${message}` };
  }
  if (status >= 500) {
    return { kind: ErrorKind.ProviderUnavailable, message, transient: true };
  }
  return { kind: ErrorKind.MalformedProviderResponse, message };
}

/**
 * Classification shared by every SDK: HTTP status first, then Node socket codes.
 * Provider subclasses check their SDK's own error classes before falling back here.
 */
export function classifyProviderError(error: unknown): ProviderFailure {
  if (error instanceof RcaError) {
    return { kind: error.kind, message: error.message, transient: error.transient };
  }

  const message = errorMessage(error);
  const status = readProperty(error, 'status');
  if (typeof status === 'number') {
    return classifyStatus(status, message);
  }

  const code = readProperty(error, 'code');
  if (code === 'ETIMEDOUT' || (error instanceof Error && /timed? ?out/i.test(error.message))) {
    return { kind: ErrorKind.ProviderTimeout, message };
  }
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) {
    return { kind: ErrorKind.ProviderUnavailable, message, transient: true };
  }

  const cause = readProperty(error, 'cause');
  if (cause !== undefined && cause !== error) {
    const fromCause = classifyProviderError(cause);
    if (fromCause.kind !== ErrorKind.MalformedProviderResponse) {
      return { ...fromCause, message };
    }
  }

  return { kind: ErrorKind.MalformedProviderResponse, message };
}

/**
 * Shared attempt bookkeeping: latency, empty-reply detection and error
 * classification. Variants only implement the SDK call.
 */
export abstract class BaseProvider implements LLMProvider {
  constructor(
    readonly name: ProviderName,
    readonly model: string
  ) {}

  protected abstract complete(prompt: string, options: ProviderCallOptions): Promise<string | null | undefined>;

  protected classify(error: unknown): ProviderFailure {
    return classifyProviderError(error);
  }

  async invoke(prompt: string, options: ProviderCallOptions): Promise<RawModelReply> {
    const started = Date.now();
    try {
      const text = await this.complete(prompt, options);
      if (!text || text.trim().length === 0) {
        return this.failure(started, {
          kind: ErrorKind.MalformedProviderResponse,
          message: `${this.name} returned an empty completion`
        });
      }
      return { provider: this.name, text, latencyMs: Date.now() - started, succeeded: true };
    } catch (error) {
      return this.failure(started, this.classify(error));
    }
  }

  private failure(started: number, error: ProviderFailure): RawModelReply {
    return { provider: this.name, text: '', latencyMs: Date.now() - started, succeeded: false, error };
  }
}
