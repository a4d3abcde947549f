/**
 * Error kinds shared by every stage of an analysis run.
 *
 * Known conditions are always classified into one of these kinds so callers can
 * pick a message ("try a different provider" vs "add evidence") without parsing
 * error strings.
 */
export enum ErrorKind {
  InsufficientInput = 'InsufficientInput',
  ConfigurationError = 'ConfigurationError',
  ProviderAuthError = 'ProviderAuthError',
  ProviderQuotaError = 'ProviderQuotaError',
  ProviderTimeout = 'ProviderTimeout',
  ProviderUnavailable = 'ProviderUnavailable',
  MalformedProviderResponse = 'MalformedProviderResponse',
  TicketingError = 'TicketingError',
  InternalParseWarning = 'InternalParseWarning',
  EvidenceError = 'EvidenceError',
  Cancelled = 'Cancelled'
}

export class RcaError extends Error {
  readonly kind: ErrorKind;
  readonly transient: boolean;

  constructor(kind: ErrorKind, message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super(message);
    this.name = 'RcaError';
    this.kind = kind;
    this.transient = options.transient ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

const USER_MESSAGES: Record<ErrorKind, string> = {
  [ErrorKind.InsufficientInput]: 'Add at least one evidence source or describe the issue, then run the analysis again.',
  [ErrorKind.ConfigurationError]: 'Check the configuration file and the selected analysis template.',
  [ErrorKind.ProviderAuthError]: 'The provider rejected the credentials. Check the API key or try a different provider.',
  [ErrorKind.ProviderQuotaError]: 'The provider quota or billing limit was reached. Try a different provider.',
  [ErrorKind.ProviderTimeout]: 'The provider did not answer in time. Try again or choose a different provider.',
  [ErrorKind.ProviderUnavailable]: 'No language model provider could complete the analysis. Try a different provider or check connectivity.',
  [ErrorKind.MalformedProviderResponse]: 'The provider returned an unusable response. Try again or choose a different provider.',
  [ErrorKind.TicketingError]: 'Tickets could not be created. Create them manually from the analysis.',
  [ErrorKind.InternalParseWarning]: 'Part of the model reply could not be structured; the full text is still available.',
  [ErrorKind.EvidenceError]: 'An evidence source could not be read. Check the path, URL or ticket key.',
  [ErrorKind.Cancelled]: 'The analysis was cancelled.'
};

export function userMessageFor(kind: ErrorKind): string {
  return USER_MESSAGES[kind];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wraps anything thrown inside a stage into an RcaError of that stage's kind. */
export function toRcaError(error: unknown, fallbackKind: ErrorKind): RcaError {
  if (error instanceof RcaError) return error;
  return new RcaError(fallbackKind, errorMessage(error), { cause: error });
}
