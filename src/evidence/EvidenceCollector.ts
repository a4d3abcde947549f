import { RcaConfig } from '../config/RcaConfig';
import { ErrorKind, RcaError, toRcaError } from '../errors';
import { Logger, createLogger } from '../logging/Logger';
import { TicketReader } from '../ticketing/types';
import { EvidenceInput, EvidenceItem, EvidenceKind, EvidenceRef, Result, err, isEvidenceItem } from '../types';
import { withTimeout } from '../utils/timeout';
import { EvidenceSource } from './EvidenceSource';
import { FileEvidenceSource } from './FileEvidenceSource';
import { TicketEvidenceSource } from './TicketEvidenceSource';
import { UrlEvidenceSource } from './UrlEvidenceSource';

export interface EvidenceFailure {
  ref: EvidenceRef;
  error: RcaError;
}

export interface CollectedEvidence {
  /** Resolved items, in request order. */
  items: EvidenceItem[];
  failures: EvidenceFailure[];
}

/**
 * Dispatches evidence references to the source for their kind. Items are
 * fetched concurrently, each bounded by its own timeout.
 */
export class EvidenceCollector {
  private sources = new Map<EvidenceKind, EvidenceSource>();
  private logger: Logger;

  constructor(
    sources: EvidenceSource[],
    private settings: { timeoutMs: number },
    logger?: Logger
  ) {
    for (const source of sources) {
      this.sources.set(source.kind, source);
    }
    this.logger = logger ?? createLogger('Evidence');
  }

  /** Ticket evidence is only available when a ticket reader is supplied. */
  static fromConfig(config: RcaConfig, ticketReader?: TicketReader, logger?: Logger): EvidenceCollector {
    const sources: EvidenceSource[] = [new FileEvidenceSource(config.evidence), new UrlEvidenceSource(config.evidence)];
    if (ticketReader) {
      sources.push(new TicketEvidenceSource(ticketReader));
    }
    return new EvidenceCollector(sources, config.evidence, logger);
  }

  async fetch(ref: EvidenceRef): Promise<Result<EvidenceItem>> {
    const source = this.sources.get(ref.kind);
    if (!source) {
      return err(new RcaError(ErrorKind.EvidenceError, `no source configured for ${ref.kind} evidence`));
    }

    const attempt = Promise.resolve()
      .then(() => source.fetch(ref.identifier))
      .catch((error: unknown) => err(toRcaError(error, ErrorKind.EvidenceError)));
    return withTimeout(attempt, this.settings.timeoutMs, () =>
      err(new RcaError(ErrorKind.EvidenceError, `no result within ${this.settings.timeoutMs}ms`))
    );
  }

  async collect(inputs: readonly EvidenceInput[]): Promise<CollectedEvidence> {
    const results = await Promise.all(
      inputs.map(async (input) => {
        if (isEvidenceItem(input)) {
          return { input, result: { ok: true as const, value: input } };
        }
        return { input, result: await this.fetch(input) };
      })
    );

    const collected: CollectedEvidence = { items: [], failures: [] };
    for (const { input, result } of results) {
      if (result.ok) {
        collected.items.push(result.value);
      } else {
        this.logger.warn(`Could not resolve ${input.kind} '${input.identifier}': ${result.error.message}`);
        collected.failures.push({ ref: { kind: input.kind, identifier: input.identifier }, error: result.error });
      }
    }
    this.logger.debug(`Collected ${collected.items.length}/${inputs.length} evidence items`);
    return collected;
  }
}
