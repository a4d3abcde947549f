import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { RcaConfig } from '../config/RcaConfig';
import { ErrorKind, RcaError, errorMessage, toRcaError } from '../errors';
import { CollectedEvidence } from '../evidence/EvidenceCollector';
import { Logger, createLogger } from '../logging/Logger';
import { ResponseParser } from '../parsing/ResponseParser';
import { PromptAssembler, sourceLabel } from '../prompt/PromptAssembler';
import { PromptTemplate } from '../templates/TemplateManager';
import { TicketingCollaborator } from '../ticketing/types';
import {
  AnalysisRequest,
  AnalysisResult,
  CreatedTicket,
  EvidenceInput,
  EvidenceItem,
  InvokeOptions,
  OutcomeResult,
  ParsedReply,
  ProviderName,
  RawModelReply,
  RunStage
} from '../types';
import { deepFreeze } from '../utils/freeze';
import { withTimeout } from '../utils/timeout';
import { RunTracker, StateMachine } from './StateMachine';
import { TicketPolicy } from './TicketPolicy';

/** The collaborators a run needs; each is an interface so tests can pass fakes. */
export interface EvidenceProvider {
  collect(inputs: readonly EvidenceInput[]): Promise<CollectedEvidence>;
}

export interface TemplateProvider {
  load(templateId: string): Promise<PromptTemplate>;
}

export interface ModelGateway {
  invoke(prompt: string, preference: readonly ProviderName[], options: InvokeOptions): Promise<RawModelReply>;
}

export interface OrchestratorDeps {
  config: RcaConfig;
  evidence: EvidenceProvider;
  templates: TemplateProvider;
  gateway: ModelGateway;
  /** Only supplied when automatic ticket creation is enabled. */
  ticketing?: TicketingCollaborator;
  parser?: ResponseParser;
  logger?: Logger;
  newRunId?: () => string;
}

export interface RunOptions {
  /** Checked between stages; in-flight I/O is left to finish or time out. */
  signal?: AbortSignal;
}

export interface Orchestrator {
  on(event: 'stage', listener: (runId: string, stage: RunStage) => void): this;
  emit(event: 'stage', runId: string, stage: RunStage): boolean;
}

/**
 * Drives one analysis: collect evidence, build the prompt, call the model,
 * parse the reply and open follow-up tickets. Recoverable problems become
 * warnings; stage-fatal ones end the run with a typed failure.
 */
export class Orchestrator extends EventEmitter {
  private machine = new StateMachine();
  private assembler: PromptAssembler;
  private parser: ResponseParser;
  private policy: TicketPolicy;
  private logger: Logger;
  private newRunId: () => string;

  constructor(private deps: OrchestratorDeps) {
    super();
    this.assembler = new PromptAssembler(deps.config.evidence.maxCharsPerItem);
    this.parser = deps.parser ?? new ResponseParser();
    this.policy = new TicketPolicy(deps.config.ticketing);
    this.logger = deps.logger ?? createLogger('Orchestrator');
    this.newRunId = deps.newRunId ?? uuidv4;
  }

  async run(request: AnalysisRequest, options: RunOptions = {}): Promise<OutcomeResult> {
    const runId = this.newRunId();
    const tracker = new RunTracker(this.machine);
    const { config } = this.deps;

    const advance = (stage: RunStage): void => {
      tracker.advance(stage);
      this.logger.debug(`${runId} -> ${stage}`);
      this.emit('stage', runId, stage);
    };
    const fail = (kind: ErrorKind, detail: string, lastReply?: RawModelReply): OutcomeResult => {
      const stage = tracker.stage;
      tracker.fail(detail);
      this.logger.error(`Run ${runId} failed in ${stage}: ${kind}: ${detail}`);
      this.emit('stage', runId, RunStage.Failed);
      return { status: 'failure', runId, kind, detail, ...(lastReply ? { lastReply } : {}) };
    };
    const cancelled = (): boolean => options.signal?.aborted === true;

    this.logger.info(`Run ${runId} started`, { evidence: request.evidence.length, template: request.templateId });
    this.emit('stage', runId, RunStage.Collecting);

    // Collecting
    let collected: CollectedEvidence;
    try {
      collected = await this.deps.evidence.collect(request.evidence);
    } catch (error) {
      return fail(ErrorKind.EvidenceError, toRcaError(error, ErrorKind.EvidenceError).message);
    }
    const evidenceWarnings = collected.failures.map(
      (f) => `evidence ${f.ref.kind} '${f.ref.identifier}' unavailable: ${f.error.message}`
    );
    if (collected.items.length === 0 && request.issueDescription.trim().length === 0) {
      const detail = request.evidence.length === 0
        ? 'No evidence and no issue description were supplied'
        : `None of the ${request.evidence.length} evidence items could be resolved and no issue description was supplied`;
      return fail(ErrorKind.InsufficientInput, detail);
    }

    // Prompting
    if (cancelled()) return fail(ErrorKind.Cancelled, 'Run cancelled before Prompting');
    advance(RunStage.Prompting);
    let prompt: string;
    try {
      const template = await this.deps.templates.load(request.templateId || config.defaultTemplate);
      prompt = this.assembler.build({ template, issueDescription: request.issueDescription, evidence: collected.items });
    } catch (error) {
      return fail(ErrorKind.ConfigurationError, errorMessage(error));
    }

    // Invoking
    if (cancelled()) return fail(ErrorKind.Cancelled, 'Run cancelled before Invoking');
    advance(RunStage.Invoking);
    const preference = request.providerPreference.length > 0 ? request.providerPreference : config.providerOrder;
    let reply: RawModelReply;
    try {
      reply = await this.deps.gateway.invoke(prompt, preference, {
        timeoutMs: config.llm.timeoutMs,
        maxTokens: config.llm.maxTokens,
        temperature: config.llm.temperature
      });
    } catch (error) {
      const failure = toRcaError(error, ErrorKind.ProviderUnavailable);
      return fail(failure.kind, failure.message);
    }
    if (!reply.succeeded) {
      const cause = reply.error ? `${reply.error.kind}: ${reply.error.message}` : 'unknown error';
      return fail(ErrorKind.ProviderUnavailable, `All providers failed; last attempt ${reply.provider} (${cause})`, reply);
    }

    // Parsing
    if (cancelled()) return fail(ErrorKind.Cancelled, 'Run cancelled before Parsing');
    advance(RunStage.Parsing);
    const parsed = this.parseReply(reply.text);
    const result: AnalysisResult = deepFreeze({
      structuredFields: parsed.structuredFields,
      sections: parsed.sections,
      warnings: [...evidenceWarnings, ...parsed.warnings],
      rawText: reply.text,
      providerUsed: reply.provider,
      sourcesUsed: collected.items.map(sourceLabel)
    });

    // PostProcessing
    if (cancelled()) return fail(ErrorKind.Cancelled, 'Run cancelled before PostProcessing');
    advance(RunStage.PostProcessing);
    const { tickets, warnings: ticketWarnings } = await this.createTickets(result, request.issueDescription, collected.items);

    advance(RunStage.Done);

    if (evidenceWarnings.length > 0 || ticketWarnings.length > 0) {
      this.logger.warn(`Run ${runId} completed with warnings`, { evidence: evidenceWarnings.length, tickets: ticketWarnings.length });
      return { status: 'partial_failure', runId, result, warnings: [...result.warnings, ...ticketWarnings], tickets };
    }
    this.logger.info(`Run ${runId} completed`, { provider: reply.provider, sections: result.sections.length });
    return { status: 'success', runId, result, tickets };
  }

  private parseReply(text: string): ParsedReply {
    try {
      return this.parser.parse(text);
    } catch (error) {
      // The raw text is still returned, so a parser fault only costs structure.
      return { structuredFields: null, sections: [], warnings: [`reply could not be structured: ${errorMessage(error)}`] };
    }
  }

  private async createTickets(
    result: AnalysisResult,
    issueDescription: string,
    evidence: readonly EvidenceItem[]
  ): Promise<{ tickets: CreatedTicket[]; warnings: string[] }> {
    const tickets: CreatedTicket[] = [];
    const warnings: string[] = [];

    const requests = this.policy.decide(result.structuredFields, issueDescription);
    if (requests.length === 0) {
      return { tickets, warnings };
    }
    const ticketing = this.deps.ticketing;
    if (!ticketing) {
      this.logger.info(`Analysis qualifies for ${requests.map((r) => r.kind).join(' and ')} tickets; automatic creation is disabled`);
      return { tickets, warnings };
    }

    const timeoutMs = this.deps.config.ticketing.timeoutMs;
    for (const request of requests) {
      const attempt = Promise.resolve()
        .then(() => ticketing.createTicket(request.kind, request.summary, request.description, evidence, { priority: request.priority }))
        .catch((error: unknown) => ({ ok: false as const, error: toRcaError(error, ErrorKind.TicketingError) }));
      const created = await withTimeout(attempt, timeoutMs, () => ({
        ok: false as const,
        error: new RcaError(ErrorKind.TicketingError, `no response within ${timeoutMs}ms`)
      }));

      if (created.ok) {
        tickets.push({ kind: request.kind, id: created.value });
      } else {
        warnings.push(`${request.kind} ticket creation failed: ${created.error.message}`);
      }
    }
    return { tickets, warnings };
  }
}
