import type { ErrorKind, RcaError } from './errors';

export type EvidenceKind = 'file' | 'url' | 'ticket';

export interface EvidenceRef {
  kind: EvidenceKind;
  identifier: string; // path, URL or ticket key
}

export interface EvidenceItem extends EvidenceRef {
  text: string;
  metadata: Record<string, string>;
}

/** Either a reference still to be resolved, or an item collected ahead of the run. */
export type EvidenceInput = EvidenceRef | EvidenceItem;

export function isEvidenceItem(input: EvidenceInput): input is EvidenceItem {
  return 'text' in input && typeof input.text === 'string';
}

/** Name of a configured provider, e.g. "openai" or "llmproxy". */
export type ProviderName = string;

export interface AnalysisRequest {
  issueDescription: string;
  evidence: EvidenceInput[];
  templateId: string;
  providerPreference: ProviderName[];
}

export interface ProviderFailure {
  kind: ErrorKind;
  message: string;
  transient?: boolean; // connection reset, 5xx: worth one retry
}

export interface RawModelReply {
  provider: ProviderName;
  text: string;
  latencyMs: number;
  succeeded: boolean;
  error?: ProviderFailure;
}

export interface InvokeOptions {
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

export interface TableContent {
  headers: string[];
  rows: string[][];
}

interface SectionBase {
  key: string;
  title: string;
}

export interface NarrativeSection extends SectionBase {
  kind: 'narrative';
  content: string;
}

export interface ListSection extends SectionBase {
  kind: 'list';
  content: string;
  items: string[];
}

export interface TableSection extends SectionBase {
  kind: 'table';
  content: TableContent;
  tables: TableContent[];
  text: string; // whole block, including prose around the tables
}

export type StructuredSection = NarrativeSection | ListSection | TableSection;

export interface ParsedReply {
  structuredFields: Record<string, unknown> | null;
  sections: StructuredSection[];
  warnings: string[];
}

export interface AnalysisResult extends ParsedReply {
  rawText: string;
  providerUsed: ProviderName;
  sourcesUsed: string[];
}

export type TicketKind = 'escalation' | 'defect';
export type TicketId = string;

export interface CreatedTicket {
  kind: TicketKind;
  id: TicketId;
}

export type OutcomeResult =
  | { status: 'success'; runId: string; result: AnalysisResult; tickets: CreatedTicket[] }
  | {
      status: 'partial_failure';
      runId: string;
      result: AnalysisResult;
      warnings: string[];
      tickets: CreatedTicket[];
    }
  | { status: 'failure'; runId: string; kind: ErrorKind; detail: string; lastReply?: RawModelReply };

export type Result<T, E = RcaError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export enum RunStage {
  Collecting = 'Collecting',
  Prompting = 'Prompting',
  Invoking = 'Invoking',
  Parsing = 'Parsing',
  PostProcessing = 'PostProcessing',
  Done = 'Done',
  Failed = 'Failed'
}

export interface StageEntry {
  stage: RunStage;
  ts: string;
  detail?: string;
}
