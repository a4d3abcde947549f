import * as path from 'path';
import type { LogLevel } from '../logging/Logger';
import type { ProviderName } from '../types';

export type ProviderKind = 'openai' | 'anthropic' | 'openai-compatible';

export interface ProviderSettings {
  readonly kind: ProviderKind;
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl?: string; // required for openai-compatible proxies
}

export interface LlmSettings {
  readonly timeoutMs: number;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly retryBackoffMs: number;
}

export interface EvidenceSettings {
  readonly maxCharsPerItem: number;
  readonly timeoutMs: number;
  readonly allowedExtensions: readonly string[];
  readonly maxFileSizeMb: number;
  readonly redact: boolean;
}

export interface TicketingSettings {
  readonly enabled: boolean;
  readonly baseUrl: string;
  readonly username: string;
  readonly apiToken: string;
  readonly escalationProject: string;
  readonly defectProject: string;
  readonly timeoutMs: number;
  /** Field of the model's JSON block holding the severity label. */
  readonly severityField: string;
  readonly escalationField: string;
  readonly defectField: string;
  /** Ordered from least to most severe. */
  readonly severityLevels: readonly string[];
  /** Lowest severity that triggers automatic ticket creation. */
  readonly escalationSeverity: string;
}

export interface RcaConfig {
  readonly providers: Readonly<Record<ProviderName, ProviderSettings>>;
  readonly providerOrder: readonly ProviderName[];
  readonly llm: LlmSettings;
  readonly promptsDir: string;
  readonly defaultTemplate: string;
  readonly evidence: EvidenceSettings;
  readonly ticketing: TicketingSettings;
  readonly logging: { readonly level: LogLevel };
  readonly outputDir: string;
}

export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

export const DEFAULT_CONFIG = {
  providers: {},
  llm: {
    timeoutMs: 120_000,
    maxTokens: 4000,
    temperature: 0.3,
    retryBackoffMs: 1000
  },
  promptsDir: path.join(PROJECT_ROOT, 'prompts'),
  defaultTemplate: 'formal_rca',
  evidence: {
    maxCharsPerItem: 20_000,
    timeoutMs: 30_000,
    allowedExtensions: ['.txt', '.log', '.md', '.json', '.yaml', '.yml', '.csv', '.xml', '.html', '.pdf', '.zip'],
    maxFileSizeMb: 50,
    redact: true
  },
  ticketing: {
    enabled: false,
    baseUrl: '',
    username: '',
    apiToken: '',
    escalationProject: 'ESC',
    defectProject: 'DEF',
    timeoutMs: 30_000,
    severityField: 'severity',
    escalationField: 'escalation_needed',
    defectField: 'defect_tickets_needed',
    severityLevels: ['Low', 'Medium', 'High', 'Critical'],
    escalationSeverity: 'High'
  },
  logging: { level: 'info' },
  outputDir: './output'
};

/** Per-provider defaults applied when credentials come from the environment. */
export const PROVIDER_DEFAULTS: Record<string, { kind: ProviderKind; model: string; baseUrl?: string }> = {
  openai: { kind: 'openai', model: 'gpt-4o' },
  anthropic: { kind: 'anthropic', model: 'claude-3-5-sonnet-20241022' },
  openrouter: { kind: 'openai-compatible', model: 'anthropic/claude-3.5-sonnet', baseUrl: 'https://openrouter.ai/api/v1' },
  llmproxy: { kind: 'openai-compatible', model: 'gpt-4o' }
};
