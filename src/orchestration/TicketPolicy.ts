import { TicketingSettings } from '../config/RcaConfig';
import { TicketKind } from '../types';

type PolicySettings = Pick<TicketingSettings, 'severityField' | 'escalationField' | 'defectField' | 'severityLevels' | 'escalationSeverity'>;

export interface TicketRequest {
  kind: TicketKind;
  summary: string;
  description: string;
  priority?: string;
}

const SUMMARY_FIELDS = ['problem_statement', 'executive_summary', 'title'];
const MAX_SUMMARY = 120;

function readFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', 'yes', 'y'].includes(normalized)) return true;
    if (['false', 'no', 'n'].includes(normalized)) return false;
  }
  return undefined;
}

function readText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string').map((v) => `- ${v}`).join('\n');
  }
  return '';
}

function firstLine(text: string): string {
  const line = text.split('\n').find((l) => l.trim().length > 0)?.trim() ?? '';
  return line.length > MAX_SUMMARY ? `${line.slice(0, MAX_SUMMARY - 3)}...` : line;
}

/**
 * Decides which follow-up tickets an analysis warrants. Severity labels and
 * their order come from configuration.
 */
export class TicketPolicy {
  constructor(private settings: PolicySettings) {}

  /** Index in the configured scale, or -1 for an unknown label. */
  severityRank(label: string): number {
    const wanted = label.trim().toLowerCase();
    return this.settings.severityLevels.findIndex((level) => level.toLowerCase() === wanted);
  }

  meetsThreshold(severity: string): boolean {
    const rank = this.severityRank(severity);
    return rank >= 0 && rank >= this.severityRank(this.settings.escalationSeverity);
  }

  decide(structuredFields: Record<string, unknown> | null, issueDescription: string): TicketRequest[] {
    if (!structuredFields) return [];

    const severity = structuredFields[this.settings.severityField];
    if (typeof severity !== 'string' || !this.meetsThreshold(severity)) return [];

    const subject = SUMMARY_FIELDS.map((field) => readText(structuredFields[field])).find((t) => t.length > 0) ?? issueDescription;
    const title = firstLine(subject) || 'Root cause analysis follow-up';
    const priority = typeof structuredFields.priority === 'string' ? structuredFields.priority : severity;
    const description = this.describe(structuredFields, severity, issueDescription);

    const requests: TicketRequest[] = [];
    if (readFlag(structuredFields[this.settings.escalationField]) !== false) {
      requests.push({ kind: 'escalation', summary: `[RCA][${severity}] ${title}`, description, priority });
    }
    if (readFlag(structuredFields[this.settings.defectField]) === true) {
      requests.push({ kind: 'defect', summary: `[RCA][Defect] ${title}`, description, priority });
    }
    return requests;
  }

  private describe(fields: Record<string, unknown>, severity: string, issueDescription: string): string {
    const parts = [`Severity: ${severity}`];
    const sections: [string, unknown][] = [
      ['Issue', issueDescription],
      ['Summary', fields.executive_summary],
      ['Root cause', fields.root_cause],
      ['Recommendations', fields.recommendations]
    ];
    for (const [heading, value] of sections) {
      const body = readText(value);
      if (body) parts.push(`${heading}:\n${body}`);
    }
    return parts.join('\n\n');
  }
}
