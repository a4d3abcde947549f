import { TicketingSettings } from '../config/RcaConfig';
import { ErrorKind, RcaError, errorMessage, toRcaError } from '../errors';
import { Logger, createLogger } from '../logging/Logger';
import { sourceLabel } from '../prompt/PromptAssembler';
import { EvidenceItem, Result, TicketId, TicketKind, err, ok } from '../types';
import { TicketComment, TicketDetails, TicketReader, TicketingCollaborator } from './types';

type JiraSettings = Pick<TicketingSettings, 'baseUrl' | 'username' | 'apiToken' | 'escalationProject' | 'defectProject' | 'timeoutMs'>;

export interface CreateTicketOptions {
  priority?: string;
}

const ISSUE_TYPES: Record<TicketKind, string> = {
  escalation: 'Task',
  defect: 'Bug'
};

function get(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function text(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function nameOf(value: unknown, fallback = ''): string {
  return text(get(value, 'name'), fallback);
}

function toComment(raw: unknown): TicketComment {
  return {
    author: text(get(get(raw, 'author'), 'displayName'), 'unknown'),
    created: text(get(raw, 'created')),
    body: text(get(raw, 'body'))
  };
}

function toLink(raw: unknown): string | null {
  const type = get(raw, 'type');
  const outward = text(get(get(raw, 'outwardIssue'), 'key'));
  if (outward) return `${text(get(type, 'outward'), 'relates to')} ${outward}`;
  const inward = text(get(get(raw, 'inwardIssue'), 'key'));
  if (inward) return `${text(get(type, 'inward'), 'relates to')} ${inward}`;
  return null;
}

/** Maps a Jira REST v2 issue document to the fields used as evidence. */
export function toTicketDetails(issue: unknown): TicketDetails {
  const fields = get(issue, 'fields');
  const comments = get(get(fields, 'comment'), 'comments');
  const links = get(fields, 'issuelinks');

  return {
    key: text(get(issue, 'key')),
    summary: text(get(fields, 'summary')),
    status: nameOf(get(fields, 'status'), 'Unknown'),
    priority: nameOf(get(fields, 'priority'), 'None'),
    issueType: nameOf(get(fields, 'issuetype'), 'Unknown'),
    description: text(get(fields, 'description')),
    comments: Array.isArray(comments) ? comments.map(toComment) : [],
    links: Array.isArray(links) ? links.map(toLink).filter((l): l is string => l !== null) : []
  };
}

/**
 * Jira REST v2 client over basic auth. Creates escalation and defect tickets
 * and reads existing tickets for evidence.
 */
export class JiraClient implements TicketingCollaborator, TicketReader {
  private logger: Logger;

  constructor(
    private settings: JiraSettings,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('Jira');
  }

  async createTicket(
    kind: TicketKind,
    summary: string,
    description: string,
    linkedEvidence: readonly EvidenceItem[],
    options: CreateTicketOptions = {}
  ): Promise<Result<TicketId>> {
    const project = kind === 'escalation' ? this.settings.escalationProject : this.settings.defectProject;
    const evidenceList = linkedEvidence.map((item) => `- ${sourceLabel(item)}`).join('\n');
    const body = {
      fields: {
        project: { key: project },
        summary: summary.slice(0, 250),
        description: evidenceList ? `${description}\n\nEvidence:\n${evidenceList}` : description,
        issuetype: { name: ISSUE_TYPES[kind] },
        ...(options.priority ? { priority: { name: options.priority } } : {})
      }
    };

    try {
      const created = await this.request('POST', '/rest/api/2/issue', body);
      const key = text(get(created, 'key'));
      if (!key) {
        return err(new RcaError(ErrorKind.TicketingError, 'Jira response did not include an issue key'));
      }
      this.logger.info(`Created ${kind} ticket ${key} in ${project}`);
      return ok(key);
    } catch (error) {
      return err(toRcaError(error, ErrorKind.TicketingError));
    }
  }

  async getTicket(key: string): Promise<TicketDetails> {
    const fields = 'summary,status,priority,issuetype,description,comment,issuelinks';
    const issue = await this.request('GET', `/rest/api/2/issue/${encodeURIComponent(key)}?fields=${fields}`);
    return toTicketDetails(issue);
  }

  private async request(method: 'GET' | 'POST', urlPath: string, body?: unknown): Promise<unknown> {
    if (!this.settings.baseUrl) {
      throw new RcaError(ErrorKind.ConfigurationError, 'Jira base URL is not configured');
    }

    const url = `${this.settings.baseUrl.replace(/\/+$/, '')}${urlPath}`;
    const auth = Buffer.from(`${this.settings.username}:${this.settings.apiToken}`).toString('base64');
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);

    try {
      const response = await fetch(url, {
        method,
        headers: {
          authorization: `Basic ${auth}`,
          accept: 'application/json',
          ...(body === undefined ? {} : { 'content-type': 'application/json' })
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal
      });

      const contentType = response.headers.get('content-type') ?? '';
      const payload: unknown = contentType.includes('application/json') ? await response.json().catch(() => ({})) : {};

      if (!response.ok) {
        const messages = get(payload, 'errorMessages');
        const detail = Array.isArray(messages) ? messages.filter((m) => typeof m === 'string').join('; ') : '';
        throw new RcaError(ErrorKind.TicketingError, `Jira ${method} ${urlPath} failed (${response.status})${detail ? `: ${detail}` : ''}`);
      }
      return payload;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new RcaError(ErrorKind.TicketingError, `Jira request timed out after ${this.settings.timeoutMs}ms`, { cause: error });
      }
      if (error instanceof RcaError) throw error;
      throw new RcaError(ErrorKind.TicketingError, `Jira request failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
