import { ErrorKind, RcaError, errorMessage } from '../errors';
import { TicketDetails, TicketReader } from '../ticketing/types';
import { EvidenceItem, Result, err, ok } from '../types';
import { EvidenceSource, freezeItem } from './EvidenceSource';

export function renderTicket(ticket: TicketDetails): string {
  const lines = [
    `Ticket: ${ticket.key}`,
    `Summary: ${ticket.summary}`,
    `Type: ${ticket.issueType}`,
    `Status: ${ticket.status}`,
    `Priority: ${ticket.priority}`,
    '',
    'Description:',
    ticket.description.trim() || '(none)'
  ];

  if (ticket.comments.length > 0) {
    lines.push('', 'Comments:');
    for (const comment of ticket.comments) {
      lines.push(`- ${comment.author} (${comment.created}): ${comment.body.trim()}`);
    }
  }
  if (ticket.links.length > 0) {
    lines.push('', 'Linked issues:', ...ticket.links.map((link) => `- ${link}`));
  }
  return lines.join('\n');
}

export class TicketEvidenceSource implements EvidenceSource {
  readonly kind = 'ticket';

  constructor(private reader: TicketReader) {}

  async fetch(identifier: string): Promise<Result<EvidenceItem>> {
    const key = identifier.trim().toUpperCase();
    try {
      const ticket = await this.reader.getTicket(key);
      return ok(
        freezeItem({
          kind: 'ticket',
          identifier: key,
          text: renderTicket(ticket),
          metadata: {
            key: ticket.key || key,
            summary: ticket.summary,
            status: ticket.status,
            priority: ticket.priority,
            linkedIssues: String(ticket.links.length)
          }
        })
      );
    } catch (error) {
      return err(new RcaError(ErrorKind.EvidenceError, errorMessage(error), { cause: error }));
    }
  }
}
