import { EvidenceItem, Result, TicketId, TicketKind } from '../types';

export interface TicketComment {
  author: string;
  created: string;
  body: string;
}

export interface TicketDetails {
  key: string;
  summary: string;
  status: string;
  priority: string;
  issueType: string;
  description: string;
  comments: TicketComment[];
  /** "relates to OPS-12"-style descriptions of linked issues. */
  links: string[];
}

/** Creates follow-up tickets after an analysis. Never throws; failures come back as Results. */
export interface TicketingCollaborator {
  createTicket(
    kind: TicketKind,
    summary: string,
    description: string,
    linkedEvidence: readonly EvidenceItem[],
    options?: { priority?: string }
  ): Promise<Result<TicketId>>;
}

/** Reads an existing ticket so it can be used as evidence. */
export interface TicketReader {
  getTicket(key: string): Promise<TicketDetails>;
}
