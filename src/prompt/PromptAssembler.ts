import * as path from 'path';
import { PromptTemplate } from '../templates/TemplateManager';
import { EvidenceItem } from '../types';

export const TRUNCATION_MARKER = '[...truncated...]';

/** Human label for one evidence item, e.g. `File: app.log` or `Ticket: OPS-12`. */
export function sourceLabel(item: EvidenceItem): string {
  switch (item.kind) {
    case 'file':
      return `File: ${item.metadata.fileName ?? path.basename(item.identifier)}`;
    case 'url':
      return `URL: ${item.identifier}`;
    case 'ticket':
      return `Ticket: ${item.identifier}`;
  }
}

/** Cuts at `maxChars` UTF-16 units, stepping back rather than splitting a surrogate pair. */
export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  let cut = maxChars;
  const last = text.charCodeAt(cut - 1);
  if (cut > 0 && last >= 0xd800 && last <= 0xdbff) {
    cut--;
  }
  return `${text.slice(0, cut)}\n${TRUNCATION_MARKER}`;
}

function titleCase(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

export interface PromptInput {
  template: PromptTemplate;
  issueDescription: string;
  evidence: readonly EvidenceItem[];
}

/**
 * Builds the single prompt string sent to the model: template body, issue
 * description, domain contexts, source data and format instructions.
 */
export class PromptAssembler {
  constructor(private maxCharsPerItem: number) {}

  build(input: PromptInput): string {
    const parts: string[] = [input.template.body.trim()];

    if (input.issueDescription.trim()) {
      parts.push(`## Issue Description:\n${input.issueDescription.trim()}`);
    }

    for (const context of input.template.contexts) {
      parts.push(`## ${titleCase(context.name)}:\n${context.text.trim()}`);
    }

    const sourceData = input.evidence.length > 0
      ? input.evidence.map((item) => `### ${sourceLabel(item)}\n${truncate(item.text, this.maxCharsPerItem)}`).join('\n\n')
      : 'No source data was provided; work from the issue description.';
    parts.push(`## Source Data for Analysis:\n${sourceData}`);

    if (input.template.formatInstructions) {
      parts.push(input.template.formatInstructions.trim());
    }

    return parts.join('\n\n');
  }
}
