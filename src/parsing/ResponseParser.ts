import { ParsedReply } from '../types';
import { findFirstObject, removeSpan } from './JsonBlockScanner';
import { extractSections } from './MarkdownSections';

/**
 * Turns a free-form model reply into structured fields plus ordered sections.
 *
 * Two independent passes over the same text: the first top-level JSON object
 * becomes `structuredFields`, and the heading scan keeps every narrative, list
 * and table block. Neither pass throws; problems end up in `warnings`.
 */
export class ResponseParser {
  parse(rawText: string): ParsedReply {
    const warnings: string[] = [];
    let structuredFields: Record<string, unknown> | null = null;
    let body = rawText;

    const scan = findFirstObject(rawText);
    switch (scan.status) {
      case 'found':
        structuredFields = scan.value;
        body = removeSpan(rawText, scan.start, scan.end);
        break;
      case 'invalid':
        warnings.push(`structured JSON block could not be parsed: ${scan.reason}`);
        break;
      case 'unterminated':
        warnings.push('structured JSON block is unterminated');
        break;
      case 'none':
        break;
    }

    const { sections, warnings: sectionWarnings } = extractSections(body);
    warnings.push(...sectionWarnings);

    return { structuredFields, sections, warnings };
  }
}

