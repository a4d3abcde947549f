import * as fs from 'fs-extra';
import * as path from 'path';
import { ErrorKind, RcaError } from '../errors';
import { EvidenceKind, EvidenceRef } from '../types';

export interface IntakeRequest {
  issueDescription: string;
  evidence: EvidenceRef[];
  templateId?: string;
  providerPreference: string[];
  /** Lines in the Evidence section that were not understood. */
  ignored: string[];
}

type Section = 'description' | 'evidence' | 'template' | 'providers' | 'other';

const SECTION_NAMES: Record<string, Section> = {
  'issue description': 'description',
  'description': 'description',
  'evidence': 'evidence',
  'template': 'template',
  'providers': 'providers'
};

const EVIDENCE_LINE = /^[-*]\s*(file|url|ticket)\s*:\s*(.+)$/i;

function isEvidenceKind(value: string): value is EvidenceKind {
  return value === 'file' || value === 'url' || value === 'ticket';
}

/**
 * Reads an analysis request from a markdown intake file with
 * `## Issue Description`, `## Evidence`, `## Template` and `## Providers`
 * sections. Relative file paths are resolved against `baseDir`.
 */
export class IntakeParser {
  static parse(markdown: string, baseDir: string = process.cwd()): IntakeRequest {
    const result: IntakeRequest = { issueDescription: '', evidence: [], providerPreference: [], ignored: [] };
    const descriptionBuffer: string[] = [];
    let currentSection: Section = 'other';

    for (const line of markdown.split(/\r?\n/)) {
      const trim = line.trim();

      const header = /^##\s+(.+?)\s*:?$/.exec(trim);
      if (header) {
        currentSection = SECTION_NAMES[header[1].toLowerCase()] ?? 'other';
        continue;
      }
      if (trim.startsWith('#') && !trim.startsWith('##')) continue; // document title

      switch (currentSection) {
        case 'description':
          descriptionBuffer.push(line);
          break;
        case 'evidence': {
          if (!trim) break;
          const match = EVIDENCE_LINE.exec(trim);
          const kind = match?.[1].toLowerCase() ?? '';
          if (match && isEvidenceKind(kind)) {
            const value = match[2].trim();
            const identifier = kind === 'file' ? path.resolve(baseDir, value) : value;
            result.evidence.push({ kind, identifier });
          } else {
            result.ignored.push(trim);
          }
          break;
        }
        case 'template':
          if (trim && !result.templateId) result.templateId = trim.replace(/^[-*]\s*/, '');
          break;
        case 'providers':
          if (trim) {
            result.providerPreference.push(
              ...trim.replace(/^[-*]\s*/, '').split(',').map((p) => p.trim()).filter((p) => p.length > 0)
            );
          }
          break;
        case 'other':
          break;
      }
    }

    result.issueDescription = descriptionBuffer.join('\n').trim();
    return result;
  }

  static async load(filePath: string): Promise<IntakeRequest> {
    if (!(await fs.pathExists(filePath))) {
      throw new RcaError(ErrorKind.InsufficientInput, `Intake file ${filePath} not found`);
    }
    const markdown = await fs.readFile(filePath, 'utf-8');
    return IntakeParser.parse(markdown, path.dirname(path.resolve(filePath)));
  }
}
