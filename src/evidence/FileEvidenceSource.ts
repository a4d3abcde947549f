import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import AdmZip from 'adm-zip';
import { EvidenceSettings } from '../config/RcaConfig';
import { ErrorKind, RcaError, errorMessage } from '../errors';
import { Logger, createLogger } from '../logging/Logger';
import { EvidenceItem, Result, err, ok } from '../types';
import { EvidenceSource, freezeItem } from './EvidenceSource';
import { Redactor } from './Redactor';

type FileSettings = Pick<EvidenceSettings, 'allowedExtensions' | 'maxFileSizeMb' | 'redact'>;

const MEDIA_TYPES: Record<string, string> = {
  '.json': 'application/json',
  '.log': 'text/plain',
  '.txt': 'text/plain',
  '.csv': 'text/csv',
  '.xml': 'application/xml',
  '.html': 'text/html',
  '.yml': 'application/yaml',
  '.yaml': 'application/yaml',
  '.md': 'text/markdown',
  '.zip': 'application/zip',
  '.pdf': 'application/pdf'
};

export function sniffType(ext: string): string {
  return MEDIA_TYPES[ext] ?? 'application/octet-stream';
}

/** Extracts the text layer of a PDF. The parser is loaded on first use. */
export async function extractPdfText(buffer: Buffer): Promise<{ text: string; pages: number }> {
  const { default: parsePdf } = await import('pdf-parse');
  const parsed = await parsePdf(buffer);
  const text = parsed.text.trim();
  if (!text) {
    throw new Error('no extractable text (scanned or image-only PDF?)');
  }
  return { text, pages: parsed.numpages };
}

/**
 * Reads local files (text, PDF, and zip bundles of either) as evidence. Text is
 * redacted before it leaves this class when redaction is enabled.
 */
export class FileEvidenceSource implements EvidenceSource {
  readonly kind = 'file';
  private redactor: Redactor;
  private logger: Logger;

  constructor(
    private settings: FileSettings,
    options: { redactor?: Redactor; logger?: Logger } = {}
  ) {
    this.redactor = options.redactor ?? new Redactor();
    this.logger = options.logger ?? createLogger('Evidence:file');
  }

  async fetch(identifier: string): Promise<Result<EvidenceItem>> {
    const filePath = path.resolve(identifier);
    const ext = path.extname(filePath).toLowerCase();

    if (!(await fs.pathExists(filePath))) {
      return err(new RcaError(ErrorKind.EvidenceError, `file not found: ${filePath}`));
    }
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      return err(new RcaError(ErrorKind.EvidenceError, `not a regular file: ${filePath}`));
    }
    if (!this.settings.allowedExtensions.includes(ext)) {
      return err(new RcaError(ErrorKind.EvidenceError, `file extension not allowed: ${ext || '(none)'}`));
    }
    const maxBytes = this.settings.maxFileSizeMb * 1024 * 1024;
    if (stat.size > maxBytes) {
      return err(new RcaError(ErrorKind.EvidenceError, `file too large: ${stat.size} bytes (max ${maxBytes})`));
    }

    const buffer = await fs.readFile(filePath);
    const sha256 = crypto.createHash('sha256').update(buffer).digest('hex');

    let content: string;
    let entries: number | undefined;
    let pages: number | undefined;
    if (ext === '.zip') {
      try {
        const expanded = await this.expandZip(buffer);
        content = expanded.text;
        entries = expanded.entries;
      } catch (error) {
        return err(new RcaError(ErrorKind.EvidenceError, `cannot read zip archive: ${errorMessage(error)}`, { cause: error }));
      }
    } else if (ext === '.pdf') {
      try {
        const extracted = await extractPdfText(buffer);
        content = extracted.text;
        pages = extracted.pages;
      } catch (error) {
        return err(new RcaError(ErrorKind.EvidenceError, `cannot read PDF: ${errorMessage(error)}`, { cause: error }));
      }
    } else {
      content = buffer.toString('utf-8');
    }

    let appliedRules: string[] = [];
    if (this.settings.redact) {
      const { redacted, check } = this.redactor.process(content);
      content = redacted;
      appliedRules = check.appliedRules;
      if (check.hasChanges) {
        this.logger.debug(`Redacted ${path.basename(filePath)}`, { rules: appliedRules });
      }
    }

    const metadata: Record<string, string> = {
      fileName: path.basename(filePath),
      mediaType: sniffType(ext),
      sizeBytes: String(stat.size),
      sha256,
      redacted: String(appliedRules.length > 0),
      redactionRules: appliedRules.join(',')
    };
    if (entries !== undefined) {
      metadata.entries = String(entries);
    }
    if (pages !== undefined) {
      metadata.pages = String(pages);
    }

    return ok(freezeItem({ kind: 'file', identifier: filePath, text: content, metadata }));
  }

  /** Concatenates every allowed entry under a `--- <entry> ---` header. */
  private async expandZip(buffer: Buffer): Promise<{ text: string; entries: number }> {
    const zip = new AdmZip(buffer);
    const parts: string[] = [];

    for (const entry of zip.getEntries()) {
      if (entry.isDirectory) continue;
      const ext = path.extname(entry.entryName).toLowerCase();
      if (ext === '.zip' || !this.settings.allowedExtensions.includes(ext)) {
        this.logger.debug(`Skipping zip entry ${entry.entryName}`);
        continue;
      }
      const data = entry.getData();
      const text = ext === '.pdf' ? (await extractPdfText(data)).text : data.toString('utf-8');
      parts.push(`--- ${entry.entryName} ---\n${text}`);
    }

    if (parts.length === 0) {
      throw new Error('archive contains no readable text files');
    }
    return { text: parts.join('\n\n'), entries: parts.length };
  }
}
