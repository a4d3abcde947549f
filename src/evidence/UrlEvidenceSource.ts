import { ErrorKind, RcaError, errorMessage } from '../errors';
import { Logger, createLogger } from '../logging/Logger';
import { EvidenceItem, Result, err, ok } from '../types';
import { EvidenceSource, freezeItem } from './EvidenceSource';

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' '
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match: string, entity: string) => {
    if (entity[0] === '#') {
      const code = entity[1].toLowerCase() === 'x' ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export function extractTitle(html: string): string {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  return match ? decodeEntities(match[1]).replace(/\s+/g, ' ').trim() : '';
}

/** Reduces an HTML page to readable text: one line per block element, no markup. */
export function htmlToText(html: string): string {
  const text = html
    .replace(/<(script|style|noscript|head)\b[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|tr|h[1-6]|pre|section|article|table|ul|ol)>/gi, '\n')
    .replace(/<[^>]+>/g, ' ');

  return decodeEntities(text)
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/** Fetches a web page over HTTP(S) and keeps its readable text. */
export class UrlEvidenceSource implements EvidenceSource {
  readonly kind = 'url';
  private logger: Logger;

  constructor(
    private settings: { timeoutMs: number },
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('Evidence:url');
  }

  async fetch(identifier: string): Promise<Result<EvidenceItem>> {
    let url: URL;
    try {
      url = new URL(identifier);
    } catch {
      return err(new RcaError(ErrorKind.EvidenceError, `invalid URL: ${identifier}`));
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return err(new RcaError(ErrorKind.EvidenceError, `unsupported URL scheme: ${url.protocol}`));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: { 'user-agent': 'rca-assistant', accept: 'text/html,text/plain,application/json;q=0.9,*/*;q=0.5' },
        redirect: 'follow',
        signal: controller.signal
      });
      if (!response.ok) {
        await response.body?.cancel();
        return err(new RcaError(ErrorKind.EvidenceError, `HTTP ${response.status} from ${identifier}`));
      }

      const contentType = response.headers.get('content-type') ?? '';
      const body = await response.text();
      const isHtml = contentType.includes('html') || /^\s*<(!doctype html|html)/i.test(body);
      const text = isHtml ? htmlToText(body) : body.trim();

      this.logger.debug(`Fetched ${identifier}`, { status: response.status, chars: text.length });
      return ok(
        freezeItem({
          kind: 'url',
          identifier,
          text,
          metadata: {
            url: identifier,
            status: String(response.status),
            contentType,
            title: isHtml ? extractTitle(body) : ''
          }
        })
      );
    } catch (error) {
      if (controller.signal.aborted) {
        return err(new RcaError(ErrorKind.EvidenceError, `no response within ${this.settings.timeoutMs}ms`, { cause: error }));
      }
      return err(new RcaError(ErrorKind.EvidenceError, errorMessage(error), { cause: error }));
    } finally {
      clearTimeout(timeout);
    }
  }
}
