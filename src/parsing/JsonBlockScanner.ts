import { errorMessage } from '../errors';

export type JsonScan =
  | { status: 'none' }
  | { status: 'found'; start: number; end: number; value: Record<string, unknown> }
  | { status: 'invalid'; start: number; end: number; reason: string }
  | { status: 'unterminated'; start: number };

/**
 * A `{` only opens a candidate when the next non-blank character could start
 * an object body. Prose placeholders such as `{name}` are skipped.
 */
function opensObject(text: string, index: number): boolean {
  for (let i = index + 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') continue;
    return ch === '"' || ch === '}';
  }
  return false;
}

/**
 * Returns the index of the `}` that closes the object opened at `start`, or -1.
 * Braces inside string literals, including escaped quotes, are not counted.
 */
export function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nextCandidate(text: string, from: number): number {
  let start = text.indexOf('{', from);
  while (start !== -1 && !opensObject(text, start)) {
    start = text.indexOf('{', start + 1);
  }
  return start;
}

function scanAt(text: string, start: number): Exclude<JsonScan, { status: 'none' }> {
  const end = findClosingBrace(text, start);
  if (end === -1) {
    return { status: 'unterminated', start };
  }

  try {
    const value: unknown = JSON.parse(text.slice(start, end + 1));
    if (!isRecord(value)) {
      return { status: 'invalid', start, end, reason: 'not a JSON object' };
    }
    return { status: 'found', start, end, value };
  } catch (error) {
    return { status: 'invalid', start, end, reason: errorMessage(error) };
  }
}

/**
 * Locates and parses the first top-level JSON object embedded in free text.
 * An empty `{}` is only returned when no non-empty object follows it.
 */
export function findFirstObject(text: string): JsonScan {
  const start = nextCandidate(text, 0);
  if (start === -1) {
    return { status: 'none' };
  }

  const first = scanAt(text, start);
  if (first.status !== 'found' || Object.keys(first.value).length > 0) {
    return first;
  }

  for (let next = nextCandidate(text, first.end + 1); next !== -1; ) {
    const later = scanAt(text, next);
    if (later.status === 'found' && Object.keys(later.value).length > 0) {
      return later;
    }
    next = nextCandidate(text, later.status === 'unterminated' ? next + 1 : later.end + 1);
  }
  return first;
}

/**
 * Removes the span `[start, end]` and, when it was the only thing inside a
 * fenced code block, the fence around it.
 */
export function removeSpan(text: string, start: number, end: number): string {
  let before = text.slice(0, start);
  let after = text.slice(end + 1);

  const openFence = /```[a-zA-Z]*[ \t]*\r?\n[ \t]*$/;
  const closeFence = /^[ \t]*\r?\n?[ \t]*```[ \t]*/;
  if (openFence.test(before) && closeFence.test(after)) {
    before = before.replace(openFence, '');
    after = after.replace(closeFence, '');
  }
  return before + after;
}
