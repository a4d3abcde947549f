import { StructuredSection, TableContent } from '../types';

export interface Block {
  /** Heading text, or null for the text before the first heading. */
  title: string | null;
  lines: string[];
}

const HEADING = /^\s{0,3}#{1,6}\s+(.+?)\s*#*\s*$/;
const PSEUDO_HEADING = /^\s*(\*\*|__)((?:(?!\1).)+)\1\s*:?\s*$/;
const FENCE = /^\s*(```|~~~)/;
const LIST_ITEM = /^\s*(?:[-*+]|\d+[.)])\s+(.*)$/;
const MAX_PSEUDO_HEADING = 80;

function headingText(line: string): string | null {
  const heading = HEADING.exec(line);
  if (heading) {
    return heading[1].trim();
  }
  const pseudo = PSEUDO_HEADING.exec(line);
  if (pseudo && pseudo[2].trim().length > 0 && pseudo[2].length <= MAX_PSEUDO_HEADING) {
    return pseudo[2].trim().replace(/:$/, '').trim();
  }
  return null;
}

/** Splits text on markdown and bold pseudo-headings, ignoring fenced code. */
export function splitIntoBlocks(text: string): Block[] {
  const blocks: Block[] = [];
  let current: Block = { title: null, lines: [] };
  let inFence = false;

  for (const line of text.split(/\r?\n/)) {
    if (FENCE.test(line)) {
      inFence = !inFence;
      current.lines.push(line);
      continue;
    }
    const title = inFence ? null : headingText(line);
    if (title !== null) {
      blocks.push(current);
      current = { title, lines: [] };
    } else {
      current.lines.push(line);
    }
  }
  blocks.push(current);

  // The preamble only counts when it has content.
  return blocks.filter((block) => block.title !== null || block.lines.some((l) => l.trim().length > 0));
}

const ORDINAL = /^(?:\d+(?:\.\d+)*[.)]|\d+(?:\.\d+)+|[a-z][.)]|[ivx]+[.)])\s+/;

export function normalizeKey(title: string): string {
  const key = title
    .toLowerCase()
    .trim()
    .replace(ORDINAL, '')
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return key.length > 0 ? key : 'section';
}

/** Assigns one key per title; repeated keys get `_2`, `_3`... in order. */
export function assignKeys(titles: string[]): string[] {
  const seen = new Map<string, number>();
  return titles.map((title) => {
    const base = normalizeKey(title);
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}

function countUnescapedPipes(line: string): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] === '\\') {
      i++;
    } else if (line[i] === '|') {
      count++;
    }
  }
  return count;
}

export function isSeparatorRow(line: string): boolean {
  return /^[\s|:-]+$/.test(line) && line.includes('-') && line.includes('|');
}

/** Splits a pipe row into trimmed cells, honouring `\|` escapes. */
export function splitRow(line: string): string[] {
  const cells: string[] = [];
  let cell = '';
  const trimmed = line.trim();

  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (ch === '\\' && trimmed[i + 1] === '|') {
      cell += '|';
      i++;
    } else if (ch === '|') {
      cells.push(cell);
      cell = '';
    } else {
      cell += ch;
    }
  }
  cells.push(cell);

  // Outer pipes produce empty edge cells.
  if (trimmed.startsWith('|')) cells.shift();
  if (trimmed.endsWith('|') && !trimmed.endsWith('\\|')) cells.pop();
  return cells.map((c) => c.trim());
}

export interface TableScan {
  tables: TableContent[];
  warnings: string[];
}

export function extractTables(lines: string[], key: string): TableScan {
  const tables: TableContent[] = [];
  const warnings: string[] = [];
  let inFence = false;

  for (let i = 0; i < lines.length; i++) {
    if (FENCE.test(lines[i])) {
      inFence = !inFence;
      continue;
    }
    if (inFence || countUnescapedPipes(lines[i]) < 2 || i + 1 >= lines.length || !isSeparatorRow(lines[i + 1])) {
      continue;
    }

    const headers = splitRow(lines[i]);
    const rows: string[][] = [];
    let rowNumber = 0;
    let j = i + 2;
    for (; j < lines.length && lines[j].trim().length > 0 && countUnescapedPipes(lines[j]) > 0; j++) {
      rowNumber++;
      const cells = splitRow(lines[j]);
      if (cells.length !== headers.length) {
        warnings.push(`table '${key}' row ${rowNumber} dropped: expected ${headers.length} columns, got ${cells.length}`);
        continue;
      }
      rows.push(cells);
    }
    tables.push({ headers, rows });
    i = j - 1;
  }
  return { tables, warnings };
}

/** Returns the list items when every non-blank line is an item or its indented continuation. */
export function extractListItems(lines: string[]): string[] | null {
  const items: string[] = [];
  for (const line of lines) {
    if (line.trim().length === 0) continue;
    const item = LIST_ITEM.exec(line);
    if (item) {
      items.push(item[1].trim());
    } else if (/^\s+\S/.test(line) && items.length > 0) {
      items[items.length - 1] = `${items[items.length - 1]} ${line.trim()}`;
    } else {
      return null;
    }
  }
  return items.length > 0 ? items : null;
}

export interface SectionScan {
  sections: StructuredSection[];
  warnings: string[];
}

export function extractSections(text: string): SectionScan {
  const blocks = splitIntoBlocks(text);
  const keys = assignKeys(blocks.map((block) => block.title ?? 'overview'));
  const sections: StructuredSection[] = [];
  const warnings: string[] = [];

  blocks.forEach((block, index) => {
    const key = keys[index];
    const title = block.title ?? 'Overview';
    const content = block.lines.join('\n').trim();

    const { tables, warnings: tableWarnings } = extractTables(block.lines, key);
    warnings.push(...tableWarnings);
    if (tables.length > 0) {
      sections.push({ key, title, kind: 'table', content: tables[0], tables, text: content });
      return;
    }

    const items = extractListItems(block.lines);
    if (items) {
      sections.push({ key, title, kind: 'list', content, items });
      return;
    }
    sections.push({ key, title, kind: 'narrative', content });
  });

  return { sections, warnings };
}
