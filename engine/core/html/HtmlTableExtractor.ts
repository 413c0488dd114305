/**
 * Tablepaste Engine - HTML Table Extractor
 *
 * Browsers put a `text/html` flavour on the clipboard next to the plain
 * text. Flattening its first <table> to tab-delimited lines gives the
 * reconstruction pipeline exact cell boundaries, including cells the
 * plain-text flavour split across lines.
 *
 * - colspan: cell followed by n-1 empty cells
 * - rowspan: cell text repeated in the same column of the next n-1 rows
 * - <br>, <p>, <div>, <li>: cell parts joined with "; "
 * - display:none, <style>, <script>, <caption>: skipped
 *
 * Clipboard HTML is not XML: attribute values may be bare (`colspan=2`)
 * and cells or rows are often left open. The markup is repaired first so
 * the XML parser sees the same cells a browser would.
 */

import { XMLParser } from 'fast-xml-parser';
import { HtmlTableError } from '../errors/ReconstructionError.js';

const CELL_PART_SEPARATOR = '; ';
const MAX_SPAN = 1000;

const UNPAIRED_TAGS = ['br', 'img', 'hr', 'wbr', 'col', 'input', 'meta', 'link'];
const VOID_TAGS = new Set(UNPAIRED_TAGS);
const BREAK_TAGS = new Set(['br', 'p', 'div', 'li']);
const SKIPPED_TAGS = new Set(['style', 'script', 'caption', 'table']);
const SECTION_TAGS = new Set(['thead', 'tbody', 'tfoot']);
const CELL_TAGS = new Set(['td', 'th']);

const HIDDEN_STYLE = /display\s*:\s*none/i;
const COMMENT = /<!--[\s\S]*?-->/g;

// Raw-text elements whole, or one tag: slash, name, attribute text
const MARKUP_TOKEN = /<(script|style)\b[\s\S]*?<\/\1\s*>|<(\/?)([a-zA-Z][\w:-]*)((?:"[^"]*"|'[^']*'|[^'"<>])*)>/gi;
// Attribute with an optional value; only a bare value is captured
const ATTRIBUTE = /([^\s"'<>\/=]+)(?:\s*=\s*(?:"[^"]*"|'[^']*'|([^\s"'=<>`]+)))?/g;
const SELF_CLOSING = /\/\s*$/;

// XML Parser configuration (ordered output keeps sibling order of cells)
const parserOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  allowBooleanAttributes: true,
  htmlEntities: true,
  unpairedTags: UNPAIRED_TAGS,
  stopNodes: ['*.script', '*.style'],
  transformTagName: (name: string) => name.toLowerCase(),
};

const htmlParser = new XMLParser(parserOptions);

// =============================================================================
// Ordered-node helpers
// =============================================================================

type OrderedNode = Record<string, unknown>;

interface ElementNode {
  tag: string;
  attributes: Record<string, string>;
  children: unknown[];
}

function isRecord(value: unknown): value is OrderedNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asElement(node: unknown): ElementNode | null {
  if (!isRecord(node)) return null;
  const tag = Object.keys(node).find(key => key !== ':@' && key !== '#text');
  if (tag === undefined) return null;

  const attributes: Record<string, string> = {};
  const rawAttributes = node[':@'];
  if (isRecord(rawAttributes)) {
    for (const [name, value] of Object.entries(rawAttributes)) {
      attributes[name] = typeof value === 'string' ? value : String(value);
    }
  }

  const children = node[tag];
  return { tag, attributes, children: Array.isArray(children) ? children : [] };
}

function textOf(node: unknown): string | null {
  if (!isRecord(node)) return null;
  const text = node['#text'];
  if (typeof text === 'string') return text;
  if (typeof text === 'number' || typeof text === 'boolean') return String(text);
  return null;
}

function isHidden(element: ElementNode): boolean {
  const style = element.attributes['style'];
  return style !== undefined && HIDDEN_STYLE.test(style);
}

function findFirst(nodes: unknown[], tag: string): ElementNode | null {
  for (const node of nodes) {
    const element = asElement(node);
    if (element === null) continue;
    if (element.tag === tag) return element;
    const nested = findFirst(element.children, tag);
    if (nested) return nested;
  }
  return null;
}

function spanOf(value: string | undefined): number {
  if (value === undefined) return 1;
  const span = Number.parseInt(value, 10);
  if (!Number.isFinite(span) || span < 1) return 1;
  return Math.min(span, MAX_SPAN);
}

// =============================================================================
// Cell text
// =============================================================================

function collectParts(nodes: unknown[], parts: string[]): void {
  for (const node of nodes) {
    const text = textOf(node);
    if (text !== null) {
      parts[parts.length - 1] += text;
      continue;
    }

    const element = asElement(node);
    if (element === null || SKIPPED_TAGS.has(element.tag) || isHidden(element)) continue;

    if (BREAK_TAGS.has(element.tag)) parts.push('');
    collectParts(element.children, parts);
    if (BREAK_TAGS.has(element.tag) && element.tag !== 'br') parts.push('');
  }
}

/**
 * Visible text of a cell, one line.
 */
export function cellText(cell: ElementNode): string {
  const parts = [''];
  collectParts(cell.children, parts);
  return parts
    .map(part => part.replace(/\s+/g, ' ').trim())
    .filter(part => part !== '')
    .join(CELL_PART_SEPARATOR);
}

// =============================================================================
// Rows
// =============================================================================

function collectRowElements(nodes: unknown[], rows: ElementNode[]): void {
  for (const node of nodes) {
    const element = asElement(node);
    if (element === null || isHidden(element)) continue;
    if (element.tag === 'tr') {
      rows.push(element);
    } else if (SECTION_TAGS.has(element.tag)) {
      collectRowElements(element.children, rows);
    }
  }
}

interface PendingSpan {
  text: string;
  remaining: number;
}

/**
 * Lay out the rows of a table element as a grid, expanding spans.
 */
export function tableGrid(table: ElementNode): string[][] {
  const rowElements: ElementNode[] = [];
  collectRowElements(table.children, rowElements);

  const pending = new Map<number, PendingSpan>();
  const grid: string[][] = [];

  for (const rowElement of rowElements) {
    const row: string[] = [];

    const fillPending = (): void => {
      let span = pending.get(row.length);
      while (span !== undefined) {
        row.push(span.text);
        span.remaining--;
        if (span.remaining === 0) pending.delete(row.length - 1);
        span = pending.get(row.length);
      }
    };

    for (const node of rowElement.children) {
      const cell = asElement(node);
      if (cell === null || !CELL_TAGS.has(cell.tag) || isHidden(cell)) continue;

      fillPending();
      const text = cellText(cell);
      const colspan = spanOf(cell.attributes['colspan']);
      const rowspan = spanOf(cell.attributes['rowspan']);

      for (let k = 0; k < colspan; k++) {
        const value = k === 0 ? text : '';
        if (rowspan > 1) pending.set(row.length, { text: value, remaining: rowspan - 1 });
        row.push(value);
      }
    }
    fillPending();

    grid.push(row);
  }

  return grid;
}

// =============================================================================
// Markup repair
// =============================================================================

/** Open structure of one <table> level while repairing */
interface TableScope {
  /** Open cell tag, if any */
  cell: string | null;
  row: boolean;
  /** Elements opened inside the current cell, innermost last */
  inner: string[];
}

function quoteAttributes(attributes: string): string {
  return attributes.replace(ATTRIBUTE, (match: string, name: string, bare: string | undefined) =>
    bare === undefined ? match : `${name}="${bare}"`
  );
}

function closeInner(scope: TableScope, depth: number): string {
  const closed = scope.inner.splice(depth);
  return closed.reverse().map(tag => `</${tag}>`).join('');
}

function closeCell(scope: TableScope): string {
  if (scope.cell === null) return '';
  const closing = `${closeInner(scope, 0)}</${scope.cell}>`;
  scope.cell = null;
  return closing;
}

function closeRow(scope: TableScope): string {
  const closing = closeCell(scope);
  if (!scope.row) return closing;
  scope.row = false;
  return `${closing}</tr>`;
}

/**
 * Quote bare attribute values and close what the markup left open: a cell
 * ends at the next cell, row, section or table end, a row at the next row,
 * section or table end. Stray end tags inside a table are dropped.
 */
export function repairTableMarkup(markup: string): string {
  const scopes: TableScope[] = [];

  return markup.replace(
    MARKUP_TOKEN,
    (
      token: string,
      rawTextElement: string | undefined,
      slash: string | undefined,
      rawName: string | undefined,
      attributes: string | undefined
    ) => {
      if (rawTextElement !== undefined || rawName === undefined) return token;

      const name = rawName.toLowerCase();
      const isEnd = slash === '/';
      const selfClosing = SELF_CLOSING.test(attributes ?? '');
      const tag = isEnd ? `</${name}>` : `<${rawName}${quoteAttributes(attributes ?? '')}>`;

      if (name === 'table') {
        if (!isEnd) {
          if (!selfClosing) scopes.push({ cell: null, row: false, inner: [] });
          return tag;
        }
        const ended = scopes.pop();
        return ended === undefined ? tag : `${closeRow(ended)}${tag}`;
      }

      const scope = scopes.at(-1);
      if (scope === undefined) return tag;

      if (CELL_TAGS.has(name)) {
        if (isEnd) return closeCell(scope);
        const closing = closeCell(scope);
        if (!selfClosing) scope.cell = name;
        return `${closing}${tag}`;
      }

      if (name === 'tr') {
        if (isEnd) return closeRow(scope);
        const closing = closeRow(scope);
        scope.row = !selfClosing;
        return `${closing}${tag}`;
      }

      if (SECTION_TAGS.has(name)) {
        return `${closeRow(scope)}${tag}`;
      }

      if (scope.cell === null || VOID_TAGS.has(name) || selfClosing) return tag;

      if (!isEnd) {
        scope.inner.push(name);
        return tag;
      }
      const depth = scope.inner.lastIndexOf(name);
      return depth === -1 ? '' : closeInner(scope, depth);
    }
  );
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Cut the markup down to the outermost table, dropping clipboard headers
 * and fragment comments around it.
 */
export function isolateTableMarkup(html: string): string | null {
  const withoutComments = html.replace(COMMENT, '');
  const lower = withoutComments.toLowerCase();
  const start = lower.search(/<table[\s>]/);
  const end = lower.lastIndexOf('</table>');
  if (start === -1 || end < start) return null;
  return withoutComments.slice(start, end + '</table>'.length);
}

/**
 * Flatten the first table of an HTML fragment to tab-delimited text.
 * Returns null when the fragment holds no table rows.
 *
 * @throws HtmlTableError when the markup cannot be parsed
 */
export function extractHtmlTable(html: string): string | null {
  const markup = isolateTableMarkup(html);
  if (markup === null) return null;

  let parsed: unknown;
  try {
    parsed = htmlParser.parse(repairTableMarkup(markup));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new HtmlTableError(`Failed to parse table markup: ${errorMessage}`, 'malformed');
  }

  const table = findFirst(Array.isArray(parsed) ? parsed : [], 'table');
  if (table === null) return null;

  const grid = tableGrid(table);
  if (grid.length === 0) return null;

  return grid
    .map(row => row.map(cell => cell.replace(/[\t\r\n]+/g, ' ')).join('\t'))
    .join('\n');
}

export type { ElementNode };
