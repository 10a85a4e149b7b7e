/**
 * Structured-text parser module.
 *
 * Tokenizes source text with the `marked` lexer and maps the token tree onto
 * the node union of `./types.ts`. Constructs outside the supported subset
 * (emphasis, code spans, block quotes, tables) are flattened to text rather
 * than rejected. The returned tree is frozen.
 *
 * @module core/parser
 */
import { marked } from 'marked';
import type { Token, Tokens } from 'marked';
import { ParseError } from './errors.js';
import { decodeSource, normalizeLineEndings, preprocessSource, utf8Length } from './preprocessor.js';
import type {
  BlockNode,
  DocumentNode,
  HeadingLevel,
  InlineNode,
  ListItemNode,
  Node,
  ParseMetadata,
  ParseResult,
} from './types.js';

// ---------------------------------------------------------------------------
// Fence validation
// ---------------------------------------------------------------------------

const FENCE_OPEN_RE = /^ {0,3}(`{3,}|~{3,})/;

/** Block quote markers, list markers and indentation in front of a line. */
const CONTAINER_PREFIX_RE = /^(?:[ \t]*(?:>|[-*+](?=[ \t])|\d{1,9}[.)](?=[ \t])))*[ \t]*/;

function isFencedCode(token: Token): token is Tokens.Code {
  return token.type === 'code' && token.codeBlockStyle !== 'indented';
}

function rawLines(raw: string): string[] {
  return raw.replace(/\n+$/, '').split('\n');
}

/**
 * Whether a fenced code token ends with a closing run of the opening
 * character, at least as long, followed only by spaces.
 */
function isFenceClosed(token: Tokens.Code): boolean {
  const lines = rawLines(token.raw);
  const open = FENCE_OPEN_RE.exec(lines[0]);
  if (!open) return true;
  if (lines.length < 2) return false;
  const marker = open[1];
  const closing = new RegExp(`^ {0,3}${marker[0]}{${marker.length},}[ \\t]*$`);
  return closing.test(lines[lines.length - 1]);
}

/**
 * Find the source line an unterminated fence opens on.
 *
 * The lexer strips block quote and list prefixes before it sees nested
 * blocks, so fences are matched against source lines with those prefixes
 * removed, in document order.
 */
function locateFence(
  source: string,
  fences: readonly Tokens.Code[],
  target: Tokens.Code,
): { line: number; offset: number } {
  const lines = source.split('\n');
  const content = (index: number) => lines[index].replace(CONTAINER_PREFIX_RE, '').trimEnd();
  let cursor = 0;

  for (const fence of fences) {
    const own = rawLines(fence.raw);
    const opening = own[0].trim();
    while (cursor < lines.length - 1 && content(cursor) !== opening) cursor++;
    if (fence === target) break;
    const closing = own[own.length - 1].trim();
    cursor++;
    while (cursor < lines.length - 1 && content(cursor) !== closing) cursor++;
    cursor++;
  }

  const index = Math.min(cursor, lines.length - 1);
  let offset = 0;
  for (let i = 0; i < index; i++) offset += utf8Length(lines[i]) + 1;
  return { line: index + 1, offset };
}

/**
 * Reject a fenced code block that is never closed, at any nesting depth.
 *
 * @param source - Decoded source with normalized line endings, used to
 *   report the position of the opening fence.
 */
function assertFencesTerminated(tokens: Token[], source: string): void {
  const fences: Tokens.Code[] = [];
  marked.walkTokens(tokens, (token) => {
    if (isFencedCode(token)) fences.push(token);
  });

  const open = fences.find((fence) => !isFenceClosed(fence));
  if (open) {
    const { line, offset } = locateFence(source, fences, open);
    throw new ParseError('Unterminated fenced code block', line, offset);
  }
}

// ---------------------------------------------------------------------------
// Token mapping
// ---------------------------------------------------------------------------

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

/**
 * Undo the HTML escaping the lexer applies to some inline text.
 */
function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-fA-F]+);/gi, (m, hex: string) => fromCodePoint(parseInt(hex, 16), m))
    .replace(/&#(\d+);/g, (m, dec: string) => fromCodePoint(parseInt(dec, 10), m))
    .replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITY_MAP[entity] ?? entity);
}

function fromCodePoint(code: number, fallback: string): string {
  return code <= 0x10ffff ? String.fromCodePoint(code) : fallback;
}

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

function clampHeadingLevel(depth: number): HeadingLevel {
  const index = Math.min(5, Math.max(0, Math.trunc(depth) - 1));
  return HEADING_LEVELS[index];
}

/** Append a text run, merging it into a preceding text node. */
function pushText(nodes: InlineNode[], text: string): void {
  if (text.length === 0) return;
  const last = nodes[nodes.length - 1];
  if (last && last.type === 'text') {
    nodes[nodes.length - 1] = { type: 'text', text: last.text + text };
  } else {
    nodes.push({ type: 'text', text });
  }
}

function mapInline(tokens: Token[] | undefined): InlineNode[] {
  const nodes: InlineNode[] = [];
  if (!tokens) return nodes;

  for (const token of tokens) {
    switch (token.type) {
      case 'link': {
        const link = token as Tokens.Link;
        nodes.push({ type: 'link', href: link.href, children: mapInline(link.tokens) });
        break;
      }
      case 'text': {
        const text = token as Tokens.Text;
        if (text.tokens && text.tokens.length > 0) {
          for (const child of mapInline(text.tokens)) {
            if (child.type === 'text') pushText(nodes, child.text);
            else nodes.push(child);
          }
        } else {
          pushText(nodes, decodeEntities(text.text));
        }
        break;
      }
      case 'strong':
      case 'em':
      case 'del': {
        const children = mapInline((token as Tokens.Strong | Tokens.Em | Tokens.Del).tokens);
        for (const child of children) {
          if (child.type === 'text') pushText(nodes, child.text);
          else nodes.push(child);
        }
        break;
      }
      case 'codespan':
      case 'escape':
        pushText(nodes, decodeEntities((token as Tokens.Codespan | Tokens.Escape).text));
        break;
      case 'image':
        pushText(nodes, (token as Tokens.Image).text);
        break;
      case 'br':
        pushText(nodes, '\n');
        break;
      case 'html':
        pushText(nodes, (token as Tokens.HTML).text);
        break;
      default:
        break;
    }
  }

  return nodes;
}

function mapListItem(item: Tokens.ListItem): ListItemNode {
  return { type: 'listItem', children: mapBlocks(item.tokens) };
}

function mapBlocks(tokens: Token[]): BlockNode[] {
  const blocks: BlockNode[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'heading': {
        const heading = token as Tokens.Heading;
        blocks.push({
          type: 'heading',
          level: clampHeadingLevel(heading.depth),
          children: mapInline(heading.tokens),
        });
        break;
      }
      case 'paragraph':
        blocks.push({ type: 'paragraph', children: mapInline((token as Tokens.Paragraph).tokens) });
        break;
      case 'text': {
        // Tight list items hold their content as block-level text tokens.
        const text = token as Tokens.Text;
        const children = text.tokens ? mapInline(text.tokens) : [];
        if (children.length === 0) pushText(children, decodeEntities(text.text));
        blocks.push({ type: 'paragraph', children });
        break;
      }
      case 'code': {
        const code = token as Tokens.Code;
        blocks.push({ type: 'codeBlock', literal: code.text, lang: code.lang?.trim() ?? '' });
        break;
      }
      case 'list': {
        const list = token as Tokens.List;
        blocks.push({
          type: 'list',
          ordered: list.ordered,
          start: typeof list.start === 'number' ? list.start : 1,
          items: list.items.map(mapListItem),
        });
        break;
      }
      case 'blockquote':
        blocks.push(...mapBlocks((token as Tokens.Blockquote).tokens));
        break;
      case 'table': {
        const table = token as Tokens.Table;
        for (const row of [table.header, ...table.rows]) {
          const text = row.map((cell) => decodeEntities(cell.text)).join(' | ');
          blocks.push({ type: 'paragraph', children: [{ type: 'text', text }] });
        }
        break;
      }
      case 'html': {
        const html = (token as Tokens.HTML).text.trim();
        if (html.length > 0) {
          blocks.push({ type: 'paragraph', children: [{ type: 'text', text: html }] });
        }
        break;
      }
      default:
        // space, hr and link definitions carry no renderable content.
        break;
    }
  }

  return blocks;
}

// ---------------------------------------------------------------------------
// Tree walking
// ---------------------------------------------------------------------------

/**
 * Walk a node tree depth-first in document order, invoking `visitor` on every
 * node (parents before children).
 */
export function walkNodes(node: Node, visitor: (node: Node) => void): void {
  visitor(node);
  switch (node.type) {
    case 'document':
    case 'heading':
    case 'paragraph':
    case 'listItem':
    case 'link':
      for (const child of node.children) walkNodes(child, visitor);
      break;
    case 'list':
      for (const item of node.items) walkNodes(item, visitor);
      break;
    default:
      break;
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Extract metadata from a node tree in a single walk.
 */
function extractMetadata(document: DocumentNode): ParseMetadata {
  let headingCount = 0;
  let hasCodeBlocks = false;
  let hasLinks = false;
  const languageSet = new Set<string>();

  walkNodes(document, (node) => {
    switch (node.type) {
      case 'heading':
        headingCount++;
        break;
      case 'codeBlock':
        hasCodeBlocks = true;
        if (node.lang) languageSet.add(node.lang);
        break;
      case 'link':
        hasLinks = true;
        break;
      default:
        break;
    }
  });

  return { headingCount, hasCodeBlocks, languages: Array.from(languageSet), hasLinks };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse structured text into a frozen document tree.
 *
 * @param source - UTF-8 bytes or an already decoded string.
 * @throws {ParseError} When a fenced code block is never closed. No partial
 *   tree is produced.
 *
 * @example
 * ```ts
 * const doc = parseDocument('# Hello\n\nWorld');
 * doc.children[0].type; // 'heading'
 * ```
 */
export function parseDocument(source: string | Uint8Array): DocumentNode {
  const text = preprocessSource(source);

  if (text.trim().length === 0) {
    const empty: DocumentNode = { type: 'document', children: [] };
    return deepFreeze(empty);
  }

  const tokens = marked.lexer(text, { gfm: true, breaks: false });
  // Positions are reported against the source, before blank lines collapse.
  assertFencesTerminated(tokens, normalizeLineEndings(decodeSource(source)));
  const document: DocumentNode = { type: 'document', children: mapBlocks(tokens) };
  return deepFreeze(document);
}

/**
 * Parse structured text and collect document metadata alongside the tree.
 *
 * @throws {ParseError} See {@link parseDocument}.
 */
export function parseMarkdownDocument(source: string | Uint8Array): ParseResult {
  const document = parseDocument(source);
  return { document, metadata: extractMetadata(document) };
}
