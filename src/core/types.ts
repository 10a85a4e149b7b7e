/**
 * Node tree produced by the document parser.
 *
 * The tree is a tagged union keyed on `type`. Nodes are readonly and the
 * parser freezes every node it returns, so a tree can be rendered any number
 * of times without being changed.
 */

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

/** Literal text. */
export interface TextNode {
  readonly type: 'text';
  readonly text: string;
}

/** An inline link; its children carry the visible text. */
export interface LinkNode {
  readonly type: 'link';
  readonly href: string;
  readonly children: readonly InlineNode[];
}

export type InlineNode = TextNode | LinkNode;

export interface HeadingNode {
  readonly type: 'heading';
  readonly level: HeadingLevel;
  readonly children: readonly InlineNode[];
}

export interface ParagraphNode {
  readonly type: 'paragraph';
  readonly children: readonly InlineNode[];
}

/** A fenced or indented code block. `literal` is never parsed further. */
export interface CodeBlockNode {
  readonly type: 'codeBlock';
  readonly literal: string;
  /** Info string of the opening fence, empty when absent. */
  readonly lang: string;
}

export interface ListItemNode {
  readonly type: 'listItem';
  readonly children: readonly BlockNode[];
}

export interface ListNode {
  readonly type: 'list';
  readonly ordered: boolean;
  /** First number of an ordered list; 1 for bullet lists. */
  readonly start: number;
  readonly items: readonly ListItemNode[];
}

export type BlockNode = HeadingNode | ParagraphNode | CodeBlockNode | ListNode;

/** Root of a parsed document. Children appear in source order. */
export interface DocumentNode {
  readonly type: 'document';
  readonly children: readonly BlockNode[];
}

export type Node = DocumentNode | BlockNode | ListItemNode | InlineNode;

/**
 * Metadata extracted from the node tree.
 */
export interface ParseMetadata {
  /** Number of headings at any depth. */
  headingCount: number;

  /** Whether the document contains any code blocks. */
  hasCodeBlocks: boolean;

  /** Deduplicated info strings of fenced code blocks, in first-seen order. */
  languages: string[];

  /** Whether the document contains any links. */
  hasLinks: boolean;
}

/**
 * The result of parsing a structured-text document.
 */
export interface ParseResult {
  document: DocumentNode;
  metadata: ParseMetadata;
}
