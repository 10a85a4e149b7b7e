import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { ParseError } from './core/errors';
import type { RenderingOptions, ReconstructionOptions } from './core/options';
import type { PageWriter } from './core/page-writer';
import { parseMarkdownDocument } from './core/parser';
import { decodeSource, normalizeLineEndings, utf8Length } from './core/preprocessor';
import { renderDocument, type TocEntry } from './core/renderer';
import { reconstructTextWithReport, type ReconstructionIrregularity } from './core/reconstructor';
import { silentLogger, type Logger } from './logger';
import { PdfPageWriter } from './pdf/pdf-page-writer';
import type { PageTextSource } from './pdf/pdf-text-source';
import type { ConvertMetadata, PdfConversionResult, SourceKind } from './types';

const TITLE_SPACING = 15;

const EXTENSION_KINDS: Record<string, SourceKind> = {
  '.yml': 'yaml',
  '.yaml': 'yaml',
  '.conf': 'config',
  '.ini': 'config',
  '.config': 'config',
};

/**
 * Decide how a source file is rendered from its extension.
 *
 * YAML and config files are shown verbatim in one monospace block;
 * everything else is parsed as structured text.
 */
export function detectSourceKind(fileName: string): SourceKind {
  return EXTENSION_KINDS[path.extname(fileName).toLowerCase()] ?? 'markdown';
}

/** File name without directory and extension. */
export function documentTitle(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Count words in plain text, treating each CJK character as one word.
 */
function countWords(text: string): number {
  if (!text.trim()) {
    return 0;
  }
  const cjkRegex = /[\u3000-\u9fff\uf900-\ufaff\u{20000}-\u{2fa1f}]/gu;
  const cjkCount = text.match(cjkRegex)?.length ?? 0;
  const latinWords = text.replace(cjkRegex, ' ').split(/\s+/).filter((w) => w.length > 0);
  return latinWords.length + cjkCount;
}

/**
 * Reject YAML that does not parse, reporting where the first error is.
 */
function assertValidYaml(text: string): void {
  try {
    parseYaml(text);
  } catch (err) {
    if (!(err instanceof YAMLParseError)) throw err;
    const line = err.linePos?.[0].line ?? 1;
    const offset = text
      .split('\n')
      .slice(0, line - 1)
      .reduce((sum, previous) => sum + utf8Length(previous) + 1, 0);
    throw new ParseError(`Invalid YAML: ${err.message.split('\n')[0]}`, line, offset);
  }
}

/**
 * Render one source file into `writer`.
 *
 * Emits a new page and the document title, then the body according to
 * {@link detectSourceKind}.
 *
 * @throws {ParseError} When structured text or YAML is malformed.
 *
 * @example
 * ```ts
 * const writer = new RecordingPageWriter();
 * renderSource('notes.md', '# Hello', createRenderingOptions(), writer);
 * ```
 */
export function renderSource(
  fileName: string,
  content: string | Uint8Array,
  options: RenderingOptions,
  writer: PageWriter,
  title: string = documentTitle(fileName),
): ConvertMetadata & { toc: TocEntry[] } {
  const kind = detectSourceKind(fileName);
  const text = normalizeLineEndings(decodeSource(content));

  // Parse before touching the writer so a malformed document produces
  // no output at all.
  if (kind === 'yaml') assertValidYaml(text);
  const parsed = kind === 'markdown' ? parseMarkdownDocument(text) : undefined;

  writer.newPage();
  writer.setFont(options.mainFont, 'bold', options.baseFontSize + 4);
  writer.writeTextBlock(title, false);
  writer.lineBreak(TITLE_SPACING);

  const base = { title, kind, wordCount: countWords(text) };

  if (!parsed) {
    writer.setFont(options.monoFont, 'regular', options.baseFontSize);
    const body = kind === 'yaml' ? `\`\`\`yaml\n${text.replace(/\n$/, '')}\n\`\`\`` : text;
    writer.writeTextBlock(body, false);
    return { ...base, headingCount: 0, hasCodeBlocks: kind === 'yaml', languages: [], hasLinks: false, toc: [] };
  }

  const { toc } = renderDocument(parsed.document, options, writer);
  return { ...base, ...parsed.metadata, toc };
}

/**
 * Convert one source file's content to PDF bytes.
 *
 * Either the complete document is returned or an error is thrown; nothing
 * is written anywhere.
 *
 * @throws {ParseError} When structured text is malformed.
 * @throws {RenderError} When the PDF cannot be produced.
 */
export async function convertToPdf(
  fileName: string,
  content: string | Uint8Array,
  options: RenderingOptions,
): Promise<PdfConversionResult> {
  const title = documentTitle(fileName);
  const writer = await PdfPageWriter.create(options, title);
  const { toc, ...metadata } = renderSource(fileName, content, options, writer, title);
  const pdf = await writer.save();
  return { pdf, pageCount: writer.pageCount, toc, metadata };
}

/**
 * Read a source file from disk and convert it to PDF bytes.
 */
export async function convertFileToPdf(
  filePath: string,
  options: RenderingOptions,
): Promise<PdfConversionResult> {
  const content = await fs.readFile(filePath);
  return convertToPdf(filePath, content, options);
}

export interface MarkdownConversionSettings {
  /** Date written into frontmatter. @default now */
  date?: Date;
  logger?: Logger;
}

function describeIrregularity(irregularity: ReconstructionIrregularity): string {
  switch (irregularity.kind) {
    case 'unterminated-fence':
      return `code fence opened on line ${irregularity.line} is never closed`;
    case 'heading-level-clamped':
      return `heading on line ${irregularity.line} clamped from level ${irregularity.requestedLevel} to ${irregularity.level}`;
  }
}

/**
 * Extract text from a page document and reconstruct structured text.
 *
 * Irregularities are logged as warnings and returned with the text.
 */
export async function convertPdfToMarkdown(
  pdf: Uint8Array,
  title: string,
  options: ReconstructionOptions,
  textSource: PageTextSource,
  settings: MarkdownConversionSettings = {},
): Promise<{ markdown: string; irregularities: ReconstructionIrregularity[] }> {
  const logger = settings.logger ?? silentLogger;
  const flatText = await textSource.extractText(pdf);
  const report = reconstructTextWithReport(flatText, options, { title, date: settings.date });

  for (const irregularity of report.irregularities) {
    logger.warn(`${title}: ${describeIrregularity(irregularity)}`);
  }

  return { markdown: report.text, irregularities: report.irregularities };
}

/**
 * Convert a PDF file into `<targetDir>/<title>.md`.
 *
 * The Markdown file is only written once conversion succeeded.
 *
 * @returns Path of the written file.
 */
export async function convertPdfFile(
  pdfPath: string,
  targetDir: string,
  options: ReconstructionOptions,
  textSource: PageTextSource,
  settings: MarkdownConversionSettings = {},
): Promise<string> {
  const title = documentTitle(pdfPath);
  const pdf = await fs.readFile(pdfPath);
  const { markdown } = await convertPdfToMarkdown(pdf, title, options, textSource, settings);
  const mdPath = path.join(targetDir, `${title}.md`);
  await fs.writeFile(mdPath, markdown, 'utf8');
  return mdPath;
}
