/**
 * PDF page writer backed by `pdf-lib`.
 *
 * Implements the {@link PageWriter} boundary with simple flow layout: text
 * blocks wrap at the right margin and overflow onto new pages. Only the
 * standard PDF fonts are used, so characters outside their encoding are
 * replaced with `?`.
 */
import {
  PageSizes,
  PDFDocument,
  rgb,
  StandardFonts,
  type PDFFont,
  type PDFPage,
} from 'pdf-lib';
import { RenderError } from '../core/errors.js';
import type { RenderingOptions } from '../core/options.js';
import { BLACK, HIGHLIGHT_GREY, type PageWriter, type RgbColor } from '../core/page-writer.js';
import type { FontWeight } from '../core/render-state.js';

const POINTS_PER_MM = 72 / 25.4;
const LINE_HEIGHT_FACTOR = 1.25;
const TAB = '    ';

type FontFamilyKey = 'helvetica' | 'times' | 'courier';

const STANDARD_FONTS: Record<FontFamilyKey, Record<FontWeight, StandardFonts>> = {
  helvetica: { regular: StandardFonts.Helvetica, bold: StandardFonts.HelveticaBold },
  times: { regular: StandardFonts.TimesRoman, bold: StandardFonts.TimesRomanBold },
  courier: { regular: StandardFonts.Courier, bold: StandardFonts.CourierBold },
};

/**
 * Map a font name such as "Arial" or "Courier New" onto a standard font
 * family.
 */
export function resolveFontFamily(name: string): FontFamilyKey {
  const lower = name.toLowerCase();
  if (lower.includes('courier') || lower.includes('mono')) return 'courier';
  if (lower.includes('times') || (lower.includes('serif') && !lower.includes('sans'))) return 'times';
  return 'helvetica';
}

function toPdfColor(color: RgbColor) {
  return rgb(color.r / 255, color.g / 255, color.b / 255);
}

/**
 * Split `text` into lines no wider than `maxWidth` at `size`.
 *
 * Breaks at spaces where possible and inside words that are too long for a
 * line on their own. Hard line breaks in the input are kept.
 */
export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const width = (s: string) => font.widthOfTextAtSize(s, size);
  const lines: string[] = [];

  for (const paragraph of text.split('\n')) {
    const first = lines.length;
    let line = '';
    for (const word of paragraph.split(' ')) {
      const candidate = line.length > 0 ? `${line} ${word}` : word;
      if (width(candidate) <= maxWidth) {
        line = candidate;
        continue;
      }
      if (line.length > 0) lines.push(line);
      line = '';
      let rest = word;
      while (rest.length > 0 && width(rest) > maxWidth) {
        // Every chunk takes at least one character, however narrow the line.
        let cut = Math.max(1, rest.length - 1);
        while (cut > 1 && width(rest.slice(0, cut)) > maxWidth) cut--;
        lines.push(rest.slice(0, cut));
        rest = rest.slice(cut);
      }
      line = rest;
    }
    if (line.length > 0 || lines.length === first) lines.push(line);
  }

  return lines;
}

export class PdfPageWriter implements PageWriter {
  private page: PDFPage | undefined;
  private font: PDFFont;
  private fontSize: number;
  private textColor: RgbColor = BLACK;
  private fillColor: RgbColor = HIGHLIGHT_GREY;
  private fillOn = false;
  private x = 0;
  private y = 0;
  private readonly fonts = new Map<StandardFonts, PDFFont>();
  private readonly charsets = new Map<PDFFont, Set<number>>();
  private readonly margin: number;
  private readonly pageSize: [number, number];

  private constructor(
    private readonly doc: PDFDocument,
    options: RenderingOptions,
  ) {
    this.margin = options.margins * POINTS_PER_MM;
    this.pageSize = PageSizes[options.pageSize];
    this.fontSize = options.baseFontSize;
    this.font = this.embed(resolveFontFamily(options.mainFont), 'regular');
  }

  /**
   * Create a writer over a new, empty PDF document.
   *
   * @param title - Stored in the document information dictionary.
   */
  static async create(options: RenderingOptions, title?: string): Promise<PdfPageWriter> {
    const doc = await PDFDocument.create();
    if (title) doc.setTitle(title);
    return new PdfPageWriter(doc, options);
  }

  get pageCount(): number {
    return this.doc.getPageCount();
  }

  newPage(): void {
    this.guard('add page', () => {
      this.addPage();
    });
  }

  setFont(family: string, weight: FontWeight, sizePt: number): void {
    this.guard('set font', () => {
      this.font = this.embed(resolveFontFamily(family), weight);
      this.fontSize = sizePt;
    });
  }

  setFill(color: RgbColor, on: boolean): void {
    this.fillColor = color;
    this.fillOn = on;
  }

  setTextColor(color: RgbColor): void {
    this.textColor = color;
  }

  writeTextBlock(text: string, filled: boolean): void {
    this.guard('write text', () => {
      const page = this.currentPage();
      const left = this.x;
      const maxWidth = page.getWidth() - this.margin - left;
      const lineHeight = this.fontSize * LINE_HEIGHT_FACTOR;
      const lines = wrapText(this.encodable(text), this.font, this.fontSize, maxWidth);

      for (const line of lines) {
        const target = this.y - lineHeight < this.margin ? this.addPage() : this.currentPage();
        if (filled && this.fillOn) {
          target.drawRectangle({
            x: left,
            y: this.y - lineHeight,
            width: maxWidth,
            height: lineHeight,
            color: toPdfColor(this.fillColor),
          });
        }
        if (line.length > 0) {
          target.drawText(line, {
            x: left,
            y: this.y - this.fontSize,
            size: this.fontSize,
            font: this.font,
            color: toPdfColor(this.textColor),
          });
        }
        this.y -= lineHeight;
      }
      this.x = this.margin;
    });
  }

  lineBreak(height: number): void {
    this.x = this.margin;
    this.y -= height * POINTS_PER_MM;
    if (this.page && this.y < this.margin) {
      this.newPage();
    }
  }

  writeGlyph(glyph: string): void {
    this.guard('write glyph', () => {
      const page =
        this.page && this.y - this.fontSize * LINE_HEIGHT_FACTOR >= this.margin
          ? this.page
          : this.addPage();
      const text = `${this.encodable(glyph)} `;
      page.drawText(text, {
        x: this.x,
        y: this.y - this.fontSize,
        size: this.fontSize,
        font: this.font,
        color: toPdfColor(this.textColor),
      });
      this.x += this.font.widthOfTextAtSize(text, this.fontSize);
    });
  }

  /**
   * Serialize the document. A document that never received a page gets one
   * empty page.
   */
  async save(): Promise<Uint8Array> {
    if (this.doc.getPageCount() === 0) {
      this.addPage();
    }
    try {
      return await this.doc.save();
    } catch (err) {
      throw new RenderError('Failed to serialize PDF', { cause: err });
    }
  }

  private addPage(): PDFPage {
    const page = this.doc.addPage(this.pageSize);
    this.page = page;
    this.x = this.margin;
    this.y = this.pageSize[1] - this.margin;
    return page;
  }

  private currentPage(): PDFPage {
    return this.page ?? this.addPage();
  }

  private embed(family: FontFamilyKey, weight: FontWeight): PDFFont {
    const name = STANDARD_FONTS[family][weight];
    let font = this.fonts.get(name);
    if (!font) {
      font = this.doc.embedStandardFont(name);
      this.fonts.set(name, font);
    }
    return font;
  }

  /** Replace characters the current font cannot encode. */
  private encodable(text: string): string {
    let charset = this.charsets.get(this.font);
    if (!charset) {
      charset = new Set(this.font.getCharacterSet());
      this.charsets.set(this.font, charset);
    }
    let result = '';
    for (const ch of text.replace(/\t/g, TAB)) {
      const code = ch.codePointAt(0) ?? 0;
      result += ch === '\n' || charset.has(code) ? ch : '?';
    }
    return result;
  }

  private guard(action: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      if (err instanceof RenderError) throw err;
      throw new RenderError(`Failed to ${action}`, { cause: err });
    }
  }
}
