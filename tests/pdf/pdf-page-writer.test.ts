import { PDFDocument, StandardFonts, type PDFFont } from 'pdf-lib';
import { createRenderingOptions } from '../../src/core/options';
import { HIGHLIGHT_GREY, LINK_BLUE } from '../../src/core/page-writer';
import { PdfPageWriter, resolveFontFamily, wrapText } from '../../src/pdf/pdf-page-writer';

function header(bytes: Uint8Array): string {
  return Buffer.from(bytes.subarray(0, 5)).toString('latin1');
}

// ---------------------------------------------------------------------------
// resolveFontFamily
// ---------------------------------------------------------------------------

describe('resolveFontFamily', () => {
  it.each([
    ['Arial', 'helvetica'],
    ['Helvetica', 'helvetica'],
    ['DejaVu Sans', 'helvetica'],
    ['Courier New', 'courier'],
    ['JetBrains Mono', 'courier'],
    ['Times New Roman', 'times'],
    ['Noto Serif', 'times'],
    ['Noto Sans Serif', 'helvetica'],
  ])('should map %s to %s', (name, family) => {
    expect(resolveFontFamily(name)).toBe(family);
  });
});

// ---------------------------------------------------------------------------
// wrapText
// ---------------------------------------------------------------------------

describe('wrapText', () => {
  // Courier glyphs are 600 units wide: 6pt each at 10pt.
  let courier: PDFFont;

  beforeAll(async () => {
    const doc = await PDFDocument.create();
    courier = doc.embedStandardFont(StandardFonts.Courier);
  });

  it('should break at spaces', () => {
    expect(wrapText('aaa bbb ccc', courier, 10, 45)).toEqual(['aaa bbb', 'ccc']);
  });

  it('should break words longer than a line', () => {
    expect(wrapText('abcdefghij', courier, 10, 30)).toEqual(['abcde', 'fghij']);
  });

  it('should put one character per line when no character fits', () => {
    expect(wrapText('ab', courier, 10, 3)).toEqual(['a', 'b']);
  });

  it('should terminate with a negative width', () => {
    expect(wrapText('abc de', courier, 10, -5)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('should keep hard line breaks and empty lines', () => {
    expect(wrapText('a\n\nb', courier, 10, 100)).toEqual(['a', '', 'b']);
  });
});

// ---------------------------------------------------------------------------
// PdfPageWriter
// ---------------------------------------------------------------------------

describe('PdfPageWriter', () => {
  const options = createRenderingOptions();

  it('should save a PDF with one page when nothing was drawn', async () => {
    const writer = await PdfPageWriter.create(options, 'Empty');
    const bytes = await writer.save();
    expect(header(bytes)).toBe('%PDF-');
    expect(writer.pageCount).toBe(1);
  });

  it('should draw every operation kind', async () => {
    const writer = await PdfPageWriter.create(options);
    writer.newPage();
    writer.setFont('Arial', 'bold', 17);
    writer.writeTextBlock('Heading', false);
    writer.lineBreak(5);
    writer.setTextColor(LINK_BLUE);
    writer.writeGlyph('•');
    writer.writeTextBlock('item', false);
    writer.setFont('Courier', 'regular', 11);
    writer.setFill(HIGHLIGHT_GREY, true);
    writer.writeTextBlock('let x = 1;\n\tindented', true);
    writer.setFill(HIGHLIGHT_GREY, false);

    const bytes = await writer.save();
    expect(header(bytes)).toBe('%PDF-');
    expect(writer.pageCount).toBe(1);
  });

  it('should overflow long text onto new pages', async () => {
    const writer = await PdfPageWriter.create(options);
    const lines = Array.from({ length: 200 }, (_, i) => `line ${i}`);
    writer.writeTextBlock(lines.join('\n'), false);
    expect(writer.pageCount).toBeGreaterThan(1);
  });

  it('should start a page when a line break runs past the bottom margin', async () => {
    const writer = await PdfPageWriter.create(options);
    writer.newPage();
    writer.lineBreak(1000);
    expect(writer.pageCount).toBe(2);
  });

  it('should lay out text wider than the usable width', async () => {
    const narrow = createRenderingOptions({ margins: 70, pageSize: 'A5', baseFontSize: 72 });
    const writer = await PdfPageWriter.create(narrow);
    writer.writeTextBlock('hi there', false);
    expect(writer.pageCount).toBeGreaterThan(1);
    expect(header(await writer.save())).toBe('%PDF-');
  });

  it('should replace characters the standard fonts cannot encode', async () => {
    const writer = await PdfPageWriter.create(options);
    expect(() => writer.writeTextBlock('日本語 text ✓', false)).not.toThrow();
    expect(header(await writer.save())).toBe('%PDF-');
  });
});
