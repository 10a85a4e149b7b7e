import { RenderError } from '../../src/core/errors';
import { createRenderingOptions, type RenderingOptions } from '../../src/core/options';
import {
  BLACK,
  HIGHLIGHT_GREY,
  LINK_BLUE,
  RecordingPageWriter,
  type PageOperation,
} from '../../src/core/page-writer';
import { parseDocument } from '../../src/core/parser';
import { PageRenderer, renderDocument } from '../../src/core/renderer';

/**
 * Helper: render markdown and return the recorded operations.
 */
function render(md: string, overrides: Partial<RenderingOptions> = {}): readonly PageOperation[] {
  const writer = new RecordingPageWriter();
  renderDocument(parseDocument(md), createRenderingOptions({ toc: false, ...overrides }), writer);
  return writer.operations;
}

const BODY_FONT: PageOperation = { type: 'setFont', family: 'Arial', weight: 'regular', sizePt: 11 };

// ---------------------------------------------------------------------------
// Headings and paragraphs
// ---------------------------------------------------------------------------

describe('renderDocument - headings and paragraphs', () => {
  it('should emit a line break and bold font for a heading, then body font for a paragraph', () => {
    expect(render('# Title\n\nBody text.')).toEqual([
      BODY_FONT,
      { type: 'lineBreak', height: 5 },
      { type: 'setFont', family: 'Arial', weight: 'bold', sizePt: 17 },
      { type: 'writeTextBlock', text: 'Title', filled: false },
      { type: 'lineBreak', height: 5 },
      BODY_FONT,
      { type: 'writeTextBlock', text: 'Body text.', filled: false },
    ]);
  });

  it.each([
    [1, 17],
    [2, 16],
    [3, 15],
    [4, 14],
    [5, 13],
    [6, 12],
  ])('should size h%i at %ipt', (level, size) => {
    const ops = render(`${'#'.repeat(level)} Heading`);
    expect(ops[2]).toEqual({ type: 'setFont', family: 'Arial', weight: 'bold', sizePt: size });
  });

  it('should never size a heading below 6pt', () => {
    const ops = render('###### Tiny', { baseFontSize: 1 });
    expect(ops[2]).toEqual({ type: 'setFont', family: 'Arial', weight: 'bold', sizePt: 6 });
  });

  it('should write text blocks in source order', () => {
    const ops = render('# One\n\nalpha\n\n## Two\n\nbeta\n\ngamma');
    const texts = ops.flatMap((op) => (op.type === 'writeTextBlock' ? [op.text] : []));
    expect(texts).toEqual(['One', 'alpha', 'Two', 'beta', 'gamma']);
  });

  it('should use the configured main font', () => {
    expect(render('text', { mainFont: 'Times' })[0]).toEqual({
      type: 'setFont',
      family: 'Times',
      weight: 'regular',
      sizePt: 11,
    });
  });
});

// ---------------------------------------------------------------------------
// Code blocks
// ---------------------------------------------------------------------------

describe('renderDocument - code blocks', () => {
  it('should draw highlighted code in the mono font and restore the main font', () => {
    expect(render('```\nx = 1\n```')).toEqual([
      BODY_FONT,
      { type: 'setFont', family: 'Courier', weight: 'regular', sizePt: 11 },
      { type: 'setFill', color: HIGHLIGHT_GREY, on: true },
      { type: 'writeTextBlock', text: 'x = 1', filled: true },
      BODY_FONT,
      { type: 'setFill', color: HIGHLIGHT_GREY, on: false },
    ]);
  });

  it('should skip the fill when highlighting is off', () => {
    expect(render('```\nx = 1\n```', { highlight: false })).toEqual([
      BODY_FONT,
      { type: 'setFont', family: 'Courier', weight: 'regular', sizePt: 11 },
      { type: 'writeTextBlock', text: 'x = 1', filled: false },
      BODY_FONT,
    ]);
  });

  it('should write the literal without interpreting it', () => {
    const ops = render('```\n# not a heading\n```', { highlight: false, monoFont: 'Menlo' });
    expect(ops).toContainEqual({ type: 'writeTextBlock', text: '# not a heading', filled: false });
    expect(ops).toContainEqual({ type: 'setFont', family: 'Menlo', weight: 'regular', sizePt: 11 });
  });
});

// ---------------------------------------------------------------------------
// Links
// ---------------------------------------------------------------------------

describe('renderDocument - links', () => {
  it('should colour link text and later text of the same block, then reset at the next block', () => {
    expect(render('Go [here](https://example.test) now\n\nAfter')).toEqual([
      BODY_FONT,
      { type: 'lineBreak', height: 5 },
      { type: 'writeTextBlock', text: 'Go ', filled: false },
      { type: 'setTextColor', color: LINK_BLUE },
      { type: 'writeTextBlock', text: 'here', filled: false },
      { type: 'writeTextBlock', text: ' now', filled: false },
      { type: 'lineBreak', height: 5 },
      { type: 'setTextColor', color: BLACK },
      { type: 'writeTextBlock', text: 'After', filled: false },
    ]);
  });

  it('should not colour links when colorLinks is off', () => {
    const ops = render('[here](https://example.test)', { colorLinks: false });
    expect(ops.some((op) => op.type === 'setTextColor')).toBe(false);
  });

  it('should not carry link colour into the next list item', () => {
    const ops = render('- [a](x) tail\n- plain');
    const plainIndex = ops.findIndex((op) => op.type === 'writeTextBlock' && op.text === 'plain');
    expect(ops.slice(0, plainIndex).filter((op) => op.type === 'setTextColor')).toEqual([
      { type: 'setTextColor', color: LINK_BLUE },
      { type: 'setTextColor', color: BLACK },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Lists
// ---------------------------------------------------------------------------

describe('renderDocument - lists', () => {
  it('should space the list and write a bullet before each item', () => {
    expect(render('- one\n- two')).toEqual([
      BODY_FONT,
      { type: 'lineBreak', height: 3 },
      { type: 'writeGlyph', glyph: '•' },
      { type: 'lineBreak', height: 5 },
      { type: 'writeTextBlock', text: 'one', filled: false },
      { type: 'writeGlyph', glyph: '•' },
      { type: 'lineBreak', height: 5 },
      { type: 'writeTextBlock', text: 'two', filled: false },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Table of contents
// ---------------------------------------------------------------------------

describe('renderDocument - table of contents', () => {
  it('should emit a contents section before the body', () => {
    const writer = new RecordingPageWriter();
    const summary = renderDocument(
      parseDocument('# One\n\ntext\n\n## Two'),
      createRenderingOptions({ toc: true }),
      writer,
    );

    expect(summary.toc).toEqual([
      { title: 'One', level: 1, page: 2 },
      { title: 'Two', level: 2, page: 2 },
    ]);
    expect(writer.operations.slice(0, 8)).toEqual([
      { type: 'setFont', family: 'Arial', weight: 'bold', sizePt: 15 },
      { type: 'writeTextBlock', text: 'Contents', filled: false },
      { type: 'lineBreak', height: 5 },
      BODY_FONT,
      { type: 'writeTextBlock', text: 'One  2', filled: false },
      { type: 'writeTextBlock', text: '  Two  2', filled: false },
      { type: 'newPage' },
      BODY_FONT,
    ]);
    expect(writer.pageBreakCount).toBe(1);
  });

  it('should render the same body with or without a contents section', () => {
    const md = '# One\n\ntext';
    const withToc = new RecordingPageWriter();
    renderDocument(parseDocument(md), createRenderingOptions({ toc: true }), withToc);
    expect(withToc.operations.slice(7)).toEqual(render(md));
  });

  it('should skip the contents section when there are no headings', () => {
    const writer = new RecordingPageWriter();
    const summary = renderDocument(parseDocument('text'), createRenderingOptions({ toc: true }), writer);
    expect(summary.toc).toEqual([]);
    expect(writer.operations).toEqual(render('text'));
  });
});

// ---------------------------------------------------------------------------
// Errors and reuse
// ---------------------------------------------------------------------------

class FailingWriter extends RecordingPageWriter {
  constructor(private readonly error: Error) {
    super();
  }

  writeTextBlock(): void {
    throw this.error;
  }
}

describe('renderDocument - writer failures', () => {
  it.each([false, true])('should propagate the writer error unchanged (toc %s)', (toc) => {
    const error = new RenderError('disk full');
    let caught: unknown;
    try {
      renderDocument(parseDocument('# Title'), createRenderingOptions({ toc }), new FailingWriter(error));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBe(error);
  });
});

describe('PageRenderer', () => {
  it('should render the same tree identically twice', () => {
    const renderer = new PageRenderer(createRenderingOptions({ toc: false }));
    const doc = parseDocument('# A\n\n- b\n\n```\nc\n```');
    const first = new RecordingPageWriter();
    const second = new RecordingPageWriter();
    renderer.render(doc, first);
    renderer.render(doc, second);
    expect(second.operations).toEqual(first.operations);
  });
});
