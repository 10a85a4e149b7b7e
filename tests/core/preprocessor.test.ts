import { decodeSource, preprocessSource, utf8Length } from '../../src/core/preprocessor';

describe('preprocessSource', () => {
  describe('normalizeBlankLines', () => {
    it('should reduce 3+ consecutive blank lines to 2', () => {
      const input = 'line1\n\n\n\nline2';
      expect(preprocessSource(input)).toBe('line1\n\nline2');
    });

    it('should preserve exactly 2 blank lines', () => {
      const input = 'line1\n\nline2';
      expect(preprocessSource(input)).toBe('line1\n\nline2');
    });

    it('should handle multiple groups of blank lines', () => {
      const input = 'a\n\n\n\nb\n\n\n\n\nc';
      expect(preprocessSource(input)).toBe('a\n\nb\n\nc');
    });
  });

  describe('line endings', () => {
    it('should convert CRLF and lone CR to LF', () => {
      expect(preprocessSource('a\r\nb\rc')).toBe('a\nb\nc');
    });
  });

  describe('code block protection', () => {
    it('should not collapse blank lines inside fenced code', () => {
      const input = '```\na\n\n\n\nb\n```';
      expect(preprocessSource(input)).toBe(input);
    });

    it('should still normalize text around a fenced block', () => {
      const input = 'intro\n\n\n\n~~~\nx\n\n\ny\n~~~';
      expect(preprocessSource(input)).toBe('intro\n\n~~~\nx\n\n\ny\n~~~');
    });
  });
});

describe('decodeSource', () => {
  it('should decode UTF-8 bytes', () => {
    const bytes = new TextEncoder().encode('# Café');
    expect(decodeSource(bytes)).toBe('# Café');
  });

  it('should drop a leading byte-order mark', () => {
    expect(decodeSource('\uFEFFHello')).toBe('Hello');
    expect(decodeSource(new Uint8Array([0xef, 0xbb, 0xbf, 0x68, 0x69]))).toBe('hi');
  });
});

describe('utf8Length', () => {
  it('should count bytes rather than characters', () => {
    expect(utf8Length('abc')).toBe(3);
    expect(utf8Length('é')).toBe(2);
    expect(utf8Length('日本')).toBe(6);
  });
});
