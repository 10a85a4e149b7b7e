/**
 * md2page - Source Preprocessor
 *
 * Decodes and normalizes structured-text input before parsing.
 *
 * @module core/preprocessor
 */

const utf8Decoder = new TextDecoder('utf-8');
const utf8Encoder = new TextEncoder();

/**
 * Decode UTF-8 bytes to a string. Strings pass through unchanged.
 * A leading byte-order mark is dropped either way.
 */
export function decodeSource(source: string | Uint8Array): string {
  const text = typeof source === 'string' ? source : utf8Decoder.decode(source);
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/** Number of bytes `text` occupies when encoded as UTF-8. */
export function utf8Length(text: string): number {
  return utf8Encoder.encode(text).length;
}

/**
 * Convert CRLF and lone CR line endings to LF.
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * Normalize consecutive blank lines (3+ newlines to 2).
 *
 * Paragraph separation only depends on there being one blank line, so the
 * extra lines carry no structure.
 */
function normalizeBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, '\n\n');
}

/**
 * Apply all preprocessor transformations in sequence.
 *
 * Fenced code blocks are protected so their content reaches the parser
 * byte-for-byte (only line endings are normalized inside them).
 *
 * @param source - Raw structured text, as a string or UTF-8 bytes.
 * @returns Normalized text ready for the parser.
 */
export function preprocessSource(source: string | Uint8Array): string {
  const text = normalizeLineEndings(decodeSource(source));

  // Protect fenced code blocks from modification.
  const codeBlocks: string[] = [];
  let result = text.replace(/^ {0,3}(`{3,}|~{3,})[^\n]*\n[\s\S]*?\n {0,3}\1[`~]*[ \t]*$/gm, (match) => {
    codeBlocks.push(match);
    return `\x00CODEBLOCK${codeBlocks.length - 1}\x00`;
  });

  result = normalizeBlankLines(result);

  // Restore code blocks.
  result = result.replace(/\x00CODEBLOCK(\d+)\x00/g, (_match, idx: string) => {
    return codeBlocks[parseInt(idx, 10)];
  });

  return result;
}
