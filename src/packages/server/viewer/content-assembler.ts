import { DEFAULT_HEX_BYTES_PER_LINE } from '../config/viewer-config.js';

export interface ContentSources {
  lines: readonly string[];
  raw: Uint8Array | null;      // Whole buffer, kept for small files and directories
  encoding: string | null;
  sample: Uint8Array | null;   // Leading bytes of a background-loaded file
  bytesPerLine?: number;
}

/**
 * Compose displayable text for a session: cached lines first, then a
 * direct decode of the raw buffer or of the leading sample, then a hex
 * dump of whatever bytes are held. Returns null when there is nothing to
 * show yet.
 */
export function assembleContent(sources: ContentSources): string | null {
  const { lines, raw, encoding, sample } = sources;

  if (lines.length > 0) {
    return lines.join('\n');
  }

  if (raw && encoding) {
    const text = decodeStrict(raw, encoding);
    if (text !== null) return text;
  }

  if (!raw && sample && encoding) {
    // The sample is a prefix of the file and may end inside a character
    const text = decodeStrict(sample, encoding, true);
    if (text !== null) return text;
  }

  const bytes = raw ?? sample;
  if (!bytes) return null;
  return formatHexView(bytes, sources.bytesPerLine);
}

function decodeStrict(bytes: Uint8Array, encoding: string, partial = false): string | null {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes, { stream: partial });
  } catch {
    return null;
  }
}

function toHex(byte: number): string {
  return byte.toString(16).padStart(2, '0');
}

function toPrintable(byte: number): string {
  return byte >= 0x20 && byte <= 0x7e ? String.fromCharCode(byte) : '.';
}

/**
 * Classic hex dump, one row per `bytesPerLine` bytes:
 *
 *   00000000  41 00 ff<padding>  |A..|
 */
export function formatHexView(bytes: Uint8Array, bytesPerLine: number = DEFAULT_HEX_BYTES_PER_LINE): string {
  if (!Number.isInteger(bytesPerLine) || bytesPerLine <= 0) {
    throw new RangeError(`bytesPerLine must be a positive integer, got ${bytesPerLine}`);
  }

  const rows: string[] = [];

  for (let offset = 0; offset < bytes.length; offset += bytesPerLine) {
    const row = Array.from(bytes.subarray(offset, offset + bytesPerLine));
    const hex = row.map(toHex).join(' ').padEnd(bytesPerLine * 3);
    const ascii = row.map(toPrintable).join('');
    rows.push(`${offset.toString(16).padStart(8, '0')}  ${hex}  |${ascii}|`);
  }

  return rows.join('\n');
}
