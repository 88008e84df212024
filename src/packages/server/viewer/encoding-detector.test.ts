import { describe, expect, it } from 'vitest';
import { DEFAULT_ENCODING, detectEncoding, isSupportedEncoding } from './encoding-detector.js';

const UMLAUT_TEXT = 'Grüße aus Köln, schöne Äpfel und Öl für die Brücke.\n'.repeat(4);

describe('detectEncoding', () => {
  it('accepts a confident UTF-8 guess', () => {
    const detection = detectEncoding(Buffer.from(UMLAUT_TEXT, 'utf8'));

    expect(detection).toEqual({
      encoding: 'utf-8',
      confidence: 1,
      detected: 'utf-8',
      accepted: true,
    });
  });

  it('falls back to UTF-8 when the guess is not above the threshold', () => {
    const detection = detectEncoding(Buffer.from(UMLAUT_TEXT, 'utf8'), 1);

    expect(detection.encoding).toBe(DEFAULT_ENCODING);
    expect(detection.accepted).toBe(false);
    expect(detection.detected).toBe('utf-8');
  });

  it('falls back to UTF-8 with zero confidence for empty input', () => {
    expect(detectEncoding(new Uint8Array(0))).toEqual({
      encoding: 'utf-8',
      confidence: 0,
      detected: null,
      accepted: false,
    });
  });
});

describe('isSupportedEncoding', () => {
  it('knows which labels the decoder understands', () => {
    expect(isSupportedEncoding('utf-8')).toBe(true);
    expect(isSupportedEncoding('utf-16le')).toBe(true);
    expect(isSupportedEncoding('utf-32le')).toBe(false);
    expect(isSupportedEncoding('not-an-encoding')).toBe(false);
  });
});
