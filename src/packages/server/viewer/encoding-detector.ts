import { analyse } from 'chardet';
import { DEFAULT_CONFIDENCE_THRESHOLD } from '../config/viewer-config.js';

export const DEFAULT_ENCODING = 'utf-8';

export interface EncodingDetection {
  encoding: string;          // What the session decodes with
  confidence: number;        // Best guess confidence in [0, 1]
  detected: string | null;   // Best guess before the threshold was applied
  accepted: boolean;
}

export function isSupportedEncoding(label: string): boolean {
  try {
    return new TextDecoder(label).encoding.length > 0;
  } catch {
    return false;
  }
}

/**
 * Guess the text encoding of a byte sample. The guess is used only when its
 * confidence is strictly above the threshold and Node can decode it;
 * otherwise the session falls back to UTF-8.
 */
export function detectEncoding(
  sample: Uint8Array,
  confidenceThreshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): EncodingDetection {
  if (sample.length === 0) {
    return { encoding: DEFAULT_ENCODING, confidence: 0, detected: null, accepted: false };
  }

  const [best] = analyse(sample);
  if (!best) {
    return { encoding: DEFAULT_ENCODING, confidence: 0, detected: null, accepted: false };
  }

  const detected = best.name.toLowerCase();
  const confidence = best.confidence / 100;
  const accepted = confidence > confidenceThreshold && isSupportedEncoding(detected);

  return {
    encoding: accepted ? detected : DEFAULT_ENCODING,
    confidence,
    detected,
    accepted,
  };
}
