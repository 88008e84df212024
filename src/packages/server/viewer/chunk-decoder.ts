// Longest incomplete sequence any supported multi-byte encoding can leave
// at the end of a chunk (UTF-8 and GB18030 four-byte forms, UTF-16 pairs).
const MAX_CARRY_BYTES = 3;

/**
 * Decodes a file chunk by chunk under one fixed encoding.
 *
 * Every chunk is decoded strictly. When the only problem is a multi-byte
 * character cut by the chunk boundary, the cut bytes are carried into the
 * next chunk. Any other failure makes `decode` return null and the caller
 * drops the chunk, carried bytes included.
 */
export class ChunkDecoder {
  readonly encoding: string;
  private carry: Uint8Array = new Uint8Array(0);
  private first = true;

  constructor(encoding: string) {
    this.encoding = encoding;
  }

  get carriedBytes(): number {
    return this.carry.length;
  }

  decode(chunk: Uint8Array): string | null {
    const bytes = this.carry.length > 0 ? concat(this.carry, chunk) : chunk;
    this.carry = new Uint8Array(0);

    const text = this.decodeBytes(bytes);
    // Start of input is behind us once any byte was consumed or dropped
    if (this.carry.length < bytes.length) {
      this.first = false;
    }
    return text;
  }

  private decodeBytes(bytes: Uint8Array): string | null {
    const whole = this.tryDecode(bytes);
    if (whole !== null) {
      return whole;
    }

    const maxCarry = Math.min(MAX_CARRY_BYTES, bytes.length);
    for (let cut = 1; cut <= maxCarry; cut++) {
      const tail = bytes.subarray(bytes.length - cut);
      if (!this.isIncompleteSequence(tail)) continue;

      const head = this.tryDecode(bytes.subarray(0, bytes.length - cut));
      if (head !== null) {
        // The source buffer is reused by the reader, keep a copy
        this.carry = tail.slice();
        return head;
      }
    }

    return null;
  }

  /**
   * Decode whatever is still carried at end of input. Returns '' when
   * nothing is pending and null when the leftover bytes never completed.
   */
  finish(): string | null {
    if (this.carry.length === 0) return '';
    const leftover = this.carry;
    this.carry = new Uint8Array(0);
    return this.tryDecode(leftover);
  }

  private tryDecode(bytes: Uint8Array): string | null {
    // A BOM only means something at the start of the file
    const decoder = new TextDecoder(this.encoding, { fatal: true, ignoreBOM: !this.first });
    try {
      return decoder.decode(bytes);
    } catch {
      return null;
    }
  }

  private isIncompleteSequence(tail: Uint8Array): boolean {
    const decoder = new TextDecoder(this.encoding, { fatal: true });
    try {
      return decoder.decode(tail, { stream: true }) === '';
    } catch {
      return false;
    }
  }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}
