const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Splits streamed text into lines, holding back the last (possibly
 * incomplete) line until a later push completes it.
 *
 * Only the newly pushed text is scanned; the held line is kept as pieces
 * and joined once, when its break arrives. A trailing '\r' is held too, so
 * a "\r\n" pair cut in half by a chunk boundary counts as one break. A
 * final line break does not produce an empty last line.
 */
export class LineSplitter {
  private pieces: string[] = [];
  private heldCarriageReturn = false;

  get pending(): string {
    return this.pieces.join('') + (this.heldCarriageReturn ? '\r' : '');
  }

  push(text: string): string[] {
    const lines: string[] = [];
    if (text === '') return lines;

    let data = text;
    if (this.heldCarriageReturn) {
      this.heldCarriageReturn = false;
      lines.push(this.takePending());
      if (data.startsWith('\n')) {
        data = data.slice(1);
      }
    }

    if (data.endsWith('\r')) {
      this.heldCarriageReturn = true;
      data = data.slice(0, -1);
    }

    const parts = data.split(LINE_BREAK);
    const last = parts.pop() ?? '';
    if (parts.length > 0) {
      this.pieces.push(parts[0]);
      lines.push(this.takePending());
      for (let i = 1; i < parts.length; i++) {
        lines.push(parts[i]);
      }
    }
    if (last !== '') {
      this.pieces.push(last);
    }

    return lines;
  }

  finish(): string[] {
    if (this.pieces.length === 0 && !this.heldCarriageReturn) return [];

    this.heldCarriageReturn = false;
    return [this.takePending()];
  }

  private takePending(): string {
    const line = this.pieces.length === 1 ? this.pieces[0] : this.pieces.join('');
    this.pieces = [];
    return line;
  }
}

export function splitLines(text: string): string[] {
  const splitter = new LineSplitter();
  return [...splitter.push(text), ...splitter.finish()];
}
