/**
 * Append-only line store shared by the background loader (single writer)
 * and any number of readers.
 *
 * Slots are written once, in index order, and the published count only
 * moves after the slot is stored, so a reader sees either a complete line
 * or nothing.
 */
export class LineCache {
  private readonly lines: string[] = [];
  private count = 0;

  append(line: string): void {
    this.lines[this.count] = line;
    this.count += 1;
  }

  appendAll(lines: Iterable<string>): void {
    for (const line of lines) {
      this.append(line);
    }
  }

  /** The line at `index`, or undefined while it is not (yet) available. */
  getLine(index: number): string | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      return undefined;
    }
    return this.lines[index];
  }

  /** Never decreases; may trail the final count while loading. */
  getLineCount(): number {
    return this.count;
  }

  /** Available lines in [start, end), clamped to what has been written. */
  getLines(start: number, end: number): string[] {
    const from = Math.max(0, Math.floor(start));
    const to = Math.min(this.count, Math.floor(end));
    return from < to ? this.lines.slice(from, to) : [];
  }

  snapshot(): readonly string[] {
    return this.lines.slice(0, this.count);
  }
}
