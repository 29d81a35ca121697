/**
 * Size - Screen space occupied by a rendered node
 *
 * A node's footprint is described by how many line breaks it contains and
 * how long its last line is. That is all a cursor/layout component needs to
 * place the node that follows it.
 */

export class Size {
  static readonly ZERO = new Size(0, 0);

  constructor(
    public readonly lines: number,
    public readonly lastLineLength: number
  ) {}

  /**
   * Measure a rendered string
   */
  static ofText(text: string): Size {
    // Lengths are in code points, so a surrogate pair is one column.
    let lines = 0;
    let lastLineLength = 0;
    for (const ch of text) {
      if (ch === '\n') {
        lines++;
        lastLineLength = 0;
      } else {
        lastLineLength++;
      }
    }
    return new Size(lines, lastLineLength);
  }

  /**
   * Size of `this` immediately followed by `other`
   */
  add(other: Size): Size {
    if (other.lines === 0) {
      return new Size(this.lines, this.lastLineLength + other.lastLineLength);
    }
    return new Size(this.lines + other.lines, other.lastLineLength);
  }

  equals(other: Size): boolean {
    return this.lines === other.lines && this.lastLineLength === other.lastLineLength;
  }

  toString(): string {
    return `${this.lines}:${this.lastLineLength}`;
  }
}
