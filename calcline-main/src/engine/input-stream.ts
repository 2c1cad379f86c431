/** Code-point cursor over one input line. */
export class InputStream {
  private readonly chars: string[];
  private pos = 0;

  constructor(readonly input: string) {
    this.chars = Array.from(input);
  }

  peek(offset = 0): string | undefined {
    return this.chars[this.pos + offset];
  }

  next(): string | undefined {
    const ch = this.chars[this.pos];
    if (ch !== undefined) this.pos++;
    return ch;
  }

  eof(): boolean {
    return this.pos >= this.chars.length;
  }

  /** Number of characters consumed so far. */
  position(): number {
    return this.pos;
  }
}
