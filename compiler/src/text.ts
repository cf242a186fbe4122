
export class TextPos {

  constructor(
    public offset: number,
    public line: number,
    public column: number,
  ) {

  }

}

export class TextSpan {

  constructor(
    public file: TextFile,
    public start: TextPos,
    public end: TextPos,
  ) {

  }

  /**
   * Two spans intersect when they belong to the same file and share at least
   * one character.
   */
  public intersects(other: TextSpan): boolean {
    return this.file === other.file
        && this.start.offset < other.end.offset
        && other.start.offset < this.end.offset;
  }

  public format(): string {
    return `${this.start.line}:${this.start.column}-${this.end.line}:${this.end.column}`;
  }

}

export class TextFile {

  constructor(
    public origPath: string,
    private text: string,
  ) {

  }

  public getText(): string {
    return this.text;
  }

  public getPosition(offset: number): TextPos {
    if (offset < 0 || offset > this.text.length) {
      throw new Error(`Offset ${offset} lies outside of ${this.origPath}.`);
    }
    let line = 1;
    let column = 1;
    for (let i = 0; i < offset; i++) {
      if (this.text[i] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    return new TextPos(offset, line, column);
  }

  public getSpan(startOffset: number, endOffset: number): TextSpan {
    return new TextSpan(this, this.getPosition(startOffset), this.getPosition(endOffset));
  }

}
