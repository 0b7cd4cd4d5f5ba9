/**
 * Append-only, scrollable text buffer with a character cursor.
 * The cursor marks the scroll position; renderers show the lines ending at it.
 */

export class OutputBuffer {
  private _text = '';
  private _cursor = 0;

  get text(): string {
    return this._text;
  }

  get length(): number {
    return this._text.length;
  }

  get cursor(): number {
    return this._cursor;
  }

  /** Set the cursor, clamped to `[0, length]`. */
  set cursor(position: number) {
    this._cursor = Math.max(0, Math.min(Math.floor(position), this._text.length));
  }

  get atEnd(): boolean {
    return this._cursor >= this._text.length;
  }

  /** Append text. The cursor does not move; callers decide whether to follow. */
  append(text: string): void {
    this._text += text;
  }

  /** Replace the whole content; the cursor is clamped to the new length. */
  replace(text: string): void {
    this._text = text;
    this.cursor = this._cursor;
  }

  moveToEnd(): void {
    this._cursor = this._text.length;
  }

  clear(): void {
    this._text = '';
    this._cursor = 0;
  }
}
