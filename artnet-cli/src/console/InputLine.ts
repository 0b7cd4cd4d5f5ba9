/**
 * The command line being typed, with submit history.
 */

const MAX_HISTORY = 100;

export class InputLine {
  private _text = '';
  private readonly history: string[] = [];
  /** Index into history while browsing; equals history.length when not browsing. */
  private historyIndex = 0;

  get text(): string {
    return this._text;
  }

  get isEmpty(): boolean {
    return this._text.length === 0;
  }

  insert(text: string): void {
    this._text += text;
  }

  backspace(): void {
    this._text = this._text.slice(0, -1);
  }

  clear(): void {
    this._text = '';
    this.historyIndex = this.history.length;
  }

  /** Take the current line, record it in history and reset the input. */
  submit(): string {
    const line = this._text;
    if (line.trim() && this.history[this.history.length - 1] !== line) {
      this.history.push(line);
      if (this.history.length > MAX_HISTORY) this.history.shift();
    }
    this.clear();
    return line;
  }

  /** Step through history; -1 is older, 1 is newer. */
  recall(direction: -1 | 1): void {
    const next = this.historyIndex + direction;
    if (next < 0 || next > this.history.length) return;
    this.historyIndex = next;
    this._text = next === this.history.length ? '' : this.history[next];
  }
}
