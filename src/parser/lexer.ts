/**
 * Lexer
 * Flat scanning state machine over a region of C-family source text.
 * Yields the characters that matter for delimiter balance and hands back
 * comments, literals and preprocessor lines as opaque ranges.
 */

export type LexState =
  | "normal"
  | "line-comment"
  | "block-comment"
  | "string"
  | "char"
  | "raw-string"
  | "directive"
  | "directive-comment";

export type LexEvent =
  | { type: "char"; index: number }
  | { type: "comment"; start: number; end: number }
  | { type: "literal"; start: number; end: number }
  | { type: "directive"; start: number; end: number };

// Raw string opening: optional encoding prefix, R, quote, delimiter, paren
const RAW_STRING_OPEN = /(?:u8|u|U|L)?R"([^()\\\s"]{0,16})\(/y;

const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;

function isSpace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\r" || ch === "\f" || ch === "\v";
}

/**
 * Start offset of an event, whatever its type
 */
export function eventStart(event: LexEvent): number {
  return event.type === "char" ? event.index : event.start;
}

/**
 * End offset (exclusive) of an event, whatever its type
 */
export function eventEnd(event: LexEvent): number {
  return event.type === "char" ? event.index + 1 : event.end;
}

export class Lexer {
  private pos: number;
  private state: LexState = "normal";
  private lineStart: boolean;
  private quote = "";
  private rawTerminator = "";

  constructor(
    private readonly src: string,
    from: number,
    private readonly end: number,
  ) {
    this.pos = from;
    this.lineStart = from === 0 || src[from - 1] === "\n";
  }

  get position(): number {
    return this.pos;
  }

  /**
   * Resume scanning at an arbitrary offset in the normal state
   */
  seek(pos: number): void {
    this.pos = Math.min(pos, this.end);
    this.state = "normal";
    this.lineStart = this.pos === 0 || this.src[this.pos - 1] === "\n";
  }

  /**
   * Next event in the region, or null once the region is exhausted.
   * Whitespace is consumed silently. Constructs left open at the region end
   * (unterminated comment, literal or directive) are closed at the end.
   */
  next(): LexEvent | null {
    const { src, end } = this;
    let start = this.pos;

    while (this.pos < end) {
      const i = this.pos;
      const ch = src[i];

      switch (this.state) {
        case "normal": {
          if (ch === "\n") {
            this.lineStart = true;
            this.pos++;
            continue;
          }
          if (isSpace(ch)) {
            this.pos++;
            continue;
          }

          start = i;
          const next = src[i + 1];

          if (ch === "/" && next === "/") {
            this.enter("line-comment", 2);
            continue;
          }
          if (ch === "/" && next === "*") {
            this.enter("block-comment", 2);
            continue;
          }
          if (ch === "#" && this.lineStart) {
            this.enter("directive", 1);
            continue;
          }

          const raw = this.matchRawStringOpening(i);
          if (raw !== null) {
            this.rawTerminator = `)${raw.delimiter}"`;
            this.enter("raw-string", raw.length);
            continue;
          }
          if (ch === '"') {
            this.quote = '"';
            this.enter("string", 1);
            continue;
          }
          if (ch === "'" && !this.isDigitSeparator(i)) {
            this.quote = "'";
            this.enter("char", 1);
            continue;
          }

          this.lineStart = false;
          this.pos++;
          return { type: "char", index: i };
        }

        case "line-comment": {
          if (ch === "\\" && this.isLineContinuation(i)) {
            this.pos = this.skipLineContinuation(i);
            continue;
          }
          if (ch === "\n") {
            this.state = "normal";
            return { type: "comment", start, end: i };
          }
          this.pos++;
          continue;
        }

        case "block-comment": {
          if (ch === "*" && src[i + 1] === "/") {
            this.pos = i + 2;
            this.state = "normal";
            return { type: "comment", start, end: this.pos };
          }
          this.pos++;
          continue;
        }

        case "string":
        case "char": {
          if (ch === "\\") {
            this.pos = Math.min(i + 2, end);
            continue;
          }
          if (ch === this.quote) {
            this.pos = i + 1;
            this.state = "normal";
            this.lineStart = false;
            return { type: "literal", start, end: this.pos };
          }
          if (ch === "\n") {
            // Unterminated literal stops at the end of its line
            this.state = "normal";
            this.lineStart = false;
            return { type: "literal", start, end: i };
          }
          this.pos++;
          continue;
        }

        case "raw-string": {
          if (src.startsWith(this.rawTerminator, i)) {
            this.pos = Math.min(i + this.rawTerminator.length, end);
            this.state = "normal";
            this.lineStart = false;
            return { type: "literal", start, end: this.pos };
          }
          this.pos++;
          continue;
        }

        case "directive": {
          if (ch === "\\" && this.isLineContinuation(i)) {
            this.pos = this.skipLineContinuation(i);
            continue;
          }
          if (ch === "/" && src[i + 1] === "*") {
            this.state = "directive-comment";
            this.pos = i + 2;
            continue;
          }
          if (ch === "\n") {
            this.state = "normal";
            return { type: "directive", start, end: this.trimLineEnd(start, i) };
          }
          this.pos++;
          continue;
        }

        case "directive-comment": {
          if (ch === "*" && src[i + 1] === "/") {
            this.state = "directive";
            this.pos = i + 2;
            continue;
          }
          this.pos++;
          continue;
        }
      }
    }

    return this.closeAtEnd(start);
  }

  private enter(state: LexState, width: number): void {
    this.state = state;
    this.pos += width;
  }

  private closeAtEnd(start: number): LexEvent | null {
    const state = this.state;
    this.state = "normal";
    const end = this.end;

    switch (state) {
      case "normal":
        return null;
      case "line-comment":
      case "block-comment":
        return { type: "comment", start, end };
      case "string":
      case "char":
      case "raw-string":
        return { type: "literal", start, end };
      case "directive":
      case "directive-comment":
        return { type: "directive", start, end: this.trimLineEnd(start, end) };
    }
  }

  // A directive ending in "\r\n" leaves the carriage return to the gap
  private trimLineEnd(start: number, end: number): number {
    return end > start && this.src[end - 1] === "\r" ? end - 1 : end;
  }

  private isLineContinuation(i: number): boolean {
    const next = this.src[i + 1];
    return next === "\n" || (next === "\r" && this.src[i + 2] === "\n");
  }

  private skipLineContinuation(i: number): number {
    return this.src[i + 1] === "\r" ? i + 3 : i + 2;
  }

  private matchRawStringOpening(
    i: number,
  ): { delimiter: string; length: number } | null {
    const ch = this.src[i];
    if (ch !== "R" && ch !== "u" && ch !== "U" && ch !== "L") return null;
    if (i > 0 && IDENTIFIER_CHAR.test(this.src[i - 1])) return null;

    RAW_STRING_OPEN.lastIndex = i;
    const match = RAW_STRING_OPEN.exec(this.src);
    if (!match || i + match[0].length > this.end) return null;

    return { delimiter: match[1], length: match[0].length };
  }

  // 1'000'000 and 0xFF'FF use the apostrophe as a digit separator
  private isDigitSeparator(i: number): boolean {
    const { src } = this;
    if (i === 0 || !IDENTIFIER_CHAR.test(src[i - 1])) return false;
    if (!/[0-9A-Za-z]/.test(src[i + 1] ?? "")) return false;

    let tokenStart = i;
    while (tokenStart > 0 && /[0-9A-Za-z_.']/.test(src[tokenStart - 1])) {
      tokenStart--;
    }
    return /[0-9]/.test(src[tokenStart]);
  }
}
