/**
 * Segmenter
 * Splits a region of source into top-level directives and statements.
 * Statements end at a ";" outside parentheses, or after the closing brace
 * of a body. Linkage blocks (extern "C" { ... }) are transparent: their
 * braces become segments of their own and their contents are segmented at
 * the same level.
 */

import { Lexer, eventEnd, eventStart, type LexEvent } from "./lexer";
import { blankTrivia, decideBrace, isTypeHead } from "./classifier";

export interface DirectiveSegment {
  type: "directive";
  start: number;
  end: number;
}

export interface StatementSegment {
  type: "statement";
  start: number;
  end: number;
  // Offset of the opening body brace, when the statement has a body
  bodyStart?: number;
  // Offset just past the closing body brace
  bodyEnd?: number;
  // Set when a body brace is never closed before the region ends
  unterminated?: boolean;
}

/**
 * Bytes that can never form a construct: access labels, stray delimiters,
 * linkage block braces
 */
export interface PunctuationSegment {
  type: "punctuation";
  start: number;
  end: number;
}

export type Segment = DirectiveSegment | StatementSegment | PunctuationSegment;

const ACCESS_LABEL =
  /(?:public|private|protected|signals|Q_SIGNALS|Q_SLOTS|(?:public|private|protected)\s+(?:slots|Q_SLOTS))\s*:(?!:)/y;

const LINKAGE_HEAD = /^extern\s*"\s*"$/;

// Declarators after a type body: "} a, *b[4];" or just "};"
const DECLARATOR = String.raw`(?:[*&]\s*)*[A-Za-z_]\w*(?:\s*\[[^\]]*\])?`;
const TYPE_TRAILER = new RegExp(
  String.raw`\s*(?:${DECLARATOR}\s*,\s*)*(?:${DECLARATOR}\s*)?;`,
  "y",
);

interface OpenStatement {
  start: number;
  last: number; // End of the last event belonging to the statement
  parens: number;
  bodyStart?: number;
  bodyEnd?: number;
}

/**
 * Consume events up to and including the brace matching an already
 * consumed "{". Returns the offset of the closing brace, or -1.
 */
function matchBrace(src: string, lexer: Lexer): number {
  let depth = 1;
  let event: LexEvent | null;

  while ((event = lexer.next()) !== null) {
    if (event.type !== "char") continue;
    const ch = src[event.index];
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return event.index;
    }
  }

  return -1;
}

export function segment(src: string, from: number, to: number): Segment[] {
  const lexer = new Lexer(src, from, to);
  const segments: Segment[] = [];
  let open: OpenStatement | null = null;
  let event: LexEvent | null;

  const close = (end: number, extra: Partial<StatementSegment> = {}) => {
    if (!open) return;
    segments.push({
      type: "statement",
      start: open.start,
      end,
      bodyStart: open.bodyStart,
      bodyEnd: open.bodyEnd,
      ...extra,
    });
    open = null;
  };

  while ((event = lexer.next()) !== null) {
    if (event.type === "comment") continue;

    if (event.type === "directive") {
      if (open) {
        open.last = event.end;
      } else {
        segments.push({ type: "directive", start: event.start, end: event.end });
      }
      continue;
    }

    const start = eventStart(event);

    if (!open) {
      if (event.type === "char") {
        const ch = src[event.index];

        ACCESS_LABEL.lastIndex = start;
        const label = ACCESS_LABEL.exec(src);
        if (label && start + label[0].length <= to) {
          const end = start + label[0].length;
          segments.push({ type: "punctuation", start, end });
          lexer.seek(end);
          continue;
        }

        if (ch === ";" || ch === "}") {
          segments.push({ type: "punctuation", start, end: start + 1 });
          continue;
        }
      }

      open = { start, last: start, parens: 0 };
    }

    const previousLast = open.last;
    open.last = eventEnd(event);
    if (event.type !== "char") continue;

    const ch = src[event.index];
    switch (ch) {
      case "(":
      case "[":
        open.parens++;
        break;

      case ")":
      case "]":
        open.parens = Math.max(0, open.parens - 1);
        break;

      case ";":
        if (open.parens === 0) close(event.index + 1);
        break;

      case "}":
        if (open.parens === 0) {
          // Closing brace of an enclosing block this region does not own
          const stray = event.index;
          close(previousLast);
          segments.push({ type: "punctuation", start: stray, end: stray + 1 });
        }
        break;

      case "{": {
        if (open.parens > 0) break;

        const brace = event.index;
        const head = blankTrivia(src, open.start, brace);

        if (LINKAGE_HEAD.test(head.trim())) {
          segments.push({ type: "punctuation", start: open.start, end: brace + 1 });
          open = null;
          break;
        }

        const decision = decideBrace(head);
        const closing = matchBrace(src, lexer);

        if (closing === -1) {
          close(to, { unterminated: true, bodyStart: brace });
          break;
        }

        open.last = closing + 1;
        if (decision === "inline") break;

        open.bodyStart = brace;
        open.bodyEnd = closing + 1;

        let end = closing + 1;
        if (isTypeHead(head)) {
          TYPE_TRAILER.lastIndex = end;
          const trailer = TYPE_TRAILER.exec(src);
          if (trailer && end + trailer[0].length <= to) {
            end += trailer[0].length;
          }
        }

        close(end);
        lexer.seek(end);
        break;
      }
    }
  }

  if (open) {
    const pending: OpenStatement = open;
    close(pending.last);
  }

  return segments;
}
