/**
 * Source Index
 * Maps string offsets of decoded source to UTF-8 byte offsets and lines.
 */

import type { Span } from "../types";

export class SourceIndex {
  private readonly bytes: Uint32Array;
  private readonly lineStarts: number[] = [0];

  constructor(readonly text: string) {
    this.bytes = new Uint32Array(text.length + 1);

    let offset = 0;
    for (let i = 0; i < text.length; i++) {
      this.bytes[i] = offset;
      const code = text.charCodeAt(i);

      if (code < 0x80) offset += 1;
      else if (code < 0x800) offset += 2;
      // A surrogate pair encodes as 4 bytes, split 2 + 2 over its halves
      else if (code >= 0xd800 && code <= 0xdfff) offset += 2;
      else offset += 3;

      if (code === 0x0a) this.lineStarts.push(offset);
    }
    this.bytes[text.length] = offset;
  }

  byteAt(index: number): number {
    return this.bytes[index];
  }

  /**
   * 1-based line holding the given byte offset
   */
  lineAt(byte: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;

    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= byte) low = mid;
      else high = mid - 1;
    }

    return low + 1;
  }

  /**
   * Span of the string range [start, end). The end line is the line of the
   * last byte, or the start line for an empty range.
   */
  span(start: number, end: number): Span {
    const startByte = this.byteAt(start);
    const endByte = this.byteAt(end);

    return {
      start_byte: startByte,
      end_byte: endByte,
      start_line: this.lineAt(startByte),
      end_line: this.lineAt(Math.max(startByte, endByte - 1)),
    };
  }
}
