/*
 * -------------------------------------------------------------------------
 *  Code‑point helpers. Columns count Unicode scalar values, not UTF‑16 code
 *  units, so a surrogate‑pair emoji occupies exactly one column.
 * ---------------------------------------------------------------------- */

export function toCodePoints(str: string): Array<string> {
  // Array.from iterates by code point, keeping surrogate pairs together.
  return Array.from(str);
}

export function cpLen(str: string): number {
  return toCodePoints(str).length;
}

const LINE_BREAK = /[\r\n]/;

export function hasLineBreak(str: string): boolean {
  return LINE_BREAK.test(str);
}

/** Exactly one code point, and not a line break. */
export function isSingleChar(str: string): boolean {
  return cpLen(str) === 1 && !hasLineBreak(str);
}

/** Trailing blank cell every line carries so the cursor can sit past the text. */
export const SENTINEL = " ";

/**
 * One row of the buffer.
 *
 * The logical content is stored without the sentinel; the sentinel is the
 * implicit final cell, so `cellCount` is always `length + 1` and no mutator
 * can remove it. Cell indices run over `[0, cellCount)`, and index `length`
 * addresses the sentinel.
 */
export class Line {
  private chars: Array<string>;

  constructor(text = "") {
    this.chars = toCodePoints(text);
  }

  /** Number of code points of logical text. */
  get length(): number {
    return this.chars.length;
  }

  /** Number of addressable cells, sentinel included. */
  get cellCount(): number {
    return this.chars.length + 1;
  }

  /** Character at `col`; the sentinel for `col === length`. */
  cellAt(col: number): string | undefined {
    if (col === this.chars.length) {
      return SENTINEL;
    }
    return this.chars[col];
  }

  /** Logical text, sentinel excluded. */
  text(): string {
    return this.chars.join("");
  }

  /** Rendered text, sentinel included. */
  cells(): string {
    return this.text() + SENTINEL;
  }

  /** Text of cells `[start, end)`; `end` may reach `cellCount`. */
  sliceCells(start: number, end?: number): string {
    return [...this.chars, SENTINEL].slice(start, end).join("");
  }

  /** Insert `str` before cell `col`. Returns the number of code points added. */
  insert(col: number, str: string): number {
    const inserted = toCodePoints(str);
    this.chars = this.chars
      .slice(0, col)
      .concat(inserted, this.chars.slice(col));
    return inserted.length;
  }

  /** Remove the character at `col` (never the sentinel). */
  removeAt(col: number): boolean {
    if (col < 0 || col >= this.chars.length) {
      return false;
    }
    this.chars.splice(col, 1);
    return true;
  }

  /**
   * Cut this line at `col`. Cells from `col` on (the sentinel included) move
   * to the returned line; this line keeps the head and a fresh sentinel.
   */
  splitAt(col: number): Line {
    const tail = new Line();
    tail.chars = this.chars.splice(col);
    return tail;
  }

  /**
   * Join `next` onto the end of this line. The join point (this line's former
   * sentinel cell) is returned so callers can place the cursor on it.
   */
  append(next: Line): number {
    const joinAt = this.chars.length;
    this.chars = this.chars.concat(next.chars);
    return joinAt;
  }
}
