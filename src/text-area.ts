import type { Input } from "./input.js";
import type { Block, TextAreaWidget, TextStyle } from "./widget.js";

import {
  ConfigError,
  ContractViolationError,
  InvariantViolationError,
} from "./errors.js";
import { Line, SENTINEL, hasLineBreak, isSingleChar } from "./line.js";
import { isLoggingEnabled, log } from "./utils/logger/log.js";
import { projectSpans } from "./widget.js";

export const DEFAULT_TAB = "    ";

export interface TextAreaOptions {
  /** Seed text; split on `\n`, `\r\n` and `\r`. */
  readonly initialText?: string;
  /** Indentation unit inserted by Tab. Spaces only. */
  readonly tab?: string;
  readonly style?: TextStyle;
  readonly block?: Block;
}

/**
 * Throws a {@link ConfigError} unless `tab` consists of spaces only. An empty
 * string is accepted and disables Tab.
 */
export function assertTabString(tab: string): void {
  if (!/^ *$/.test(tab)) {
    throw new ConfigError(
      `tab string must consist of spaces but got ${JSON.stringify(tab)}`,
    );
  }
}

function describeInput(input: Input): string {
  const { key } = input;
  const name = key.kind === "char" ? `char(${JSON.stringify(key.char)})` : key.kind;
  return input.ctrl ? `ctrl+${name}` : name;
}

/* ────────────────────────────────────────────────────────────────────────── */

/**
 * A multi-line editing buffer with a single block cursor.
 *
 * Each line ends in a sentinel cell, so the cursor always addresses a real,
 * highlightable character, including past the last character of a line.
 * Rows and columns are 0-based and counted in code points.
 */
export class TextArea {
  private lines: Array<Line>;
  private cursorRow = 0;
  private cursorCol = 0;

  /* bumps every time the text changes */
  private version = 0;

  private tab: string = DEFAULT_TAB;
  private style: TextStyle = {};
  private block: Block | undefined;

  constructor(options: TextAreaOptions = {}) {
    const { initialText = "", tab, style, block } = options;
    this.lines = initialText
      .replace(/\r\n/g, "\n")
      .split(/[\r\n]/)
      .map((l) => new Line(l));
    if (tab !== undefined) {
      this.setTab(tab);
    }
    if (style !== undefined) {
      this.style = style;
    }
    this.block = block;
  }

  /* =======================================================================
   *  Geometry helpers
   * ===================================================================== */

  private currentLine(): Line {
    return this.lineAt(this.cursorRow);
  }

  private lineAt(row: number): Line {
    const line = this.lines[row];
    if (line === undefined) {
      throw new InvariantViolationError(
        "cursor row within bounds",
        `row ${row} of ${this.lines.length} lines`,
      );
    }
    return line;
  }

  /* =======================================================================
   *  Public read‑only accessors
   * ===================================================================== */

  /** Logical lines; the sentinel is never included. */
  getLines(): Array<string> {
    return this.lines.map((l) => l.text());
  }

  getText(): string {
    return this.getLines().join("\n");
  }

  getLineCount(): number {
    return this.lines.length;
  }

  /** 0-based, code-point-wise `[row, col]` cursor position. */
  getCursor(): [number, number] {
    return [this.cursorRow, this.cursorCol];
  }

  getVersion(): number {
    return this.version;
  }

  getTab(): string {
    return this.tab;
  }

  getStyle(): TextStyle {
    return this.style;
  }

  getBlock(): Block | undefined {
    return this.block;
  }

  /* =======================================================================
   *  Configuration
   * ===================================================================== */

  setStyle(style: TextStyle): this {
    this.style = style;
    return this;
  }

  setBlock(block: Block): this {
    this.block = block;
    return this;
  }

  removeBlock(): this {
    this.block = undefined;
    return this;
  }

  setTab(tab: string): this {
    assertTabString(tab);
    this.tab = tab;
    return this;
  }

  /* =======================================================================
   *  Input dispatch
   * ===================================================================== */

  /**
   * Apply one normalised key. Ctrl-modified keys follow the Emacs bindings;
   * unbound keys are ignored. Returns true when the text or cursor changed.
   */
  input(input: Input): boolean {
    const beforeVer = this.version;
    const [beforeRow, beforeCol] = this.getCursor();
    const { key } = input;

    if (input.ctrl) {
      if (key.kind === "char") {
        switch (key.char) {
          case "h":
            this.deleteChar();
            break;
          case "m":
            this.insertNewline();
            break;
          case "p":
            this.cursorUp();
            break;
          case "n":
            this.cursorDown();
            break;
          case "f":
            this.cursorForward();
            break;
          case "b":
            this.cursorBack();
            break;
          case "a":
            this.cursorStart();
            break;
          case "e":
            this.cursorEnd();
            break;
        }
      }
    } else {
      switch (key.kind) {
        case "char":
          if (isSingleChar(key.char)) {
            this.insertChar(key.char);
          }
          break;
        case "backspace":
          this.deleteChar();
          break;
        case "tab":
          this.insertTab();
          break;
        case "enter":
          this.insertNewline();
          break;
        case "up":
          this.cursorUp();
          break;
        case "right":
          this.cursorForward();
          break;
        case "down":
          this.cursorDown();
          break;
        case "left":
          this.cursorBack();
          break;
        case "home":
          this.cursorStart();
          break;
        case "end":
          this.cursorEnd();
          break;
        case "delete":
        case "null":
          break;
      }
    }

    if (isLoggingEnabled()) {
      log(
        `TextArea.input ${describeInput(input)} -> cursor ${JSON.stringify(
          this.getCursor(),
        )}, ${this.lines.length} line(s)`,
      );
    }

    return (
      this.version !== beforeVer ||
      this.cursorRow !== beforeRow ||
      this.cursorCol !== beforeCol
    );
  }

  /* =======================================================================
   *  Editing operations
   * ===================================================================== */

  /** Insert one code point before the cursor. */
  insertChar(c: string): void {
    if (!isSingleChar(c)) {
      throw new ContractViolationError(
        `insertChar expects a single non-line-break character but got ${JSON.stringify(c)}`,
      );
    }
    this.cursorCol += this.currentLine().insert(this.cursorCol, c);
    this.version++;
  }

  /** Insert a string without line breaks; use `insertNewline` to split. */
  insertText(s: string): void {
    if (hasLineBreak(s)) {
      throw new ContractViolationError(
        "string given to insertText must not contain a line break",
      );
    }
    if (s === "") {
      return;
    }
    this.cursorCol += this.currentLine().insert(this.cursorCol, s);
    this.version++;
  }

  /** Pad with spaces up to the next multiple of the tab width. */
  insertTab(): void {
    if (this.tab === "") {
      return;
    }
    const width = this.tab.length - (this.cursorCol % this.tab.length);
    this.insertText(this.tab.slice(0, width));
  }

  insertNewline(): void {
    const tail = this.currentLine().splitAt(this.cursorCol);
    this.lines.splice(this.cursorRow + 1, 0, tail);
    this.cursorRow += 1;
    this.cursorCol = 0;
    this.version++;
  }

  /** Backspace: delete the character before the cursor or join lines. */
  deleteChar(): void {
    if (this.cursorCol > 0) {
      if (this.currentLine().removeAt(this.cursorCol - 1)) {
        this.cursorCol -= 1;
        this.version++;
      }
      return;
    }
    if (this.cursorRow === 0) {
      return;
    }

    const prev = this.lines[this.cursorRow - 1];
    if (prev === undefined) {
      return;
    }
    // Append before the current line is unlinked.
    const joinAt = prev.append(this.currentLine());
    this.lines.splice(this.cursorRow, 1);
    this.cursorRow -= 1;
    this.cursorCol = joinAt;
    this.version++;
  }

  /* =======================================================================
   *  Cursor movement
   * ===================================================================== */

  cursorForward(): void {
    if (this.cursorCol + 1 < this.currentLine().cellCount) {
      this.cursorCol += 1;
    } else if (this.cursorRow + 1 < this.lines.length) {
      this.cursorRow += 1;
      this.cursorCol = 0;
    }
  }

  cursorBack(): void {
    if (this.cursorCol > 0) {
      this.cursorCol -= 1;
    } else if (this.cursorRow > 0) {
      this.cursorRow -= 1;
      this.cursorCol = this.currentLine().cellCount - 1;
    }
  }

  cursorDown(): void {
    if (this.cursorRow + 1 >= this.lines.length) {
      return;
    }
    this.cursorRow += 1;
    this.clampColumn();
  }

  cursorUp(): void {
    if (this.cursorRow === 0) {
      return;
    }
    this.cursorRow -= 1;
    this.clampColumn();
  }

  cursorStart(): void {
    this.cursorCol = 0;
  }

  cursorEnd(): void {
    this.cursorCol = this.currentLine().cellCount - 1;
  }

  private clampColumn(): void {
    this.cursorCol = Math.min(this.cursorCol, this.currentLine().cellCount - 1);
  }

  /* =======================================================================
   *  Rendering & self-check
   * ===================================================================== */

  widget(): TextAreaWidget {
    return {
      lines: projectSpans(this.lines, this.getCursor()),
      style: this.style,
      block: this.block,
    };
  }

  /**
   * Verify the structural invariants and throw an
   * {@link InvariantViolationError} describing the first one that fails.
   */
  checkInvariants(): void {
    const [row, col] = this.getCursor();
    if (this.lines.length === 0) {
      throw new InvariantViolationError("buffer is non-empty", "no lines");
    }
    this.lines.forEach((line, i) => {
      if (line.cellAt(line.cellCount - 1) !== SENTINEL) {
        throw new InvariantViolationError(
          "every line ends with the sentinel",
          `line ${i + 1}: ${JSON.stringify(line.cells())}`,
        );
      }
    });
    if (row < 0 || row >= this.lines.length) {
      throw new InvariantViolationError(
        "cursor row within bounds",
        `cursor [${row}, ${col}] exceeds max lines ${this.lines.length}`,
      );
    }
    const cells = this.lineAt(row).cellCount;
    if (col < 0 || col >= cells) {
      throw new InvariantViolationError(
        "cursor column within bounds",
        `cursor [${row}, ${col}] exceeds max col ${cells} at line ${JSON.stringify(
          this.lineAt(row).cells(),
        )}`,
      );
    }
  }
}

/** A ready-to-use empty buffer: one sentinel-only line, cursor at origin. */
export function createTextArea(options?: TextAreaOptions): TextArea {
  return new TextArea(options);
}
