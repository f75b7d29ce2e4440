import type { Line } from "./line.js";
import type { BoxProps, TextProps } from "ink";

/** Text attributes applied to every rendered line. */
export type TextStyle = Pick<
  TextProps,
  | "color"
  | "backgroundColor"
  | "dimColor"
  | "bold"
  | "italic"
  | "underline"
  | "strikethrough"
  | "inverse"
>;

/** Optional decorative frame drawn around the text. */
export type Block = Pick<
  BoxProps,
  "borderStyle" | "borderColor" | "paddingX" | "paddingY" | "width"
>;

export interface Span {
  readonly text: string;
  /** Rendered with foreground and background swapped (the block cursor). */
  readonly reversed: boolean;
}

export type Spans = ReadonlyArray<Span>;

/** Read-only snapshot handed to the render collaborator. */
export interface TextAreaWidget {
  readonly lines: ReadonlyArray<Spans>;
  readonly style: TextStyle;
  readonly block: Block | undefined;
}

/**
 * Split every line into spans for rendering. The cursor line becomes
 * `[before, cell under cursor, after]` with the middle span reversed; all
 * other lines are one plain span, trailing sentinel included.
 */
export function projectSpans(
  lines: ReadonlyArray<Line>,
  [cursorRow, cursorCol]: readonly [number, number],
): Array<Spans> {
  return lines.map((line, row) => {
    if (row !== cursorRow) {
      return [{ text: line.cells(), reversed: false }];
    }
    return [
      { text: line.sliceCells(0, cursorCol), reversed: false },
      { text: line.sliceCells(cursorCol, cursorCol + 1), reversed: true },
      { text: line.sliceCells(cursorCol + 1), reversed: false },
    ];
  });
}
