import type { Key as InkKey } from "ink";

import { toCodePoints } from "./line.js";

export type NamedKey =
  | "backspace"
  | "enter"
  | "left"
  | "right"
  | "up"
  | "down"
  | "tab"
  | "delete"
  | "home"
  | "end"
  | "null";

export type Key = { kind: "char"; char: string } | { kind: NamedKey };

/** A key event normalised away from whatever terminal layer produced it. */
export interface Input {
  readonly key: Key;
  readonly ctrl: boolean;
}

export const NULL_INPUT: Input = { key: { kind: "null" }, ctrl: false };

export function charKey(char: string): Key {
  return { kind: "char", char };
}

/**
 * The modifier/special-key flags Ink hands to `useInput`. `home` and `end`
 * are only reported by some hosts, so every field is optional.
 */
export type KeyFlags = Partial<InkKey> & {
  home?: boolean;
  end?: boolean;
};

// Ink strips the leading ESC from unrecognised escape sequences.
const HOME_SEQUENCES = new Set(["[H", "[1~", "[7~", "OH"]);
const END_SEQUENCES = new Set(["[F", "[4~", "[8~", "OF"]);

// C0 controls, DEL and the C1 block U+0080–U+009F.
const CONTROL_CHAR = /^[\u0000-\u001f\u007f-\u009f]$/;

function isPrintable(ch: string): boolean {
  return !CONTROL_CHAR.test(ch);
}

function named(kind: NamedKey, ctrl = false): Input {
  return { key: { kind }, ctrl };
}

/**
 * Map a single Ink `useInput` event to an {@link Input}. Total: anything not
 * recognised (escape, page keys, multi-character bursts) becomes
 * {@link NULL_INPUT}.
 */
export function inputFromInk(input: string, key: KeyFlags): Input {
  const ctrl = key.ctrl === true;

  if (key.upArrow) {
    return named("up", ctrl);
  }
  if (key.downArrow) {
    return named("down", ctrl);
  }
  if (key.leftArrow) {
    return named("left", ctrl);
  }
  if (key.rightArrow) {
    return named("right", ctrl);
  }
  if (key.return) {
    return named("enter", ctrl);
  }
  if (key.tab) {
    return named("tab", ctrl);
  }
  if (key.backspace) {
    return named("backspace", ctrl);
  }
  // In raw mode the Backspace key sends DEL (0x7f), which Ink reports as
  // `delete`. Only Shift+Delete is treated as a real forward delete.
  if (key.delete) {
    return named(key.shift ? "delete" : "backspace", ctrl);
  }
  if (key.home || HOME_SEQUENCES.has(input)) {
    return named("home", ctrl);
  }
  if (key.end || END_SEQUENCES.has(input)) {
    return named("end", ctrl);
  }
  if (key.escape || key.pageUp || key.pageDown) {
    return NULL_INPUT;
  }

  switch (input) {
    case "\r":
    case "\n":
      return named("enter", ctrl);
    case "\t":
      return named("tab", ctrl);
    case "\x7f":
    case "\b":
      return named("backspace", ctrl);
  }

  const cps = toCodePoints(input);
  if (cps.length === 1 && cps[0] !== undefined && isPrintable(cps[0])) {
    return { key: charKey(cps[0]), ctrl };
  }
  return NULL_INPUT;
}

/**
 * Like {@link inputFromInk}, but expands a burst of plain text (terminals
 * deliver pasted text as one chunk) into one input per code point, with a
 * single `enter` for each line break (`\r\n` counts once).
 */
export function inputsFromInk(input: string, key: KeyFlags): Array<Input> {
  const plain =
    !key.ctrl &&
    !key.meta &&
    !key.escape &&
    !key.return &&
    !key.tab &&
    !key.backspace &&
    !key.delete;
  const cps = toCodePoints(input);
  if (
    !plain ||
    cps.length <= 1 ||
    HOME_SEQUENCES.has(input) ||
    END_SEQUENCES.has(input)
  ) {
    return [inputFromInk(input, key)];
  }

  const out: Array<Input> = [];
  const normalised = input.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
  for (const ch of toCodePoints(normalised)) {
    if (ch === "\n") {
      out.push(named("enter"));
    } else if (ch === "\t") {
      out.push(named("tab"));
    } else if (isPrintable(ch)) {
      out.push({ key: charKey(ch), ctrl: false });
    }
  }
  return out;
}
