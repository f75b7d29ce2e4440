import type { Block, TextStyle } from "../widget.js";

import { inputsFromInk } from "../input.js";
import { TextArea } from "../text-area.js";
import { log } from "../utils/logger/log.js";
import TextAreaView from "./text-area-view.js";
import { useInput } from "ink";
import React, { useImperativeHandle, useRef, useState } from "react";

export interface TextAreaEditorProps {
  // Initial contents.
  readonly initialText?: string;

  // Indentation unit for <Tab>; spaces only.
  readonly tab?: string;

  // Applied to every rendered line.
  readonly style?: TextStyle;

  // Optional frame around the text.
  readonly block?: Block;

  // Capture keyboard input.
  readonly focus?: boolean;

  // Called with the logical lines whenever the text changes.
  readonly onChange?: (lines: Array<string>) => void;

  // Called whenever the cursor moves or the text changes.
  readonly onCursorChange?: (cursor: [number, number]) => void;
}

// Read-only view of the buffer for parent components.
export interface TextAreaEditorHandle {
  getLines(): Array<string>;
  getCursor(): [number, number];
  getText(): string;
}

const TextAreaEditorInner = (
  {
    initialText = "",
    tab,
    style,
    block,
    focus = true,
    onChange,
    onCursorChange,
  }: TextAreaEditorProps,
  ref: React.ForwardedRef<TextAreaEditorHandle>,
): React.ReactElement => {
  const area = useRef<TextArea | null>(null);
  if (area.current === null) {
    area.current = new TextArea({ initialText, tab, style, block });
  }
  const [, setVersion] = useState(0);

  // Keep the pass-through configuration in sync with the props.
  const buffer = area.current;
  if (style !== undefined && style !== buffer.getStyle()) {
    buffer.setStyle(style);
  }
  if (block !== buffer.getBlock()) {
    if (block === undefined) {
      buffer.removeBlock();
    } else {
      buffer.setBlock(block);
    }
  }
  if (tab !== undefined && tab !== buffer.getTab()) {
    buffer.setTab(tab);
  }

  useInput(
    (input, key) => {
      const beforeVer = buffer.getVersion();
      let changed = false;
      for (const normalised of inputsFromInk(input, key)) {
        changed = buffer.input(normalised) || changed;
      }
      if (!changed) {
        return;
      }

      log(`TextAreaEditor: cursor ${JSON.stringify(buffer.getCursor())}`);
      setVersion((v) => v + 1);
      if (buffer.getVersion() !== beforeVer) {
        onChange?.(buffer.getLines());
      }
      onCursorChange?.(buffer.getCursor());
    },
    { isActive: focus },
  );

  useImperativeHandle(
    ref,
    () => ({
      getLines: () => buffer.getLines(),
      getCursor: () => buffer.getCursor(),
      getText: () => buffer.getText(),
    }),
    [buffer],
  );

  return <TextAreaView widget={buffer.widget()} />;
};

const TextAreaEditor = React.forwardRef(TextAreaEditorInner);
export default TextAreaEditor;
