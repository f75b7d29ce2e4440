import type { TextAreaEditorHandle } from "./components/text-area-editor.js";
import type { Block, TextStyle } from "./widget.js";

import TextAreaEditor from "./components/text-area-editor.js";
import { Box, Text, useApp, useInput } from "ink";
import React, { useRef, useState } from "react";

export interface AppProps {
  readonly initialText?: string;
  readonly tab: string;
  readonly style?: TextStyle;
  readonly block?: Block;
  /** Receives the final text once the user presses <Esc>. */
  readonly onDone: (text: string) => void;
}

export default function App({
  initialText,
  tab,
  style,
  block,
  onDone,
}: AppProps): React.ReactElement {
  const { exit } = useApp();
  const editor = useRef<TextAreaEditorHandle>(null);
  const [[row, col], setCursor] = useState<[number, number]>([0, 0]);

  useInput((_input, key) => {
    if (key.escape) {
      onDone(editor.current?.getText() ?? "");
      exit();
    }
  });

  return (
    <Box flexDirection="column">
      <TextAreaEditor
        ref={editor}
        initialText={initialText}
        tab={tab}
        style={style}
        block={block}
        onCursorChange={setCursor}
      />
      <Text dimColor>
        Ln {row + 1}, Col {col + 1} · esc to finish
      </Text>
    </Box>
  );
}
