import type { TextAreaWidget } from "../widget.js";

import { Box, Text } from "ink";
import React from "react";

export interface TextAreaViewProps {
  readonly widget: TextAreaWidget;
}

/**
 * Draw a {@link TextAreaWidget}. The block props frame the outer box, the
 * style props apply to every line, and the reversed span becomes the block
 * cursor.
 */
export default function TextAreaView({
  widget,
}: TextAreaViewProps): React.ReactElement {
  const { lines, style, block } = widget;
  return (
    <Box flexDirection="column" {...block}>
      {lines.map((spans, row) => (
        <Text key={row} {...style}>
          {spans.map((span, i) =>
            span.reversed ? (
              <Text key={i} inverse>
                {span.text}
              </Text>
            ) : (
              span.text
            ),
          )}
        </Text>
      ))}
    </Box>
  );
}
