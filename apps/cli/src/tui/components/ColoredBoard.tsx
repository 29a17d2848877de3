import React from "react";
import { Box, Text } from "ink";
import { colors, tileColors } from "../theme.js";

interface Style {
  color?: string;
  bold?: boolean;
  inverse?: boolean;
}

/** Terminal styles for the classes OthelloUI.renderBoard() emits. */
const CLASS_STYLES: Record<string, Style> = {
  "oth-b": { color: tileColors.black },
  "oth-w": { color: tileColors.white },
  "oth-hint": { color: colors.dimmed },
  "oth-last": { bold: true },
  "oth-cursor": { inverse: true },
};

export interface Segment extends Style {
  text: string;
}

export function parseSegments(line: string): Segment[] {
  const segments: Segment[] = [];
  const regex = /<span class="([^"]*)">(.*?)<\/span>/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(line)) !== null) {
    if (match.index > lastIndex) {
      segments.push({ text: line.slice(lastIndex, match.index) });
    }

    const segment: Segment = { text: match[2] };
    for (const cls of match[1].split(/\s+/)) {
      const style = CLASS_STYLES[cls];
      if (!style) continue;
      if (style.color) segment.color = style.color;
      if (style.bold) segment.bold = true;
      if (style.inverse) segment.inverse = true;
    }

    segments.push(segment);
    lastIndex = match.index + match[0].length;
  }

  if (lastIndex < line.length) {
    segments.push({ text: line.slice(lastIndex) });
  }

  return segments;
}

/**
 * Renders board text (with <span class="..."> tags) as colored Ink text.
 */
export function ColoredBoard({ html }: { html: string }) {
  const lines = html.split("\n");

  return (
    <Box flexDirection="column">
      {lines.map((line, i) => (
        <Text key={i}>
          {parseSegments(line).map((seg, j) => (
            <Text key={j} color={seg.color} bold={seg.bold} inverse={seg.inverse}>
              {seg.text}
            </Text>
          ))}
        </Text>
      ))}
    </Box>
  );
}
