export const BEST_COLUMN_MARKER = "Best column:";
export const REWARD_BREAKDOWN_MARKER = "Reward break-down:";
export const RELATIONS_MARKER = "Top relations:";

export const RELATION_ARROW = "→";

const numberLiteral = /[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/.source;

// `<source> → <target> deg=<int> R²=<float>`; deg is accepted and dropped.
export const RELATION_LINE = new RegExp(
  `^(.+?)\\s*${RELATION_ARROW}\\s*(.+?)\\s+deg=(\\d+)\\s+R²=(${numberLiteral})$`,
  "u",
);

export const NUMBER_LITERAL = new RegExp(`^${numberLiteral}`);

export function normalizeLineEndings(raw: string): string {
  return raw.replace(/\r\n?/g, "\n");
}

/**
 * Text after the first occurrence of `marker` up to the end of its line,
 * or `undefined` when the marker is absent.
 */
export function restOfMarkerLine(text: string, marker: string): string | undefined {
  const start = text.indexOf(marker);
  if (start < 0) {
    return undefined;
  }
  const from = start + marker.length;
  const end = text.indexOf("\n", from);
  return text.slice(from, end < 0 ? undefined : end);
}

/**
 * Lines of the block opened by `marker`: the remainder of the marker line
 * followed by every line up to the first blank one.
 */
export function markerBlockLines(text: string, marker: string): string[] | undefined {
  const head = restOfMarkerLine(text, marker);
  if (head === undefined) {
    return undefined;
  }
  const start = text.indexOf(marker) + marker.length + head.length;
  const lines: string[] = [];
  if (head.trim()) {
    lines.push(head);
  }
  if (start >= text.length) {
    return lines;
  }
  for (const line of text.slice(start + 1).split("\n")) {
    if (!line.trim()) {
      break;
    }
    lines.push(line);
  }
  return lines;
}
