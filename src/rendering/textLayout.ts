export interface TextExtent {
  width: number;
  height: number;
}

export interface TextMeasurer {
  measure(text: string): TextExtent;
}

export interface WrappedText {
  lines: string[];
  /** Top of each line relative to the top of the block. */
  offsets: number[];
  height: number;
}

/** Vertical gap added after every wrapped line. */
export const LINE_SPACING = 6;

/**
 * Packs text into lines one character at a time so scripts without spaces
 * (Japanese notes, mostly) wrap as well as Latin text does. Latin words may
 * be split mid-token. Explicit newlines always end a line.
 */
export const wrapText = (
  text: string,
  measurer: TextMeasurer,
  maxWidthPx: number,
  lineSpacing = LINE_SPACING
): WrappedText => {
  if (!text) {
    return { lines: [], offsets: [], height: 0 };
  }

  const lines: string[] = [];
  let current = '';
  for (const ch of text) {
    if (ch === '\n') {
      if (current) {
        lines.push(current);
      }
      current = '';
      continue;
    }
    const candidate = current + ch;
    if (measurer.measure(candidate).width <= maxWidthPx) {
      current = candidate;
      continue;
    }
    if (current) {
      lines.push(current);
    }
    current = ch;
  }
  if (current) {
    lines.push(current);
  }

  const offsets: number[] = [];
  let height = 0;
  for (const line of lines) {
    offsets.push(height);
    height += measurer.measure(line).height + lineSpacing;
  }
  return { lines, offsets, height };
};
