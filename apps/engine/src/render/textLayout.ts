/** The parts of an opentype.js `Font` that text measurement needs. */
export interface FontMetrics {
  unitsPerEm: number;
  ascender: number;
  descender: number;
  getAdvanceWidth(text: string, fontSize: number): number;
}

export interface TextMeasurer {
  fontSize: number;
  /** Distance between baselines of consecutive lines. */
  lineHeight: number;
  ascent: number;
  descent: number;
  width(text: string): number;
}

export function createFontMeasurer(font: FontMetrics, fontSize: number): TextMeasurer {
  const scale = fontSize / font.unitsPerEm;
  const ascent = font.ascender * scale;
  const descent = Math.abs(font.descender) * scale;
  return {
    fontSize,
    ascent,
    descent,
    lineHeight: ascent + descent,
    width: (text) => font.getAdvanceWidth(text, fontSize)
  };
}

/** Average-glyph estimate for bold caps when no font file resolves. */
export function createApproxMeasurer(fontSize: number): TextMeasurer {
  return {
    fontSize,
    ascent: fontSize * 0.8,
    descent: fontSize * 0.2,
    lineHeight: fontSize * 1.2,
    width: (text) => text.length * fontSize * 0.6
  };
}

/** Greedy word wrap. A word wider than `maxWidth` gets a line of its own. */
export function wrapText(text: string, maxWidth: number, measurer: TextMeasurer): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = "";
  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (!current || measurer.width(candidate) <= maxWidth) {
      current = candidate;
      continue;
    }
    lines.push(current);
    current = word;
  }
  if (current) {
    lines.push(current);
  }
  return lines;
}

export type CaptionLayoutOptions = {
  frameWidth: number;
  frameHeight: number;
  safeMargin: number;
  padding: number;
  /** Horizontal room reserved outside the caption box. */
  sideInset: number;
  strokeWidth: number;
  uppercase: boolean;
};

export type CaptionLine = {
  text: string;
  width: number;
  x: number;
  y: number;
};

export type CaptionLayout = {
  lines: CaptionLine[];
  boxWidth: number;
  textHeight: number;
  top: number;
};

export const DEFAULT_CAPTION_LAYOUT: Omit<CaptionLayoutOptions, "frameWidth" | "frameHeight" | "safeMargin"> = {
  padding: 40,
  sideInset: 140,
  strokeWidth: 5,
  uppercase: true
};

/**
 * Places a caption block above the bottom safe zone. The block height covers
 * every wrapped line plus the outline, and the block is pushed down to the top
 * padding when the frame is too short to fit it above the safe zone.
 */
export function layoutCaption(
  rawText: string,
  measurer: TextMeasurer,
  options: CaptionLayoutOptions
): CaptionLayout {
  const text = options.uppercase ? rawText.toUpperCase() : rawText;
  const boxWidth = Math.max(1, options.frameWidth - options.sideInset);
  const wrapped = wrapText(text, boxWidth, measurer);
  const textHeight = wrapped.length * measurer.lineHeight + options.strokeWidth * 2;
  const desiredTop = options.frameHeight - options.safeMargin - textHeight - options.padding;
  const top = Math.round(Math.max(options.padding, desiredTop));

  const lines = wrapped.map((line, index) => {
    const width = measurer.width(line);
    return {
      text: line,
      width,
      x: Math.round((options.frameWidth - width) / 2),
      y: Math.round(top + options.strokeWidth + index * measurer.lineHeight)
    };
  });

  return { lines, boxWidth, textHeight, top };
}
