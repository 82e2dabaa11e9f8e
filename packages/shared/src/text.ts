export const PAUSE_MARKER = "...";

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function countPauseMarkers(text: string): number {
  return text.split(PAUSE_MARKER).length - 1;
}

/**
 * Word list used for caption timing. Pause markers become word breaks; emphasis
 * (CAPS, *stars*) is kept on the word it decorates.
 */
export function splitCaptionWords(text: string): string[] {
  const withoutPauses = text.split(PAUSE_MARKER).join(" ");
  const normalized = normalizeSpacing(withoutPauses);
  if (!normalized) {
    return [];
  }
  return normalized.split(" ");
}

export function countWords(text: string): number {
  return splitCaptionWords(text).length;
}

export function reflowCaptionText(input: { text: string; maxLineChars: number }): string {
  const maxLineChars = Math.max(10, input.maxLineChars);
  const normalized = normalizeSpacing(input.text);
  if (!normalized) {
    return "";
  }
  const lines: string[] = [];
  let current = "";
  for (const word of normalized.split(" ")) {
    if (!current) {
      current = word;
      continue;
    }
    if (current.length + 1 + word.length <= maxLineChars) {
      current = `${current} ${word}`;
      continue;
    }
    lines.push(current);
    current = word;
  }
  if (current) {
    lines.push(current);
  }
  return lines.join("\n");
}
