import { normalizeSpacing, reflowCaptionText, type CaptionCue } from "@reelsmith/shared";
import { InputValidationError } from "../lib/errors";

const MAX_LINE_CHARS = 42;
const TIMING_LINE = /^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})\s*-->\s*(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})/;

function pad2(value: number) {
  return value.toString().padStart(2, "0");
}

function pad3(value: number) {
  return value.toString().padStart(3, "0");
}

function toMs(seconds: number) {
  return Math.max(0, Math.round(seconds * 1000));
}

function formatTime(seconds: number, separator: "," | ".") {
  const ms = toMs(seconds);
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;
  const millis = ms % 1000;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}${separator}${pad3(millis)}`;
}

export function formatTimeSrt(seconds: number) {
  return formatTime(seconds, ",");
}

export function formatTimeVtt(seconds: number) {
  return formatTime(seconds, ".");
}

export function toSrt(cues: CaptionCue[]): string {
  const lines: string[] = [];
  cues.forEach((cue, index) => {
    lines.push(String(index + 1));
    lines.push(`${formatTimeSrt(cue.start)} --> ${formatTimeSrt(cue.end)}`);
    lines.push(reflowCaptionText({ text: cue.text, maxLineChars: MAX_LINE_CHARS }));
    lines.push("");
  });
  return lines.join("\n");
}

export function toVtt(cues: CaptionCue[]): string {
  const lines = ["WEBVTT", ""];
  cues.forEach((cue) => {
    lines.push(`${formatTimeVtt(cue.start)} --> ${formatTimeVtt(cue.end)}`);
    lines.push(reflowCaptionText({ text: cue.text, maxLineChars: MAX_LINE_CHARS }));
    lines.push("");
  });
  return lines.join("\n");
}

function toSeconds(h: string, m: string, s: string, ms: string) {
  return (Number(h) * 3600000 + Number(m) * 60000 + Number(s) * 1000 + Number(ms)) / 1000;
}

/** Parses SRT text. Wrapped caption lines are joined with a single space. */
export function parseSrt(text: string): CaptionCue[] {
  const blocks = text
    .replace(/\r\n?/g, "\n")
    .split(/\n{2,}/)
    .map((block) => block.trim())
    .filter((block) => block.length > 0);

  return blocks.map((block, blockIndex) => {
    const lines = block.split("\n");
    const timingIndex = /^\d+$/.test(lines[0].trim()) ? 1 : 0;
    const timingLine = lines[timingIndex] ?? "";
    const match = TIMING_LINE.exec(timingLine.trim());
    if (!match) {
      throw new InputValidationError(
        `Malformed SRT timing line in block ${blockIndex + 1}: "${timingLine}"`
      );
    }
    const [, h1, m1, s1, ms1, h2, m2, s2, ms2] = match;
    return {
      start: toSeconds(h1, m1, s1, ms1),
      end: toSeconds(h2, m2, s2, ms2),
      text: normalizeSpacing(lines.slice(timingIndex + 1).join(" "))
    };
  });
}
