import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import * as opentype from "opentype.js";
import { getGenreOrDefault, getGenreTable } from "../lib/genres";
import { errorMessage } from "../lib/errors";
import { createApproxMeasurer, createFontMeasurer, type FontMetrics, type TextMeasurer } from "./textLayout";

export type ResolvedFont = {
  path: string;
  metrics: FontMetrics;
};

export type FontLoader = (filePath: string) => FontMetrics;

const loadedFonts = new Map<string, FontMetrics | null>();

export function loadFontFile(filePath: string): FontMetrics {
  const buffer = readFileSync(filePath);
  return opentype.parse(buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength));
}

function tryLoad(filePath: string, load: FontLoader) {
  if (loadedFonts.has(filePath) && load === loadFontFile) {
    return loadedFonts.get(filePath) ?? null;
  }
  let metrics: FontMetrics | null = null;
  try {
    metrics = load(filePath);
  } catch (err) {
    console.warn(`[reel] font unusable path=${filePath} error=${errorMessage(err)}`);
  }
  if (load === loadFontFile) {
    loadedFonts.set(filePath, metrics);
  }
  return metrics;
}

/**
 * First usable font for the genre: the genre's preference list inside
 * `fontsDir`, then platform fonts. Null means "let the encoder pick".
 */
export function resolveGenreFont(
  genre: string | undefined,
  options: { fontsDir: string; platformFonts?: string[]; load?: FontLoader }
): ResolvedFont | null {
  const load = options.load ?? loadFontFile;
  const candidates = [
    ...getGenreOrDefault(genre).fonts.map((name) => path.join(options.fontsDir, name)),
    ...(options.platformFonts ?? getGenreTable().platformFonts)
  ];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) {
      continue;
    }
    const metrics = tryLoad(candidate, load);
    if (metrics) {
      return { path: candidate, metrics };
    }
  }
  console.warn(`[reel] no caption font resolved genre=${genre ?? "-"} fontsDir=${options.fontsDir}`);
  return null;
}

export function createCaptionMeasurer(font: ResolvedFont | null, fontSize: number): TextMeasurer {
  return font ? createFontMeasurer(font.metrics, fontSize) : createApproxMeasurer(fontSize);
}

export function formatFontPathForFfmpeg(fontPath: string) {
  const forward = fontPath.replace(/\\/g, "/");
  return forward.replace(":/", "\\:/").replace(/ /g, "\\ ");
}
