import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as cheerio from "cheerio";
import sharp from "sharp";
import { VECTOR_EXTENSIONS } from "../constants.js";
import { SiteImageError } from "../errors.js";
import type { ImageDimensions, ImageFormatFamily } from "../types.js";

const SVG_LENGTH = /^\s*([+]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*(?:px)?\s*$/i;

export function detectFormatFamily(filePath: string): ImageFormatFamily {
  const extension = path.extname(filePath).toLowerCase();
  if (VECTOR_EXTENSIONS.some((vector) => vector === extension)) {
    return { kind: "vector", extension };
  }
  return { kind: "raster", extension };
}

/** Parses a unitless or `px` SVG length. Percentages and other units yield undefined. */
export function parseSvgLength(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const match = value.match(SVG_LENGTH);
  if (!match) return undefined;
  const parsed = Number(match[1]);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseViewBox(value: string | undefined): { width: number; height: number } | undefined {
  if (value === undefined) return undefined;
  const parts = value.trim().split(/[\s,]+/).filter((part) => part.length > 0);
  if (parts.length !== 4) return undefined;
  const numbers = parts.map(Number);
  if (!numbers.every(Number.isFinite)) return undefined;
  const [, , width, height] = numbers;
  if (width <= 0 || height <= 0) return undefined;
  return { width, height };
}

/**
 * Size of an SVG document: explicit width/height win, the viewBox rectangle
 * is the fallback.
 */
export function svgDimensionsFromSource(source: string, filePath: string): ImageDimensions {
  const $ = cheerio.load(source, { xml: true });
  const root = $.root().children("svg").first();
  if (root.length === 0) {
    throw new SiteImageError("UnsupportedOrCorruptImage", `Failed to process SVG: ${filePath}`, {
      cause: new Error("Document has no <svg> root element"),
    });
  }

  const height = parseSvgLength(root.attr("height"));
  const width = parseSvgLength(root.attr("width"));
  if (height !== undefined && width !== undefined) {
    return { height: Math.trunc(height), width: Math.trunc(width) };
  }

  const viewBox = parseViewBox(root.attr("viewBox"));
  if (viewBox) {
    return { height: Math.trunc(viewBox.height), width: Math.trunc(viewBox.width) };
  }

  throw new SiteImageError(
    "InvalidVectorDimensions",
    `Invalid dimensions: SVG width/height and viewbox not set (${filePath}).`
  );
}

async function readSvgDimensions(filePath: string): Promise<ImageDimensions> {
  let source: string;
  try {
    source = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new SiteImageError("UnsupportedOrCorruptImage", `Failed to process SVG: ${filePath}`, { cause: error });
  }
  return svgDimensionsFromSource(source, filePath);
}

async function readRasterDimensions(filePath: string): Promise<ImageDimensions> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(filePath).metadata();
  } catch (error) {
    throw new SiteImageError("UnsupportedOrCorruptImage", `Failed to process image: ${filePath}`, { cause: error });
  }

  if (!metadata.width || !metadata.height) {
    throw new SiteImageError("UnsupportedOrCorruptImage", `Failed to process image: ${filePath}`, {
      cause: new Error("Image header carries no dimensions"),
    });
  }

  return { height: metadata.height, width: metadata.width };
}

export async function getImageDimensions(filePath: string): Promise<ImageDimensions> {
  const family = detectFormatFamily(filePath);
  switch (family.kind) {
    case "vector":
      return readSvgDimensions(filePath);
    case "raster":
      return readRasterDimensions(filePath);
    default: {
      const unreachable: never = family;
      throw new Error(`Unhandled image format family: ${JSON.stringify(unreachable)}`);
    }
  }
}
