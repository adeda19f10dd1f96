import sharp from "sharp";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createHash } from "node:crypto";
import {
  DEFAULT_JPEG_QUALITY,
  HASH_LENGTH,
  LOSSY_EXTENSIONS,
  LOG_PREFIX,
  PNG_COMPRESSION_LEVEL,
  PROCESSED_FILE_PATTERN,
  PROCESSED_IMAGES_DIR,
  STATIC_DIR,
} from "../constants.js";
import type { EncodedFormat, ProcessedImageLocation, ResizeOp, ResizeOperation, SiteConfig } from "../types.js";
import { joinUrl, toPosix } from "../utils.js";

sharp.cache({ items: 10, memory: 200 });
sharp.concurrency(2);

export interface ProcessPendingResult {
  processed: number;
  /** One error per operation that could not be written, naming its logical path */
  failures: Error[];
}

export interface BuildOperationParams {
  logicalPath: string;
  sourceFile: string;
  op: string;
  width?: number;
  height?: number;
  format: string;
  quality?: number;
}

function requireDimension(op: string, name: "width" | "height", value: number | undefined): number {
  if (value === undefined) {
    throw new Error(`op="${op}" requires a \`${name}\` argument`);
  }
  if (value === 0) {
    throw new Error(`op="${op}" requires a non-zero \`${name}\``);
  }
  return value;
}

function requireBoth(op: string, width?: number, height?: number): { width: number; height: number } {
  if (width === undefined || height === undefined) {
    throw new Error(`op="${op}" requires a \`width\` and \`height\` argument`);
  }
  return { width: requireDimension(op, "width", width), height: requireDimension(op, "height", height) };
}

export function parseResizeOp(op: string, width?: number, height?: number): ResizeOp {
  switch (op) {
    case "scale":
      return { kind: "scale", ...requireBoth(op, width, height) };
    case "fit":
      return { kind: "fit", ...requireBoth(op, width, height) };
    case "fill":
      return { kind: "fill", ...requireBoth(op, width, height) };
    case "fit_width":
      return { kind: "fit_width", width: requireDimension(op, "width", width) };
    case "fit_height":
      return { kind: "fit_height", height: requireDimension(op, "height", height) };
    default:
      throw new Error(`Invalid image resize operation: ${op}`);
  }
}

export function parseOutputFormat(format: string, sourceFile: string, quality?: number): EncodedFormat {
  switch (format) {
    case "auto": {
      const extension = path.extname(sourceFile).toLowerCase();
      const isLossy = LOSSY_EXTENSIONS.some((lossy) => lossy === extension);
      return isLossy ? { kind: "jpeg", quality: quality ?? DEFAULT_JPEG_QUALITY } : { kind: "png" };
    }
    case "jpg":
    case "jpeg":
      return { kind: "jpeg", quality: quality ?? DEFAULT_JPEG_QUALITY };
    case "png":
      return { kind: "png" };
    case "webp":
      return { kind: "webp", quality };
    case "avif":
      return { kind: "avif", quality };
    default:
      throw new Error(`Invalid image format: ${format}`);
  }
}

export function extensionFor(format: EncodedFormat): string {
  return format.kind === "jpeg" ? "jpg" : format.kind;
}

function operationKey(logicalPath: string, resize: ResizeOp, format: EncodedFormat): string {
  return JSON.stringify({ source: logicalPath, resize, format });
}

export function hashOperation(logicalPath: string, resize: ResizeOp, format: EncodedFormat): string {
  return createHash("sha256")
    .update(operationKey(logicalPath, resize, format))
    .digest("hex")
    .slice(0, HASH_LENGTH);
}

function applyResize(pipeline: sharp.Sharp, resize: ResizeOp): sharp.Sharp {
  switch (resize.kind) {
    case "scale":
      return pipeline.resize(resize.width, resize.height, { fit: "fill" });
    case "fit_width":
      return pipeline.resize({ width: resize.width });
    case "fit_height":
      return pipeline.resize({ height: resize.height });
    case "fit":
      return pipeline.resize(resize.width, resize.height, { fit: "inside", withoutEnlargement: true });
    case "fill":
      return pipeline.resize(resize.width, resize.height, { fit: "cover", position: "centre" });
  }
}

function applyFormat(pipeline: sharp.Sharp, format: EncodedFormat): sharp.Sharp {
  switch (format.kind) {
    case "jpeg":
      return pipeline.jpeg({ quality: format.quality });
    case "png":
      return pipeline.png({ compressionLevel: PNG_COMPRESSION_LEVEL });
    case "webp":
      return format.quality === undefined ? pipeline.webp({ lossless: true }) : pipeline.webp({ quality: format.quality });
    case "avif":
      return format.quality === undefined ? pipeline.avif({ lossless: true }) : pipeline.avif({ quality: format.quality });
  }
}

async function isUpToDate(outputPath: string, sourceFile: string): Promise<boolean> {
  try {
    const [output, source] = await Promise.all([fs.stat(outputPath), fs.stat(sourceFile)]);
    return output.mtimeMs >= source.mtimeMs;
  } catch {
    return false;
  }
}

/**
 * Content-addressed registry of resize operations. Inserting hands out the
 * final location immediately; the pixels are written by processPending().
 * Not safe for concurrent mutation: callers serialize access.
 */
export class ImageProcessor {
  private readonly operations = new Map<string, ResizeOperation[]>();
  // Skipped by processPending until requested again
  private readonly failed = new Set<ResizeOperation>();

  constructor(private readonly config: SiteConfig) {}

  get outputDir(): string {
    return path.join(this.config.rootDir, STATIC_DIR, PROCESSED_IMAGES_DIR);
  }

  get size(): number {
    let count = 0;
    for (const bucket of this.operations.values()) count += bucket.length;
    return count;
  }

  buildOperation(params: BuildOperationParams): ResizeOperation {
    const resize = parseResizeOp(params.op, params.width, params.height);
    const format = parseOutputFormat(params.format, params.sourceFile, params.quality);
    return {
      logicalPath: params.logicalPath,
      sourceFile: params.sourceFile,
      resize,
      format,
      hash: hashOperation(params.logicalPath, resize, format),
    };
  }

  insert(operation: ResizeOperation): ProcessedImageLocation {
    const bucket = this.operations.get(operation.hash) ?? [];
    const key = operationKey(operation.logicalPath, operation.resize, operation.format);
    let collisionId = bucket.findIndex(
      (existing) => operationKey(existing.logicalPath, existing.resize, existing.format) === key
    );
    if (collisionId === -1) {
      bucket.push(operation);
      collisionId = bucket.length - 1;
      this.operations.set(operation.hash, bucket);
    } else {
      this.failed.delete(bucket[collisionId]);
    }
    return this.locationFor(this.fileNameFor(operation, collisionId));
  }

  /**
   * Writes every registered output that is missing or older than its source.
   * A failing operation does not stop the others; it is reported in
   * `failures` and left alone on later runs unless it is inserted again.
   */
  async processPending(): Promise<ProcessPendingResult> {
    let processed = 0;
    const failures: Error[] = [];
    await fs.mkdir(this.outputDir, { recursive: true });

    for (const [, bucket] of this.operations) {
      for (const [collisionId, operation] of bucket.entries()) {
        if (this.failed.has(operation)) continue;
        const outputPath = path.join(this.outputDir, this.fileNameFor(operation, collisionId));
        if (await isUpToDate(outputPath, operation.sourceFile)) continue;

        const pipeline = applyFormat(applyResize(sharp(operation.sourceFile).rotate(), operation.resize), operation.format);
        try {
          await pipeline.toFile(outputPath);
          processed++;
        } catch (error) {
          this.failed.add(operation);
          failures.push(
            new Error(
              `Failed to process ${operation.logicalPath}: ${error instanceof Error ? error.message : String(error)}`,
              { cause: error }
            )
          );
        }
      }
    }

    return { processed, failures };
  }

  /** Removes processed images that no registered operation produces. */
  async pruneUnused(): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.outputDir);
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return 0;
      throw err;
    }

    const live = new Set<string>();
    for (const [, bucket] of this.operations) {
      bucket.forEach((operation, collisionId) => live.add(this.fileNameFor(operation, collisionId)));
    }

    let pruned = 0;
    for (const entry of entries) {
      if (!PROCESSED_FILE_PATTERN.test(entry) || live.has(entry)) continue;
      try {
        await fs.unlink(path.join(this.outputDir, entry));
        pruned++;
      } catch (err: unknown) {
        // ENOENT = already gone
        if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
          const msg = err instanceof Error ? err.message : String(err);
          console.warn(`${LOG_PREFIX} Failed to prune ${entry}: ${msg}`);
        }
      }
    }
    return pruned;
  }

  private fileNameFor(operation: ResizeOperation, collisionId: number): string {
    const suffix = collisionId.toString(16).padStart(2, "0");
    return `${operation.hash}${suffix}.${extensionFor(operation.format)}`;
  }

  private locationFor(fileName: string): ProcessedImageLocation {
    return {
      staticPath: toPosix(path.join(STATIC_DIR, PROCESSED_IMAGES_DIR, fileName)),
      url: joinUrl(this.config.baseUrl, PROCESSED_IMAGES_DIR, fileName),
    };
  }
}
