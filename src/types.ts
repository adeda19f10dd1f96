export interface ImageDimensions {
  height: number;
  width: number;
}

export interface ResizeImageResponse {
  /** Final URL of the processed asset */
  url: string;
  /** Path of the processed asset, relative to the site root */
  static_path: string;
}

export interface ProcessImagesResult {
  processed: number;
  pruned: number;
}

export interface SiteConfig {
  rootDir: string;
  baseUrl: string;
}

// Format families, inferred from the file extension
export type ImageFormatFamily =
  | { kind: "vector"; extension: string }
  | { kind: "raster"; extension: string };

// Resize operations understood by the processor
export type ResizeOp =
  | { kind: "scale"; width: number; height: number }
  | { kind: "fit_width"; width: number }
  | { kind: "fit_height"; height: number }
  | { kind: "fit"; width: number; height: number }
  | { kind: "fill"; width: number; height: number };

export type EncodedFormat =
  | { kind: "jpeg"; quality: number }
  | { kind: "png" }
  | { kind: "webp"; quality?: number }
  | { kind: "avif"; quality?: number };

export interface ResizeOperation {
  logicalPath: string;
  sourceFile: string;
  resize: ResizeOp;
  format: EncodedFormat;
  hash: string;
}

export interface ProcessedImageLocation {
  staticPath: string;
  url: string;
}
