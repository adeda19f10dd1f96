export const SERVER_NAME = "site-image-mcp-server";
export const LOG_PREFIX = "[site-image]";

// Site layout
export const CONTENT_DIR = "content";
export const STATIC_DIR = "static";
export const PROCESSED_IMAGES_DIR = "processed_images";
export const CONTENT_SHORTHAND = "@/";
export const DEFAULT_BASE_URL = "/";

// Resize request defaults
export const DEFAULT_OP = "fill";
export const DEFAULT_FORMAT = "auto";
export const MIN_QUALITY = 1;
export const MAX_QUALITY = 100;
// Widths and heights are unsigned 32-bit
export const MAX_DIMENSION = 0xffff_ffff;
export const DEFAULT_JPEG_QUALITY = 75;
export const PNG_COMPRESSION_LEVEL = 6;

export const RESIZE_OPS = ["scale", "fit_width", "fit_height", "fit", "fill"] as const;
export type ResizeOpName = (typeof RESIZE_OPS)[number];

export const OUTPUT_FORMATS = ["auto", "jpg", "jpeg", "png", "webp", "avif"] as const;
export type OutputFormatName = (typeof OUTPUT_FORMATS)[number];

// Sources with these extensions are lossy, so "auto" keeps them as JPEG
export const LOSSY_EXTENSIONS = [".jpg", ".jpeg"] as const;

export const VECTOR_EXTENSIONS = [".svg"] as const;

// <16 hex hash><2 hex collision id>.<ext>
export const HASH_LENGTH = 16;
export const PROCESSED_FILE_PATTERN = /^[0-9a-f]{18}\.(jpg|png|webp|avif)$/;
