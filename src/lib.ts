export { SiteImageFunctions } from "./services/image-functions.js";
export { ImageProcessor, type BuildOperationParams, type ProcessPendingResult } from "./services/processor.js";
export { resolveLogicalPath, candidatePaths, isAbsoluteLogicalPath } from "./services/path-resolver.js";
export { getImageDimensions, detectFormatFamily } from "./services/dimension-extractor.js";
export { parseResizeImageArgs, parseGetImageMetadataArgs } from "./services/argument-parser.js";
export { SiteImageError, isSiteImageError, type SiteImageErrorKind } from "./errors.js";
export { createServer } from "./server.js";
export { loadConfig, parseCliFlags, ConfigError } from "./config.js";
export type {
  ResizeImageArgs,
  ResizeImageInput,
  GetImageMetadataArgs,
  GetImageMetadataInput,
} from "./schemas/index.js";
export type * from "./types.js";
