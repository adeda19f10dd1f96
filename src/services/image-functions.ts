import pLimit from "p-limit";
import { LOG_PREFIX } from "../constants.js";
import { SiteImageError, describeError } from "../errors.js";
import type { GetImageMetadataArgs, GetImageMetadataInput, ResizeImageArgs, ResizeImageInput } from "../schemas/index.js";
import type {
  ImageDimensions,
  ProcessedImageLocation,
  ProcessImagesResult,
  ResizeImageResponse,
  SiteConfig,
} from "../types.js";
import { parseGetImageMetadataArgs, parseResizeImageArgs } from "./argument-parser.js";
import { getImageDimensions } from "./dimension-extractor.js";
import { resolveLogicalPath } from "./path-resolver.js";
import { ImageProcessor } from "./processor.js";

/**
 * The image functions available to page templates. Path resolution and
 * dimension reads run freely in parallel; everything that touches the
 * shared processor goes through a single-slot queue.
 */
export class SiteImageFunctions {
  readonly processor: ImageProcessor;
  private readonly processorLock = pLimit(1);

  constructor(
    private readonly config: SiteConfig,
    processor?: ImageProcessor
  ) {
    this.processor = processor ?? new ImageProcessor(config);
  }

  get rootDir(): string {
    return this.config.rootDir;
  }

  resizeImage(input: ResizeImageInput): Promise<ResizeImageResponse> {
    return this.callResizeImage(input);
  }

  getImageMetadata(input: GetImageMetadataInput): Promise<ImageDimensions | null> {
    return this.callGetImageMetadata(input);
  }

  /** Writes pending outputs and prunes stale ones. */
  async processImages(): Promise<ProcessImagesResult> {
    return this.processorLock(async () => {
      const { processed, failures } = await this.guardProcessor(() => this.processor.processPending());
      const pruned = await this.guardProcessor(() => this.processor.pruneUnused());
      if (failures.length > 0) {
        const message = failures.map((failure) => failure.message).join("; ");
        throw new SiteImageError("ProcessorError", `\`process_images\`: ${message}`, {
          cause: new AggregateError(failures),
        });
      }
      return { processed, pruned };
    });
  }

  /** Entry point for untyped named-argument bags, as handed over by a template engine. */
  async callResizeImage(args: unknown): Promise<ResizeImageResponse> {
    return this.runResize(parseResizeImageArgs(args));
  }

  async callGetImageMetadata(args: unknown): Promise<ImageDimensions | null> {
    return this.runMetadataLookup(parseGetImageMetadataArgs(args));
  }

  private async guardProcessor<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new SiteImageError("ProcessorError", `\`process_images\`: ${describeError(error)}`, { cause: error });
    }
  }

  private runResize(args: ResizeImageArgs): Promise<ResizeImageResponse> {
    // Held from path resolution through insertion
    return this.processorLock(async () => {
      const sourceFile = await resolveLogicalPath(this.config.rootDir, args.path);
      if (sourceFile === null) {
        throw new SiteImageError("FileNotFound", `\`resize_image\`: Cannot find file: ${args.path}`);
      }
      const location = this.insertOperation(args, sourceFile);
      return { url: location.url, static_path: location.staticPath };
    });
  }

  private insertOperation(args: ResizeImageArgs, sourceFile: string): ProcessedImageLocation {
    try {
      const operation = this.processor.buildOperation({
        logicalPath: args.path,
        sourceFile,
        op: args.op,
        width: args.width,
        height: args.height,
        format: args.format,
        quality: args.quality,
      });
      return this.processor.insert(operation);
    } catch (error) {
      throw new SiteImageError("ProcessorError", `\`resize_image\`: ${describeError(error)}`, { cause: error });
    }
  }

  private async runMetadataLookup(args: GetImageMetadataArgs): Promise<ImageDimensions | null> {
    const sourceFile = await resolveLogicalPath(this.config.rootDir, args.path);
    if (sourceFile === null) {
      if (args.allow_missing) {
        console.warn(`${LOG_PREFIX} Image at path ${args.path} could not be found or loaded`);
        return null;
      }
      throw new SiteImageError("FileNotFound", `\`get_image_metadata\`: Cannot find path: ${args.path}`);
    }

    return getImageDimensions(sourceFile);
  }
}
