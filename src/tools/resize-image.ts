import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ResizeImageInputSchema } from "../schemas/index.js";
import { DEFAULT_FORMAT, DEFAULT_OP, MAX_QUALITY, MIN_QUALITY, OUTPUT_FORMATS, RESIZE_OPS } from "../constants.js";
import { describeError } from "../errors.js";
import type { SiteImageFunctions } from "../services/image-functions.js";

const RESIZE_IMAGE_DESCRIPTION = `Request a resized variant of a site image and get its final URL.

The output location is content-addressed: the same path and parameters always map to the same file. Outputs are written when process_images runs.

Path conventions:
  - "@/blog/cover.jpg": relative to the content directory
  - "content/..." or "static/...": relative to the site root
  - "gallery/photo.jpg": tried under content, then static, then the site root
  - Absolute paths ("/...") are rejected

Args:
  - path (string, required): Logical path of the source image
  - width (number, optional): Target width in pixels
  - height (number, optional): Target height in pixels
  - op (string, optional): ${RESIZE_OPS.map((op) => `"${op}"`).join(", ")} (default: "${DEFAULT_OP}")
  - format (string, optional): ${OUTPUT_FORMATS.map((f) => `"${f}"`).join(", ")} (default: "${DEFAULT_FORMAT}")
  - quality (number, optional): Encoder quality, ${MIN_QUALITY}-${MAX_QUALITY}

Returns:
  JSON { "url": string, "static_path": string }

Examples:
  - Square thumbnail: path="@/blog/cover.jpg", width=200, height=200
  - Fixed width, WebP: path="static/hero.png", op="fit_width", width=800, format="webp", quality=80`;

export function registerResizeImageTool(server: McpServer, functions: Pick<SiteImageFunctions, "resizeImage">): void {
  server.registerTool(
    "resize_image",
    {
      title: "Resize Image",
      description: RESIZE_IMAGE_DESCRIPTION,
      inputSchema: ResizeImageInputSchema,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ path, width, height, op, format, quality }) => {
      try {
        const response = await functions.resizeImage({ path, width, height, op, format, quality });
        return {
          content: [
            {
              type: "text" as const,
              text: `Resized ${path} (op=${op}, format=${format}) → ${response.static_path}`,
            },
            {
              type: "text" as const,
              text: JSON.stringify(response, null, 2),
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: `Error: ${describeError(error)}`,
            },
          ],
        };
      }
    }
  );
}
