import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GetImageMetadataInputSchema } from "../schemas/index.js";
import { describeError } from "../errors.js";
import type { SiteImageFunctions } from "../services/image-functions.js";

export function registerGetImageMetadataTool(
  server: McpServer,
  functions: Pick<SiteImageFunctions, "getImageMetadata">
): void {
  server.registerTool(
    "get_image_metadata",
    {
      title: "Get Image Metadata",
      description: `Read the pixel dimensions of a site image (raster formats and SVG).

Uses the same path conventions as resize_image. SVG sizes come from the width/height attributes, or from the viewBox when either is missing.

Args:
  - path (string, required): Logical path of the image
  - allow_missing (boolean, optional): Return null instead of an error when the image does not exist (default: false)

Returns:
  JSON { "height": number, "width": number }, or null when allow_missing is set and the image is absent`,
      inputSchema: GetImageMetadataInputSchema,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ path, allow_missing }) => {
      try {
        const metadata = await functions.getImageMetadata({ path, allow_missing });
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(metadata),
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
