import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ProcessImagesInputSchema } from "../schemas/index.js";
import { PROCESSED_IMAGES_DIR, STATIC_DIR } from "../constants.js";
import { describeError } from "../errors.js";
import type { SiteImageFunctions } from "../services/image-functions.js";

export function registerProcessImagesTool(
  server: McpServer,
  functions: Pick<SiteImageFunctions, "processImages">
): void {
  server.registerTool(
    "process_images",
    {
      title: "Process Images",
      description: `Write every image requested through resize_image since the server started, then delete outputs in ${STATIC_DIR}/${PROCESSED_IMAGES_DIR} that no request refers to.

Outputs that already exist and are newer than their source are skipped.

Returns:
  JSON { "processed": number, "pruned": number }`,
      inputSchema: ProcessImagesInputSchema,
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async () => {
      try {
        const result = await functions.processImages();
        return {
          content: [
            {
              type: "text" as const,
              text: `Processed ${result.processed} image(s), pruned ${result.pruned} stale output(s)`,
            },
            {
              type: "text" as const,
              text: JSON.stringify(result, null, 2),
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
