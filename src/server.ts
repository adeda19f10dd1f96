import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SERVER_NAME } from "./constants.js";
import { SiteImageFunctions } from "./services/image-functions.js";
import { registerResizeImageTool } from "./tools/resize-image.js";
import { registerGetImageMetadataTool } from "./tools/get-image-metadata.js";
import { registerProcessImagesTool } from "./tools/process-images.js";
import type { SiteConfig } from "./types.js";

export function createServer(config: SiteConfig, version: string): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version,
  });

  const functions = new SiteImageFunctions(config);
  registerResizeImageTool(server, functions);
  registerGetImageMetadataTool(server, functions);
  registerProcessImagesTool(server, functions);

  return server;
}
