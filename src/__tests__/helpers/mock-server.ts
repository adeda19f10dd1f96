import { vi } from "vitest";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export interface CapturedTool {
  name: string;
  config: Record<string, unknown>;
  handler: (...args: unknown[]) => Promise<unknown>;
}

export interface ToolResult {
  isError?: boolean;
  content: Array<{ type: string; text: string }>;
}

export function createMockServer() {
  const tools: CapturedTool[] = [];

  const registerTool = vi.fn(
    (name: string, config: Record<string, unknown>, handler: (...args: unknown[]) => Promise<unknown>) => {
      tools.push({ name, config, handler });
    }
  );

  // Only registerTool is exercised by the tool modules
  const server = { registerTool } as unknown as McpServer;

  return {
    server,
    registerTool,
    getTools: () => tools,
    getTool: (name: string) => tools.find((t) => t.name === name),
    async callTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
      const tool = tools.find((t) => t.name === name);
      if (!tool) throw new Error(`Tool ${name} was not registered`);
      return (await tool.handler(args, {})) as ToolResult;
    },
  };
}
