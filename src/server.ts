#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config/loader.js";
import { callTool, listTools } from "./dispatch.js";

const server = new Server(
  { name: "opendatasoft", version: "0.1.0" },
  { capabilities: { tools: {} } }
);

// List all registered tools
server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: listTools(),
}));

// Dispatch tool calls to handlers
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  const result = await callTool(name, args ?? {});
  return {
    content: result.content.map((c) => ({ type: "text" as const, text: c.text })),
    isError: result.isError,
  };
});

async function main() {
  // Config errors surface here, before the transport opens
  const config = loadConfig();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[server] opendatasoft MCP server ready (${config.baseUrl}${config.apiKey ? ", API key set" : ""})`);
}

main().catch((e) => {
  console.error("[server] Fatal:", e instanceof Error ? e.message : String(e));
  process.exit(1);
});
