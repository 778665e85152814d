// Tool dispatch: lookup, argument errors, unexpected failures, audit
import { logToolInvocation } from "./audit.js";
import { tools } from "./tools/registry.js";
import { err, errorMessage, InvalidArgumentError, type ToolDef, type ToolResult } from "./types/tools.js";

export function listTools(): Array<Pick<ToolDef, "name" | "description" | "inputSchema">> {
  return Array.from(tools.values()).map((t) => ({
    name: t.name,
    description: t.description,
    inputSchema: t.inputSchema,
  }));
}

export async function callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolResult> {
  const tool = tools.get(name);
  if (!tool) {
    return err(`Unknown tool: ${name}`);
  }

  const start = Date.now();
  let result: ToolResult;
  try {
    result = await tool.handler(args);
  } catch (e) {
    result =
      e instanceof InvalidArgumentError
        ? err(`Invalid arguments for ${name}: ${e.message}`)
        : err(`Tool ${name} failed: ${errorMessage(e)}`);
  }

  logToolInvocation(name, args, result, Date.now() - start);
  return result;
}
