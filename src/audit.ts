// Audit trail — one JSON line per tool invocation on stderr (stdout carries the MCP protocol)
import type { ToolResult } from "./types/tools.js";

// Max size for parameter/result JSON to keep log lines readable
const MAX_JSON_LENGTH = 2048;

export interface AuditRow {
  ts: string;
  tool_name: string;
  parameters: string;
  result_status: "success" | "failure";
  result_summary: string;
  duration_ms: number;
}

export function truncateJson(obj: unknown): string {
  const json = JSON.stringify(obj ?? {});
  if (json.length <= MAX_JSON_LENGTH) return json;
  return json.slice(0, MAX_JSON_LENGTH - 3) + "...";
}

// First line of the text result: the header for successes, the message for errors
function buildResultSummary(result: ToolResult): string {
  const text = result.content[0]?.text ?? "";
  return text.split("\n", 1)[0].slice(0, 200);
}

export function buildAuditRow(
  toolName: string,
  args: Record<string, unknown>,
  result: ToolResult,
  durationMs: number,
  now: Date = new Date(),
): AuditRow {
  return {
    ts: now.toISOString(),
    tool_name: toolName,
    parameters: truncateJson(args),
    result_status: result.isError ? "failure" : "success",
    result_summary: buildResultSummary(result),
    duration_ms: Math.round(durationMs),
  };
}

export function logToolInvocation(
  toolName: string,
  args: Record<string, unknown>,
  result: ToolResult,
  durationMs: number,
): void {
  if (process.env.ODS_AUDIT === "off") return;
  console.error(`[audit] ${JSON.stringify(buildAuditRow(toolName, args, result, durationMs))}`);
}
