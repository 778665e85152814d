// Tool input/output types
export interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function ok(text: string): ToolResult {
  return {
    content: [{ type: "text", text }],
  };
}

export function err(message: string): ToolResult {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

// Tool handler type
export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult>;

// Tool definition for registry
export interface ToolDef {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, Record<string, unknown>>;
    required: string[];
  };
  handler: ToolHandler;
}

// Raised when a tool argument is missing or has the wrong shape
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export function readString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidArgumentError(`"${key}" is required and must be a non-empty string`);
  }
  return value.trim();
}

export function readOptionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new InvalidArgumentError(`"${key}" must be a string`);
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Reads an integer argument. Numeric strings are accepted since some clients
 * send every argument as text.
 */
export function readInt(
  args: Record<string, unknown>,
  key: string,
  fallback: number,
  bounds: { min: number; max: number },
): number {
  const n = readOptionalInt(args, key);
  if (n === undefined) return fallback;
  if (n < bounds.min || n > bounds.max) {
    throw new InvalidArgumentError(`"${key}" must be between ${bounds.min} and ${bounds.max} (got ${n})`);
  }
  return n;
}

export function readOptionalInt(args: Record<string, unknown>, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined || raw === null || raw === "") return undefined;
  const n = typeof raw === "string" ? Number(raw) : raw;
  if (typeof n !== "number" || !Number.isInteger(n)) {
    throw new InvalidArgumentError(`"${key}" must be an integer`);
  }
  return n;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
