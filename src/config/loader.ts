// Portal config: configs/ods.yml (optional) + environment overrides
import { existsSync, readFileSync } from "fs";
import { join } from "path";

export interface OdsConfig {
  baseUrl: string;
  apiPath: string;
  apiKey?: string;
  timeoutMs: number;
}

export const DEFAULT_BASE_URL = "https://documentation-resources.opendatasoft.com";
export const DEFAULT_API_PATH = "/api/explore/v2.1";
export const DEFAULT_TIMEOUT_MS = 30_000;

export function loadYaml(name: string, dir: string = join(process.cwd(), "configs")): Record<string, Record<string, string>> {
  const path = join(dir, name);
  if (!existsSync(path)) return {};
  const raw = readFileSync(path, "utf-8");
  return parseSimpleYaml(raw);
}

/**
 * Minimal YAML parser for flat/nested key-value configs.
 * Handles the portal config structure without pulling in a full YAML lib.
 */
export function parseSimpleYaml(text: string): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};
  let currentSection: string | null = null;
  let currentObj: Record<string, string> = {};

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trimEnd();
    if (!trimmed || trimmed.trimStart().startsWith("#")) continue;

    // Top-level key (no indent)
    if (!line.startsWith(" ") && !line.startsWith("\t") && trimmed.endsWith(":")) {
      if (currentSection !== null) {
        result[currentSection] = currentObj;
      }
      currentSection = trimmed.slice(0, -1).trim();
      currentObj = {};
      continue;
    }

    // Indented key: value
    const match = trimmed.match(/^\s+([^\s:]+):\s*(.+)$/);
    if (match && currentSection !== null) {
      currentObj[match[1]] = unquote(match[2].trim());
    }
  }

  if (currentSection !== null) {
    result[currentSection] = currentObj;
  }

  return result;
}

function unquote(value: string): string {
  if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
    return value.slice(1, -1);
  }
  return value;
}

function parseTimeout(raw: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Invalid timeout: "${raw}" (expected a positive number of milliseconds)`);
  }
  return n;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  file: Record<string, string> = loadYaml("ods.yml").ods ?? {},
): OdsConfig {
  const baseUrl = (env.ODS_BASE_URL || file.base_url || DEFAULT_BASE_URL).replace(/\/+$/, "");
  const apiPath = file.api_path || DEFAULT_API_PATH;
  const keyVar = file.env_key || "ODS_API_KEY";
  const apiKey = env[keyVar] || env.ODS_API_KEY || undefined;
  const timeoutRaw = env.ODS_TIMEOUT_MS || file.timeout_ms;
  const timeoutMs = timeoutRaw ? parseTimeout(timeoutRaw) : DEFAULT_TIMEOUT_MS;

  return { baseUrl, apiPath, apiKey, timeoutMs };
}
