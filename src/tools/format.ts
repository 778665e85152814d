// Text/markdown rendering shared by the tools
import type { Dataset, DatasetMetas, OdsRecord } from "../types/ods.js";

export const UNKNOWN_DATASET = "Unknown Dataset";

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

// Statistic cells: missing values read as N/A rather than blank
export function statValue(value: unknown): string {
  return value === null || value === undefined ? "N/A" : formatValue(value);
}

export function cleanDescription(html: string | null | undefined, fallback = "No description available."): string {
  if (!html) return fallback;
  const text = html
    .replace(/<br\s*\/?>/gi, " ")
    .replace(/<\/p>/gi, " ")
    .replace(/<[^>]+>/g, "")
    .replace(/\s+/g, " ")
    .trim();
  return text || fallback;
}

export function truncate(text: string, max = 300): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function percent(part: number, total: number): string {
  return `${((part / total) * 100).toFixed(2)}%`;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function cell(text: string): string {
  return text.replace(/\r?\n/g, " ").replace(/\|/g, "\\|");
}

export function markdownTable(headers: string[], rows: string[][]): string[] {
  return [
    `| ${headers.map(cell).join(" | ")} |`,
    `| ${headers.map(() => "---").join(" | ")} |`,
    ...rows.map((r) => `| ${r.map(cell).join(" | ")} |`),
  ];
}

// Columns come from the first record, as the API returns uniform rows
export function recordsTable(records: OdsRecord[]): string[] {
  const keys = Object.keys(records[0] ?? {});
  return markdownTable(
    keys,
    records.map((r) => keys.map((k) => formatValue(r[k]))),
  );
}

export function recordListing(records: OdsRecord[]): string[] {
  const lines: string[] = [];
  records.forEach((record, i) => {
    lines.push(`\nRecord ${i + 1}:`);
    for (const [key, value] of Object.entries(record)) {
      lines.push(`  ${key}: ${formatValue(value)}`);
    }
  });
  return lines;
}

export function metasOf(dataset: Dataset): DatasetMetas {
  return dataset.metas?.default ?? {};
}

export function titleOf(dataset: Dataset, fallback = "Untitled Dataset"): string {
  return metasOf(dataset).title || fallback;
}

export function firstTheme(metas: DatasetMetas): string {
  return metas.theme?.[0] ?? "";
}

export function recordsCount(metas: DatasetMetas): string {
  return metas.records_count === null || metas.records_count === undefined ? "Unknown" : String(metas.records_count);
}
