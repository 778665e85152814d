// ODSQL parameter assembly. Clauses are forwarded verbatim; only values this
// server interpolates itself (field names, string literals, bounds) are checked.
import { InvalidArgumentError } from "../types/tools.js";
import type { RecordQuery } from "../types/ods.js";

const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function buildQueryParams(query: RecordQuery): Array<[string, string]> {
  const params: Array<[string, string]> = [];
  if (query.select) params.push(["select", query.select]);
  if (query.where) params.push(["where", query.where]);
  if (query.groupBy) params.push(["group_by", query.groupBy]);
  if (query.orderBy) params.push(["order_by", query.orderBy]);
  if (query.limit !== undefined) params.push(["limit", String(query.limit)]);
  if (query.offset !== undefined) params.push(["offset", String(query.offset)]);
  return params;
}

export function andWhere(...clauses: Array<string | undefined>): string | undefined {
  const present = clauses.filter((c): c is string => typeof c === "string" && c.trim() !== "");
  return present.length > 0 ? present.join(" AND ") : undefined;
}

export function quoteLiteral(text: string): string {
  return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

export function searchClause(text: string): string {
  return `search(${quoteLiteral(text)})`;
}

export function assertFieldName(name: string): string {
  if (!FIELD_NAME_PATTERN.test(name)) {
    throw new InvalidArgumentError(`Invalid field name: "${name}" (letters, digits and underscores only)`);
  }
  return name;
}

// Equal-width [lower, upper] ranges between min and max; the last upper bound is max itself
export function bucketRanges(min: number, max: number, buckets = 10): Array<[number, number]> {
  if (!Number.isFinite(min) || !Number.isFinite(max) || max <= min || buckets < 1) return [];
  const width = (max - min) / buckets;
  const ranges: Array<[number, number]> = [];
  for (let i = 0; i < buckets; i++) {
    ranges.push([min + i * width, i === buckets - 1 ? max : min + (i + 1) * width]);
  }
  return ranges;
}

export function rangeWhere(field: string, lower: number, upper: number, inclusiveUpper: boolean): string {
  return `${field} >= ${lower} AND ${field} ${inclusiveUpper ? "<=" : "<"} ${upper}`;
}
