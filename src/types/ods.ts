// Opendatasoft Explore API v2.1 response shapes (only the parts we read)

export interface DatasetMetas {
  title?: string;
  description?: string | null;
  publisher?: string | null;
  theme?: string[] | null;
  keyword?: string[] | null;
  license?: string | null;
  records_count?: number | null;
  modified?: string | null;
}

export interface DatasetField {
  name: string;
  label?: string | null;
  type?: string | null;
  description?: string | null;
  annotations?: Record<string, unknown> | null;
}

export interface Dataset {
  dataset_id: string;
  metas?: { default?: DatasetMetas };
  fields?: DatasetField[];
}

export interface CatalogResponse {
  total_count?: number;
  results?: Dataset[];
}

export type OdsRecord = Record<string, unknown>;

export interface RecordsResponse {
  total_count?: number;
  results?: OdsRecord[];
}

export interface FacetValue {
  name?: string;
  count?: number;
  state?: string;
  value?: string;
}

export interface FacetGroup {
  name?: string;
  facets?: FacetValue[];
}

export interface FacetsResponse {
  links?: unknown[];
  facets?: FacetGroup[];
}

export interface OdsErrorBody {
  error_code?: string;
  message?: string;
}

// ODSQL clauses forwarded verbatim to the records and exports endpoints
export interface RecordQuery {
  select?: string;
  where?: string;
  groupBy?: string;
  orderBy?: string;
  limit?: number;
  offset?: number;
}

export interface CatalogQuery {
  search?: string;
  publisher?: string;
  theme?: string;
  where?: string;
  limit?: number;
  offset?: number;
}

export const NUMERIC_FIELD_TYPES: ReadonlySet<string> = new Set(["int", "double", "decimal", "float"]);
export const DATE_FIELD_TYPES: ReadonlySet<string> = new Set(["date", "datetime"]);
export const GEO_FIELD_TYPES: ReadonlySet<string> = new Set(["geo_point_2d", "geo_shape"]);

export const EXPORT_FORMATS = [
  "csv",
  "json",
  "jsonl",
  "geojson",
  "xlsx",
  "parquet",
  "shp",
  "kml",
  "gpx",
  "fgb",
  "turtle",
  "rdfxml",
  "n3",
  "jsonld",
] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}
