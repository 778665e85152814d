// Opendatasoft Explore API v2.1 client — catalog, records, facets, exports
import { loadConfig, type OdsConfig } from "../config/loader.js";
import { andWhere, buildQueryParams, quoteLiteral, searchClause } from "../odsql/builder.js";
import type {
  CatalogQuery,
  CatalogResponse,
  Dataset,
  FacetsResponse,
  OdsErrorBody,
  RecordQuery,
  RecordsResponse,
} from "../types/ods.js";

export class OdsApiError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly detail?: string,
  ) {
    super(`ODS API error: ${status} ${statusText}${detail ? ` - ${detail}` : ""}`);
    this.name = "OdsApiError";
  }
}

type Params = Array<[string, string]>;

export class OdsClient {
  constructor(private readonly config: OdsConfig) {}

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  async listDatasets(query: CatalogQuery = {}): Promise<CatalogResponse> {
    const where = andWhere(
      query.search ? quoteLiteral(query.search) : undefined,
      query.where,
      query.publisher ? `publisher=${quoteLiteral(query.publisher)}` : undefined,
      query.theme ? `theme=${quoteLiteral(query.theme)}` : undefined,
    );
    const params = buildQueryParams({ where, limit: query.limit ?? 10, offset: query.offset ?? 0 });
    return this.get<CatalogResponse>("/catalog/datasets", params);
  }

  async searchDatasets(query: string, limit = 10): Promise<CatalogResponse> {
    return this.listDatasets({ search: query, limit });
  }

  async getDataset(datasetId: string): Promise<Dataset> {
    return this.get<Dataset>(`/catalog/datasets/${encodeURIComponent(datasetId)}`);
  }

  async getRecords(datasetId: string, query: RecordQuery = {}): Promise<RecordsResponse> {
    const params = buildQueryParams({ ...query, limit: query.limit ?? 10, offset: query.offset ?? 0 });
    return this.get<RecordsResponse>(`/catalog/datasets/${encodeURIComponent(datasetId)}/records`, params);
  }

  async searchRecords(datasetId: string, query: string, limit = 10): Promise<RecordsResponse> {
    return this.getRecords(datasetId, { where: searchClause(query), limit });
  }

  async getFacets(datasetId: string, facets: string[], where?: string): Promise<FacetsResponse> {
    const params: Params = facets.map((f) => ["facet", f]);
    if (where) params.push(["where", where]);
    return this.get<FacetsResponse>(`/catalog/datasets/${encodeURIComponent(datasetId)}/facets`, params);
  }

  // Builds the export URL only; the caller downloads it
  exportUrl(datasetId: string, format: string, query: RecordQuery = {}): string {
    const path = `/catalog/datasets/${encodeURIComponent(datasetId)}/exports/${encodeURIComponent(format)}`;
    return this.url(path, buildQueryParams(query));
  }

  private url(path: string, params: Params = []): string {
    const qs = new URLSearchParams(params).toString();
    return `${this.config.baseUrl}${this.config.apiPath}${path}${qs ? `?${qs}` : ""}`;
  }

  private async get<T>(path: string, params: Params = []): Promise<T> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.config.apiKey) {
      headers.Authorization = `Apikey ${this.config.apiKey}`;
    }

    const res = await fetch(this.url(path, params), {
      headers,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!res.ok) {
      throw new OdsApiError(res.status, res.statusText, await readErrorDetail(res));
    }

    return (await res.json()) as T;
  }
}

async function readErrorDetail(res: Response): Promise<string | undefined> {
  const text = await res.text().catch(() => "");
  if (!text) return undefined;
  try {
    const body: OdsErrorBody = JSON.parse(text);
    return body.message ?? body.error_code ?? undefined;
  } catch {
    // non-JSON error page
    return text.slice(0, 200);
  }
}

// Config is re-read on every call
export function odsClient(): OdsClient {
  return new OdsClient(loadConfig());
}
