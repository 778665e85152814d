// Tool registry — single source of truth for all MCP tools
import type { ToolDef } from "../types/tools.js";
import {
  searchDatasets,
  getDatasetInfo,
  listDatasetsByPublisher,
  listDatasetsByTheme,
  listDatasetFields,
} from "./catalog/index.js";
import {
  getDatasetRecords,
  getDatasetAggregates,
  facetAnalysis,
  searchDatasetRecords,
  getExportUrl,
} from "./query/index.js";
import {
  summarizeDataset,
  analyzeNumericField,
  analyzeTextField,
  analyzeDateField,
  generateDatasetStatistics,
} from "./analysis/index.js";

const allTools: ToolDef[] = [
  searchDatasets,
  getDatasetInfo,
  listDatasetsByPublisher,
  listDatasetsByTheme,
  listDatasetFields,
  getDatasetRecords,
  getDatasetAggregates,
  facetAnalysis,
  searchDatasetRecords,
  getExportUrl,
  summarizeDataset,
  analyzeNumericField,
  analyzeTextField,
  analyzeDateField,
  generateDatasetStatistics,
];

// Indexed by tool name for fast lookup
export const tools: Map<string, ToolDef> = new Map(
  allTools.map((t) => [t.name, t])
);
