// Query tool barrel export
export { getDatasetRecords } from "./records.js";
export { getDatasetAggregates } from "./aggregates.js";
export { facetAnalysis } from "./facets.js";
export { searchDatasetRecords } from "./search-records.js";
export { getExportUrl } from "./export-url.js";
