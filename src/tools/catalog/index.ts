// Catalog tool barrel export
export { searchDatasets } from "./search-datasets.js";
export { getDatasetInfo } from "./dataset-info.js";
export { listDatasetsByPublisher } from "./publisher-datasets.js";
export { listDatasetsByTheme } from "./theme-datasets.js";
export { listDatasetFields } from "./dataset-fields.js";
