// Analysis tool barrel export
export { summarizeDataset } from "./summarize.js";
export { analyzeNumericField } from "./numeric-field.js";
export { analyzeTextField } from "./text-field.js";
export { analyzeDateField } from "./date-field.js";
export { generateDatasetStatistics } from "./statistics.js";
