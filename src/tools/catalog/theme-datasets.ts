// list_datasets_by_theme — Catalog filtered on theme
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readInt, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { metasOf, recordsCount, titleOf } from "../format.js";

export const listDatasetsByTheme: ToolDef = {
  name: "list_datasets_by_theme",
  description: "List datasets tagged with a catalog theme (e.g. Environment, Transport), with publishers and record counts.",
  inputSchema: {
    type: "object",
    properties: {
      theme: { type: "string", description: "Theme name (exact match)" },
      limit: { type: "number", description: "Maximum number of datasets to return (default 10, max 100)" },
    },
    required: ["theme"],
  },
  async handler(args) {
    const theme = readString(args, "theme");
    const limit = readInt(args, "limit", 10, { min: 1, max: 100 });

    try {
      const results = await odsClient().listDatasets({ theme, limit });

      const datasets = results.results ?? [];
      if (datasets.length === 0) {
        return ok(`No datasets found for theme: ${theme}.`);
      }

      const output = [
        `Found ${results.total_count ?? 0} datasets with theme '${theme}'. Here are the first ${datasets.length} results:`,
      ];
      datasets.forEach((dataset, i) => {
        const metas = metasOf(dataset);
        output.push(`\n${i + 1}. ${titleOf(dataset)} (ID: ${dataset.dataset_id})`);
        output.push(`   Publisher: ${metas.publisher || "Unknown Publisher"} | Records: ${recordsCount(metas)}`);
      });
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error listing datasets: ${errorMessage(e)}`);
    }
  },
};
