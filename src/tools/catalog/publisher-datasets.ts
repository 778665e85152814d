// list_datasets_by_publisher — Catalog filtered on publisher
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readInt, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { firstTheme, metasOf, recordsCount, titleOf } from "../format.js";

export const listDatasetsByPublisher: ToolDef = {
  name: "list_datasets_by_publisher",
  description: "List datasets from a specific publisher, with record counts and themes.",
  inputSchema: {
    type: "object",
    properties: {
      publisher: { type: "string", description: "Name of the publisher (exact match)" },
      limit: { type: "number", description: "Maximum number of datasets to return (default 10, max 100)" },
    },
    required: ["publisher"],
  },
  async handler(args) {
    const publisher = readString(args, "publisher");
    const limit = readInt(args, "limit", 10, { min: 1, max: 100 });

    try {
      const results = await odsClient().listDatasets({ publisher, limit });

      const datasets = results.results ?? [];
      if (datasets.length === 0) {
        return ok(`No datasets found from publisher: ${publisher}.`);
      }

      const output = [
        `Found ${results.total_count ?? 0} datasets from publisher '${publisher}'. Here are the first ${datasets.length} results:`,
      ];
      datasets.forEach((dataset, i) => {
        const metas = metasOf(dataset);
        const theme = firstTheme(metas);
        output.push(`\n${i + 1}. ${titleOf(dataset)} (ID: ${dataset.dataset_id})`);
        output.push(`   Records: ${recordsCount(metas)}${theme ? ` | Theme: ${theme}` : ""}`);
      });
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error listing datasets: ${errorMessage(e)}`);
    }
  },
};
