// search_datasets — Full-text search over the portal catalog
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readInt, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { cleanDescription, metasOf, titleOf, truncate } from "../format.js";

export const searchDatasets: ToolDef = {
  name: "search_datasets",
  description: "Search for datasets in the Opendatasoft catalog by keyword.",
  inputSchema: {
    type: "object",
    properties: {
      query: { type: "string", description: "Search query to find datasets" },
      limit: { type: "number", description: "Maximum number of datasets to return (default 10, max 100)" },
    },
    required: ["query"],
  },
  async handler(args) {
    const query = readString(args, "query");
    const limit = readInt(args, "limit", 10, { min: 1, max: 100 });

    try {
      const results = await odsClient().searchDatasets(query, limit);

      const datasets = results.results ?? [];
      if (datasets.length === 0) {
        return ok("No datasets found matching your query.");
      }

      const output = [
        `Found ${results.total_count ?? 0} datasets matching '${query}'. Here are the first ${datasets.length} results:`,
      ];
      datasets.forEach((dataset, i) => {
        const metas = metasOf(dataset);
        output.push(`\n${i + 1}. ${titleOf(dataset)} (ID: ${dataset.dataset_id})`);
        output.push(`   Publisher: ${metas.publisher || "Unknown Publisher"}`);
        output.push(`   Description: ${truncate(cleanDescription(metas.description))}`);
      });
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error searching datasets: ${errorMessage(e)}`);
    }
  },
};
