// search_dataset_records — Full-text search inside one dataset
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readInt, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { recordListing } from "../format.js";
import { datasetTitle } from "../lookup.js";

export const searchDatasetRecords: ToolDef = {
  name: "search_dataset_records",
  description: "Search for records within a dataset using full-text search across its fields.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
      query: { type: "string", description: "Text to search for" },
      limit: { type: "number", description: "Maximum number of records to return (default 10, max 100)" },
    },
    required: ["dataset_id", "query"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");
    const query = readString(args, "query");
    const limit = readInt(args, "limit", 10, { min: 1, max: 100 });

    const client = odsClient();
    try {
      const results = await client.searchRecords(datasetId, query, limit);
      const records = results.results ?? [];
      if (records.length === 0) {
        return ok(`No records found matching '${query}' in dataset '${datasetId}'.`);
      }

      const title = await datasetTitle(client, datasetId);
      const output = [
        `Search results for '${query}' in dataset: ${title} (ID: ${datasetId})`,
        `Found ${results.total_count ?? 0} matching records. Showing first ${records.length}:`,
        ...recordListing(records),
      ];
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error searching dataset records: ${errorMessage(e)}`);
    }
  },
};
