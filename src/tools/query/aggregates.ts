// get_dataset_aggregates — ODSQL aggregation (count, sum, avg, ...) with optional grouping
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readInt, readOptionalString, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { recordsTable } from "../format.js";
import { datasetTitle } from "../lookup.js";

export const getDatasetAggregates: ToolDef = {
  name: "get_dataset_aggregates",
  description:
    "Get aggregated data from a dataset using ODSQL aggregation functions (count, sum, avg, min, max) with optional group by and filter.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
      select: { type: "string", description: "ODSQL select clause with aggregations, e.g. \"region, count(*) as n\"" },
      group_by: { type: "string", description: "ODSQL group by clause, e.g. \"region\"" },
      where: { type: "string", description: "ODSQL where clause to filter records" },
      limit: { type: "number", description: "Maximum number of result rows (default 100, max 100)" },
    },
    required: ["dataset_id", "select"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");
    const select = readString(args, "select");
    const groupBy = readOptionalString(args, "group_by");
    const where = readOptionalString(args, "where");
    const limit = readInt(args, "limit", 100, { min: 1, max: 100 });

    const client = odsClient();
    try {
      const results = await client.getRecords(datasetId, { select, groupBy, where, limit });
      const rows = results.results ?? [];
      if (rows.length === 0) {
        return ok(`No aggregation results found for dataset '${datasetId}' with the specified criteria.`);
      }

      const title = await datasetTitle(client, datasetId);
      const query = `SELECT ${select}${groupBy ? ` GROUP BY ${groupBy}` : ""}${where ? ` WHERE ${where}` : ""}`;
      const output = [
        `Aggregation results for dataset: ${title} (ID: ${datasetId})`,
        `Query: ${query}`,
        `Results: ${rows.length} rows`,
        "",
        ...recordsTable(rows),
      ];
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error performing aggregation: ${errorMessage(e)}`);
    }
  },
};
