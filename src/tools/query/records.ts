// get_dataset_records — Records with optional ODSQL select/where/order_by
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readInt, readOptionalString, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { recordListing, recordsTable } from "../format.js";
import { datasetTitle } from "../lookup.js";

// Wider records read better as key/value listings than as a table
const MAX_TABLE_COLUMNS = 10;

export const getDatasetRecords: ToolDef = {
  name: "get_dataset_records",
  description:
    "Get records from a dataset with optional ODSQL filtering, field selection and sorting. Fragments are passed to the API verbatim.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
      limit: { type: "number", description: "Maximum number of records to return (default 10, max 100)" },
      offset: { type: "number", description: "Number of records to skip, for pagination (default 0)" },
      select: { type: "string", description: "ODSQL select clause, e.g. \"name, population\"" },
      where: { type: "string", description: "ODSQL where clause, e.g. \"population > 10000\"" },
      order_by: { type: "string", description: "ODSQL order by clause, e.g. \"population DESC\"" },
    },
    required: ["dataset_id"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");
    const limit = readInt(args, "limit", 10, { min: 1, max: 100 });
    const offset = readInt(args, "offset", 0, { min: 0, max: 9999 });
    const select = readOptionalString(args, "select");
    const where = readOptionalString(args, "where");
    const orderBy = readOptionalString(args, "order_by");

    const client = odsClient();
    try {
      const results = await client.getRecords(datasetId, { select, where, orderBy, limit, offset });
      const records = results.results ?? [];
      if (records.length === 0) {
        return ok(`No records found for dataset '${datasetId}' with the specified criteria.`);
      }

      const title = await datasetTitle(client, datasetId);
      const output = [
        `Records from dataset: ${title} (ID: ${datasetId})`,
        `Showing ${records.length} of ${results.total_count ?? 0} total records (offset: ${offset})`,
      ];

      const fieldCount = Object.keys(records[0]).length;
      if (fieldCount > MAX_TABLE_COLUMNS) {
        output.push(`\nFound ${fieldCount} fields in the records. Here's a summary of the first ${records.length} records:`);
        output.push(...recordListing(records));
      } else {
        output.push("", ...recordsTable(records));
      }

      if (select || where || orderBy) {
        output.push("\nNote: This query used ODSQL syntax:");
        if (select) output.push(`- SELECT: ${select}`);
        if (where) output.push(`- WHERE: ${where}`);
        if (orderBy) output.push(`- ORDER BY: ${orderBy}`);
      }
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error retrieving dataset records: ${errorMessage(e)}`);
    }
  },
};
