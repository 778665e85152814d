// analyze_text_field — Most frequent values, distinct count and share of total
import { odsClient } from "../../bridge/ods-client.js";
import { assertFieldName } from "../../odsql/builder.js";
import type { Dataset, OdsRecord } from "../../types/ods.js";
import { ok, err, readInt, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { asNumber, markdownTable, percent, statValue, titleOf, UNKNOWN_DATASET } from "../format.js";
import { checkField, fieldLabel, optionalAggregateRow } from "../lookup.js";

const TEXT_FIELD_TYPES: ReadonlySet<string> = new Set(["text"]);

export const analyzeTextField: ToolDef = {
  name: "analyze_text_field",
  description: "Analyze a text field in a dataset: total records, distinct values and the most frequent values with their share.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
      field_name: { type: "string", description: "Name of the text field to analyze" },
      limit: { type: "number", description: "Maximum number of top values to list (default 20, max 100)" },
    },
    required: ["dataset_id", "field_name"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");
    const fieldName = assertFieldName(readString(args, "field_name"));
    const limit = readInt(args, "limit", 20, { min: 1, max: 100 });
    const client = odsClient();

    let dataset: Dataset;
    try {
      dataset = await client.getDataset(datasetId);
    } catch (e) {
      return err(`Error validating field: ${errorMessage(e)}`);
    }
    const check = checkField(dataset, datasetId, fieldName, TEXT_FIELD_TYPES, "text");
    if (!check.ok) return ok(check.message);

    let values: OdsRecord[];
    try {
      const frequency = await client.getRecords(datasetId, {
        select: `${fieldName}, count(*) as value_count`,
        groupBy: fieldName,
        orderBy: "value_count DESC",
        limit,
      });
      values = frequency.results ?? [];
    } catch (e) {
      return err(`Error computing value frequency: ${errorMessage(e)}`);
    }
    if (values.length === 0) {
      return ok(`Failed to compute value frequency for field '${fieldName}'.`);
    }

    const [totalRow, distinctRow] = await Promise.all([
      optionalAggregateRow(client, datasetId, "count(*) as total"),
      optionalAggregateRow(client, datasetId, `count(distinct ${fieldName}) as distinct_count`),
    ]);
    const total = asNumber(totalRow?.total);

    const output = [
      `# Analysis of ${fieldLabel(check.field)} (${fieldName})`,
      `\nDataset: ${titleOf(dataset, UNKNOWN_DATASET)} (ID: ${datasetId})`,
      "\n## Basic Statistics",
      `- **Total Records**: ${total ?? "Unknown"}`,
      `- **Distinct Values**: ${distinctRow === undefined ? "Unknown" : statValue(distinctRow.distinct_count)}`,
      `\n## Top ${values.length} Values by Frequency`,
      ...markdownTable(
        ["Value", "Count", "Percentage"],
        values.map((row) => {
          const count = asNumber(row.value_count) ?? 0;
          return [
            statValue(row[fieldName]),
            String(count),
            total !== undefined && total > 0 ? percent(count, total) : "N/A",
          ];
        }),
      ),
    ];
    return ok(output.join("\n"));
  },
};
