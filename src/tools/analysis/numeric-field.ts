// analyze_numeric_field — min/max/avg/count plus a 10-bucket histogram
import { odsClient, type OdsClient } from "../../bridge/ods-client.js";
import { assertFieldName, bucketRanges, rangeWhere } from "../../odsql/builder.js";
import { NUMERIC_FIELD_TYPES, type Dataset, type OdsRecord } from "../../types/ods.js";
import { ok, err, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { asNumber, markdownTable, statValue, titleOf, UNKNOWN_DATASET } from "../format.js";
import { aggregateRow, checkField, fieldLabel } from "../lookup.js";

const BUCKETS = 10;

interface Bucket {
  lower: number;
  upper: number;
  count: number;
}

export async function histogram(
  client: OdsClient,
  datasetId: string,
  field: string,
  min: number,
  max: number,
): Promise<Bucket[]> {
  const ranges = bucketRanges(min, max, BUCKETS);
  return Promise.all(
    ranges.map(async ([lower, upper], i) => {
      const row = await aggregateRow(client, datasetId, "count(*) as count", rangeWhere(field, lower, upper, i === ranges.length - 1));
      return { lower, upper, count: asNumber(row.count) ?? 0 };
    }),
  );
}

export const analyzeNumericField: ToolDef = {
  name: "analyze_numeric_field",
  description: "Analyze a numeric field in a dataset: count, min, max, average and value distribution over 10 equal-width ranges.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
      field_name: { type: "string", description: "Name of the numeric field to analyze" },
    },
    required: ["dataset_id", "field_name"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");
    const fieldName = assertFieldName(readString(args, "field_name"));
    const client = odsClient();

    let dataset: Dataset;
    try {
      dataset = await client.getDataset(datasetId);
    } catch (e) {
      return err(`Error validating field: ${errorMessage(e)}`);
    }
    const check = checkField(dataset, datasetId, fieldName, NUMERIC_FIELD_TYPES, "numeric");
    if (!check.ok) return ok(check.message);

    let stats: OdsRecord;
    try {
      stats = await aggregateRow(
        client,
        datasetId,
        `min(${fieldName}) as min, max(${fieldName}) as max, avg(${fieldName}) as avg, count(${fieldName}) as count`,
      );
    } catch (e) {
      return err(`Error computing field statistics: ${errorMessage(e)}`);
    }
    if (Object.keys(stats).length === 0) {
      return ok(`Failed to compute statistics for field '${fieldName}'.`);
    }

    const output = [
      `# Analysis of ${fieldLabel(check.field)} (${fieldName})`,
      `\nDataset: ${titleOf(dataset, UNKNOWN_DATASET)} (ID: ${datasetId})`,
      "\n## Basic Statistics",
      `- **Count**: ${statValue(stats.count)}`,
      `- **Minimum**: ${statValue(stats.min)}`,
      `- **Maximum**: ${statValue(stats.max)}`,
      `- **Average**: ${statValue(stats.avg)}`,
    ];

    const min = asNumber(stats.min);
    const max = asNumber(stats.max);
    if (min !== undefined && max !== undefined && max > min) {
      try {
        const buckets = await histogram(client, datasetId, fieldName, min, max);
        output.push(
          "\n## Value Distribution",
          ...markdownTable(
            ["Range", "Count"],
            buckets.map((b) => [`${b.lower.toFixed(2)} - ${b.upper.toFixed(2)}`, String(b.count)]),
          ),
        );
      } catch (e) {
        console.error(`[ods] Distribution unavailable for ${datasetId}.${fieldName}: ${errorMessage(e)}`);
      }
    }

    return ok(output.join("\n"));
  },
};
