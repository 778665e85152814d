// analyze_date_field — Date range plus yearly and recent monthly distributions
import { odsClient, type OdsClient } from "../../bridge/ods-client.js";
import { assertFieldName } from "../../odsql/builder.js";
import { DATE_FIELD_TYPES, type Dataset, type OdsRecord } from "../../types/ods.js";
import { ok, err, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { asNumber, formatValue, markdownTable, statValue, titleOf, UNKNOWN_DATASET } from "../format.js";
import { aggregateRow, checkField, fieldLabel } from "../lookup.js";

const RECENT_YEARS = 5;

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export function monthName(month: unknown): string {
  const n = asNumber(month);
  return n !== undefined && Number.isInteger(n) && n >= 1 && n <= 12 ? MONTH_NAMES[n - 1] : formatValue(month);
}

async function yearDistribution(client: OdsClient, datasetId: string, field: string): Promise<OdsRecord[]> {
  const res = await client.getRecords(datasetId, {
    select: `year(${field}) as year, count(*) as count`,
    groupBy: `year(${field})`,
    orderBy: "year",
    limit: 100,
  });
  return res.results ?? [];
}

async function monthDistribution(
  client: OdsClient,
  datasetId: string,
  field: string,
  year: number,
): Promise<OdsRecord[]> {
  try {
    const res = await client.getRecords(datasetId, {
      select: `month(${field}) as month, count(*) as count`,
      where: `year(${field}) = ${year}`,
      groupBy: `month(${field})`,
      orderBy: "month",
      limit: 12,
    });
    return res.results ?? [];
  } catch (e) {
    console.error(`[ods] Month distribution for ${year} unavailable for ${datasetId}.${field}: ${errorMessage(e)}`);
    return [];
  }
}

export const analyzeDateField: ToolDef = {
  name: "analyze_date_field",
  description:
    "Analyze a date field in a dataset: earliest and latest dates, distribution by year and by month for the most recent years.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
      field_name: { type: "string", description: "Name of the date or datetime field to analyze" },
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
    const check = checkField(dataset, datasetId, fieldName, DATE_FIELD_TYPES, "date");
    if (!check.ok) return ok(check.message);

    let stats: OdsRecord;
    try {
      stats = await aggregateRow(
        client,
        datasetId,
        `min(${fieldName}) as min_date, max(${fieldName}) as max_date, count(${fieldName}) as count`,
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
      `- **Earliest Date**: ${statValue(stats.min_date)}`,
      `- **Latest Date**: ${statValue(stats.max_date)}`,
    ];

    let years: OdsRecord[] = [];
    try {
      years = await yearDistribution(client, datasetId, fieldName);
    } catch (e) {
      console.error(`[ods] Year distribution unavailable for ${datasetId}.${fieldName}: ${errorMessage(e)}`);
    }
    if (years.length === 0) return ok(output.join("\n"));

    output.push(
      "\n## Distribution by Year",
      ...markdownTable(
        ["Year", "Count"],
        years.map((y) => [statValue(y.year), formatValue(y.count ?? 0)]),
      ),
    );

    const recent = years
      .map((y) => asNumber(y.year))
      .filter((y): y is number => y !== undefined)
      .sort((a, b) => b - a)
      .slice(0, RECENT_YEARS);

    // A failed year is logged and left out; the other years still render
    const perYear = await Promise.all(recent.map((y) => monthDistribution(client, datasetId, fieldName, y)));
    const monthly = recent
      .map((y, i): [number, OdsRecord[]] => [y, perYear[i]])
      .filter(([, months]) => months.length > 0);

    if (monthly.length > 0) {
      output.push(`\n## Monthly Distribution (Last ${monthly.length} Years)`);
      for (const [year, months] of monthly) {
        output.push(
          `\n### ${year}`,
          ...markdownTable(
            ["Month", "Count"],
            months.map((m) => [monthName(m.month), formatValue(m.count ?? 0)]),
          ),
        );
      }
    }

    return ok(output.join("\n"));
  },
};
