// generate_dataset_statistics — Per-type statistics for every field of a dataset
import { odsClient, type OdsClient } from "../../bridge/ods-client.js";
import {
  DATE_FIELD_TYPES,
  GEO_FIELD_TYPES,
  NUMERIC_FIELD_TYPES,
  type DatasetField,
} from "../../types/ods.js";
import { ok, err, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { asNumber, markdownTable, percent, statValue, titleOf, UNKNOWN_DATASET } from "../format.js";
import { fieldLabel, optionalAggregateRow } from "../lookup.js";

export type FieldGroup = "numeric" | "text" | "date" | "geo" | "other";

export function groupFields(fields: DatasetField[]): Record<FieldGroup, DatasetField[]> {
  const groups: Record<FieldGroup, DatasetField[]> = { numeric: [], text: [], date: [], geo: [], other: [] };
  for (const field of fields) {
    const type = field.type ?? "";
    if (NUMERIC_FIELD_TYPES.has(type)) groups.numeric.push(field);
    else if (type === "text") groups.text.push(field);
    else if (DATE_FIELD_TYPES.has(type)) groups.date.push(field);
    else if (GEO_FIELD_TYPES.has(type)) groups.geo.push(field);
    else groups.other.push(field);
  }
  return groups;
}

function fillRate(count: unknown, total: number | undefined): string {
  const n = asNumber(count);
  return n !== undefined && total !== undefined && total > 0 ? percent(n, total) : "N/A";
}

function describe(field: DatasetField): string {
  return `${fieldLabel(field)} (${field.name})`;
}

async function numericSection(client: OdsClient, datasetId: string, fields: DatasetField[]): Promise<string[]> {
  // One combined aggregate for all numeric fields
  const select = fields
    .flatMap((f) => [
      `min(${f.name}) as min_${f.name}`,
      `max(${f.name}) as max_${f.name}`,
      `avg(${f.name}) as avg_${f.name}`,
      `count(${f.name}) as count_${f.name}`,
    ])
    .join(", ");
  const row = (await optionalAggregateRow(client, datasetId, select)) ?? {};

  return [
    "\n### Numeric Fields",
    ...markdownTable(
      ["Field", "Type", "Count", "Min", "Max", "Average"],
      fields.map((f) => [
        describe(f),
        f.type ?? "",
        statValue(row[`count_${f.name}`]),
        statValue(row[`min_${f.name}`]),
        statValue(row[`max_${f.name}`]),
        statValue(row[`avg_${f.name}`]),
      ]),
    ),
  ];
}

async function textSection(
  client: OdsClient,
  datasetId: string,
  fields: DatasetField[],
  total: number | undefined,
): Promise<string[]> {
  const rows = await Promise.all(
    fields.map(async (f) => {
      const row = await optionalAggregateRow(
        client,
        datasetId,
        `count(distinct ${f.name}) as distinct_count, count(${f.name}) as count`,
      );
      return [describe(f), statValue(row?.distinct_count), fillRate(row?.count, total)];
    }),
  );
  return ["\n### Text Fields", ...markdownTable(["Field", "Distinct Values", "Fill Rate"], rows)];
}

async function dateSection(
  client: OdsClient,
  datasetId: string,
  fields: DatasetField[],
  total: number | undefined,
): Promise<string[]> {
  const rows = await Promise.all(
    fields.map(async (f) => {
      const row = await optionalAggregateRow(
        client,
        datasetId,
        `min(${f.name}) as min_date, max(${f.name}) as max_date, count(${f.name}) as count`,
      );
      return [describe(f), statValue(row?.min_date), statValue(row?.max_date), fillRate(row?.count, total)];
    }),
  );
  return ["\n### Date Fields", ...markdownTable(["Field", "Earliest Date", "Latest Date", "Fill Rate"], rows)];
}

async function geoSection(
  client: OdsClient,
  datasetId: string,
  fields: DatasetField[],
  total: number | undefined,
): Promise<string[]> {
  const rows = await Promise.all(
    fields.map(async (f) => {
      const row = await optionalAggregateRow(client, datasetId, `count(${f.name}) as count`);
      return [describe(f), f.type ?? "", fillRate(row?.count, total)];
    }),
  );
  return ["\n### Geographic Fields", ...markdownTable(["Field", "Type", "Fill Rate"], rows)];
}

export const generateDatasetStatistics: ToolDef = {
  name: "generate_dataset_statistics",
  description:
    "Generate statistics for all fields of a dataset, grouped by type: numeric ranges and averages, text distinct counts, date ranges and fill rates.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
    },
    required: ["dataset_id"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");
    const client = odsClient();

    try {
      const dataset = await client.getDataset(datasetId);
      const fields = dataset.fields ?? [];
      if (fields.length === 0) {
        return ok(`No fields found for dataset '${datasetId}'.`);
      }

      const groups = groupFields(fields);
      const output = [
        `# Dataset Statistics: ${titleOf(dataset, UNKNOWN_DATASET)}`,
        `\nDataset ID: ${datasetId}`,
        "\n## Field Count by Type",
        `- **Numeric Fields**: ${groups.numeric.length}`,
        `- **Text Fields**: ${groups.text.length}`,
        `- **Date Fields**: ${groups.date.length}`,
        `- **Geographic Fields**: ${groups.geo.length}`,
        `- **Other Fields**: ${groups.other.length}`,
        "\n## Detailed Field Information",
      ];

      let total: number | undefined;
      if (groups.text.length + groups.date.length + groups.geo.length > 0) {
        const totalRow = await optionalAggregateRow(client, datasetId, "count(*) as total");
        total = asNumber(totalRow?.total);
      }

      if (groups.numeric.length > 0) output.push(...(await numericSection(client, datasetId, groups.numeric)));
      if (groups.text.length > 0) output.push(...(await textSection(client, datasetId, groups.text, total)));
      if (groups.date.length > 0) output.push(...(await dateSection(client, datasetId, groups.date, total)));
      if (groups.geo.length > 0) output.push(...(await geoSection(client, datasetId, groups.geo, total)));
      if (groups.other.length > 0) {
        output.push(
          "\n### Other Fields",
          ...markdownTable(["Field", "Type"], groups.other.map((f) => [describe(f), f.type || "Unknown"])),
        );
      }

      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error retrieving dataset information: ${errorMessage(e)}`);
    }
  },
};
