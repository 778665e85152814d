// summarize_dataset — Metadata, schema, type distribution and sample records in one report
import { odsClient, type OdsClient } from "../../bridge/ods-client.js";
import type { OdsRecord } from "../../types/ods.js";
import { ok, err, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { cleanDescription, firstTheme, formatValue, metasOf, recordsCount, titleOf } from "../format.js";

const SAMPLE_SIZE = 5;

export const summarizeDataset: ToolDef = {
  name: "summarize_dataset",
  description:
    "Generate a comprehensive summary of a dataset including metadata, schema, field type distribution and sample records.",
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
      const metas = metasOf(dataset);
      const fields = dataset.fields ?? [];
      const count = recordsCount(metas);

      const summary = [
        `# Dataset Summary: ${titleOf(dataset)}`,
        "\n## Basic Information",
        `- **Dataset ID**: ${datasetId}`,
        `- **Publisher**: ${metas.publisher || "Unknown Publisher"}`,
        `- **Theme**: ${firstTheme(metas)}`,
        `- **License**: ${metas.license || "Unknown License"}`,
        `- **Records Count**: ${count}`,
        "\n## Description",
        cleanDescription(metas.description),
        `\n## Schema (${fields.length} fields)`,
      ];

      const typeCounts = new Map<string, number>();
      for (const field of fields) {
        const type = field.type || "Unknown";
        typeCounts.set(type, (typeCounts.get(type) ?? 0) + 1);
        summary.push(`- **${field.label || field.name}** (${field.name}): ${type}`);
      }

      summary.push("\n## Field Type Distribution");
      for (const [type, n] of typeCounts) {
        summary.push(`- ${type}: ${n} fields`);
      }

      const samples = await sampleRecords(client, datasetId);
      if (samples.length > 0) {
        summary.push(`\n## Sample Records (${samples.length} of ${count})`);
        samples.forEach((record, i) => {
          summary.push(`\n### Record ${i + 1}`);
          for (const [key, value] of Object.entries(record)) {
            summary.push(`- **${key}**: ${formatValue(value)}`);
          }
        });
      }
      return ok(summary.join("\n"));
    } catch (e) {
      return err(`Error retrieving dataset information: ${errorMessage(e)}`);
    }
  },
};

// Failures are logged and the sample section is left out
async function sampleRecords(client: OdsClient, datasetId: string): Promise<OdsRecord[]> {
  try {
    const res = await client.getRecords(datasetId, { limit: SAMPLE_SIZE });
    return res.results ?? [];
  } catch (e) {
    console.error(`[ods] Sample records unavailable for ${datasetId}: ${errorMessage(e)}`);
    return [];
  }
}
