// get_dataset_info — Metadata and schema of one dataset
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { cleanDescription, metasOf, recordsCount, titleOf } from "../format.js";

export const getDatasetInfo: ToolDef = {
  name: "get_dataset_info",
  description: "Get detailed information about a specific dataset: title, publisher, record count, description and fields.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
    },
    required: ["dataset_id"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");

    try {
      const dataset = await odsClient().getDataset(datasetId);

      const metas = metasOf(dataset);
      const fields = dataset.fields ?? [];
      const output = [
        `Dataset: ${titleOf(dataset)} (ID: ${datasetId})`,
        `Publisher: ${metas.publisher || "Unknown Publisher"}`,
        `Record Count: ${recordsCount(metas)}`,
        "\nDescription:",
        cleanDescription(metas.description),
        `\nFields (${fields.length}):`,
      ];
      for (const field of fields) {
        const suffix = field.description ? ` - ${field.description}` : "";
        output.push(`  - ${field.label || field.name} (${field.name}): ${field.type || "Unknown"}${suffix}`);
      }
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error retrieving dataset: ${errorMessage(e)}`);
    }
  },
};
