// list_dataset_fields — Field schema of one dataset
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readString, errorMessage, type ToolDef } from "../../types/tools.js";
import { formatValue, titleOf } from "../format.js";

export const listDatasetFields: ToolDef = {
  name: "list_dataset_fields",
  description: "List all fields in a dataset with their types, descriptions and annotations.",
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

      const fields = dataset.fields ?? [];
      if (fields.length === 0) {
        return ok(`No fields found for dataset '${datasetId}'.`);
      }

      const output = [`Fields for dataset: ${titleOf(dataset)} (ID: ${datasetId})`];
      fields.forEach((field, i) => {
        output.push(`\n${i + 1}. ${field.label || field.name} (${field.name})`);
        output.push(`   Type: ${field.type || "Unknown"}`);
        output.push(`   Description: ${field.description || "No description available"}`);

        const annotations = Object.entries(field.annotations ?? {});
        if (annotations.length > 0) {
          output.push(`   Annotations: ${annotations.map(([k, v]) => `${k}: ${formatValue(v)}`).join(", ")}`);
        }
      });
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error retrieving dataset: ${errorMessage(e)}`);
    }
  },
};
