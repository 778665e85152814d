// facet_analysis — Value distribution of one or more facet fields
import { odsClient } from "../../bridge/ods-client.js";
import { ok, err, readOptionalString, readString, errorMessage, InvalidArgumentError, type ToolDef } from "../../types/tools.js";
import { markdownTable } from "../format.js";
import { datasetTitle } from "../lookup.js";

const TOP_VALUES = 20;

export function parseFacetList(raw: string): string[] {
  const facets = raw.split(",").map((f) => f.trim()).filter((f) => f !== "");
  if (facets.length === 0) {
    throw new InvalidArgumentError(`"facets" must name at least one field`);
  }
  return facets;
}

export const facetAnalysis: ToolDef = {
  name: "facet_analysis",
  description: "Analyze the distribution of facet values (counts per value) for one or more dataset fields.",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
      facets: { type: "string", description: "Comma-separated list of field names to use as facets" },
      where: { type: "string", description: "ODSQL where clause to filter records" },
    },
    required: ["dataset_id", "facets"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");
    const facets = parseFacetList(readString(args, "facets"));
    const where = readOptionalString(args, "where");

    const client = odsClient();
    try {
      const results = await client.getFacets(datasetId, facets, where);
      const groups = results.facets ?? [];
      if (groups.length === 0) {
        return ok(`No facet data found for dataset '${datasetId}' with the specified criteria.`);
      }

      const title = await datasetTitle(client, datasetId);
      const output = [
        `Facet analysis for dataset: ${title} (ID: ${datasetId})`,
        `Analyzing facets: ${facets.join(", ")}${where ? ` WHERE ${where}` : ""}`,
      ];

      for (const group of groups) {
        const values = group.facets ?? [];
        output.push(`\nFacet: ${group.name ?? "Unknown"} (${values.length} values)`);
        if (values.length === 0) {
          output.push("  No values found for this facet.");
          continue;
        }

        const sorted = [...values].sort((a, b) => (b.count ?? 0) - (a.count ?? 0));
        output.push(
          "",
          ...markdownTable(
            ["Value", "Count", "State"],
            sorted.slice(0, TOP_VALUES).map((v) => [v.name ?? "N/A", String(v.count ?? 0), v.state ?? "N/A"]),
          ),
        );
        if (sorted.length > TOP_VALUES) {
          output.push(`\n(Showing top ${TOP_VALUES} of ${sorted.length} values)`);
        }
      }
      return ok(output.join("\n"));
    } catch (e) {
      return err(`Error retrieving facets: ${errorMessage(e)}`);
    }
  },
};
