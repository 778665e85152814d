// get_export_url — Download URL for a dataset export; no request is made for the export itself
import { odsClient } from "../../bridge/ods-client.js";
import { EXPORT_FORMATS, isExportFormat } from "../../types/ods.js";
import {
  ok,
  readOptionalInt,
  readOptionalString,
  readString,
  InvalidArgumentError,
  type ToolDef,
} from "../../types/tools.js";
import { datasetTitle } from "../lookup.js";

export const getExportUrl: ToolDef = {
  name: "get_export_url",
  description: "Get a URL for exporting dataset records in a given format (csv, json, geojson, xlsx, parquet, ...).",
  inputSchema: {
    type: "object",
    properties: {
      dataset_id: { type: "string", description: "Unique identifier for the dataset" },
      export_format: { type: "string", enum: [...EXPORT_FORMATS], description: "Export format (default csv)" },
      select: { type: "string", description: "ODSQL select clause" },
      where: { type: "string", description: "ODSQL where clause" },
      group_by: { type: "string", description: "ODSQL group by clause" },
      order_by: { type: "string", description: "ODSQL order by clause" },
      limit: { type: "number", description: "Maximum number of records (-1, 0 or omitted for all)" },
    },
    required: ["dataset_id"],
  },
  async handler(args) {
    const datasetId = readString(args, "dataset_id");
    const format = (readOptionalString(args, "export_format") ?? "csv").toLowerCase();
    if (!isExportFormat(format)) {
      throw new InvalidArgumentError(`Unsupported export format "${format}" (expected one of: ${EXPORT_FORMATS.join(", ")})`);
    }
    const select = readOptionalString(args, "select");
    const where = readOptionalString(args, "where");
    const groupBy = readOptionalString(args, "group_by");
    const orderBy = readOptionalString(args, "order_by");
    const rawLimit = readOptionalInt(args, "limit");
    if (rawLimit !== undefined && rawLimit < -1) {
      throw new InvalidArgumentError(`"limit" must be -1 or a non-negative integer`);
    }
    // 0 means no limit, same as omitting it
    const limit = rawLimit === 0 ? undefined : rawLimit;

    const client = odsClient();
    const url = client.exportUrl(datasetId, format, { select, where, groupBy, orderBy, limit });
    const title = await datasetTitle(client, datasetId);

    const output = [`Export URL for dataset: ${title} (ID: ${datasetId})`, `Format: ${format.toUpperCase()}`];

    const used: string[] = [];
    if (select) used.push(`SELECT: ${select}`);
    if (where) used.push(`WHERE: ${where}`);
    if (groupBy) used.push(`GROUP BY: ${groupBy}`);
    if (orderBy) used.push(`ORDER BY: ${orderBy}`);
    if (limit !== undefined) used.push(`LIMIT: ${limit}`);
    if (used.length > 0) {
      output.push(`Query parameters: ${used.join(", ")}`);
    }

    output.push(`\nExport URL: ${url}`);
    output.push("\nNote: This URL can be used to download the dataset in the specified format.");
    return ok(output.join("\n"));
  },
};
