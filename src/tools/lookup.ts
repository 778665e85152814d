// Dataset lookups shared by query and analysis tools
import type { OdsClient } from "../bridge/ods-client.js";
import type { Dataset, DatasetField, OdsRecord } from "../types/ods.js";
import { errorMessage } from "../types/tools.js";
import { UNKNOWN_DATASET, titleOf } from "./format.js";

// Title for result headers; a failed lookup must not fail the tool
export async function datasetTitle(client: OdsClient, datasetId: string): Promise<string> {
  try {
    const dataset = await client.getDataset(datasetId);
    return titleOf(dataset, UNKNOWN_DATASET);
  } catch (e) {
    console.error(`[ods] Title lookup failed for ${datasetId}: ${errorMessage(e)}`);
    return UNKNOWN_DATASET;
  }
}

export function findField(dataset: Dataset, fieldName: string): DatasetField | undefined {
  return (dataset.fields ?? []).find((f) => f.name === fieldName);
}

export function fieldLabel(field: DatasetField): string {
  return field.label || field.name;
}

export type FieldCheck =
  | { ok: true; field: DatasetField }
  | { ok: false; message: string };

/**
 * Resolves a field and checks its type against the accepted set.
 * Failures are explanatory messages, not tool errors.
 */
export function checkField(
  dataset: Dataset,
  datasetId: string,
  fieldName: string,
  accepted: ReadonlySet<string>,
  kind: string,
): FieldCheck {
  const field = findField(dataset, fieldName);
  if (!field) {
    return { ok: false, message: `Field '${fieldName}' not found in dataset '${datasetId}'.` };
  }
  const type = field.type ?? "";
  if (!accepted.has(type)) {
    return { ok: false, message: `Field '${fieldName}' is not a ${kind} field (type: ${type}).` };
  }
  return { ok: true, field };
}

// First row of an aggregate query, or an empty row
export async function aggregateRow(
  client: OdsClient,
  datasetId: string,
  select: string,
  where?: string,
): Promise<OdsRecord> {
  const res = await client.getRecords(datasetId, { select, where, limit: 1 });
  return res.results?.[0] ?? {};
}

// Same as aggregateRow, but a failed query is logged and yields undefined
export async function optionalAggregateRow(
  client: OdsClient,
  datasetId: string,
  select: string,
  where?: string,
): Promise<OdsRecord | undefined> {
  try {
    return await aggregateRow(client, datasetId, select, where);
  } catch (e) {
    console.error(`[ods] Aggregate "${select}" failed for ${datasetId}: ${errorMessage(e)}`);
    return undefined;
  }
}
