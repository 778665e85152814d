import { beforeEach, describe, it, expect } from "vitest";
import {
  analyzeDateField,
  analyzeNumericField,
  analyzeTextField,
  generateDatasetStatistics,
  summarizeDataset,
} from "../src/tools/analysis/index.js";
import { monthName } from "../src/tools/analysis/date-field.js";
import { groupFields } from "../src/tools/analysis/statistics.js";
import { InvalidArgumentError } from "../src/types/tools.js";
import { bikeDataset, DATASET_PATH, RECORDS_PATH } from "./helpers/fixtures.js";
import { stubOds, usePortalEnv, type StubRoute } from "./helpers/ods-stub.js";

beforeEach(() => {
  usePortalEnv();
});

const datasetRoute: StubRoute = { path: DATASET_PATH, body: bikeDataset };

function aggregate(select: string, row: Record<string, unknown>, where?: string): StubRoute {
  return {
    path: RECORDS_PATH,
    params: where === undefined ? { select } : { select, where },
    body: { results: [row] },
  };
}

describe("summarize_dataset", () => {
  it("reports metadata, schema and samples", async () => {
    stubOds([
      datasetRoute,
      { path: RECORDS_PATH, params: { limit: "5" }, body: { results: [{ site: "North Bridge", count: 42 }] } },
    ]);

    const result = await summarizeDataset.handler({ dataset_id: "bike-counts" });

    expect(result.content[0].text).toBe(
      [
        "# Dataset Summary: Bike Counts",
        "",
        "## Basic Information",
        "- **Dataset ID**: bike-counts",
        "- **Publisher**: City of Example",
        "- **Theme**: Transport",
        "- **License**: Open License",
        "- **Records Count**: 1200",
        "",
        "## Description",
        "Daily bicycle counts. Updated nightly.",
        "",
        "## Schema (5 fields)",
        "- **Counting site** (site): text",
        "- **Bikes** (count): int",
        "- **Measured on** (measured_on): date",
        "- **Location** (location): geo_point_2d",
        "- **Flags** (flags): boolean",
        "",
        "## Field Type Distribution",
        "- text: 1 fields",
        "- int: 1 fields",
        "- date: 1 fields",
        "- geo_point_2d: 1 fields",
        "- boolean: 1 fields",
        "",
        "## Sample Records (1 of 1200)",
        "",
        "### Record 1",
        "- **site**: North Bridge",
        "- **count**: 42",
      ].join("\n"),
    );
  });

  it("leaves out samples that cannot be fetched", async () => {
    stubOds([datasetRoute]);
    const result = await summarizeDataset.handler({ dataset_id: "bike-counts" });
    expect(result.isError).toBeUndefined();
    expect(result.content[0].text).not.toContain("## Sample Records");
  });

  it("fails when the dataset is missing", async () => {
    stubOds([]);
    const result = await summarizeDataset.handler({ dataset_id: "missing" });
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toMatch(/^Error retrieving dataset information: ODS API error: 404 Not Found/);
  });
});

describe("analyze_numeric_field", () => {
  const statsSelect = "min(count) as min, max(count) as max, avg(count) as avg, count(count) as count";

  it("computes basic statistics and a ten-bucket distribution", async () => {
    const { calls } = stubOds([
      datasetRoute,
      aggregate(statsSelect, { min: 0, max: 100, avg: 37.5, count: 1200 }),
      aggregate("count(*) as count", { count: 7 }, "count >= 90 AND count <= 100"),
      aggregate("count(*) as count", { count: 3 }),
    ]);

    const result = await analyzeNumericField.handler({ dataset_id: "bike-counts", field_name: "count" });

    const rows = Array.from({ length: 9 }, (_, i) => `| ${(i * 10).toFixed(2)} - ${(i * 10 + 10).toFixed(2)} | 3 |`);
    expect(result.content[0].text).toBe(
      [
        "# Analysis of Bikes (count)",
        "",
        "Dataset: Bike Counts (ID: bike-counts)",
        "",
        "## Basic Statistics",
        "- **Count**: 1200",
        "- **Minimum**: 0",
        "- **Maximum**: 100",
        "- **Average**: 37.5",
        "",
        "## Value Distribution",
        "| Range | Count |",
        "| --- | --- |",
        ...rows,
        "| 90.00 - 100.00 | 7 |",
      ].join("\n"),
    );
    // dataset + stats + 10 buckets
    expect(calls).toHaveLength(12);
    expect(calls.map((c) => c.searchParams.get("where"))).toContain("count >= 0 AND count < 10");
  });

  it("skips the distribution when all values are equal", async () => {
    const { calls } = stubOds([datasetRoute, aggregate(statsSelect, { min: 4, max: 4, avg: 4, count: 10 })]);
    const result = await analyzeNumericField.handler({ dataset_id: "bike-counts", field_name: "count" });
    expect(result.content[0].text).not.toContain("## Value Distribution");
    expect(calls).toHaveLength(2);
  });

  it("explains a wrong field type", async () => {
    stubOds([datasetRoute]);
    const result = await analyzeNumericField.handler({ dataset_id: "bike-counts", field_name: "site" });
    expect(result).toEqual({
      content: [{ type: "text", text: "Field 'site' is not a numeric field (type: text)." }],
    });
  });

  it("explains an unknown field", async () => {
    stubOds([datasetRoute]);
    const result = await analyzeNumericField.handler({ dataset_id: "bike-counts", field_name: "riders" });
    expect(result.content[0].text).toBe("Field 'riders' not found in dataset 'bike-counts'.");
  });

  it("refuses field names that are not identifiers", async () => {
    await expect(
      analyzeNumericField.handler({ dataset_id: "bike-counts", field_name: "count) as x, sum(count" }),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
  });
});

describe("analyze_text_field", () => {
  const frequencyRoute: StubRoute = {
    path: RECORDS_PATH,
    params: { select: "site, count(*) as value_count", group_by: "site", order_by: "value_count DESC" },
    body: {
      results: [
        { site: "North Bridge", value_count: 300 },
        { site: "Harbour", value_count: 100 },
      ],
    },
  };

  it("lists top values with their share of all records", async () => {
    const { calls } = stubOds([
      datasetRoute,
      frequencyRoute,
      aggregate("count(*) as total", { total: 1200 }),
      aggregate("count(distinct site) as distinct_count", { distinct_count: 14 }),
    ]);

    const result = await analyzeTextField.handler({ dataset_id: "bike-counts", field_name: "site" });

    expect(result.content[0].text).toBe(
      [
        "# Analysis of Counting site (site)",
        "",
        "Dataset: Bike Counts (ID: bike-counts)",
        "",
        "## Basic Statistics",
        "- **Total Records**: 1200",
        "- **Distinct Values**: 14",
        "",
        "## Top 2 Values by Frequency",
        "| Value | Count | Percentage |",
        "| --- | --- | --- |",
        "| North Bridge | 300 | 25.00% |",
        "| Harbour | 100 | 8.33% |",
      ].join("\n"),
    );
    expect(calls[1].searchParams.get("limit")).toBe("20");
  });

  it("keeps field values apart from their counts when the field is named count", async () => {
    const dataset = { ...bikeDataset, fields: [{ name: "count", label: "Count label", type: "text" }] };
    stubOds([
      { path: DATASET_PATH, body: dataset },
      {
        path: RECORDS_PATH,
        params: { select: "count, count(*) as value_count", group_by: "count" },
        body: { results: [{ count: "high", value_count: 30 }] },
      },
      aggregate("count(*) as total", { total: 120 }),
      aggregate("count(distinct count) as distinct_count", { distinct_count: 3 }),
    ]);

    const result = await analyzeTextField.handler({ dataset_id: "bike-counts", field_name: "count" });

    expect(result.content[0].text.split("\n")).toContain("| high | 30 | 25.00% |");
  });

  it("shows Unknown when the totals cannot be computed", async () => {
    stubOds([datasetRoute, frequencyRoute]);

    const result = await analyzeTextField.handler({ dataset_id: "bike-counts", field_name: "site", limit: 2 });
    const lines = result.content[0].text.split("\n");

    expect(lines).toContain("- **Total Records**: Unknown");
    expect(lines).toContain("- **Distinct Values**: Unknown");
    expect(lines).toContain("| North Bridge | 300 | N/A |");
  });

  it("explains a non-text field", async () => {
    stubOds([datasetRoute]);
    const result = await analyzeTextField.handler({ dataset_id: "bike-counts", field_name: "count" });
    expect(result.content[0].text).toBe("Field 'count' is not a text field (type: int).");
  });
});

describe("analyze_date_field", () => {
  it("reports the range and yearly and monthly distributions", async () => {
    stubOds([
      datasetRoute,
      aggregate(
        "min(measured_on) as min_date, max(measured_on) as max_date, count(measured_on) as count",
        { min_date: "2023-01-05", max_date: "2024-02-10", count: 1100 },
      ),
      {
        path: RECORDS_PATH,
        params: { select: "year(measured_on) as year, count(*) as count", group_by: "year(measured_on)" },
        body: {
          results: [
            { year: 2023, count: 600 },
            { year: 2024, count: 500 },
          ],
        },
      },
      {
        path: RECORDS_PATH,
        params: { where: "year(measured_on) = 2024" },
        body: {
          results: [
            { month: 1, count: 300 },
            { month: 2, count: 200 },
          ],
        },
      },
      { path: RECORDS_PATH, params: { where: "year(measured_on) = 2023" }, body: { results: [] } },
    ]);

    const result = await analyzeDateField.handler({ dataset_id: "bike-counts", field_name: "measured_on" });

    expect(result.content[0].text).toBe(
      [
        "# Analysis of Measured on (measured_on)",
        "",
        "Dataset: Bike Counts (ID: bike-counts)",
        "",
        "## Basic Statistics",
        "- **Count**: 1100",
        "- **Earliest Date**: 2023-01-05",
        "- **Latest Date**: 2024-02-10",
        "",
        "## Distribution by Year",
        "| Year | Count |",
        "| --- | --- |",
        "| 2023 | 600 |",
        "| 2024 | 500 |",
        "",
        "## Monthly Distribution (Last 1 Years)",
        "",
        "### 2024",
        "| Month | Count |",
        "| --- | --- |",
        "| January | 300 |",
        "| February | 200 |",
      ].join("\n"),
    );
  });

  it("keeps the other years when one month query fails", async () => {
    stubOds([
      datasetRoute,
      aggregate(
        "min(measured_on) as min_date, max(measured_on) as max_date, count(measured_on) as count",
        { min_date: "2023-01-05", max_date: "2024-02-10", count: 1100 },
      ),
      {
        path: RECORDS_PATH,
        params: { select: "year(measured_on) as year, count(*) as count" },
        body: {
          results: [
            { year: 2023, count: 600 },
            { year: 2024, count: 500 },
          ],
        },
      },
      {
        path: RECORDS_PATH,
        params: { where: "year(measured_on) = 2023" },
        status: 500,
        body: { error_code: "InternalError", message: "boom" },
      },
      { path: RECORDS_PATH, params: { where: "year(measured_on) = 2024" }, body: { results: [{ month: 3, count: 500 }] } },
    ]);

    const result = await analyzeDateField.handler({ dataset_id: "bike-counts", field_name: "measured_on" });
    const text = result.content[0].text;

    expect(result.isError).toBeUndefined();
    expect(text).toContain(
      ["## Monthly Distribution (Last 1 Years)", "", "### 2024", "| Month | Count |", "| --- | --- |", "| March | 500 |"].join(
        "\n",
      ),
    );
    expect(text).not.toContain("### 2023");
  });

  it("accepts datetime fields and stops after the basic statistics without years", async () => {
    const dataset = {
      ...bikeDataset,
      fields: [{ name: "seen_at", label: "Seen at", type: "datetime" }],
    };
    stubOds([
      { path: DATASET_PATH, body: dataset },
      aggregate("min(seen_at) as min_date, max(seen_at) as max_date, count(seen_at) as count", {
        min_date: null,
        max_date: null,
        count: 0,
      }),
    ]);

    const result = await analyzeDateField.handler({ dataset_id: "bike-counts", field_name: "seen_at" });
    const lines = result.content[0].text.split("\n");

    expect(lines).toContain("- **Earliest Date**: N/A");
    expect(lines[lines.length - 1]).toBe("- **Latest Date**: N/A");
  });

  it("names months and passes other values through", () => {
    expect(monthName(2)).toBe("February");
    expect(monthName(12)).toBe("December");
    expect(monthName(13)).toBe("13");
    expect(monthName(null)).toBe("");
  });
});

describe("generate_dataset_statistics", () => {
  it("groups fields by type", () => {
    const groups = groupFields(bikeDataset.fields ?? []);
    expect(Object.fromEntries(Object.entries(groups).map(([k, v]) => [k, v.map((f) => f.name)]))).toEqual({
      numeric: ["count"],
      text: ["site"],
      date: ["measured_on"],
      geo: ["location"],
      other: ["flags"],
    });
  });

  it("reports per-type statistics with fill rates", async () => {
    stubOds([
      datasetRoute,
      aggregate("count(*) as total", { total: 1000 }),
      aggregate(
        "min(count) as min_count, max(count) as max_count, avg(count) as avg_count, count(count) as count_count",
        { min_count: 0, max_count: 100, avg_count: 37.5, count_count: 990 },
      ),
      aggregate("count(distinct site) as distinct_count, count(site) as count", { distinct_count: 14, count: 1000 }),
      aggregate(
        "min(measured_on) as min_date, max(measured_on) as max_date, count(measured_on) as count",
        { min_date: "2023-01-05", max_date: "2024-02-10", count: 500 },
      ),
    ]);

    const result = await generateDatasetStatistics.handler({ dataset_id: "bike-counts" });

    expect(result.content[0].text).toBe(
      [
        "# Dataset Statistics: Bike Counts",
        "",
        "Dataset ID: bike-counts",
        "",
        "## Field Count by Type",
        "- **Numeric Fields**: 1",
        "- **Text Fields**: 1",
        "- **Date Fields**: 1",
        "- **Geographic Fields**: 1",
        "- **Other Fields**: 1",
        "",
        "## Detailed Field Information",
        "",
        "### Numeric Fields",
        "| Field | Type | Count | Min | Max | Average |",
        "| --- | --- | --- | --- | --- | --- |",
        "| Bikes (count) | int | 990 | 0 | 100 | 37.5 |",
        "",
        "### Text Fields",
        "| Field | Distinct Values | Fill Rate |",
        "| --- | --- | --- |",
        "| Counting site (site) | 14 | 100.00% |",
        "",
        "### Date Fields",
        "| Field | Earliest Date | Latest Date | Fill Rate |",
        "| --- | --- | --- | --- |",
        "| Measured on (measured_on) | 2023-01-05 | 2024-02-10 | 50.00% |",
        "",
        "### Geographic Fields",
        "| Field | Type | Fill Rate |",
        "| --- | --- | --- |",
        "| Location (location) | geo_point_2d | N/A |",
        "",
        "### Other Fields",
        "| Field | Type |",
        "| --- | --- |",
        "| Flags (flags) | boolean |",
      ].join("\n"),
    );
  });

  it("reports datasets without fields", async () => {
    stubOds([{ path: DATASET_PATH, body: { dataset_id: "bike-counts" } }]);
    const result = await generateDatasetStatistics.handler({ dataset_id: "bike-counts" });
    expect(result.content[0].text).toBe("No fields found for dataset 'bike-counts'.");
  });
});
