import type { Dataset } from "../../src/types/ods.js";

export const bikeDataset: Dataset = {
  dataset_id: "bike-counts",
  metas: {
    default: {
      title: "Bike Counts",
      publisher: "City of Example",
      description: "<p>Daily bicycle counts.</p><p>Updated nightly.</p>",
      theme: ["Transport", "Environment"],
      license: "Open License",
      records_count: 1200,
    },
  },
  fields: [
    { name: "site", label: "Counting site", type: "text", description: "Site name" },
    { name: "count", label: "Bikes", type: "int", description: "" },
    { name: "measured_on", label: "Measured on", type: "date" },
    { name: "location", label: "Location", type: "geo_point_2d" },
    { name: "flags", label: "Flags", type: "boolean", annotations: { facet: true } },
  ],
};

export const DATASET_PATH = "/catalog/datasets/bike-counts";
export const RECORDS_PATH = "/catalog/datasets/bike-counts/records";
