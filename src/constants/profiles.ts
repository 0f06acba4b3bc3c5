import type { ExtractionProfile } from "../types/index.js";

export const UNKNOWN_SITE = "(unknown_site)";
export const UNKNOWN_DATE = "(unknown_date)";

// Traffic measurements: indexed speed / vehicle flow pairs per site
export const TRAFFIC_PROFILE: ExtractionProfile = {
  name: "traffic",
  description: "Speed and vehicle flow rate per measurement site",
  blockElement: "siteMeasurements",
  labels: [
    {
      name: "site",
      element: "measurementSiteReference",
      source: { attribute: "id" },
      sentinel: UNKNOWN_SITE,
    },
  ],
  first: { name: "speed", element: "speed", kind: "float" },
  second: { name: "flow", element: "vehicleFlowRate", kind: "integer" },
  sideChannel: ["publicationTime"],
  indexed: true,
};

// Measurement site table: coordinates per site record
export const SITES_PROFILE: ExtractionProfile = {
  name: "sites",
  description: "Latitude and longitude per measurement site record",
  blockElement: "measurementSiteTable",
  labels: [
    {
      name: "site",
      element: "measurementSiteRecord",
      source: { attribute: "id" },
      sentinel: UNKNOWN_SITE,
    },
    {
      name: "date",
      element: "measurementSiteRecordVersionTime",
      source: "text",
      sentinel: UNKNOWN_DATE,
    },
  ],
  first: { name: "latitude", element: "latitude", kind: "float" },
  second: { name: "longitude", element: "longitude", kind: "float" },
  sideChannel: ["publicationTime"],
  indexed: false,
};

export const BUILTIN_PROFILES: readonly ExtractionProfile[] = [TRAFFIC_PROFILE, SITES_PROFILE];
