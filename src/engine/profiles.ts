/**
 * Profile lookup and validation.
 *
 * Built-in profiles live in constants/profiles.ts; extra ones come from the
 * `profiles` section of config.json and go through parseProfile() first.
 */

import { BUILTIN_PROFILES } from "../constants/profiles.js";

import { ProfileError } from "./errors.js";

import type {
  ExtractionProfile,
  LabelRule,
  LabelSource,
  NumericKind,
  SeriesRule,
} from "../types/index.js";

const NUMERIC_KINDS: readonly NumericKind[] = ["float", "integer"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ProfileError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function parseLabelSource(value: unknown, where: string): LabelSource {
  if (value === "text") {
    return "text";
  }
  if (isRecord(value)) {
    return { attribute: requireString(value, "attribute", `${where}.source`) };
  }
  throw new ProfileError(`${where}.source must be "text" or { "attribute": "<name>" }`);
}

function parseLabelRule(value: unknown, where: string): LabelRule {
  if (!isRecord(value)) {
    throw new ProfileError(`${where} must be an object`);
  }
  return {
    name: requireString(value, "name", where),
    element: requireString(value, "element", where),
    source: parseLabelSource(value["source"], where),
    sentinel: requireString(value, "sentinel", where),
  };
}

function parseSeriesRule(value: unknown, where: string): SeriesRule {
  if (!isRecord(value)) {
    throw new ProfileError(`${where} must be an object`);
  }
  const kind = value["kind"];
  const numericKind = NUMERIC_KINDS.find((candidate) => candidate === kind);
  if (numericKind === undefined) {
    throw new ProfileError(`${where}.kind must be one of: ${NUMERIC_KINDS.join(", ")}`);
  }
  return {
    name: requireString(value, "name", where),
    element: requireString(value, "element", where),
    kind: numericKind,
  };
}

/**
 * Build a profile from untrusted JSON. Throws ProfileError on the first
 * problem found, then runs the same checks as validateProfile().
 */
export function parseProfile(value: unknown): ExtractionProfile {
  if (!isRecord(value)) {
    throw new ProfileError("profile must be an object");
  }
  const name = requireString(value, "name", "profile");
  const where = `profile "${name}"`;

  const rawLabels = value["labels"] ?? [];
  if (!Array.isArray(rawLabels)) {
    throw new ProfileError(`${where}.labels must be an array`);
  }
  const rawSideChannel = value["sideChannel"] ?? [];
  if (!Array.isArray(rawSideChannel) || !rawSideChannel.every((entry): entry is string => typeof entry === "string")) {
    throw new ProfileError(`${where}.sideChannel must be an array of element names`);
  }

  const description = value["description"];
  const profile: ExtractionProfile = {
    name,
    description: typeof description === "string" ? description : "",
    blockElement: requireString(value, "blockElement", where),
    labels: rawLabels.map((label: unknown, i) => parseLabelRule(label, `${where}.labels[${i}]`)),
    first: parseSeriesRule(value["first"], `${where}.first`),
    second: parseSeriesRule(value["second"], `${where}.second`),
    sideChannel: rawSideChannel,
    indexed: value["indexed"] === true,
  };

  validateProfile(profile);
  return profile;
}

/**
 * Every element name may play exactly one role, since the dispatcher routes
 * by name alone.
 */
export function validateProfile(profile: ExtractionProfile): void {
  const errors: string[] = [];
  const roles = new Map<string, string>();

  const claim = (element: string, role: string): void => {
    if (element.trim() === "") {
      errors.push(`${role} has an empty element name`);
      return;
    }
    const existing = roles.get(element);
    if (existing !== undefined) {
      errors.push(`element "${element}" is used as both ${existing} and ${role}`);
      return;
    }
    roles.set(element, role);
  };

  claim(profile.blockElement, "block");
  profile.labels.forEach((label) => claim(label.element, `label "${label.name}"`));
  claim(profile.first.element, `first series "${profile.first.name}"`);
  claim(profile.second.element, `second series "${profile.second.name}"`);
  profile.sideChannel.forEach((element) => claim(element, "side channel"));

  if (errors.length > 0) {
    throw new ProfileError(`Invalid profile "${profile.name}":\n${errors.map((e) => `- ${e}`).join("\n")}`);
  }
}

export function listProfiles(extra: readonly ExtractionProfile[] = []): ExtractionProfile[] {
  const byName = new Map<string, ExtractionProfile>();
  for (const profile of [...BUILTIN_PROFILES, ...extra]) {
    byName.set(profile.name, profile);
  }
  return [...byName.values()];
}

export function resolveProfile(name: string, extra: readonly ExtractionProfile[] = []): ExtractionProfile {
  const profile = listProfiles(extra).find((candidate) => candidate.name === name);
  if (!profile) {
    const known = listProfiles(extra).map((candidate) => candidate.name).join(", ");
    throw new ProfileError(`Unknown profile "${name}". Known profiles: ${known}`);
  }
  return profile;
}
