/**
 * RecordFormatter - one text line per matched pair
 *
 * Fields are space-separated: the 1-based pair index (indexed profiles
 * only), every label slot in profile order, the first value, the second
 * value.
 */

import { formatNumericValue } from "../../parsers/xml/utils/xmlValueParsing.js";

import type { ExtractionProfile, Pair } from "../../types/index.js";

export class RecordFormatter {
  private readonly profile: Pick<ExtractionProfile, "indexed" | "first" | "second">;

  constructor(profile: Pick<ExtractionProfile, "indexed" | "first" | "second">) {
    this.profile = profile;
  }

  formatPair(pair: Pair): string {
    const fields: string[] = [];
    if (this.profile.indexed) {
      fields.push(String(pair.index));
    }
    fields.push(...pair.labels);
    fields.push(formatNumericValue(pair.first, this.profile.first.kind));
    fields.push(formatNumericValue(pair.second, this.profile.second.kind));
    return fields.join(" ");
  }
}
