import type { FeatureTable } from "../config/types";

export const SEARCH_INDEX_VERSION = 1;

export interface SearchSettings {
  maxTermsPerDoc: number;
  minTokenLen: number;
  /** Drop tokens found in at least this share of documents, 0..1 */
  dropDfRatio: number;
  /** Drop tokens found in this many documents or fewer */
  dropDfMin: number;
  weightBody: number;
  weightTitle: number;
  weightTags: number;
  normalizeByDocLen: boolean;
}

export const DEFAULT_SEARCH_SETTINGS: SearchSettings = {
  maxTermsPerDoc: 300,
  minTokenLen: 2,
  dropDfRatio: 0.7,
  dropDfMin: 0,
  weightBody: 1.0,
  weightTitle: 8.0,
  weightTags: 6.0,
  normalizeByDocLen: true,
};

function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return null;
}

function floatSetting(table: FeatureTable, key: string, fallback: number): number {
  return toNumber(table[key]) ?? fallback;
}

function intSetting(table: FeatureTable, key: string, fallback: number, minimum: number): number {
  const value = toNumber(table[key]);
  return Math.max(minimum, value === null ? fallback : Math.trunc(value));
}

/**
 * Read the [search] table. Out-of-range values are clamped and unparsable
 * ones fall back to their defaults; nothing here throws.
 */
export function resolveSearchSettings(table: FeatureTable): SearchSettings {
  const defaults = DEFAULT_SEARCH_SETTINGS;
  const ratio = floatSetting(table, "drop_df_ratio", defaults.dropDfRatio);

  return {
    maxTermsPerDoc: intSetting(table, "max_terms_per_doc", defaults.maxTermsPerDoc, 1),
    minTokenLen: intSetting(table, "min_token_len", defaults.minTokenLen, 1),
    dropDfRatio: Math.min(Math.max(ratio, 0), 1),
    dropDfMin: intSetting(table, "drop_df_min", defaults.dropDfMin, 0),
    weightBody: floatSetting(table, "weight_body", defaults.weightBody),
    weightTitle: floatSetting(table, "weight_title", defaults.weightTitle),
    weightTags: floatSetting(table, "weight_tags", defaults.weightTags),
    normalizeByDocLen: Boolean(table.normalize_by_doc_len ?? defaults.normalizeByDocLen),
  };
}
