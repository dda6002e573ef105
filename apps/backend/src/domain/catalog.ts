/** LBP histogram length: one bin per 8-bit neighbourhood code. */
export const FEATURE_DIMENSION = 256;

/** Normalized texture descriptor; entries are ≥ 0 and sum to 1. */
export type FeatureVector = readonly number[];

export type DrugId = number;

export interface CatalogEntry {
  drugId: DrugId;
  imageId: number;
  vector: FeatureVector;
  shape: string | null;
  color: string | null;
}

export interface CatalogSnapshot {
  version: number;
  builtAt: number;
  dimension: number;
  entries: readonly CatalogEntry[];
}

/** Row shape handed over by the persistence collaborator. */
export interface CatalogRow {
  drug_id: DrugId;
  image_id: number;
  feature_vector: FeatureVector;
  shape: string | null;
  color: string | null;
}

export interface DrugRecord {
  id: DrugId;
  license_number: string;
  chinese_name: string;
  english_name: string | null;
  shape: string | null;
  color: string | null;
  special_dosage_form: string | null;
  mark: string | null;
  images: string[];
}

export interface DrugNameEntry {
  id: DrugId;
  chinese_name: string;
  english_name: string | null;
}

/** Persistence boundary consumed by the catalog cache and result hydration. */
export interface CatalogSource {
  getCatalogSnapshot(): Promise<CatalogRow[]>;
  getDrugById(id: DrugId): Promise<DrugRecord | null>;
  listDrugNames(): Promise<DrugNameEntry[]>;
}

export interface SearchFilters {
  shape?: string;
  color?: string;
}

export interface RankedMatch {
  drugId: DrugId;
  score: number; // 0..1
  rank: number; // 1-based
}

export interface SimilarityResult extends RankedMatch {
  imageId: number;
}
