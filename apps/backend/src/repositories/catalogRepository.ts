import type Database from "better-sqlite3";
import type { Logger } from "pino";
import { z } from "zod";
import type {
  CatalogRow,
  CatalogSource,
  DrugId,
  DrugNameEntry,
  DrugRecord,
  FeatureVector,
} from "../domain/catalog";

// ============================================================================
// Types
// ============================================================================

export interface DrugInput {
  license_number: string;
  chinese_name: string;
  english_name?: string | null;
  shape?: string | null;
  color?: string | null;
  special_dosage_form?: string | null;
  mark?: string | null;
  label_front?: string | null;
  label_back?: string | null;
}

export interface ImageInput {
  drug_id: DrugId;
  image_filename: string;
  image_path: string;
  image_order?: number;
  feature_vector?: FeatureVector | null;
}

export interface FeatureSearchCriteria {
  /** Exact match, so "round" never matches "oval-round". */
  shape?: string;
  /** Substring match. */
  color?: string;
  /** Substring match against either face's imprint. */
  label?: string;
  limit: number;
}

export interface FeatureSearchHit {
  id: DrugId;
  license_number: string;
  chinese_name: string;
  english_name: string | null;
  shape: string | null;
  color: string | null;
  mark: string | null;
  label_front: string | null;
  label_back: string | null;
  image_count: number;
}

export interface CatalogStatistics {
  total_drugs: number;
  total_images: number;
  drugs_with_images: number;
  color_distribution: Array<{ color: string; count: number }>;
  shape_distribution: Array<{ shape: string; count: number }>;
}

/** Most common values reported per distribution. */
export const DISTRIBUTION_LIMIT = 10;

export interface PendingImage {
  id: number;
  drug_id: DrugId;
  image_path: string;
}

interface SnapshotRow {
  image_id: number;
  drug_id: DrugId;
  feature_vector: string;
  shape: string | null;
  color: string | null;
}

type DrugRow = Omit<DrugRecord, "images">;

const featureVectorSchema = z.array(z.number());

// ============================================================================
// Repository
// ============================================================================

export class CatalogRepository implements CatalogSource {
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "catalog-repository" });
  }

  /**
   * Every image that carries a stored descriptor, joined with its drug's shape
   * and colour. Rows whose descriptor is not a JSON number array are skipped.
   */
  async getCatalogSnapshot(): Promise<CatalogRow[]> {
    const rows = this.db
      .prepare<[], SnapshotRow>(
        `SELECT di.id AS image_id, di.drug_id, di.feature_vector, d.shape, d.color
         FROM drug_images di
         JOIN drugs d ON d.id = di.drug_id
         WHERE di.feature_vector IS NOT NULL
         ORDER BY di.drug_id, di.image_order, di.id`
      )
      .all();

    const catalog: CatalogRow[] = [];
    let malformed = 0;
    for (const row of rows) {
      const vector = parseFeatureVector(row.feature_vector);
      if (!vector) {
        malformed++;
        continue;
      }
      catalog.push({
        drug_id: row.drug_id,
        image_id: row.image_id,
        feature_vector: vector,
        shape: row.shape,
        color: row.color,
      });
    }

    if (malformed > 0) {
      this.logger.warn({ malformed }, "Skipped drug images with malformed feature vectors");
    }
    return catalog;
  }

  async getDrugById(id: DrugId): Promise<DrugRecord | null> {
    const drug = this.db
      .prepare<{ id: DrugId }, DrugRow>(
        `SELECT id, license_number, chinese_name, english_name, shape, color, special_dosage_form, mark
         FROM drugs WHERE id = @id`
      )
      .get({ id });
    if (!drug) {
      return null;
    }

    const images = this.db
      .prepare<{ id: DrugId }, { image_filename: string }>(
        `SELECT image_filename FROM drug_images WHERE drug_id = @id ORDER BY image_order, id`
      )
      .all({ id })
      .map((row) => row.image_filename);

    return { ...drug, images };
  }

  async listDrugNames(): Promise<DrugNameEntry[]> {
    return this.db
      .prepare<[], DrugNameEntry>(`SELECT id, chinese_name, english_name FROM drugs ORDER BY id`)
      .all();
  }

  /**
   * Substring search over chinese and english names, exact-prefix hits first.
   */
  searchByName(query: string, limit: number): DrugNameEntry[] {
    const term = query.trim();
    if (!term) return [];
    const escaped = escapeLike(term);
    return this.db
      .prepare<{ contains: string; prefix: string; limit: number }, DrugNameEntry>(
        `SELECT id, chinese_name, english_name FROM drugs
         WHERE chinese_name LIKE @contains ESCAPE '\\' OR english_name LIKE @contains ESCAPE '\\'
         ORDER BY (chinese_name LIKE @prefix ESCAPE '\\' OR english_name LIKE @prefix ESCAPE '\\') DESC, id
         LIMIT @limit`
      )
      .all({ contains: `%${escaped}%`, prefix: `${escaped}%`, limit });
  }

  searchByFeatures(criteria: FeatureSearchCriteria): FeatureSearchHit[] {
    const conditions: string[] = [];
    const params: Record<string, string | number> = { limit: criteria.limit };

    if (criteria.shape) {
      conditions.push("d.shape = @shape");
      params.shape = criteria.shape;
    }
    if (criteria.color) {
      conditions.push("d.color LIKE @color ESCAPE '\\'");
      params.color = `%${escapeLike(criteria.color)}%`;
    }
    if (criteria.label) {
      conditions.push("(d.label_front LIKE @label ESCAPE '\\' OR d.label_back LIKE @label ESCAPE '\\')");
      params.label = `%${escapeLike(criteria.label)}%`;
    }

    const where = conditions.length > 0 ? conditions.join(" AND ") : "1 = 1";
    return this.db
      .prepare<Record<string, string | number>, FeatureSearchHit>(
        `SELECT d.id, d.license_number, d.chinese_name, d.english_name, d.shape, d.color, d.mark,
                d.label_front, d.label_back, COUNT(di.id) AS image_count
         FROM drugs d
         LEFT JOIN drug_images di ON di.drug_id = d.id
         WHERE ${where}
         GROUP BY d.id
         ORDER BY d.chinese_name, d.id
         LIMIT @limit`
      )
      .all(params);
  }

  getStatistics(): CatalogStatistics {
    const count = (sql: string): number => this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

    return {
      total_drugs: count(`SELECT COUNT(*) AS count FROM drugs`),
      total_images: count(`SELECT COUNT(*) AS count FROM drug_images`),
      drugs_with_images: count(`SELECT COUNT(DISTINCT drug_id) AS count FROM drug_images`),
      color_distribution: this.db
        .prepare<{ limit: number }, { color: string; count: number }>(
          `SELECT color, COUNT(*) AS count FROM drugs
           WHERE color IS NOT NULL AND color != ''
           GROUP BY color
           ORDER BY count DESC, color
           LIMIT @limit`
        )
        .all({ limit: DISTRIBUTION_LIMIT }),
      shape_distribution: this.db
        .prepare<{ limit: number }, { shape: string; count: number }>(
          `SELECT shape, COUNT(*) AS count FROM drugs
           WHERE shape IS NOT NULL AND shape != ''
           GROUP BY shape
           ORDER BY count DESC, shape
           LIMIT @limit`
        )
        .all({ limit: DISTRIBUTION_LIMIT }),
    };
  }

  listImagesMissingFeatures(): PendingImage[] {
    return this.db
      .prepare<[], PendingImage>(
        `SELECT id, drug_id, image_path FROM drug_images
         WHERE feature_vector IS NULL
         ORDER BY drug_id, image_order, id`
      )
      .all();
  }

  updateImageFeatures(imageId: number, vector: FeatureVector): boolean {
    const result = this.db
      .prepare(`UPDATE drug_images SET feature_vector = @feature_vector WHERE id = @id`)
      .run({ id: imageId, feature_vector: JSON.stringify(vector) });
    return result.changes > 0;
  }

  insertDrug(input: DrugInput): DrugId {
    const result = this.db
      .prepare(
        `INSERT INTO drugs (license_number, chinese_name, english_name, shape, color, special_dosage_form, mark,
                            label_front, label_back)
         VALUES (@license_number, @chinese_name, @english_name, @shape, @color, @special_dosage_form, @mark,
                 @label_front, @label_back)`
      )
      .run({
        license_number: input.license_number,
        chinese_name: input.chinese_name,
        english_name: input.english_name ?? null,
        shape: input.shape ?? null,
        color: input.color ?? null,
        special_dosage_form: input.special_dosage_form ?? null,
        mark: input.mark ?? null,
        label_front: input.label_front ?? null,
        label_back: input.label_back ?? null,
      });
    return Number(result.lastInsertRowid);
  }

  insertImage(input: ImageInput): number {
    const result = this.db
      .prepare(
        `INSERT INTO drug_images (drug_id, image_filename, image_path, image_order, feature_vector)
         VALUES (@drug_id, @image_filename, @image_path, @image_order, @feature_vector)`
      )
      .run({
        drug_id: input.drug_id,
        image_filename: input.image_filename,
        image_path: input.image_path,
        image_order: input.image_order ?? 1,
        feature_vector: input.feature_vector ? JSON.stringify(input.feature_vector) : null,
      });
    return Number(result.lastInsertRowid);
  }
}

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (char) => `\\${char}`);

const parseFeatureVector = (raw: string): FeatureVector | null => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = featureVectorSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
};
