import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { CatalogRepository } from "../catalogRepository";
import { IN_MEMORY, openDatabase } from "../../db/connection";
import { runMigrations } from "../../db/migrate";
import { oneHot, silentLogger } from "../../test/fixtures";

describe("CatalogRepository", () => {
  let db: Database.Database;
  let repo: CatalogRepository;

  beforeEach(() => {
    db = openDatabase(IN_MEMORY);
    runMigrations(db, silentLogger());
    repo = new CatalogRepository(db, silentLogger());
  });

  afterEach(() => {
    db.close();
  });

  const seed = () => {
    const aspirin = repo.insertDrug({
      license_number: "LIC-001",
      chinese_name: "阿司匹林",
      english_name: "Aspirin",
      shape: "round",
      color: "white",
      label_front: "ASP",
    });
    const ibuprofen = repo.insertDrug({
      license_number: "LIC-002",
      chinese_name: "布洛芬",
      english_name: "Ibuprofen",
      shape: "oval",
      color: "orange",
      mark: "IBU",
      label_back: "IBU 200",
    });
    const back = repo.insertImage({
      drug_id: aspirin,
      image_filename: "aspirin_back.jpg",
      image_path: "aspirin/back.jpg",
      image_order: 2,
      feature_vector: oneHot(1),
    });
    const front = repo.insertImage({
      drug_id: aspirin,
      image_filename: "aspirin_front.jpg",
      image_path: "aspirin/front.jpg",
      image_order: 1,
      feature_vector: oneHot(0),
    });
    const pending = repo.insertImage({
      drug_id: ibuprofen,
      image_filename: "ibuprofen.jpg",
      image_path: "ibuprofen/front.jpg",
    });
    return { aspirin, ibuprofen, back, front, pending };
  };

  describe("getCatalogSnapshot", () => {
    it("returns images with descriptors in drug and image order", async () => {
      const { aspirin, back, front } = seed();

      const rows = await repo.getCatalogSnapshot();

      expect(rows).toEqual([
        { drug_id: aspirin, image_id: front, feature_vector: oneHot(0), shape: "round", color: "white" },
        { drug_id: aspirin, image_id: back, feature_vector: oneHot(1), shape: "round", color: "white" },
      ]);
    });

    it("skips descriptors that are not number arrays", async () => {
      const { ibuprofen } = seed();
      const broken = repo.insertImage({ drug_id: ibuprofen, image_filename: "x.jpg", image_path: "x.jpg" });
      const strings = repo.insertImage({ drug_id: ibuprofen, image_filename: "y.jpg", image_path: "y.jpg" });
      db.prepare("UPDATE drug_images SET feature_vector = ? WHERE id = ?").run("{not json", broken);
      db.prepare("UPDATE drug_images SET feature_vector = ? WHERE id = ?").run('["a","b"]', strings);

      const rows = await repo.getCatalogSnapshot();

      expect(rows.map((row) => row.drug_id)).not.toContain(ibuprofen);
      expect(rows).toHaveLength(2);
    });
  });

  describe("getDrugById", () => {
    it("returns the drug with its image filenames in order", async () => {
      const { ibuprofen, aspirin } = seed();

      await expect(repo.getDrugById(aspirin)).resolves.toEqual({
        id: aspirin,
        license_number: "LIC-001",
        chinese_name: "阿司匹林",
        english_name: "Aspirin",
        shape: "round",
        color: "white",
        special_dosage_form: null,
        mark: null,
        images: ["aspirin_front.jpg", "aspirin_back.jpg"],
      });
      await expect(repo.getDrugById(ibuprofen)).resolves.toMatchObject({ mark: "IBU", images: ["ibuprofen.jpg"] });
    });

    it("returns null for an unknown id", async () => {
      await expect(repo.getDrugById(999)).resolves.toBeNull();
    });
  });

  it("lists drug names by id", async () => {
    const { aspirin, ibuprofen } = seed();

    await expect(repo.listDrugNames()).resolves.toEqual([
      { id: aspirin, chinese_name: "阿司匹林", english_name: "Aspirin" },
      { id: ibuprofen, chinese_name: "布洛芬", english_name: "Ibuprofen" },
    ]);
  });

  describe("searchByName", () => {
    it("puts prefix matches ahead of substring matches", () => {
      const baby = repo.insertDrug({ license_number: "LIC-010", chinese_name: "小儿阿司匹林", english_name: "Baby Aspirin" });
      const plain = repo.insertDrug({ license_number: "LIC-011", chinese_name: "阿司匹林", english_name: "Aspirin" });

      expect(repo.searchByName("aspirin", 10).map((drug) => drug.id)).toEqual([plain, baby]);
      expect(repo.searchByName("阿司", 10).map((drug) => drug.id)).toEqual([plain, baby]);
      expect(repo.searchByName("aspirin", 1).map((drug) => drug.id)).toEqual([plain]);
    });

    it("treats LIKE wildcards literally", () => {
      const literal = repo.insertDrug({ license_number: "LIC-020", chinese_name: "维生素", english_name: "100%_C" });
      repo.insertDrug({ license_number: "LIC-021", chinese_name: "钙片", english_name: "Calcium" });

      expect(repo.searchByName("%", 10).map((drug) => drug.id)).toEqual([literal]);
      expect(repo.searchByName("_", 10).map((drug) => drug.id)).toEqual([literal]);
    });

    it("returns nothing for a blank query", () => {
      seed();
      expect(repo.searchByName("   ", 10)).toEqual([]);
    });
  });

  describe("searchByFeatures", () => {
    const ids = (hits: Array<{ id: number }>) => hits.map((hit) => hit.id);

    it("returns matching drugs with their image counts", () => {
      const { aspirin } = seed();

      expect(repo.searchByFeatures({ shape: "round", limit: 20 })).toEqual([
        {
          id: aspirin,
          license_number: "LIC-001",
          chinese_name: "阿司匹林",
          english_name: "Aspirin",
          shape: "round",
          color: "white",
          mark: null,
          label_front: "ASP",
          label_back: null,
          image_count: 2,
        },
      ]);
    });

    it("matches shape exactly but colour and imprint by substring", () => {
      const { aspirin, ibuprofen } = seed();

      expect(repo.searchByFeatures({ shape: "roun", limit: 20 })).toEqual([]);
      expect(ids(repo.searchByFeatures({ color: "rang", limit: 20 }))).toEqual([ibuprofen]);
      expect(ids(repo.searchByFeatures({ label: "200", limit: 20 }))).toEqual([ibuprofen]);
      expect(ids(repo.searchByFeatures({ label: "SP", limit: 20 }))).toEqual([aspirin]);
      expect(ids(repo.searchByFeatures({ shape: "oval", color: "white", limit: 20 }))).toEqual([]);
    });

    it("lists every drug by chinese name when no feature is given", () => {
      const { aspirin, ibuprofen } = seed();

      const hits = repo.searchByFeatures({ limit: 20 });

      expect(ids(hits)).toEqual([ibuprofen, aspirin]);
      expect(hits.map((hit) => hit.image_count)).toEqual([1, 2]);
      expect(ids(repo.searchByFeatures({ limit: 1 }))).toEqual([ibuprofen]);
    });

    it("treats LIKE wildcards in the colour literally", () => {
      seed();
      expect(repo.searchByFeatures({ color: "%", limit: 20 })).toEqual([]);
    });
  });

  describe("getStatistics", () => {
    it("counts drugs and images and ranks colours and shapes", () => {
      seed();
      repo.insertDrug({ license_number: "LIC-003", chinese_name: "维生素C", shape: "round", color: "white" });
      repo.insertDrug({ license_number: "LIC-004", chinese_name: "无色", color: "" });

      expect(repo.getStatistics()).toEqual({
        total_drugs: 4,
        total_images: 3,
        drugs_with_images: 2,
        color_distribution: [
          { color: "white", count: 2 },
          { color: "orange", count: 1 },
        ],
        shape_distribution: [
          { shape: "round", count: 2 },
          { shape: "oval", count: 1 },
        ],
      });
    });

    it("reports zeros for an empty catalog", () => {
      expect(repo.getStatistics()).toEqual({
        total_drugs: 0,
        total_images: 0,
        drugs_with_images: 0,
        color_distribution: [],
        shape_distribution: [],
      });
    });
  });

  describe("feature backfill support", () => {
    it("lists images without descriptors and stores new ones", () => {
      const { ibuprofen, pending } = seed();

      expect(repo.listImagesMissingFeatures()).toEqual([
        { id: pending, drug_id: ibuprofen, image_path: "ibuprofen/front.jpg" },
      ]);

      expect(repo.updateImageFeatures(pending, oneHot(2))).toBe(true);
      expect(repo.listImagesMissingFeatures()).toEqual([]);
      expect(repo.updateImageFeatures(999, oneHot(2))).toBe(false);
    });
  });

  it("rejects a duplicate license number", () => {
    seed();
    expect(() => repo.insertDrug({ license_number: "LIC-001", chinese_name: "重复" })).toThrow(/UNIQUE/);
  });

  it("removes a drug's images with the drug", async () => {
    const { aspirin } = seed();
    db.prepare("DELETE FROM drugs WHERE id = ?").run(aspirin);

    await expect(repo.getCatalogSnapshot()).resolves.toEqual([]);
  });
});
