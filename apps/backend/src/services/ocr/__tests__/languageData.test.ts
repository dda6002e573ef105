import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { bundledLanguageFile, splitLangs, stageLanguageData } from "../languageData";
import { OCRUnavailableError } from "../../../domain/errors";

describe("splitLangs", () => {
  it("splits tesseract language codes and drops blanks", () => {
    expect(splitLangs("eng+chi_tra")).toEqual(["eng", "chi_tra"]);
    expect(splitLangs(" eng + ")).toEqual(["eng"]);
  });
});

describe("bundledLanguageFile", () => {
  it("reports a language with no installed package as OCR unavailable", () => {
    expect(() => bundledLanguageFile("zz_none")).toThrow(OCRUnavailableError);
    expect(() => bundledLanguageFile("zz_none")).toThrow('No language data installed for "zz_none"');
  });
});

describe("stageLanguageData", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "pillscan-langs-"));
    fs.mkdirSync(path.join(root, "packages"));
    fs.writeFileSync(path.join(root, "packages", "eng.gz"), "eng-data");
    fs.writeFileSync(path.join(root, "packages", "chi_tra.gz"), "chi-data");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("copies every language into one directory", async () => {
    const target = path.join(root, "staged", "tessdata");
    const locate = (lang: string) => path.join(root, "packages", `${lang}.gz`);

    await expect(stageLanguageData(["eng", "chi_tra"], target, locate)).resolves.toBe(target);

    expect(fs.readdirSync(target).sort()).toEqual(["chi_tra.traineddata.gz", "eng.traineddata.gz"]);
    expect(fs.readFileSync(path.join(target, "chi_tra.traineddata.gz"), "utf8")).toBe("chi-data");
  });

  it("fails when a language file is missing", async () => {
    const locate = (lang: string) => path.join(root, "packages", `${lang}.missing`);

    await expect(stageLanguageData(["eng"], path.join(root, "staged"), locate)).rejects.toThrow(/ENOENT/);
  });
});
