/**
 * Tesseract language data shipped as npm packages (@tesseract.js-data/<lang>).
 *
 * tesseract.js reads every language from a single langPath, while each
 * package keeps its file in its own directory. stageLanguageData copies the
 * requested languages side by side so one langPath covers them all.
 */

import fs from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { OCRUnavailableError } from "../../domain/errors";

/** LSTM-only integer model, the variant tesseract.js loads by default. */
export const TRAINEDDATA_VARIANT = "4.0.0_best_int";

const require = createRequire(import.meta.url);

export type LanguageLocator = (lang: string) => string;

export const splitLangs = (langs: string): string[] =>
  langs
    .split("+")
    .map((lang) => lang.trim())
    .filter((lang) => lang.length > 0);

/** Path of the gzipped traineddata inside the language's npm package. */
export function bundledLanguageFile(lang: string): string {
  let manifest: string;
  try {
    manifest = require.resolve(`@tesseract.js-data/${lang}/package.json`);
  } catch (error) {
    throw new OCRUnavailableError(`No language data installed for "${lang}" (@tesseract.js-data/${lang})`, {
      cause: error,
    });
  }
  return path.join(path.dirname(manifest), TRAINEDDATA_VARIANT, `${lang}.traineddata.gz`);
}

/**
 * Copy `<lang>.traineddata.gz` for each language into `dir` and return it,
 * ready to be passed as langPath with gzip enabled.
 */
export async function stageLanguageData(
  langs: readonly string[],
  dir: string,
  locate: LanguageLocator = bundledLanguageFile
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  for (const lang of langs) {
    await fs.copyFile(locate(lang), path.join(dir, `${lang}.traineddata.gz`));
  }
  return dir;
}
