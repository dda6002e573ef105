/**
 * Text recognition adapter over tesseract.js.
 *
 * The worker is created on first use and reused. Language data comes from the
 * @tesseract.js-data packages, staged into one local directory before the
 * worker starts, so nothing is downloaded at run time.
 */

import type { Logger } from "pino";
import { createWorker, OEM, type Worker } from "tesseract.js";
import { OCRUnavailableError } from "../../domain/errors";
import { splitLangs, stageLanguageData } from "./languageData";

export interface RecognizedText {
  text: string;
  /** 0..1 */
  confidence: number;
}

export interface TextRecognizer {
  isAvailable(): boolean;
  recognizeText(imageBytes: Buffer): Promise<RecognizedText[]>;
  close(): Promise<void>;
}

export interface TesseractOptions {
  /** "+"-separated tesseract language codes, e.g. "eng+chi_tra". */
  langs: string;
  /** Directory the language data is staged into. */
  langDir: string;
  stage?: (langs: readonly string[], dir: string) => Promise<string>;
}

export class TesseractTextRecognizer implements TextRecognizer {
  private worker: Worker | null = null;
  private initializing: Promise<Worker> | null = null;
  private unavailable = false;
  private readonly langs: string;
  private readonly langDir: string;
  private readonly stage: (langs: readonly string[], dir: string) => Promise<string>;
  private readonly logger: Logger;

  constructor(options: TesseractOptions, logger: Logger) {
    this.langs = options.langs;
    this.langDir = options.langDir;
    this.stage = options.stage ?? stageLanguageData;
    this.logger = logger.child({ component: "text-recognizer" });
  }

  isAvailable(): boolean {
    return !this.unavailable;
  }

  async recognizeText(imageBytes: Buffer): Promise<RecognizedText[]> {
    const worker = await this.ensureWorker();
    const startTime = Date.now();
    const { data } = await worker.recognize(imageBytes);

    const lines = data.lines
      .map((line) => ({ text: line.text.trim(), confidence: clamp01(line.confidence / 100) }))
      .filter((line) => line.text.length > 0);

    this.logger.debug({ lines: lines.length, durationMs: Date.now() - startTime }, "OCR pass complete");
    return lines;
  }

  async close(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    if (worker) {
      await worker.terminate();
    }
  }

  private async ensureWorker(): Promise<Worker> {
    if (this.unavailable) {
      throw new OCRUnavailableError();
    }
    if (this.worker) {
      return this.worker;
    }

    this.initializing ??= this.startWorker();
    try {
      this.worker = await this.initializing;
      this.logger.info({ langs: this.langs }, "Tesseract worker initialized");
      return this.worker;
    } catch (error) {
      this.unavailable = true;
      this.logger.error({ err: error, langs: this.langs }, "Tesseract worker failed to start");
      throw new OCRUnavailableError("Text recognition engine failed to start", { cause: error });
    } finally {
      this.initializing = null;
    }
  }

  private async startWorker(): Promise<Worker> {
    const langPath = await this.stage(splitLangs(this.langs), this.langDir);
    return createWorker(this.langs, OEM.LSTM_ONLY, { langPath, gzip: true, cacheMethod: "none" });
  }
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));
