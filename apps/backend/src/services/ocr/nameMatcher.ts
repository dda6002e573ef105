import type { DrugId, DrugNameEntry } from "../../domain/catalog";
import type { RecognizedText } from "./textRecognizer";

export interface NameMatch {
  drugId: DrugId;
  /** 0.6 × OCR confidence + 0.4 × name similarity */
  confidence: number;
  nameSimilarity: number;
  matchedText: string;
}

export interface FuzzyMatchOptions {
  minNameSimilarity?: number;
  /** Cap on matches kept per recognized line; unlimited when omitted. */
  perLine?: number;
}

const CONTAINMENT_SCORE = 0.9;
const OCR_WEIGHT = 0.6;
const NAME_WEIGHT = 0.4;

export const normalizeName = (value: string): string => value.toLowerCase().replace(/\s+/g, "");

/**
 * Name similarity: containment either way scores 0.9, otherwise the Jaccard
 * index over character sets.
 */
export function nameSimilarity(text: string, name: string): number {
  const a = normalizeName(text);
  const b = normalizeName(name);
  if (a.length === 0 || b.length === 0) return 0;
  if (a.includes(b) || b.includes(a)) return CONTAINMENT_SCORE;

  const setA = new Set(a);
  const setB = new Set(b);
  let shared = 0;
  for (const char of setA) {
    if (setB.has(char)) shared++;
  }
  return shared / (setA.size + setB.size - shared);
}

/**
 * Match recognized lines against the drug name index. Keeps the best match
 * per drug, sorted by confidence descending then drugId ascending.
 */
export function fuzzyMatch(
  texts: readonly RecognizedText[],
  nameIndex: readonly DrugNameEntry[],
  options: FuzzyMatchOptions = {}
): NameMatch[] {
  const minNameSimilarity = options.minNameSimilarity ?? 0.5;
  const best = new Map<DrugId, NameMatch>();

  for (const line of texts) {
    const lineMatches: NameMatch[] = [];
    for (const entry of nameIndex) {
      const similarity = Math.max(
        entry.chinese_name ? nameSimilarity(line.text, entry.chinese_name) : 0,
        entry.english_name ? nameSimilarity(line.text, entry.english_name) : 0
      );
      if (similarity < minNameSimilarity) continue;
      lineMatches.push({
        drugId: entry.id,
        confidence: OCR_WEIGHT * line.confidence + NAME_WEIGHT * similarity,
        nameSimilarity: similarity,
        matchedText: line.text,
      });
    }

    lineMatches.sort(byConfidence);
    const kept = options.perLine === undefined ? lineMatches : lineMatches.slice(0, options.perLine);
    for (const match of kept) {
      const previous = best.get(match.drugId);
      if (!previous || match.confidence > previous.confidence) {
        best.set(match.drugId, match);
      }
    }
  }

  return [...best.values()].sort(byConfidence);
}

const byConfidence = (a: NameMatch, b: NameMatch): number =>
  b.confidence - a.confidence || a.drugId - b.drugId;
