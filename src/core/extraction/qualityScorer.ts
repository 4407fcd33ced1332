import type { ConversionOutput } from "../../ports/ConversionBackend";

export type QualityWeights = {
  length: number;
  structure: number;
  code: number;
  table: number;
};

export type QualityScorerConfig = {
  minTextLength: number;
  charsPerPage: { min: number; max: number };
  weights: QualityWeights;
};

export type QualityBreakdown = {
  length: number;
  structure: number;
  code: number;
  table: number;
  total: number;
};

export interface QualityScorer {
  score(output: ConversionOutput): number;
}

export const defaultQualityScorerConfig: QualityScorerConfig = {
  minTextLength: 50,
  charsPerPage: { min: 500, max: 2000 },
  weights: { length: 0.4, structure: 0.3, code: 0.15, table: 0.15 }
};

const NEUTRAL = 0.5;

const countMatches = (text: string, pattern: RegExp): number => text.match(pattern)?.length ?? 0;

/**
 * Length against what `pageCount` pages should hold. Inside the expected band
 * scores 1.0, under 100 chars/page scores 0.0, and everything else decays
 * linearly away from the band's midpoint. Neutral when the page count is unknown.
 */
export const lengthScore = (text: string, pageCount: number | undefined, band = defaultQualityScorerConfig.charsPerPage) => {
  if (pageCount == null || pageCount <= 0) return NEUTRAL;

  const perPage = text.length / pageCount;
  if (perPage >= band.min && perPage <= band.max) return 1;
  if (perPage < 100) return 0;

  const midpoint = (band.min + band.max) / 2;
  return Math.max(0, 1 - Math.abs(perPage - midpoint) / (band.max + band.min));
};

/** Headings and list items per 1000 chars; 5..15 is typical for structured documents. */
export const structureScore = (text: string): number => {
  const headings = countMatches(text, /^#{1,6}\s/gm);
  const listItems = countMatches(text, /^\s*(?:[-*+]|\d+\.)\s/gm);
  const perThousand = (headings + listItems) / Math.max(1, text.length / 1000);

  if (perThousand >= 5 && perThousand <= 15) return 1;
  return Math.max(0, 1 - Math.abs(perThousand - 10) / 20);
};

export const codeScore = (text: string): number => {
  const fences = countMatches(text, /^```/gm);
  const blocks = Math.ceil(fences / 2);
  if (blocks === 0) return NEUTRAL;
  return Math.min(1, NEUTRAL + blocks / 5);
};

export const tableScore = (text: string): number => {
  const separators = countMatches(text, /^\s*\|?\s*:?-{3,}:?\s*(?:\|\s*:?-{3,}:?\s*)+\|?\s*$/gm);
  if (separators === 0) return NEUTRAL;
  return Math.min(1, NEUTRAL + separators / 3);
};

export class HeuristicQualityScorer implements QualityScorer {
  constructor(private readonly config: QualityScorerConfig = defaultQualityScorerConfig) {}

  score(output: ConversionOutput): number {
    return this.breakdown(output).total;
  }

  breakdown(output: ConversionOutput): QualityBreakdown {
    const text = output.text;
    if (text.trim().length < this.config.minTextLength) {
      return { length: 0, structure: 0, code: 0, table: 0, total: 0 };
    }

    const { weights } = this.config;
    const parts = {
      length: lengthScore(text, output.pageCount, this.config.charsPerPage),
      structure: structureScore(text),
      code: codeScore(text),
      table: tableScore(text)
    };
    const weightSum = weights.length + weights.structure + weights.code + weights.table;
    const weighted =
      weights.length * parts.length +
      weights.structure * parts.structure +
      weights.code * parts.code +
      weights.table * parts.table;

    const total = weightSum > 0 ? Math.min(1, Math.max(0, weighted / weightSum)) : 0;
    return { ...parts, total };
  }
}
