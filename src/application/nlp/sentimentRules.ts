import {
  SENTIMENT_LABELS,
  type SentimentLabel,
  type SentimentMethod,
} from "../../core/entities/article";
import type { SentimentDistribution } from "../../core/entities/analysis";
import type { RawSentimentCandidate } from "../../core/ports/outboundPorts";
import keywordLexicon from "./sentimentKeywords.json";

export type SentimentScore = {
  label: SentimentLabel;
  confidence: number;
};

export type KeywordSignal = {
  positiveHits: number;
  negativeHits: number;
};

export type KeywordLexicon = {
  positive: readonly string[];
  negative: readonly string[];
};

export type OverridePolicy = {
  minHits: number;
  dominanceRatio: number;
};

export type CombinedSentiment = SentimentScore & {
  method: SentimentMethod;
};

export const DEFAULT_OVERRIDE_POLICY: OverridePolicy = {
  minHits: 2,
  dominanceRatio: 2,
};

export const DEFAULT_LEXICON: KeywordLexicon = keywordLexicon;

/** Label order also breaks ties: Positive, then Negative, then Neutral. */
export const pickDominantLabel = (
  distribution: SentimentDistribution,
): SentimentLabel =>
  SENTIMENT_LABELS.reduce((best, label) =>
    distribution[label] > distribution[best] ? label : best,
  );

const emptyDistribution = (): SentimentDistribution => ({
  Positive: 0,
  Negative: 0,
  Neutral: 0,
});

const STAR_LABEL = /^([1-5])\s*stars?$/i;

/**
 * Maps the label vocabularies of common sentiment models onto the three pipeline labels.
 */
export const mapModelLabel = (label: string): SentimentLabel | null => {
  const normalized = label.trim().toLowerCase();
  const stars = STAR_LABEL.exec(normalized);
  if (stars) {
    const count = Number(stars[1]);
    if (count <= 2) {
      return "Negative";
    }
    return count === 3 ? "Neutral" : "Positive";
  }

  switch (normalized) {
    case "positive":
    case "pos":
    case "label_2":
      return "Positive";
    case "negative":
    case "neg":
    case "label_0":
      return "Negative";
    case "neutral":
    case "neu":
    case "label_1":
      return "Neutral";
    default:
      return null;
  }
};

/**
 * Sums candidate scores per pipeline label and rescales them to one.
 * Returns null when no candidate carries a known label.
 */
export const toDistribution = (
  candidates: readonly RawSentimentCandidate[],
): SentimentDistribution | null => {
  const distribution = emptyDistribution();
  let total = 0;

  candidates.forEach((candidate) => {
    const label = mapModelLabel(candidate.label);
    if (!label || !Number.isFinite(candidate.score) || candidate.score < 0) {
      return;
    }
    distribution[label] += candidate.score;
    total += candidate.score;
  });

  if (total <= 0) {
    return null;
  }

  SENTIMENT_LABELS.forEach((label) => {
    distribution[label] /= total;
  });
  return distribution;
};

export const averageDistributions = (
  distributions: readonly SentimentDistribution[],
): SentimentDistribution | null => {
  if (distributions.length === 0) {
    return null;
  }

  const sum = emptyDistribution();
  distributions.forEach((distribution) => {
    SENTIMENT_LABELS.forEach((label) => {
      sum[label] += distribution[label];
    });
  });
  SENTIMENT_LABELS.forEach((label) => {
    sum[label] /= distributions.length;
  });
  return sum;
};

export const scoreFromDistribution = (
  distribution: SentimentDistribution,
): SentimentScore => {
  const label = pickDominantLabel(distribution);
  return { label, confidence: clamp(distribution[label]) };
};

const clamp = (value: number): number => Math.min(1, Math.max(0, value));

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Counts whole-word phrase hits. Longer phrases match first and mask their text,
 * so "record profit" is not also counted as "profit".
 */
export const scanKeywords = (
  text: string,
  lexicon: KeywordLexicon = DEFAULT_LEXICON,
): KeywordSignal => {
  const phrases = [
    ...lexicon.positive.map((phrase) => ({ phrase, polarity: "positive" as const })),
    ...lexicon.negative.map((phrase) => ({ phrase, polarity: "negative" as const })),
  ].sort((left, right) => right.phrase.length - left.phrase.length);

  let remaining = text.toLowerCase();
  const signal: KeywordSignal = { positiveHits: 0, negativeHits: 0 };

  phrases.forEach(({ phrase, polarity }) => {
    const pattern = new RegExp(
      `(?<![\\p{L}\\p{N}])${escapeRegExp(phrase.toLowerCase())}(?![\\p{L}\\p{N}])`,
      "gu",
    );
    remaining = remaining.replace(pattern, (match) => {
      if (polarity === "positive") {
        signal.positiveHits += 1;
      } else {
        signal.negativeHits += 1;
      }
      return " ".repeat(match.length);
    });
  });

  return signal;
};

/**
 * Merges a statistical score (or its absence) with keyword evidence.
 *
 * With a statistical score, strong keyword dominance overrides it; otherwise the score stands.
 * Without one, the keyword balance decides, defaulting to Neutral.
 */
export const combineSentiment = (
  statistical: SentimentScore | null,
  keywords: KeywordSignal,
  policy: OverridePolicy = DEFAULT_OVERRIDE_POLICY,
): CombinedSentiment => {
  const { positiveHits, negativeHits } = keywords;

  if (statistical) {
    const dominant: SentimentLabel | null =
      positiveHits >= policy.minHits &&
      positiveHits >= policy.dominanceRatio * negativeHits
        ? "Positive"
        : negativeHits >= policy.minHits &&
            negativeHits >= policy.dominanceRatio * positiveHits
          ? "Negative"
          : null;

    if (dominant === null) {
      return { ...statistical, confidence: clamp(statistical.confidence), method: "model" };
    }

    const hits = dominant === "Positive" ? positiveHits : negativeHits;
    return {
      label: dominant,
      confidence: clamp(Math.max(statistical.confidence, 0.6) + 0.05 * hits),
      method: "keyword-override",
    };
  }

  const difference = Math.abs(positiveHits - negativeHits);
  if (difference === 0) {
    return { label: "Neutral", confidence: 0.5, method: "keyword-only" };
  }

  return {
    label: positiveHits > negativeHits ? "Positive" : "Negative",
    confidence: Math.min(0.9, 0.5 + 0.1 * difference),
    method: "keyword-only",
  };
};
