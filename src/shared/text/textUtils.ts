import stopwordList from "./stopwords.json";

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const SENTENCE_BOUNDARY = /(?<=[.!?।])\s+/u;

export const sanitize = (text?: string | null): string => {
  if (!text) {
    return "";
  }

  return text.replace(/\s+/g, " ").trim();
};

export const isStopword = (token: string): boolean => STOPWORDS.has(token);

/**
 * Lowercased word tokens; possessive suffixes are dropped so "Tesla's" counts as "tesla".
 */
export const tokenize = (text: string): string[] =>
  sanitize(text)
    .toLowerCase()
    .replace(/['’]s\b/gu, "")
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);

export const contentTokens = (text: string): string[] =>
  tokenize(text).filter((token) => token.length > 1 && !isStopword(token));

export const splitSentences = (text: string): string[] =>
  sanitize(text)
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter(Boolean);

/**
 * Cuts text to at most `maxChars`, preferring the last sentence end, then the last space.
 */
export const clipToLength = (text: string, maxChars: number): string => {
  const clean = sanitize(text);
  if (clean.length <= maxChars) {
    return clean;
  }

  const window = clean.slice(0, maxChars + 1);
  const sentenceEnd = Math.max(
    window.lastIndexOf(". "),
    window.lastIndexOf("! "),
    window.lastIndexOf("? "),
    window.lastIndexOf("। "),
  );
  if (sentenceEnd > 0) {
    return clean.slice(0, sentenceEnd + 1).trim();
  }

  const lastSpace = window.lastIndexOf(" ");
  if (lastSpace > 0) {
    return clean.slice(0, lastSpace).trim();
  }

  return clean.slice(0, maxChars);
};

const splitLongSegment = (segment: string, maxChars: number): string[] => {
  const pieces: string[] = [];
  let current = "";

  for (const word of segment.split(" ")) {
    if (word.length > maxChars) {
      if (current) {
        pieces.push(current);
        current = "";
      }
      for (let start = 0; start < word.length; start += maxChars) {
        pieces.push(word.slice(start, start + maxChars));
      }
      continue;
    }

    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) {
    pieces.push(current);
  }

  return pieces;
};

/**
 * Packs whole sentences into chunks of at most `maxChars`; oversized sentences are split on words.
 * Chunks keep the input order and every character of it except collapsed whitespace.
 */
export const chunkText = (text: string, maxChars: number): string[] => {
  const chunks: string[] = [];
  let current = "";

  for (const sentence of splitSentences(text)) {
    const segments =
      sentence.length > maxChars
        ? splitLongSegment(sentence, maxChars)
        : [sentence];

    for (const segment of segments) {
      const candidate = current ? `${current} ${segment}` : segment;
      if (candidate.length > maxChars && current) {
        chunks.push(current);
        current = segment;
      } else {
        current = candidate;
      }
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
};

export const slugify = (text: string): string =>
  sanitize(text)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

/**
 * FNV-1a over UTF-16 code units.
 */
export const stableHash = (text: string): number => {
  let hash = 0x811c9dc5;
  for (let index = 0; index < text.length; index += 1) {
    hash ^= text.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }

  return hash >>> 0;
};
