import {
  clipToLength,
  contentTokens,
  isStopword,
  splitSentences,
  tokenize,
} from "../../shared/text/textUtils";

type RankedTerm = {
  term: string;
  count: number;
  first: number;
  words: 1 | 2;
};

const byRank = (left: RankedTerm, right: RankedTerm): number =>
  right.count - left.count ||
  right.words - left.words ||
  left.first - right.first ||
  (left.term < right.term ? -1 : left.term > right.term ? 1 : 0);

const countTerms = (tokens: readonly string[]): Map<string, number> => {
  const counts = new Map<string, number>();
  tokens.forEach((token) => counts.set(token, (counts.get(token) ?? 0) + 1));
  return counts;
};

/**
 * Frequency-based extractive summary: sentences are scored by the mean normalized
 * frequency of their content tokens and the best `sentenceCount` are kept in
 * original order, dropping the weakest until the result fits `maxChars`.
 */
export const extractiveSummary = (
  text: string,
  sentenceCount: number,
  maxChars: number,
): string => {
  const sentences = splitSentences(text);
  const sentenceTokens = sentences.map((sentence) => contentTokens(sentence));
  const frequencies = countTerms(sentenceTokens.flat());
  const maxFrequency = Math.max(1, ...frequencies.values());

  const ranked = sentences
    .map((sentence, index) => {
      const tokens = sentenceTokens[index] ?? [];
      const total = tokens.reduce(
        (sum, token) => sum + (frequencies.get(token) ?? 0) / maxFrequency,
        0,
      );

      return {
        sentence,
        index,
        score: tokens.length === 0 ? 0 : total / tokens.length,
      };
    })
    .sort((left, right) => right.score - left.score || left.index - right.index);

  const render = (picked: typeof ranked): string =>
    [...picked]
      .sort((left, right) => left.index - right.index)
      .map((entry) => entry.sentence)
      .join(" ");

  let selected = ranked.slice(0, Math.max(1, sentenceCount));
  while (selected.length > 1 && render(selected).length > maxChars) {
    selected = selected.slice(0, -1);
  }

  const summary = render(selected);
  return clipToLength(summary.length > 0 ? summary : text, maxChars);
};

/**
 * Most frequent salient unigrams plus bigrams seen at least twice. A chosen bigram
 * absorbs its two words; ties go to the term that appears first.
 */
export const extractTopics = (
  text: string,
  topicCount: number,
  excludeTerms: readonly string[] = [],
): string[] => {
  const excluded = new Set(excludeTerms.flatMap((term) => tokenize(term)));
  const isSalient = (token: string): boolean =>
    token.length >= 3 &&
    !/^\d+$/.test(token) &&
    !isStopword(token) &&
    !excluded.has(token);

  const unigrams = new Map<string, RankedTerm>();
  const bigrams = new Map<string, RankedTerm>();
  const bump = (
    table: Map<string, RankedTerm>,
    term: string,
    position: number,
    words: 1 | 2,
  ): void => {
    const existing = table.get(term);
    if (existing) {
      existing.count += 1;
      return;
    }
    table.set(term, { term, count: 1, first: position, words });
  };

  let position = 0;
  for (const sentence of splitSentences(text)) {
    let previous: string | null = null;
    for (const token of tokenize(sentence)) {
      if (!isSalient(token)) {
        previous = null;
        position += 1;
        continue;
      }

      bump(unigrams, token, position, 1);
      if (previous) {
        bump(bigrams, `${previous} ${token}`, position - 1, 2);
      }
      previous = token;
      position += 1;
    }
  }

  const chosenBigrams = [...bigrams.values()]
    .filter((entry) => entry.count >= 2)
    .sort(byRank)
    .slice(0, topicCount);
  const absorbed = new Set(chosenBigrams.flatMap((entry) => entry.term.split(" ")));
  const remainingUnigrams = [...unigrams.values()].filter(
    (entry) => !absorbed.has(entry.term),
  );

  return [...chosenBigrams, ...remainingUnigrams]
    .sort(byRank)
    .slice(0, topicCount)
    .map((entry) => entry.term);
};
