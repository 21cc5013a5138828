import type {
  ComparativeReport,
  CoverageDifference,
  SentimentDistribution,
  TopicOverlap,
} from "../../core/entities/analysis";
import type { Article, SentimentLabel } from "../../core/entities/article";
import { pickDominantLabel } from "../nlp/sentimentRules";

const COMMON_TOPIC_SHARE = 0.3;
const NARRATIVE_TOPIC_COUNT = 3;

type TopicCount = { topic: string; count: number };

const byCountThenText = (left: TopicCount, right: TopicCount): number =>
  right.count - left.count ||
  (left.topic < right.topic ? -1 : left.topic > right.topic ? 1 : 0);

const joinPhrases = (items: readonly string[]): string => {
  if (items.length <= 1) {
    return items.join("");
  }

  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
};

/** Number of articles mentioning each topic, counting an article once. */
const countTopicArticles = (articles: readonly Article[]): TopicCount[] => {
  const counts = new Map<string, number>();
  articles.forEach((article) => {
    new Set(article.topics).forEach((topic) => {
      counts.set(topic, (counts.get(topic) ?? 0) + 1);
    });
  });

  return [...counts.entries()]
    .map(([topic, count]) => ({ topic, count }))
    .sort(byCountThenText);
};

export const tallySentiment = (
  articles: readonly Article[],
): SentimentDistribution => {
  const distribution: SentimentDistribution = { Positive: 0, Negative: 0, Neutral: 0 };
  articles.forEach((article) => {
    distribution[article.sentiment] += 1;
  });
  return distribution;
};

/**
 * Majority label with ties going Positive, then Negative, then Neutral. No articles means Neutral.
 */
export const overallSignal = (distribution: SentimentDistribution): SentimentLabel => {
  const total = distribution.Positive + distribution.Negative + distribution.Neutral;
  return total === 0 ? "Neutral" : pickDominantLabel(distribution);
};

/**
 * Symmetric topic comparison: swapping the arguments swaps the unique sets and keeps the shared set.
 */
export const compareTopics = (a: Article, b: Article): TopicOverlap => {
  const topicsA = new Set(a.topics);
  const topicsB = new Set(b.topics);

  return {
    articleA: a.id,
    articleB: b.id,
    sharedTopics: [...topicsA].filter((topic) => topicsB.has(topic)).sort(),
    uniqueTopicsA: [...topicsA].filter((topic) => !topicsB.has(topic)).sort(),
    uniqueTopicsB: [...topicsB].filter((topic) => !topicsA.has(topic)).sort(),
  };
};

export const pairwiseOverlaps = (articles: readonly Article[]): TopicOverlap[] =>
  articles.flatMap((left, index) =>
    articles.slice(index + 1).map((right) => compareTopics(left, right)),
  );

/** Topics mentioned by at least 30% of the articles. */
export const findCommonTopics = (articles: readonly Article[]): string[] => {
  const threshold = Math.max(1, articles.length * COMMON_TOPIC_SHARE);
  return countTopicArticles(articles)
    .filter((entry) => entry.count >= threshold)
    .map((entry) => entry.topic);
};

const impactOf = (a: SentimentLabel, b: SentimentLabel): string => {
  if (a === "Neutral" || b === "Neutral") {
    return "The neutral article suggests a more cautious perspective than the other.";
  }

  return "This contrast may indicate mixed market reactions or differing views of the company's performance.";
};

export const describeCoverageDifferences = (
  articles: readonly Article[],
): CoverageDifference[] =>
  articles.flatMap((left, index) =>
    articles
      .slice(index + 1)
      .filter((right) => right.sentiment !== left.sentiment)
      .map((right) => ({
        articleA: left.id,
        articleB: right.id,
        comparison: `"${left.title}" (${left.sourceName}) reads ${left.sentiment.toLowerCase()} while "${right.title}" (${right.sourceName}) reads ${right.sentiment.toLowerCase()}.`,
        impact: impactOf(left.sentiment, right.sentiment),
      })),
  );

const strengthOf = (share: number): string => {
  if (share > 0.6) {
    return "strongly";
  }

  return share > 0.4 ? "generally" : "mixed, leaning";
};

/**
 * Fixed-structure summary of the report; this is the text handed to speech synthesis.
 */
export const composeNarrative = (
  companyName: string,
  articles: readonly Article[],
  distribution: SentimentDistribution,
  signal: SentimentLabel,
): string => {
  const [only] = articles;
  if (articles.length === 0 || !only) {
    return `No recent news coverage of ${companyName} was available, so the overall sentiment is treated as neutral.`;
  }

  if (articles.length === 1) {
    const focus = only.topics.slice(0, NARRATIVE_TOPIC_COUNT);
    const topicSentence =
      focus.length > 0 ? ` It focuses on ${joinPhrases(focus)}.` : "";
    return `Only one article about ${companyName} was analyzed, from ${only.sourceName}, and its tone is ${only.sentiment.toLowerCase()}.${topicSentence}`;
  }

  const strength = strengthOf(distribution[signal] / articles.length);
  const topicCounts = countTopicArticles(articles);
  const shared = topicCounts
    .filter((entry) => entry.count >= 2)
    .slice(0, NARRATIVE_TOPIC_COUNT)
    .map((entry) => entry.topic);
  const singleMention = new Set(
    topicCounts.filter((entry) => entry.count === 1).map((entry) => entry.topic),
  );
  const unique = [
    ...new Set(articles.flatMap((article) => article.topics)),
  ]
    .filter((topic) => singleMention.has(topic))
    .slice(0, NARRATIVE_TOPIC_COUNT);

  const sentences = [
    `Across ${articles.length} articles, news coverage of ${companyName} is ${strength} ${signal.toLowerCase()}, with ${distribution.Positive} positive, ${distribution.Negative} negative and ${distribution.Neutral} neutral.`,
    shared.length > 0
      ? `Common themes include ${joinPhrases(shared)}.`
      : "The articles share no common themes.",
  ];
  if (unique.length > 0) {
    sentences.push(`Individual articles also cover ${joinPhrases(unique)}.`);
  }

  return sentences.join(" ");
};

export class ComparativeAnalysisService {
  analyze(companyName: string, articles: readonly Article[]): ComparativeReport {
    const sentimentDistribution = tallySentiment(articles);
    const signal = overallSignal(sentimentDistribution);

    return {
      companyName,
      articles: [...articles],
      sentimentDistribution,
      topicOverlap: pairwiseOverlaps(articles),
      commonTopics: findCommonTopics(articles),
      coverageDifferences: describeCoverageDifferences(articles),
      overallSignal: signal,
      narrativeText: composeNarrative(companyName, articles, sentimentDistribution, signal),
    };
  }
}
