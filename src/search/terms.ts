import type { SearchSettings } from "./settings";
import { countTokens, tokenize } from "./tokenize";

export interface SearchDocument {
  id: number;
  url: string;
  title: string;
  tags: string[];
  /** YYYY-MM-DD for posts, null for pages */
  date: string | null;
  excerpt: string;
}

export interface DocumentRecord {
  document: SearchDocument;
  tokenWeights: Map<string, number>;
  bodyTokenCount: number;
}

/** [docId, score] */
export type Posting = [number, number];

export type TermsIndex = Map<string, Posting[]>;

export interface TokenWeights {
  weights: Map<string, number>;
  bodyTokenCount: number;
}

/**
 * Weighted token counts for one document; the same token from body, title
 * and tags adds up
 */
export function collectTokenWeights(
  title: string,
  tags: string[],
  bodyText: string,
  settings: SearchSettings,
): TokenWeights {
  const weights = new Map<string, number>();
  const add = (counts: Map<string, number>, weight: number) => {
    for (const [token, count] of counts) {
      weights.set(token, (weights.get(token) ?? 0) + count * weight);
    }
  };

  const bodyTokens = tokenize(bodyText, settings.minTokenLen);
  add(countTokens(bodyTokens), settings.weightBody);
  add(countTokens(tokenize(title, settings.minTokenLen)), settings.weightTitle);
  add(
    countTokens(tags.flatMap((tag) => tokenize(tag, settings.minTokenLen))),
    settings.weightTags,
  );

  return { weights, bodyTokenCount: bodyTokens.length };
}

/**
 * Whether a token is too rare or too common to be worth indexing
 */
export function shouldDropToken(df: number, docCount: number, settings: SearchSettings): boolean {
  if (df <= 0) {
    return settings.dropDfMin > 0;
  }
  if (docCount <= 0) {
    return true;
  }
  if (df <= settings.dropDfMin) {
    return true;
  }
  if (df === docCount) {
    return true;
  }
  return df / docCount >= settings.dropDfRatio;
}

function byScoreThenKey<K extends string | number>(a: [K, number], b: [K, number]): number {
  if (a[1] !== b[1]) return b[1] - a[1];
  return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

/**
 * Score a document's surviving tokens and keep the best `maxTermsPerDoc`
 */
export function scoreDocumentTokens(
  record: DocumentRecord,
  documentFrequency: Map<string, number>,
  docCount: number,
  settings: SearchSettings,
): Array<[string, number]> {
  const scored: Array<[string, number]> = [];

  for (const [token, weight] of record.tokenWeights) {
    if (weight <= 0) continue;

    const df = documentFrequency.get(token) ?? 0;
    if (shouldDropToken(df, docCount, settings)) continue;

    const tf = 1 + Math.log(weight);
    const idf = Math.log((docCount + 1) / (df + 1)) + 1;
    let score = tf * idf;
    if (settings.normalizeByDocLen && record.bodyTokenCount > 0) {
      score /= Math.sqrt(record.bodyTokenCount);
    }
    scored.push([token, score]);
  }

  scored.sort(byScoreThenKey);
  return scored.slice(0, settings.maxTermsPerDoc);
}

function roundScore(score: number): number {
  return Math.round(score * 1e6) / 1e6;
}

/**
 * Inverted index: token -> postings sorted by (score desc, doc id asc),
 * with tokens in sorted order
 */
export function buildTermsIndex(records: DocumentRecord[], settings: SearchSettings): TermsIndex {
  const docCount = records.length;
  const index: TermsIndex = new Map();
  if (docCount === 0) {
    return index;
  }

  const documentFrequency = new Map<string, number>();
  for (const record of records) {
    for (const token of record.tokenWeights.keys()) {
      documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
    }
  }

  const terms = new Map<string, Posting[]>();
  for (const record of records) {
    for (const [token, score] of scoreDocumentTokens(record, documentFrequency, docCount, settings)) {
      let postings = terms.get(token);
      if (!postings) {
        postings = [];
        terms.set(token, postings);
      }
      postings.push([record.document.id, score]);
    }
  }

  for (const token of [...terms.keys()].sort()) {
    const postings = terms.get(token) ?? [];
    postings.sort((a, b) => (a[1] !== b[1] ? b[1] - a[1] : a[0] - b[0]));
    index.set(
      token,
      postings.map(([docId, score]): Posting => [docId, roundScore(score)]),
    );
  }

  return index;
}

/**
 * JSON object text with keys in map order.
 * JSON.stringify would move integer-like keys such as "2024" to the front.
 */
export function serializeTermsIndex(index: TermsIndex): string {
  const members = [...index].map(
    ([token, postings]) => `${JSON.stringify(token)}:${JSON.stringify(postings)}`,
  );
  return `{${members.join(",")}}`;
}
