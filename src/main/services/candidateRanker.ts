/**
 * Candidate Ranker
 *
 * Scores catalog search hits against an Identity and picks the best one.
 *
 *   confidence = similarityWeight × similarity
 *              + masterBonus (type is "master")
 *              + yearBonus   (hit carries a parseable year)
 *
 * clamped to [0, 1]. Ranking and the threshold use that value; the reported
 * score is rounded to three decimals. Similarity is a token-set
 * ratio built on Dice coefficients from string-similarity, averaged over
 * artist and title (title alone when the identity has no artist).
 *
 * Ordering is deterministic: score desc, then master before release, then
 * year present, then first-seen order.
 */

import { compareTwoStrings } from 'string-similarity';
import { Candidate, FixerSettings, Identity, MatchResult, SearchHit } from '../../shared/types';
import { cleanYear, tokenize } from '../utils/textNormalizer';

/** Scoring knobs taken from the run settings */
export type ScoringConfig = Pick<
  FixerSettings,
  'similarityWeight' | 'masterBonus' | 'yearBonus' | 'confidenceThreshold'
>;

/** Separator the catalog uses between artist and title in search hit titles */
const HIT_TITLE_SEPARATOR = ' - ';

export const NO_MATCH: MatchResult = Object.freeze({ candidate: null, confidence: 0, matched: false });

// ─── Similarity ──────────────────────────────────────────────────────────────

/**
 * Token-set similarity in [0, 1]. Word order and duplicate words are ignored,
 * and a string whose tokens are a subset of the other's scores 1.
 */
export function tokenSetSimilarity(a: string, b: string): number {
  const tokensA = tokenize(a);
  const tokensB = tokenize(b);
  if (tokensA.length === 0 || tokensB.length === 0) return 0;

  const setB = new Set(tokensB);
  const setA = new Set(tokensA);
  const common = tokensA.filter((t) => setB.has(t));
  const onlyA = tokensA.filter((t) => !setB.has(t));
  const onlyB = tokensB.filter((t) => !setA.has(t));

  const base = common.join(' ');
  const withA = [base, ...onlyA].filter(Boolean).join(' ');
  const withB = [base, ...onlyB].filter(Boolean).join(' ');

  const scores = [compareTwoStrings(withA, withB)];
  if (base) {
    scores.push(compareTwoStrings(base, withA), compareTwoStrings(base, withB));
  }
  return Math.max(...scores);
}

/**
 * Splits a hit title such as "Daft Punk - One More Time" on the first separator.
 * Titles without one are treated as title-only.
 */
export function splitHitTitle(hitTitle: string): { artist: string; title: string } {
  const index = hitTitle.indexOf(HIT_TITLE_SEPARATOR);
  if (index < 0) {
    return { artist: '', title: hitTitle.trim() };
  }
  return {
    artist: hitTitle.slice(0, index).trim(),
    title: hitTitle.slice(index + HIT_TITLE_SEPARATOR.length).trim(),
  };
}

function clampScore(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function roundScore(value: number): number {
  return Math.round(value * 1000) / 1000;
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

export function scoreHit(identity: Identity, hit: SearchHit, config: ScoringConfig): Candidate {
  const { artist, title } = splitHitTitle(hit.title);

  const titleScore = tokenSetSimilarity(identity.title, title);
  const similarity = identity.artist
    ? (tokenSetSimilarity(identity.artist, artist) + titleScore) / 2
    : titleScore;

  const yearText = cleanYear(hit.year);
  const year = yearText !== null ? Number(yearText) : null;

  let score = config.similarityWeight * similarity;
  if (hit.type === 'master') score += config.masterBonus;
  if (year !== null) score += config.yearBonus;

  const rawScore = clampScore(score);
  return {
    id: hit.id,
    type: hit.type,
    artist,
    title,
    year,
    score: roundScore(rawScore),
    rawScore,
    url: hit.url,
    resourceUrl: hit.resourceUrl,
  };
}

/**
 * Scores every hit and returns them best-first.
 */
export function rankCandidates(identity: Identity, hits: readonly SearchHit[], config: ScoringConfig): Candidate[] {
  return hits
    .map((hit, index) => ({ candidate: scoreHit(identity, hit, config), index }))
    .sort((a, b) => {
      if (b.candidate.rawScore !== a.candidate.rawScore) return b.candidate.rawScore - a.candidate.rawScore;
      const masterA = a.candidate.type === 'master' ? 1 : 0;
      const masterB = b.candidate.type === 'master' ? 1 : 0;
      if (masterA !== masterB) return masterB - masterA;
      const yearA = a.candidate.year !== null ? 1 : 0;
      const yearB = b.candidate.year !== null ? 1 : 0;
      if (yearA !== yearB) return yearB - yearA;
      return a.index - b.index;
    })
    .map(({ candidate }) => candidate);
}

/**
 * Picks the top-ranked hit. `matched` is true iff its unrounded score
 * reaches the threshold (inclusive); `confidence` is the rounded score.
 */
export function selectBestCandidate(
  identity: Identity,
  hits: readonly SearchHit[],
  config: ScoringConfig,
): MatchResult {
  const [best] = rankCandidates(identity, hits, config);
  if (!best) return NO_MATCH;

  return {
    candidate: best,
    confidence: best.score,
    matched: best.rawScore >= config.confidenceThreshold,
  };
}
