/**
 * Query Builder
 *
 * Turns an Identity into the ordered list of catalog searches to try:
 *   1. artist + title + mix   (only when a mix is present)
 *   2. artist + title
 *   3. title only             (only when the artist is empty)
 */

import { CatalogQuery, Identity } from '../../shared/types';

/** Mix names that describe the default version and add nothing to a search */
const NEUTRAL_MIXES = new Set(['original mix', 'original']);

function isNeutralMix(mix: string): boolean {
  return NEUTRAL_MIXES.has(mix.trim().toLowerCase());
}

export function buildQueries(identity: Identity): CatalogQuery[] {
  const { artist, title, mix } = identity;
  if (!title) return [];

  const queries: CatalogQuery[] = [];

  if (artist) {
    if (mix && !isNeutralMix(mix)) {
      queries.push({
        variant: 'artist_title_mix',
        text: `${artist} - ${title} (${mix})`,
        artist,
        title,
        mix,
      });
    }
    queries.push({
      variant: 'artist_title',
      text: `${artist} - ${title}`,
      artist,
      title,
      mix: null,
    });
  } else {
    queries.push({
      variant: 'title_only',
      text: title,
      artist: null,
      title,
      mix: null,
    });
  }

  return queries;
}
