/**
 * Identity Extractor
 *
 * Derives the (artist, title, mix) triple used to query the catalog.
 * Existing tags win when both artist and title are present; otherwise the
 * filename stem is parsed as "Artist - Title (Mix)" or "Artist - Title".
 * A tagged title with no artist and an unparseable filename yields an
 * artist-less Identity, searched by title alone.
 */

import * as path from 'path';
import { Identity } from '../../shared/types';

/** Tag values relevant to identity (may be missing or whitespace) */
export interface IdentityTags {
  artist?: string | null;
  title?: string | null;
}

// ─── Filename Patterns ───────────────────────────────────────────────────────

/** Tried in order; the first full match wins */
const FILENAME_PATTERNS: readonly RegExp[] = [
  /^(?<artist>.+?)\s+-\s+(?<title>.+?)\s*\((?<mix>[^()]+)\)$/,
  /^(?<artist>.+?)\s+-\s+(?<title>.+)$/,
];

function freezeIdentity(identity: Identity): Identity {
  return Object.freeze(identity);
}

export const EMPTY_IDENTITY = freezeIdentity({ artist: '', title: '', mix: null, source: 'filename' });

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Parses a filename (with or without directory and extension) into an Identity.
 * Returns EMPTY_IDENTITY when no pattern matches.
 */
export function parseFilename(fileName: string): Identity {
  const stem = collapse(path.parse(fileName).name);

  for (const pattern of FILENAME_PATTERNS) {
    const groups = pattern.exec(stem)?.groups;
    if (!groups) continue;

    const artist = collapse(groups.artist ?? '');
    const title = collapse(groups.title ?? '');
    if (!artist || !title) continue;

    const mix = groups.mix !== undefined ? collapse(groups.mix) : '';
    return freezeIdentity({ artist, title, mix: mix || null, source: 'filename' });
  }

  return EMPTY_IDENTITY;
}

/**
 * Extracts an Identity from tags, falling back to the filename.
 * Filename parsing only runs when the tags are unusable; when it finds
 * nothing either, whatever the tags do hold is kept so a title-only search
 * can still run.
 */
export function extractIdentity(tags: IdentityTags, fileName: string): Identity {
  const artist = collapse(tags.artist ?? '');
  const title = collapse(tags.title ?? '');

  if (artist && title) {
    return freezeIdentity({ artist, title, mix: null, source: 'tags' });
  }

  const parsed = parseFilename(fileName);
  if (parsed === EMPTY_IDENTITY && title) {
    return freezeIdentity({ artist, title, mix: null, source: 'tags' });
  }
  return parsed;
}

/** True when there is nothing to search for */
export function isEmptyIdentity(identity: Identity): boolean {
  return identity.title.length === 0;
}
