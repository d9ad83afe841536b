/**
 * Name Resolver
 *
 * Maps a typed song name onto catalog tracks. Several tracks can share a
 * name, in which case the most popular few are offered back to the caller
 * and a separate selectCandidate() call picks one.
 */

import type { AmbiguousResolution, Catalog, Resolution, Selection, Track } from '@track-graph/types';

export const DEFAULT_MAX_CANDIDATES = 3;

export interface ResolveOptions {
  maxCandidates?: number;
}

export function resolveTrackName(
  catalog: Catalog,
  name: string,
  options: ResolveOptions = {}
): Resolution {
  const query = name.trim();
  // Unicode-aware folding: 'ÉTÉ' matches 'été'
  const needle = query.toLowerCase();
  const matches = catalog.filter(track => track.track_name.toLowerCase() === needle);

  if (matches.length === 0) {
    return { kind: 'not_found', query };
  }

  if (matches.length === 1) {
    return { kind: 'resolved', track: matches[0] };
  }

  // Array.prototype.sort is stable, so equal popularity keeps catalog order
  const candidates = [...matches]
    .sort((a, b) => b.popularity - a.popularity)
    .slice(0, options.maxCandidates ?? DEFAULT_MAX_CANDIDATES);

  return { kind: 'ambiguous', query, candidates };
}

/**
 * Pick one of the ranked candidates by 1-based position. Anything that is
 * not a whole number within the offered list is an invalid selection.
 */
export function selectCandidate(ambiguous: AmbiguousResolution, input: number | string): Selection {
  const raw = String(input).trim();
  const choices = ambiguous.candidates.length;
  const position = typeof input === 'number' ? input : parseSelection(raw);

  if (position === null || !Number.isInteger(position) || position < 1 || position > choices) {
    return { kind: 'invalid_selection', input: raw, choices };
  }

  return { kind: 'resolved', track: ambiguous.candidates[position - 1] };
}

function parseSelection(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  return Number(raw);
}

export function describeCandidates(ambiguous: AmbiguousResolution): string[] {
  return ambiguous.candidates.map((track, index) => describeCandidate(track, index + 1));
}

function describeCandidate(track: Track, position: number): string {
  return `${position}: "${track.track_name}" by ${track.artists} (Album: ${track.album_name}, Popularity: ${track.popularity})`;
}
