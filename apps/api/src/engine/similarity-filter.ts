/**
 * Similarity Filter
 *
 * A candidate is similar to the reference when every audio feature lies
 * within its tolerance and it is strictly more popular than the floor:
 *
 *   |Δdanceability| <= d, |Δenergy| <= e, |Δtempo| <= t, |Δvalence| <= v,
 *   popularity > p, track_id != reference.track_id
 *
 * Only the first qualifying track per exact track_name is kept, then the
 * survivors are ranked by popularity.
 *
 * Tolerances are inclusive on the decimal values as written in the catalog:
 * a delta that equals the tolerance qualifies on either side of the
 * reference, whatever the binary rounding of the operands.
 */

import type { Catalog, SimilarityThresholds, Track } from '@track-graph/types';

export const DEFAULT_THRESHOLDS: SimilarityThresholds = {
  danceabilityTolerance: 0.05,
  energyTolerance: 0.05,
  tempoTolerance: 50.0,
  valenceTolerance: 0.1,
  minPopularity: 70,
};

export const DEFAULT_TOP_SIMILAR = 5;

// Far below the 3-decimal resolution of audio features, far above float64 noise
export const TOLERANCE_EPSILON = 1e-9;

export function withinTolerance(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance + TOLERANCE_EPSILON;
}

export function isSimilar(candidate: Track, reference: Track, thresholds: SimilarityThresholds): boolean {
  return withinTolerance(candidate.danceability, reference.danceability, thresholds.danceabilityTolerance)
    && withinTolerance(candidate.energy, reference.energy, thresholds.energyTolerance)
    && withinTolerance(candidate.tempo, reference.tempo, thresholds.tempoTolerance)
    && withinTolerance(candidate.valence, reference.valence, thresholds.valenceTolerance)
    && candidate.popularity > thresholds.minPopularity
    && candidate.track_id !== reference.track_id;
}

export function findSimilarTracks(
  catalog: Catalog,
  reference: Track,
  thresholds: SimilarityThresholds = DEFAULT_THRESHOLDS
): Track[] {
  const seenNames = new Set<string>();
  const similar: Track[] = [];

  for (const track of catalog) {
    if (!isSimilar(track, reference, thresholds)) continue;
    if (seenNames.has(track.track_name)) continue;

    seenNames.add(track.track_name);
    similar.push(track);
  }

  return similar.sort((a, b) => b.popularity - a.popularity);
}

export function takeTopSimilar(tracks: readonly Track[], limit: number = DEFAULT_TOP_SIMILAR): Track[] {
  return tracks.slice(0, limit);
}
