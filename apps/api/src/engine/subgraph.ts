import type { FeatureSnapshot, GraphNode, Subgraph, Track } from '@track-graph/types';

export function snapshotFeatures(track: Track): FeatureSnapshot {
  return {
    danceability: track.danceability,
    energy: track.energy,
    tempo: track.tempo,
    valence: track.valence,
    popularity: track.popularity,
  };
}

/**
 * Render a snapshot as `Danceability: 0.80, Energy: 0.90, Tempo: 120.00, Valence: 0.70, Popularity: 85`.
 * The field order is fixed; graph labels and the console summary both rely on it.
 */
export function formatFeatures(features: FeatureSnapshot): string {
  return [
    `Danceability: ${features.danceability.toFixed(2)}`,
    `Energy: ${features.energy.toFixed(2)}`,
    `Tempo: ${features.tempo.toFixed(2)}`,
    `Valence: ${features.valence.toFixed(2)}`,
    `Popularity: ${Math.trunc(features.popularity)}`,
  ].join(', ');
}

function toNode(track: Track): GraphNode {
  return {
    id: track.track_id,
    label: track.track_name,
    features: snapshotFeatures(track),
  };
}

/**
 * One-hop star: the reference in the middle, one outgoing edge per
 * neighbour in the order given. Nodes are keyed by track_id, so two tracks
 * sharing a display name remain distinct nodes here.
 */
export function buildSubgraph(reference: Track, neighbours: readonly Track[]): Subgraph {
  const center = toNode(reference);

  return {
    center,
    edges: neighbours.map(neighbour => ({
      from: center.id,
      to: neighbour.track_id,
      target: toNode(neighbour),
    })),
  };
}
