import type { Track } from '@track-graph/types';
import { formatFeatures, snapshotFeatures } from './subgraph.js';

function describe(track: Track): string {
  return `"${track.track_name}" by ${track.artists} [${formatFeatures(snapshotFeatures(track))}]`;
}

/** `limit` is the configured top-K, printed whether or not that many qualified */
export function formatSimilaritySummary(reference: Track, similar: readonly Track[], limit: number): string[] {
  const lines = [`Top ${limit} similar songs to ${describe(reference)}:`];

  if (similar.length === 0) {
    lines.push(`No similar songs found for "${reference.track_name}".`);
    return lines;
  }

  for (const track of similar) {
    lines.push(`  -> ${describe(track)}`);
  }
  return lines;
}
