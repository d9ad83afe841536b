/**
 * Track → Similar Tracks Pipeline
 *
 * Orchestrates one query against a catalog snapshot:
 * 1. Name resolution (with an explicit disambiguation step)
 * 2. Threshold filtering, dedup and popularity ranking
 * 3. Top-K truncation
 * 4. Star subgraph construction
 * 5. DOT rendering and console summary
 *
 * Every stage is a pure function of its inputs; writing the DOT file is
 * left to the caller.
 */

import type {
  AmbiguousResolution,
  Catalog,
  Resolution,
  Selection,
  SimilarityThresholds,
  Subgraph,
  Track,
} from '@track-graph/types';
import { logger } from '../config/index.js';
import { DEFAULT_MAX_CANDIDATES, resolveTrackName, selectCandidate } from './name-resolver.js';
import { DEFAULT_THRESHOLDS, DEFAULT_TOP_SIMILAR, findSimilarTracks, takeTopSimilar } from './similarity-filter.js';
import { buildSubgraph } from './subgraph.js';
import { renderDot } from './dot-exporter.js';
import { formatSimilaritySummary } from './summary.js';

export interface PipelineConfig {
  thresholds: SimilarityThresholds;
  topSimilar: number;
  maxCandidates: number;
}

export interface PipelineOptions {
  thresholds?: Partial<SimilarityThresholds>;
  topSimilar?: number;
  maxCandidates?: number;
}

export interface SimilarityQueryResult {
  reference: Track;
  similar: Track[];
  subgraph: Subgraph;
  summary: string[];
  dot: string;
}

export class SimilarityPipeline {
  private config: PipelineConfig;

  constructor(config?: PipelineOptions) {
    this.config = {
      thresholds: {
        ...DEFAULT_THRESHOLDS,
        ...config?.thresholds,
      },
      topSimilar: config?.topSimilar ?? DEFAULT_TOP_SIMILAR,
      maxCandidates: config?.maxCandidates ?? DEFAULT_MAX_CANDIDATES,
    };
  }

  getConfig(): PipelineConfig {
    return { ...this.config, thresholds: { ...this.config.thresholds } };
  }

  resolve(catalog: Catalog, name: string): Resolution {
    const resolution = resolveTrackName(catalog, name, { maxCandidates: this.config.maxCandidates });

    logger.debug({
      query: resolution.kind === 'resolved' ? resolution.track.track_name : resolution.query,
      outcome: resolution.kind,
      candidates: resolution.kind === 'ambiguous' ? resolution.candidates.length : undefined,
    }, 'Track name resolved');

    return resolution;
  }

  select(ambiguous: AmbiguousResolution, input: number | string): Selection {
    return selectCandidate(ambiguous, input);
  }

  run(catalog: Catalog, reference: Track): SimilarityQueryResult {
    const startTime = Date.now();

    const qualifying = findSimilarTracks(catalog, reference, this.config.thresholds);
    const filterTime = Date.now() - startTime;

    const similar = takeTopSimilar(qualifying, this.config.topSimilar);
    const subgraph = buildSubgraph(reference, similar);
    const dot = renderDot(subgraph);
    const summary = formatSimilaritySummary(reference, similar, this.config.topSimilar);

    logger.debug({
      reference: reference.track_id,
      catalogSize: catalog.length,
      qualifying: qualifying.length,
      kept: similar.length,
      filterTime,
      duration: Date.now() - startTime,
    }, 'Similarity query completed');

    return { reference, similar, subgraph, summary, dot };
  }
}
