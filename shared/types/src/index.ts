// Catalog types
export interface Track {
  readonly track_id: string;
  readonly artists: string;
  readonly album_name: string;
  readonly track_name: string;
  readonly popularity: number;
  readonly danceability: number;
  readonly energy: number;
  readonly tempo: number;
  readonly valence: number;
  // Carried through from the catalog, not used for similarity
  readonly duration_ms?: number;
  readonly explicit?: boolean;
  readonly key?: number;
  readonly mode?: number;
  readonly time_signature?: number;
  readonly loudness?: number;
  readonly speechiness?: number;
  readonly acousticness?: number;
  readonly instrumentalness?: number;
  readonly liveness?: number;
  readonly track_genre?: string;
}

export type Catalog = ReadonlyArray<Track>;

// Similarity types
export interface SimilarityThresholds {
  danceabilityTolerance: number;
  energyTolerance: number;
  tempoTolerance: number;
  valenceTolerance: number;
  /** Candidates must be strictly more popular than this */
  minPopularity: number;
}

// Name resolution outcomes
export type Resolution =
  | { kind: 'resolved'; track: Track }
  | { kind: 'ambiguous'; query: string; candidates: Track[] }
  | { kind: 'not_found'; query: string };

export type AmbiguousResolution = Extract<Resolution, { kind: 'ambiguous' }>;

export type Selection =
  | { kind: 'resolved'; track: Track }
  | { kind: 'invalid_selection'; input: string; choices: number };

// Graph types
export interface FeatureSnapshot {
  danceability: number;
  energy: number;
  tempo: number;
  valence: number;
  popularity: number;
}

export interface GraphNode {
  /** track_id of the underlying track */
  id: string;
  /** Display name written into the graph file */
  label: string;
  features: FeatureSnapshot;
}

export interface GraphEdge {
  from: string;
  to: string;
  target: GraphNode;
}

export interface Subgraph {
  center: GraphNode;
  edges: GraphEdge[];
}

// API response types
export interface SimilarityResponse {
  reference: Track;
  similar: Track[];
  summary: string[];
  dot: string;
}

export interface CandidateChoice {
  index: number;
  track: Track;
}

export interface ApiError {
  error: string;
  message?: string;
  timestamp: string;
}
