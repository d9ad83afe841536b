import type { SimilarityThresholds } from '@track-graph/types';
import { loadServerEnv } from './env.js';
import { logger } from '../utils/logger.js';

export interface Config {
  server: {
    port: number;
    host: string;
  };
  catalog: {
    path: string;
  };
  graph: {
    outputPath: string;
  };
  thresholds: SimilarityThresholds;
  limits: {
    similar: number;
    disambiguation: number;
  };
  nodeEnv: 'development' | 'production' | 'test';
}

// Lazy-loaded configuration - doesn't evaluate env at import time
let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = loadServerEnv();

  cachedConfig = {
    server: {
      port: env.PORT,
      host: env.HOST,
    },
    catalog: {
      path: env.CATALOG_PATH,
    },
    graph: {
      outputPath: env.GRAPH_OUTPUT_PATH,
    },
    thresholds: {
      danceabilityTolerance: env.DANCEABILITY_TOLERANCE,
      energyTolerance: env.ENERGY_TOLERANCE,
      tempoTolerance: env.TEMPO_TOLERANCE,
      valenceTolerance: env.VALENCE_TOLERANCE,
      minPopularity: env.MIN_POPULARITY,
    },
    limits: {
      similar: env.TOP_K_SIMILAR,
      disambiguation: env.TOP_K_DISAMBIGUATION,
    },
    nodeEnv: env.NODE_ENV,
  };

  logger.debug({
    catalogPath: cachedConfig.catalog.path,
    graphOutputPath: cachedConfig.graph.outputPath,
    thresholds: cachedConfig.thresholds,
    limits: cachedConfig.limits,
    nodeEnv: cachedConfig.nodeEnv,
  }, 'Configuration loaded');

  return cachedConfig;
}

export { logger } from '../utils/logger.js';
