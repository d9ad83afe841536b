import { z } from 'zod';

// Blank counts as unset
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const numeric = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);

const tolerance = (fallback: number) => numeric(z.coerce.number().nonnegative().default(fallback));
const topK = (fallback: number) => numeric(z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  PORT: numeric(z.coerce.number().int().default(4000)),
  HOST: z.string().default('0.0.0.0'),
  CATALOG_PATH: z.string().min(1).default('spotify.csv'),
  GRAPH_OUTPUT_PATH: z.string().min(1).default('graph.dot'),
  DANCEABILITY_TOLERANCE: tolerance(0.05),
  ENERGY_TOLERANCE: tolerance(0.05),
  TEMPO_TOLERANCE: tolerance(50.0),
  VALENCE_TOLERANCE: tolerance(0.1),
  MIN_POPULARITY: numeric(z.coerce.number().default(70)),
  TOP_K_SIMILAR: topK(5),
  TOP_K_DISAMBIGUATION: topK(3),
});

export type ServerEnv = z.infer<typeof envSchema>;

// Lazy-loaded environment configuration - doesn't throw at import time
let cachedEnv: ServerEnv | null = null;

export function loadServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  if (cachedEnv && source === process.env) {
    return cachedEnv;
  }

  try {
    const parsed = envSchema.parse(source);
    if (source === process.env) {
      cachedEnv = parsed;
    }
    return parsed;
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error('Missing/invalid env: ' + JSON.stringify(error.format()));
    }
    throw error;
  }
}
