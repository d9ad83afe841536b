import Fastify, { type FastifyReply } from 'fastify';
import type { ApiError, CandidateChoice, SimilarityResponse, Track } from '@track-graph/types';
import { logger, type Config } from './config/index.js';
import { CatalogStore } from './catalog/loader.js';
import { CatalogLoadError } from './errors.js';
import { SimilarityPipeline } from './engine/pipeline.js';
import { ResolveQuerySchema, SimilarRequestSchema } from './schemas/api.js';

export interface ServerDependencies {
  store: CatalogStore;
  config: Config;
}

function serverLoggerOptions(config: Config) {
  if (config.nodeEnv === 'test') return false;

  return {
    level: process.env.LOG_LEVEL ?? (config.nodeEnv === 'production' ? 'info' : 'debug'),
    transport: config.nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname,reqId,res,responseTime',
        messageFormat: '{msg}',
        translateTime: 'HH:MM:ss UTC',
      },
    } : undefined,
  };
}

function sendError(
  reply: FastifyReply,
  status: number,
  error: string,
  message: string,
  extra: Record<string, unknown> = {}
) {
  const body: ApiError & Record<string, unknown> = {
    error,
    message,
    ...extra,
    timestamp: new Date().toISOString(),
  };
  return reply.code(status).send(body);
}

function toChoices(candidates: Track[]): CandidateChoice[] {
  return candidates.map((track, index) => ({ index: index + 1, track }));
}

export function buildServer({ store, config }: ServerDependencies) {
  const fastify = Fastify({ logger: serverLoggerOptions(config) });
  const pipeline = new SimilarityPipeline({
    thresholds: config.thresholds,
    topSimilar: config.limits.similar,
    maxCandidates: config.limits.disambiguation,
  });

  fastify.get('/health', async (_, reply) => {
    return reply.code(200).send({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      catalog: {
        path: store.path,
        tracks: store.current().length,
      },
    });
  });

  // GET /api/tracks/resolve - name lookup without running a query
  fastify.get('/api/tracks/resolve', async (request, reply) => {
    const parsed = ResolveQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendError(reply, 400, 'invalid_request', parsed.error.issues.map(i => i.message).join('; '));
    }

    const resolution = pipeline.resolve(store.current(), parsed.data.name);
    switch (resolution.kind) {
      case 'not_found':
        return sendError(reply, 404, 'not_found', `No song found with the name '${resolution.query}'.`, {
          query: resolution.query,
        });
      case 'resolved':
        return reply.send({ status: 'resolved', track: resolution.track });
      case 'ambiguous':
        return reply.send({
          status: 'ambiguous',
          query: resolution.query,
          candidates: toChoices(resolution.candidates),
        });
    }
  });

  // POST /api/similar - resolve, filter and render in one request
  fastify.post('/api/similar', async (request, reply) => {
    const parsed = SimilarRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, 400, 'invalid_request', parsed.error.issues.map(i => i.message).join('; '));
    }

    const { name, selection, format } = parsed.data;
    // One snapshot per request, even if a reload lands halfway through
    const catalog = store.current();
    const resolution = pipeline.resolve(catalog, name);

    let reference: Track;
    if (resolution.kind === 'not_found') {
      return sendError(reply, 404, 'not_found', `No song found with the name '${resolution.query}'.`, {
        query: resolution.query,
      });
    } else if (resolution.kind === 'ambiguous') {
      if (selection === undefined) {
        return sendError(reply, 409, 'ambiguous', 'Multiple matches found, supply a selection.', {
          query: resolution.query,
          candidates: toChoices(resolution.candidates),
        });
      }

      const selected = pipeline.select(resolution, selection);
      if (selected.kind === 'invalid_selection') {
        return sendError(reply, 400, 'invalid_selection', `Invalid selection '${selected.input}'.`, {
          input: selected.input,
          choices: selected.choices,
        });
      }
      reference = selected.track;
    } else {
      reference = resolution.track;
    }

    const result = pipeline.run(catalog, reference);

    if (format === 'dot') {
      return reply.type('text/vnd.graphviz; charset=utf-8').send(result.dot);
    }

    const response: SimilarityResponse = {
      reference: result.reference,
      similar: result.similar,
      summary: result.summary,
      dot: result.dot,
    };
    return reply.send(response);
  });

  fastify.post('/api/catalog/reload', async (_, reply) => {
    try {
      const catalog = await store.reload();
      return reply.send({ tracks: catalog.length, timestamp: new Date().toISOString() });
    } catch (error) {
      if (error instanceof CatalogLoadError) {
        return sendError(reply, 500, 'catalog_load_failed', error.message, {
          source: error.source,
          row: error.row,
          issues: error.issues,
        });
      }
      throw error;
    }
  });

  fastify.setErrorHandler((error, _request, reply) => {
    const status = error.statusCode ?? 500;
    if (status < 500) {
      logger.warn({ error: error.message, status }, 'Rejected request');
      return sendError(reply, status, 'invalid_request', error.message);
    }
    logger.error({ error: error.message }, 'Unhandled request error');
    return sendError(reply, status, 'internal_error', 'Internal server error');
  });

  return fastify;
}
