import { beforeAll, afterAll, describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import type { Config } from '../../src/config/index.js';
import { CatalogStore, parseCatalog } from '../../src/catalog/loader.js';
import { buildServer } from '../../src/server.js';
import { CATALOG_HEADER, SAMPLE_CSV, SONG_A_TO_B_DOT, tightThresholds } from '../fixtures/tracks.js';

let app: FastifyInstance;
let dir: string;
let catalogPath: string;

beforeAll(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'track-graph-api-'));
  catalogPath = path.join(dir, 'tracks.csv');
  await fs.writeFile(catalogPath, SAMPLE_CSV, 'utf-8');

  const config: Config = {
    server: { port: 0, host: '127.0.0.1' },
    catalog: { path: catalogPath },
    graph: { outputPath: path.join(dir, 'graph.dot') },
    thresholds: tightThresholds,
    limits: { similar: 5, disambiguation: 3 },
    nodeEnv: 'test',
  };

  app = buildServer({ store: new CatalogStore(parseCatalog(SAMPLE_CSV, catalogPath), catalogPath), config });
  await app.ready();
});

afterAll(async () => {
  await app.close();
  await fs.rm(dir, { recursive: true, force: true });
});

describe('GET /health', () => {
  it('reports the loaded catalog size', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'healthy', catalog: { path: catalogPath, tracks: 5 } });
  });
});

describe('GET /api/tracks/resolve', () => {
  it('returns ranked candidates for a shared name', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/tracks/resolve?name=echo' });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.status).toBe('ambiguous');
    expect(body.candidates.map((c: { index: number; track: { track_id: string } }) => [c.index, c.track.track_id]))
      .toEqual([[1, '5'], [2, '4']]);
  });

  it('requires a name', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/tracks/resolve' });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('invalid_request');
  });
});

describe('POST /api/similar', () => {
  it('returns the similar tracks, summary and graph', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/similar', payload: { name: 'Song A' } });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.reference.track_id).toBe('1');
    expect(body.similar.map((t: { track_id: string }) => t.track_id)).toEqual(['2']);
    expect(body.summary).toHaveLength(2);
    expect(body.dot).toBe(SONG_A_TO_B_DOT);
  });

  it('serves the raw graph when asked for dot', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/similar', payload: { name: 'song a', format: 'dot' } });
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/vnd.graphviz; charset=utf-8');
    expect(res.body).toBe(SONG_A_TO_B_DOT);
  });

  it('returns 404 for an unknown name', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/similar', payload: { name: 'Nope' } });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ error: 'not_found', query: 'Nope' });
  });

  it('asks for a selection when the name is ambiguous', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/similar', payload: { name: 'Echo' } });
    expect(res.statusCode).toBe(409);

    const body = res.json();
    expect(body.error).toBe('ambiguous');
    expect(body.candidates).toHaveLength(2);
    expect(body.candidates[0].track.popularity).toBe(90);
  });

  it('resolves an ambiguous name with a selection', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/similar', payload: { name: 'Echo', selection: '2' } });
    expect(res.statusCode).toBe(200);
    expect(res.json().reference.track_id).toBe('4');
  });

  it('rejects an out-of-range selection', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/similar', payload: { name: 'Echo', selection: 3 } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: 'invalid_selection', input: '3', choices: 2 });
  });

  it('validates the request body', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/similar', payload: { name: '' } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('invalid_request');
  });

  it('answers a malformed JSON body as a client error', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/similar',
      headers: { 'content-type': 'application/json' },
      payload: '{"name":',
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('invalid_request');
  });
});

describe('POST /api/catalog/reload', () => {
  it('serves the new snapshot after a reload', async () => {
    await fs.writeFile(catalogPath, [CATALOG_HEADER, '9,Artist Z,Album Z,Song Z,60,0.1,0.2,100.0,0.3', ''].join('\n'), 'utf-8');

    const res = await app.inject({ method: 'POST', url: '/api/catalog/reload' });
    expect(res.statusCode).toBe(200);
    expect(res.json().tracks).toBe(1);

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.json().catalog.tracks).toBe(1);
  });

  it('keeps serving the old snapshot when the file is broken', async () => {
    await fs.writeFile(catalogPath, 'track_id,artists\n1,Someone\n', 'utf-8');

    const res = await app.inject({ method: 'POST', url: '/api/catalog/reload' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toMatchObject({ error: 'catalog_load_failed', source: catalogPath, row: 1 });

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.json().catalog.tracks).toBe(1);
  });
});
