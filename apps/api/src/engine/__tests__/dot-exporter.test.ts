import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

vi.mock('../../config/index.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
  },
}));

import { exportDot, renderDot } from '../dot-exporter.js';
import { buildSubgraph } from '../subgraph.js';
import { GraphExportError } from '../../errors.js';
import { makeTrack, songA, songB, SONG_A_FEATURES, SONG_A_TO_B_DOT } from '../../../test/fixtures/tracks.js';

describe('renderDot', () => {
  it('writes the centre node and a directed edge per neighbour', () => {
    expect(renderDot(buildSubgraph(songA, [songB]))).toBe(SONG_A_TO_B_DOT);
  });

  it('renders a centre without edges', () => {
    expect(renderDot(buildSubgraph(songA, []))).toBe(
      `digraph {\n    "Song A" [label="${SONG_A_FEATURES}"];\n}\n`
    );
  });

  it('writes names byte-for-byte between quotes', () => {
    const accented = makeTrack({ track_id: '7', track_name: 'Café del Mar – Remix' });
    const dot = renderDot(buildSubgraph(songA, [accented]));
    expect(dot.split('\n')[2].startsWith('    "Song A" -> "Café del Mar – Remix" [label=')).toBe(true);
  });

  it('is deterministic for identical input', () => {
    const first = renderDot(buildSubgraph(songA, [songB]));
    const second = renderDot(buildSubgraph(songA, [songB]));
    expect(second).toBe(first);
  });
});

describe('exportDot', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'track-graph-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the rendered graph to the given path', async () => {
    const target = path.join(dir, 'graph.dot');
    await exportDot(buildSubgraph(songA, [songB]), target);

    expect(await fs.readFile(target, 'utf-8')).toBe(SONG_A_TO_B_DOT);
  });

  it('produces identical files when run twice', async () => {
    const first = path.join(dir, 'first.dot');
    const second = path.join(dir, 'second.dot');
    await exportDot(buildSubgraph(songA, [songB]), first);
    await exportDot(buildSubgraph(songA, [songB]), second);

    expect(await fs.readFile(second)).toEqual(await fs.readFile(first));
  });

  it('rejects with the offending path when the target is unwritable', async () => {
    const target = path.join(dir, 'missing', 'graph.dot');
    const attempt = exportDot(buildSubgraph(songA, [songB]), target);

    await expect(attempt).rejects.toBeInstanceOf(GraphExportError);
    await expect(attempt).rejects.toMatchObject({ path: target });
  });
});
