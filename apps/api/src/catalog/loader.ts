/**
 * Catalog Loader
 *
 * Reads a track catalog from CSV (header row required) into a frozen,
 * read-only array. Any unreadable file or malformed row aborts the load.
 */

import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import type { Catalog, Track } from '@track-graph/types';
import { logger } from '../config/index.js';
import { CatalogLoadError, type RowIssue } from '../errors.js';
import { TrackRowSchema } from './track-schema.js';

export function parseCatalog(csvContent: string, source = '<inline>'): Catalog {
  let rows: unknown[];
  try {
    const parsed: unknown = parse(csvContent, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
    rows = Array.isArray(parsed) ? parsed : [];
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`Malformed CSV in ${source}: ${reason}`, { source, cause: error });
  }

  const tracks: Track[] = [];
  const seenIds = new Set<string>();
  let duplicates = 0;

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const result = TrackRowSchema.safeParse(row);

    if (!result.success) {
      const issues: RowIssue[] = result.error.issues.map(issue => ({
        field: issue.path.join('.') || '<row>',
        message: issue.message,
      }));
      const detail = issues.map(i => `${i.field}: ${i.message}`).join('; ');
      throw new CatalogLoadError(`Invalid track at row ${rowNumber} of ${source}: ${detail}`, {
        source,
        row: rowNumber,
        issues,
      });
    }

    // The same recording can appear once per genre; the first row wins
    if (seenIds.has(result.data.track_id)) {
      duplicates++;
      return;
    }
    seenIds.add(result.data.track_id);
    tracks.push(Object.freeze(result.data));
  });

  if (duplicates > 0) {
    logger.warn({ source, duplicates }, 'Skipped rows with a repeated track_id');
  }

  return Object.freeze(tracks);
}

export async function loadCatalog(filePath: string): Promise<Catalog> {
  const startTime = Date.now();

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`Cannot read catalog '${filePath}': ${reason}`, {
      source: filePath,
      cause: error,
    });
  }

  const catalog = parseCatalog(content, filePath);

  logger.info({
    path: filePath,
    tracks: catalog.length,
    duration: Date.now() - startTime,
  }, 'Catalog loaded');

  return catalog;
}

/**
 * Holds the current catalog snapshot for long-running processes.
 * Reloading swaps in a new frozen array; a snapshot already handed out is
 * never modified.
 */
export class CatalogStore {
  private snapshot: Catalog;
  private readonly filePath: string;

  constructor(initial: Catalog, filePath: string) {
    this.snapshot = initial;
    this.filePath = filePath;
  }

  static async open(filePath: string): Promise<CatalogStore> {
    return new CatalogStore(await loadCatalog(filePath), filePath);
  }

  current(): Catalog {
    return this.snapshot;
  }

  get path(): string {
    return this.filePath;
  }

  async reload(): Promise<Catalog> {
    try {
      this.snapshot = await loadCatalog(this.filePath);
    } catch (error) {
      logger.error({ error, path: this.filePath }, 'Catalog reload failed, keeping previous snapshot');
      throw error;
    }
    return this.snapshot;
  }
}
