import type { Track } from '@track-graph/types';
import type { Config } from '../config/index.js';
import { loadCatalog } from '../catalog/loader.js';
import { describeCandidates } from '../engine/name-resolver.js';
import { exportDot } from '../engine/dot-exporter.js';
import { SimilarityPipeline } from '../engine/pipeline.js';

export interface CliArgs {
  catalog?: string;
  output?: string;
  name?: string;
  select?: string;
}

/** Line-oriented terminal boundary, replaced by a fake in tests */
export interface CliIO {
  print(line: string): void;
  ask(question: string): Promise<string>;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args = argv.filter(arg => arg !== '--');
  const get = (prefix: string) => {
    const match = args.find(a => a.startsWith(prefix));
    return match === undefined ? undefined : match.slice(prefix.length);
  };

  return {
    catalog: get('--catalog='),
    output: get('--output='),
    name: get('--name='),
    select: get('--select='),
  };
}

/**
 * Runs one interactive query. Returns the process exit code; load and
 * export failures are thrown to the caller.
 */
export async function runSimilarCommand(args: CliArgs, io: CliIO, config: Config): Promise<number> {
  const catalogPath = args.catalog ?? config.catalog.path;
  const outputPath = args.output ?? config.graph.outputPath;
  const pipeline = new SimilarityPipeline({
    thresholds: config.thresholds,
    topSimilar: config.limits.similar,
    maxCandidates: config.limits.disambiguation,
  });

  const catalog = await loadCatalog(catalogPath);
  io.print(`Loaded ${catalog.length} tracks from the dataset.`);

  const name = args.name ?? await io.ask('Enter the name of a song: ');
  const resolution = pipeline.resolve(catalog, name);

  if (resolution.kind === 'not_found') {
    io.print(`No song found with the name '${resolution.query}'.`);
    return 0;
  }

  let reference: Track;
  if (resolution.kind === 'ambiguous') {
    io.print(`Multiple matches found. Please select one of the top ${resolution.candidates.length} most popular songs:`);
    describeCandidates(resolution).forEach(line => io.print(line));

    const input = args.select ?? await io.ask('Enter the number of the correct song: ');
    const selection = pipeline.select(resolution, input);
    if (selection.kind === 'invalid_selection') {
      io.print('Invalid selection.');
      return 0;
    }
    reference = selection.track;
  } else {
    reference = resolution.track;
  }

  const result = pipeline.run(catalog, reference);
  result.summary.forEach(line => io.print(line));

  await exportDot(result.subgraph, outputPath);
  io.print(`Graph exported to '${outputPath}'.`);
  return 0;
}
