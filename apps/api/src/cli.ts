#!/usr/bin/env node
import 'dotenv/config';
import readline from 'readline/promises';
import { loadConfig, logger } from './config/index.js';
import { CatalogLoadError, GraphExportError } from './errors.js';
import { parseCliArgs, runSimilarCommand, type CliIO } from './cli/similar-command.js';

async function main(): Promise<number> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const io: CliIO = {
    print: line => console.log(line),
    ask: question => rl.question(question),
  };

  try {
    return await runSimilarCommand(parseCliArgs(process.argv.slice(2)), io, loadConfig());
  } catch (error) {
    if (error instanceof CatalogLoadError) {
      logger.error({ source: error.source, row: error.row, issues: error.issues }, error.message);
    } else if (error instanceof GraphExportError) {
      logger.error({ path: error.path, cause: error.cause }, error.message);
    } else {
      logger.error({ error }, 'Unexpected failure');
    }
    return 1;
  } finally {
    rl.close();
  }
}

main().then(code => {
  process.exitCode = code;
});
