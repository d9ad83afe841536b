/**
 * Graphviz DOT export
 *
 * Nodes are written under their display names, wrapped in double quotes
 * as-is. A name that itself contains a double quote produces an invalid
 * file; names are not escaped.
 */

import fs from 'fs/promises';
import type { Subgraph } from '@track-graph/types';
import { logger } from '../config/index.js';
import { GraphExportError } from '../errors.js';
import { formatFeatures } from './subgraph.js';

const INDENT = '    ';

export function renderDot(subgraph: Subgraph): string {
  const { center, edges } = subgraph;
  const lines = ['digraph {'];

  lines.push(`${INDENT}"${center.label}" [label="${formatFeatures(center.features)}"];`);
  for (const edge of edges) {
    lines.push(
      `${INDENT}"${center.label}" -> "${edge.target.label}" [label="${formatFeatures(edge.target.features)}"];`
    );
  }
  lines.push('}');

  return lines.join('\n') + '\n';
}

export async function exportDot(subgraph: Subgraph, filePath: string): Promise<void> {
  try {
    await fs.writeFile(filePath, renderDot(subgraph), 'utf-8');
  } catch (error) {
    throw new GraphExportError(filePath, error);
  }

  logger.debug({ path: filePath, edges: subgraph.edges.length }, 'Graph exported');
}
