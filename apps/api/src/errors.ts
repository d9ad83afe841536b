/**
 * Terminal failures of a query. Not-found and invalid selection are
 * ordinary results, see engine/name-resolver.ts.
 */

export interface RowIssue {
  field: string;
  message: string;
}

export class CatalogLoadError extends Error {
  readonly source: string;
  readonly row?: number;
  readonly issues: RowIssue[];

  constructor(message: string, details: { source: string; row?: number; issues?: RowIssue[]; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.name = 'CatalogLoadError';
    this.source = details.source;
    this.row = details.row;
    this.issues = details.issues ?? [];
  }
}

export class GraphExportError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write graph to '${path}': ${reason}`, { cause });
    this.name = 'GraphExportError';
    this.path = path;
  }
}
