// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position in a document's source text (line and column are 1-based) */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}
