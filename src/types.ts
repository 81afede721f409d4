/**
 * A place in the scanned input where a string was seen.
 */
export interface Location {
  /** File path, or the name given to standard input */
  source: string;

  /** Line number (1-based) */
  line: number;
}

/**
 * A recoverable syntax deviation found while scanning.
 */
export interface ScanWarning {
  source: string;
  line: number;
  message: string;
}

/**
 * Table name -> translatable column names. Keys and members are lower-case.
 */
export type Registry = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Table being loaded by the statement under the cursor.
 */
export interface TableTarget {
  /** Lower-cased table name, as found in the registry */
  table: string;

  /** Column names in statement order; ordinal N is columns[N - 1] */
  columns: string[];
}

/**
 * Scanner state. Per-statement data only exists on the variants that use it.
 */
export type ScanState =
  | { kind: 'idle' }
  // INSERT path
  | { kind: 'seen-insert' }
  | { kind: 'seen-into' }
  | { kind: 'in-column-list'; target: TableTarget; open: boolean }
  | { kind: 'column-list-done'; target: TableTarget }
  | { kind: 'seen-values-open'; target: TableTarget }
  | { kind: 'in-value-tuple'; target: TableTarget; ordinal: number }
  | { kind: 'value-tuple-done'; target: TableTarget }
  // COPY path
  | { kind: 'seen-copy' }
  | { kind: 'in-copy-column-list'; target: TableTarget; open: boolean }
  | { kind: 'copy-column-list-done'; target: TableTarget }
  | { kind: 'seen-from-stdin'; target: TableTarget }
  | { kind: 'seen-custom-delimiter'; target: TableTarget; delimiter: string }
  | { kind: 'in-data-block'; target: TableTarget; delimiter: string }
  // comments
  | { kind: 'in-block-comment'; resume: ScanState };

/**
 * Side effects produced by a transition. The scan driver attaches locations.
 */
export type ScanEffect =
  | { kind: 'record'; text: string }
  | { kind: 'warning'; message: string };

/**
 * The scan cursor: everything the driver carries from one line to the next.
 */
export interface ScanCursor {
  state: ScanState;

  /** Number of raw lines consumed so far */
  line: number;

  /** Unconsumed text carried over to the next line */
  pending: string;
}
