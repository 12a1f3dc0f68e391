/** A header row plus body rows of cleaned cell text. */
export interface Table {
  header: string[];
  rows: string[][];
}

/** How to find one kind of table in a document. */
export interface TableLocator {
  /** Human label used in errors, e.g. "spread history" */
  what: string;
  /** CSS selector for candidate <table> elements */
  selector: string;
  /** The table's text must match this to count */
  match?: RegExp;
  /** Index of the header row among all rows; defaults to 0 */
  headerRow?: number;
  /** Rows to drop directly after the header (summary rows) */
  skipRows?: number;
}
