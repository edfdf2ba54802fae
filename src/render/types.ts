export type OutputFormat = 'markdown' | 'json' | 'csv' | 'slack' | 'url';

export interface RenderOptions {
  title: string;
  /** Adds the parent column; set when the rows are children of the requested issues. */
  showChildren: boolean;
  /** Tracker base URL, used by the deep link. */
  serverUrl: string;
  generatedAt: Date;
  /** Append "(N days ago)" to markdown last-update links. */
  relativeDates?: boolean;
  /** Reference time for relative dates; defaults to `generatedAt`. */
  now?: Date;
}
