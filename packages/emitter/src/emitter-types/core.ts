/**
 * Core emitter types
 */

/**
 * Options for bridge source generation
 */
export type EmitterOptions = {
  /** Indentation style (spaces) */
  readonly indent?: number;
  /** Comment placed above the first item, one `//` line per text line */
  readonly header?: string;
};

/**
 * Context threaded through emission
 */
export type EmitterContext = {
  readonly indentLevel: number;
  readonly options: EmitterOptions;
};
