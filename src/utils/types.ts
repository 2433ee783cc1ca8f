export interface Position {
  line: number;
  column: number;
}

export interface SourcePosition extends Position {
  offset: number;
}

/** Anything that can be pointed at in the source: a message plus a 1-based position. */
export interface SourceError extends Position {
  message: string;
}
