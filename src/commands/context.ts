import type { FetchEngine } from '../engine.js';

/** Writes one line of user-facing output. */
export type Printer = (line: string) => void;

export interface CommandContext {
  engine: FetchEngine;
  print: Printer;
  /** Checked between problems; aborting stops a batch early. */
  signal?: AbortSignal;
}
