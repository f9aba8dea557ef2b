export interface RawBlock {
  text: string;
  // 1-based, inclusive
  startLine: number;
  endLine: number;
}

export interface Command {
  readonly index: number;
  readonly text: string;
  readonly origin: { readonly startLine: number; readonly endLine: number };
}

export type CommandSet = readonly Command[];

export interface BlockMarkers {
  containerTag: string;
  blockClass: string;
  controlTag: string;
  controlClass: string;
}

/** A configurable (identifier, matcher, message) entry, shared by the normalizer and validator tables. */
export interface CommandRule {
  readonly id: string;
  readonly matcher: RegExp;
  readonly message: string;
}
