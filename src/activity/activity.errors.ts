import type { Window } from './types.js';

/** A timestamp or continuation footer that cannot be read. The record is skipped. */
export class ParseError extends Error {
  readonly name = 'ParseError';

  constructor(
    readonly field: string,
    readonly value: unknown,
    reason?: string,
  ) {
    super(`Cannot parse ${field}: ${JSON.stringify(value)}${reason ? ` (${reason})` : ''}`);
  }
}

/** The adaptive window reached today without enough content. Not a failure. */
export class InsufficientContentError extends Error {
  readonly name = 'InsufficientContentError';

  constructor(
    readonly window: Window,
    readonly items: number,
    readonly activities: number,
  ) {
    super(
      `Not enough content between ${window.start.toISOString().slice(0, 10)} and ` +
        `${window.end.toISOString().slice(0, 10)}: ${items} items, ${activities} comments/commits`,
    );
  }
}

/** The repository itself cannot be resolved; the only fatal engine error. */
export class RepositoryNotFoundError extends Error {
  readonly name = 'RepositoryNotFoundError';

  constructor(readonly repository: string, cause?: unknown) {
    super(`Repository ${repository} could not be resolved`, { cause });
  }
}
