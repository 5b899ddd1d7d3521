// shared/errors.ts — Programming errors raised by the engine

/**
 * Thrown when the engine is driven in a way the rules never allow, such as
 * stepping a snapshot that already reached a terminal verdict. Not a game
 * outcome; callers should let it propagate.
 */
export class EngineInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineInvariantError';
  }
}
