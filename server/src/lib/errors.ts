/** `unauthorized` refusals are logged as warnings; `precondition` ones only go back to the client. */
export type GameErrorKind = 'unauthorized' | 'precondition';

/**
 * An error the acting client caused. The message is sent back to that client
 * verbatim as `ERROR{message}`; nobody else sees it.
 */
export class GameError extends Error {
  constructor(
    message: string,
    public readonly kind: GameErrorKind = 'precondition'
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
