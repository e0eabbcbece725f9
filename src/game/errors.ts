/**
 * Invariant violations. These indicate a logic bug and halt the run.
 */

export type InvariantCode =
  | 'EMPTY_RING'
  | 'PLAYER_NOT_FOUND'
  | 'UNRESOLVED_CATEGORY'
  | 'EMPTY_CHOICE'
  | 'UNKNOWN_CARD'
  | 'BELIEF_CONFLICT'
  | 'NOT_A_ROOM'
  | 'AMBIGUOUS_ACCUSATION_ROOM';

export class GameInvariantError extends Error {
  constructor(public readonly code: InvariantCode, message: string) {
    super(message);
    this.name = 'GameInvariantError';
  }
}
