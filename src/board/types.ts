/**
 * Board Interface
 * Abstracts board geometry so the turn logic never computes paths itself
 */

import { GameState, Move, MovementOption, Player } from '../game/types';

export interface IBoard {
  /**
   * Top-level choices at the start of a turn: always a roll, plus any passage out of the current room
   */
  getMoveOptions(state: GameState, player: Player): Move[];

  /**
   * Where the player can get to with `roll`, one option per target room
   */
  getMovementOptions(state: GameState, player: Player, roll: number): MovementOption[];
}
