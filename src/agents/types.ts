/**
 * Agent Interface
 * The one capability every player kind shares: decide its next action
 */

import { Card, Location, Move, MovementOption, Player, PublicState, Solution } from '../game/types';

/**
 * What an agent may look at when deciding: its own player record and the public state
 */
export interface AgentContext {
  player: Player;
  public: PublicState;
}

export interface PlayerAgent {
  chooseMove(ctx: AgentContext, options: Move[]): Promise<Move>;
  chooseMovement(ctx: AgentContext, options: MovementOption[]): Promise<Location>;
  chooseGuess(ctx: AgentContext): Promise<Solution>;
  chooseAccusation(ctx: AgentContext): Promise<Solution>;
  /**
   * null when the player holds none of the guessed cards
   */
  chooseReveal(ctx: AgentContext, guess: Solution, askerId: string): Promise<Card | null>;
}
