/**
 * Automated player backed by the deduction engine. Decisions resolve immediately.
 */

import { AgentContext, PlayerAgent } from './types';
import { Card, Location, Move, MovementOption, Solution } from '../game/types';
import { decideAccusation, decideGuess, decideMove, decideMovement, decideReveal } from '../game/deduction';
import { RandomSource } from '../utils/random';

export class AiAgent implements PlayerAgent {
  private rng: RandomSource;

  constructor(rng: RandomSource) {
    this.rng = rng;
  }

  async chooseMove(ctx: AgentContext, options: Move[]): Promise<Move> {
    return decideMove(ctx.player.sheet, options, this.rng);
  }

  async chooseMovement(ctx: AgentContext, options: MovementOption[]): Promise<Location> {
    return decideMovement(ctx.player.sheet, ctx.public, options, this.rng);
  }

  async chooseGuess(ctx: AgentContext): Promise<Solution> {
    return decideGuess(ctx.player.sheet, ctx.player.location, this.rng);
  }

  async chooseAccusation(ctx: AgentContext): Promise<Solution> {
    return decideAccusation(ctx.player.sheet);
  }

  async chooseReveal(ctx: AgentContext, guess: Solution, askerId: string): Promise<Card | null> {
    return decideReveal(ctx.player.sheet, guess, askerId, this.rng);
  }
}
