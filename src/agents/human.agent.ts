/**
 * Human player: every decision is a prompt on the display
 */

import { AgentContext, PlayerAgent } from './types';
import { Card, CardCategory, Location, Move, MovementOption, Solution, solutionCards } from '../game/types';
import { entriesOf, getBelief } from '../game/sheet';
import { GameInvariantError } from '../game/errors';
import { IDisplay } from '../adapter/types';

export class HumanAgent implements PlayerAgent {
  private display: IDisplay;

  constructor(display: IDisplay) {
    this.display = display;
  }

  chooseMove(ctx: AgentContext, options: Move[]): Promise<Move> {
    return this.display.promptMove(ctx.player, options);
  }

  chooseMovement(ctx: AgentContext, options: MovementOption[]): Promise<Location> {
    return this.display.promptMovement(ctx.player, options);
  }

  private cardsOf(ctx: AgentContext, category: CardCategory): Card[] {
    return entriesOf(ctx.player.sheet, category).map((e) => e.card);
  }

  async chooseGuess(ctx: AgentContext): Promise<Solution> {
    const location = ctx.player.location;
    if (location.kind !== 'room') {
      throw new GameInvariantError('NOT_A_ROOM', 'Trying to guess from outside a room');
    }

    const suspect = await this.display.promptCard(ctx.player, 'who do you suspect?', this.cardsOf(ctx, CardCategory.SUSPECT));
    const weapon = await this.display.promptCard(ctx.player, 'with which weapon?', this.cardsOf(ctx, CardCategory.WEAPON));
    return { suspect, weapon, room: { category: CardCategory.ROOM, name: location.name } };
  }

  async chooseAccusation(ctx: AgentContext): Promise<Solution> {
    this.display.displayMessage(`${ctx.player.id} must make a final accusation.`);
    const suspect = await this.display.promptCard(ctx.player, 'who did it?', this.cardsOf(ctx, CardCategory.SUSPECT));
    const weapon = await this.display.promptCard(ctx.player, 'with which weapon?', this.cardsOf(ctx, CardCategory.WEAPON));
    const room = await this.display.promptCard(ctx.player, 'in which room?', this.cardsOf(ctx, CardCategory.ROOM));
    return { suspect, weapon, room };
  }

  /**
   * A player holding a guessed card must show one; the choice only matters with several
   */
  async chooseReveal(ctx: AgentContext, guess: Solution, askerId: string): Promise<Card | null> {
    const matches = solutionCards(guess).filter((card) => getBelief(ctx.player.sheet, card).type === 'MINE');
    if (matches.length === 0) return null;
    if (matches.length === 1) return matches[0];
    return this.display.promptReveal(ctx.player, askerId, matches);
  }
}
