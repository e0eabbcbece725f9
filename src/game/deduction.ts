/**
 * Deduction Engine - heuristic policy for automated players.
 *
 * Every function is pure: it reads only the acting player's own sheet and the
 * public state, and takes its tie-breaks from the injected random source.
 */

import {
  Belief,
  Card,
  CardCategory,
  Location,
  Move,
  MovementOption,
  PublicState,
  Sheet,
  Solution,
  cardKey,
  solutionCards,
} from './types';
import { cardsWithBelief, getBelief, getSolutionGuess, isCategorySolved, isFullySolved } from './sheet';
import { GameInvariantError } from './errors';
import { RandomSource, pickRandom } from '../utils/random';

function roomBelief(sheet: Sheet, room: string): Belief['type'] | null {
  const entry = sheet.get(cardKey({ category: CardCategory.ROOM, name: room }));
  return entry ? entry.belief.type : null;
}

function locationBelief(sheet: Sheet, location: Location): Belief['type'] | null {
  return location.kind === 'room' ? roomBelief(sheet, location.name) : null;
}

/**
 * Roll the dice or take a secret passage
 */
export function decideMove(sheet: Sheet, options: readonly Move[], rng: RandomSource): Move {
  const passagesTo = (type: Belief['type']): Move[] =>
    options.filter((m) => m.type === 'PASSAGE' && locationBelief(sheet, m.destination) === type);

  if (!isCategorySolved(sheet, CardCategory.ROOM)) {
    const mine = passagesTo('MINE');
    if (mine.length > 0) return pickRandom(rng, mine);
    const envelope = passagesTo('ENVELOPE');
    if (envelope.length > 0) return pickRandom(rng, envelope);
    return { type: 'ROLL' };
  }

  const unknown = passagesTo('UNKNOWN');
  if (unknown.length > 0) return pickRandom(rng, unknown);
  return { type: 'ROLL' };
}

/**
 * Choose where to go with the rolled dice
 */
export function decideMovement(
  sheet: Sheet,
  publicState: PublicState,
  options: readonly MovementOption[],
  rng: RandomSource
): Location {
  if (isFullySolved(sheet)) {
    const toAccusation = options.filter((o) => o.room === publicState.accusationRoom);
    if (toAccusation.length !== 1) {
      throw new GameInvariantError(
        'AMBIGUOUS_ACCUSATION_ROOM',
        `Expected one option toward ${publicState.accusationRoom}, found ${toAccusation.length}`
      );
    }
    return toAccusation[0].location;
  }

  const candidates = options.filter((o) => o.room !== publicState.accusationRoom);
  const probing = !isCategorySolved(sheet, CardCategory.SUSPECT) || !isCategorySolved(sheet, CardCategory.WEAPON);
  const roomSolved = isCategorySolved(sheet, CardCategory.ROOM);

  const isTarget = (o: MovementOption): boolean => {
    const belief = roomBelief(sheet, o.room);
    return belief === 'ENVELOPE' || (probing && belief === 'MINE');
  };
  const isUnknown = (o: MovementOption): boolean => roomBelief(sheet, o.room) === 'UNKNOWN';

  const tiers: MovementOption[][] = [
    probing ? candidates.filter((o) => o.entersRoom && roomBelief(sheet, o.room) === 'MINE') : [],
    candidates.filter((o) => o.entersRoom && roomBelief(sheet, o.room) === 'ENVELOPE'),
    candidates.filter(isTarget),
    roomSolved ? [] : candidates.filter((o) => o.entersRoom && isUnknown(o)),
    roomSolved ? [] : candidates.filter(isUnknown),
    candidates,
  ];

  const tier = tiers.find((t) => t.length > 0) ?? [];
  return pickRandom(rng, tier).location;
}

/**
 * Suggest a suspect and weapon; the room is wherever the player stands.
 */
export function decideGuess(sheet: Sheet, currentRoom: Location, rng: RandomSource): Solution {
  if (currentRoom.kind !== 'room' || !roomBelief(sheet, currentRoom.name)) {
    throw new GameInvariantError('NOT_A_ROOM', 'Trying to guess from outside a room');
  }

  const pick = (category: CardCategory): Card => {
    if (isCategorySolved(sheet, category)) {
      const mine = cardsWithBelief(sheet, category, 'MINE');
      if (mine.length > 0) return pickRandom(rng, mine);
      return cardsWithBelief(sheet, category, 'ENVELOPE')[0];
    }
    return pickRandom(rng, cardsWithBelief(sheet, category, 'UNKNOWN'));
  };

  return {
    suspect: pick(CardCategory.SUSPECT),
    weapon: pick(CardCategory.WEAPON),
    room: { category: CardCategory.ROOM, name: currentRoom.name },
  };
}

export function decideAccusation(sheet: Sheet): Solution {
  const { suspect, weapon, room } = getSolutionGuess(sheet);
  if (!suspect || !weapon || !room) {
    throw new GameInvariantError('UNRESOLVED_CATEGORY', 'Cannot accuse before every category is solved');
  }
  return { suspect, weapon, room };
}

/**
 * Pick which card to show the asker, or null when we hold none of the guessed cards.
 * Cards the asker has not seen yet are preferred.
 */
export function decideReveal(sheet: Sheet, guess: Solution, askerId: string, rng: RandomSource): Card | null {
  const matches: { card: Card; shownTo: readonly string[] }[] = [];
  for (const card of solutionCards(guess)) {
    const belief = getBelief(sheet, card);
    if (belief.type === 'MINE') matches.push({ card, shownTo: belief.shownTo });
  }

  if (matches.length === 0) return null;
  if (matches.length === 1) return matches[0].card;

  const fresh = matches.filter((m) => !m.shownTo.includes(askerId));
  return pickRandom(rng, fresh.length > 0 ? fresh : matches).card;
}
