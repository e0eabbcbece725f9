/**
 * Knowledge Sheet - one player's beliefs over the whole card universe.
 *
 * Sheets are immutable; every operation returns a new sheet. Beliefs only move
 * forward: UNKNOWN may become ENVELOPE or SHOWN_BY, MINE never changes category.
 */

import { Belief, Card, CardCategory, CARD_CATEGORIES, Sheet, SheetEntry, Solution, cardKey, solutionCards } from './types';
import { GameInvariantError } from './errors';

export interface SolutionGuess {
  suspect: Card | null;
  weapon: Card | null;
  room: Card | null;
}

export function initializeSheet(universe: readonly Card[], hand: readonly Card[]): Sheet {
  const handKeys = new Set(hand.map(cardKey));
  const sheet = new Map<string, SheetEntry>();

  for (const card of universe) {
    const key = cardKey(card);
    const belief: Belief = handKeys.has(key) ? { type: 'MINE', shownTo: [] } : { type: 'UNKNOWN' };
    sheet.set(key, { card, belief });
  }

  for (const key of handKeys) {
    if (!sheet.has(key)) {
      throw new GameInvariantError('UNKNOWN_CARD', `Hand card ${key} is not part of the game`);
    }
  }

  return sheet;
}

export function getBelief(sheet: Sheet, card: Card): Belief {
  const entry = sheet.get(cardKey(card));
  if (!entry) {
    throw new GameInvariantError('UNKNOWN_CARD', `Card ${cardKey(card)} is not on the sheet`);
  }
  return entry.belief;
}

function withBelief(sheet: Sheet, card: Card, belief: Belief): Sheet {
  const key = cardKey(card);
  const entry = sheet.get(key);
  if (!entry) {
    throw new GameInvariantError('UNKNOWN_CARD', `Card ${key} is not on the sheet`);
  }
  const next = new Map(sheet);
  next.set(key, { ...entry, belief });
  return next;
}

/**
 * A rival revealed `card` to us.
 */
export function recordShown(sheet: Sheet, card: Card, by: string): Sheet {
  const belief = getBelief(sheet, card);
  switch (belief.type) {
    case 'UNKNOWN':
      return withBelief(sheet, card, { type: 'SHOWN_BY', playerId: by });
    case 'SHOWN_BY':
      return sheet;
    case 'MINE':
    case 'ENVELOPE':
      throw new GameInvariantError(
        'BELIEF_CONFLICT',
        `${cardKey(card)} was shown by ${by} but is already marked ${belief.type}`
      );
  }
}

/**
 * Nobody could disprove the guess, so every guessed card we do not know about is in the envelope.
 */
export function markNoDisprove(sheet: Sheet, guess: Solution): Sheet {
  let next = sheet;
  for (const card of solutionCards(guess)) {
    if (getBelief(next, card).type === 'UNKNOWN') {
      next = withBelief(next, card, { type: 'ENVELOPE' });
    }
  }
  return next;
}

export function noteShownTo(sheet: Sheet, card: Card, viewer: string): Sheet {
  const belief = getBelief(sheet, card);
  if (belief.type !== 'MINE') {
    throw new GameInvariantError('BELIEF_CONFLICT', `Cannot show ${cardKey(card)}: it is not in hand`);
  }
  if (belief.shownTo.includes(viewer)) return sheet;
  return withBelief(sheet, card, { type: 'MINE', shownTo: [...belief.shownTo, viewer] });
}

export function entriesOf(sheet: Sheet, category?: CardCategory): SheetEntry[] {
  const entries = Array.from(sheet.values());
  return category ? entries.filter((e) => e.card.category === category) : entries;
}

export function cardsWithBelief(sheet: Sheet, category: CardCategory, type: Belief['type']): Card[] {
  return entriesOf(sheet, category)
    .filter((e) => e.belief.type === type)
    .map((e) => e.card);
}

export function hand(sheet: Sheet): Card[] {
  return entriesOf(sheet)
    .filter((e) => e.belief.type === 'MINE')
    .map((e) => e.card);
}

export function isCategorySolved(sheet: Sheet, category: CardCategory): boolean {
  return cardsWithBelief(sheet, category, 'ENVELOPE').length === 1;
}

export function isFullySolved(sheet: Sheet): boolean {
  return CARD_CATEGORIES.every((category) => isCategorySolved(sheet, category));
}

export function getSolutionGuess(sheet: Sheet): SolutionGuess {
  const solved = (category: CardCategory): Card | null => {
    const cards = cardsWithBelief(sheet, category, 'ENVELOPE');
    return cards.length === 1 ? cards[0] : null;
  };

  return {
    suspect: solved(CardCategory.SUSPECT),
    weapon: solved(CardCategory.WEAPON),
    room: solved(CardCategory.ROOM),
  };
}

export function describeBelief(belief: Belief): string {
  switch (belief.type) {
    case 'UNKNOWN':
      return '?';
    case 'MINE':
      return belief.shownTo.length > 0 ? `mine (shown to ${belief.shownTo.join(', ')})` : 'mine';
    case 'ENVELOPE':
      return 'envelope';
    case 'SHOWN_BY':
      return `shown by ${belief.playerId}`;
  }
}
