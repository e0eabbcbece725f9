/**
 * Builds the initial game state from a definition: envelope, deal, sheets, seats
 */

import { GameDefinition } from './definition';
import {
  Card,
  CardCategory,
  DEFAULT_GAME_SETTINGS,
  GameSettings,
  GameState,
  Location,
  Player,
  Solution,
  TurnPhase,
  cardKey,
  solutionCards,
} from '../game/types';
import { initializeSheet } from '../game/sheet';
import { RandomSource, pickRandom, shuffle } from '../utils/random';
import { boardLogger } from '../utils/logger';

export interface GameSetupOptions {
  aiOnly?: boolean;
  settings?: Partial<GameSettings>;
}

export function buildUniverse(definition: GameDefinition): Card[] {
  return [
    ...definition.suspects.map((name) => ({ category: CardCategory.SUSPECT, name })),
    ...definition.weapons.map((name) => ({ category: CardCategory.WEAPON, name })),
    ...definition.rooms.map((name) => ({ category: CardCategory.ROOM, name })),
  ];
}

function drawEnvelope(definition: GameDefinition, rng: RandomSource): Solution {
  const fixed = definition.envelope;
  return {
    suspect: { category: CardCategory.SUSPECT, name: fixed?.suspect ?? pickRandom(rng, definition.suspects) },
    weapon: { category: CardCategory.WEAPON, name: fixed?.weapon ?? pickRandom(rng, definition.weapons) },
    room: { category: CardCategory.ROOM, name: fixed?.room ?? pickRandom(rng, definition.rooms) },
  };
}

/**
 * Deal the remaining cards round-robin in seating order
 */
export function dealHands(cards: readonly Card[], playerCount: number, rng: RandomSource): Card[][] {
  const hands: Card[][] = Array.from({ length: playerCount }, () => []);
  shuffle(rng, cards).forEach((card, i) => {
    hands[i % playerCount].push(card);
  });
  return hands;
}

export function createGameState(definition: GameDefinition, rng: RandomSource, options: GameSetupOptions = {}): GameState {
  const universe = buildUniverse(definition);
  const envelope = drawEnvelope(definition, rng);
  const hidden = new Set(solutionCards(envelope).map(cardKey));
  const hands = dealHands(
    universe.filter((c) => !hidden.has(cardKey(c))),
    definition.players.length,
    rng
  );

  const roomNames = new Set([...definition.rooms, definition.accusationRoom]);
  const players: Player[] = definition.players.map((seat, i) => {
    const start = definition.board.start[seat.suspect];
    const location: Location = roomNames.has(start) ? { kind: 'room', name: start } : { kind: 'space', id: start };
    return {
      id: seat.suspect,
      agent: seat.agent,
      location,
      isOut: false,
      sheet: initializeSheet(universe, hands[i]),
    };
  });

  boardLogger.info(
    { players: players.map((p) => `${p.id}(${p.agent})`), cardsPerPlayer: hands.map((h) => h.length) },
    'Cards dealt'
  );

  return {
    phase: TurnPhase.TURN_START,
    players,
    public: {
      currentPlayer: definition.firstPlayer ?? players[0].id,
      accusationRoom: definition.accusationRoom,
      aiOnly: options.aiOnly ?? false,
    },
    envelope,
    universe,
    turn: null,
    turnsPlayed: 0,
    winner: null,
    gameOverReason: null,
    settings: { ...DEFAULT_GAME_SETTINGS, ...options.settings },
  };
}
