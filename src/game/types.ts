/**
 * Game Types for the Whodunit deduction game
 */

/**
 * Card categories. Every card belongs to exactly one.
 */
export enum CardCategory {
  SUSPECT = 'SUSPECT',
  WEAPON = 'WEAPON',
  ROOM = 'ROOM',
}

export const CARD_CATEGORIES: readonly CardCategory[] = [
  CardCategory.SUSPECT,
  CardCategory.WEAPON,
  CardCategory.ROOM,
];

export interface Card {
  category: CardCategory;
  name: string;
}

/**
 * What a player believes about one card
 */
export type Belief =
  | { type: 'UNKNOWN' }
  | { type: 'MINE'; shownTo: readonly string[] } // rivals who have already seen it
  | { type: 'ENVELOPE' }
  | { type: 'SHOWN_BY'; playerId: string };

export interface SheetEntry {
  card: Card;
  belief: Belief;
}

/**
 * A player's private knowledge, keyed by cardKey()
 */
export type Sheet = ReadonlyMap<string, SheetEntry>;

/**
 * One suspect, one weapon, one room. Used for the envelope, guesses and accusations.
 */
export interface Solution {
  suspect: Card;
  weapon: Card;
  room: Card;
}

export type Location = { kind: 'room'; name: string } | { kind: 'space'; id: string };

export type Move = { type: 'ROLL' } | { type: 'PASSAGE'; destination: Location };

/**
 * A reachable location for a roll. There is one option per target room:
 * either the room itself or the closest reachable space on the way to it.
 */
export interface MovementOption {
  location: Location;
  room: string;
  entersRoom: boolean;
}

export type AgentKind = 'human' | 'ai';

export interface Player {
  id: string; // suspect name
  agent: AgentKind;
  location: Location;
  isOut: boolean;
  sheet: Sheet;
}

export interface PublicState {
  currentPlayer: string;
  accusationRoom: string;
  aiOnly: boolean;
}

/**
 * Turn phases following the state machine pattern
 */
export enum TurnPhase {
  TURN_START = 'TURN_START',
  AWAIT_MOVE = 'AWAIT_MOVE',
  AWAIT_MOVEMENT = 'AWAIT_MOVEMENT',
  AWAIT_GUESS = 'AWAIT_GUESS',
  AWAIT_ACCUSATION = 'AWAIT_ACCUSATION',
  WIN = 'WIN',
  GAME_OVER = 'GAME_OVER',
}

export interface TurnContext {
  playerId: string;
  roll: number | null;
}

export type GameOverReason = 'ALL_ELIMINATED' | 'NO_HUMANS_LEFT' | 'TURN_LIMIT';

export interface GameSettings {
  maxTurns: number; // 0 = unlimited
}

export const DEFAULT_GAME_SETTINGS: GameSettings = {
  maxTurns: 0,
};

/**
 * Complete game state. Transitions never mutate it; they return a new one.
 */
export interface GameState {
  phase: TurnPhase;
  players: readonly Player[]; // fixed order, defines the turn ring
  public: PublicState;
  envelope: Solution;
  universe: readonly Card[];
  turn: TurnContext | null;
  turnsPlayed: number;
  winner: string | null;
  gameOverReason: GameOverReason | null;
  settings: GameSettings;
}

export interface Reveal {
  revealerId: string;
  card: Card;
}

/**
 * Actions that can modify game state
 */
export type GameAction =
  | { type: 'START_TURN' }
  | { type: 'CHOOSE_MOVE'; move: Move; roll?: number }
  | { type: 'CHOOSE_MOVEMENT'; location: Location }
  | { type: 'SUBMIT_GUESS'; guess: Solution; reveal: Reveal | null }
  | { type: 'SUBMIT_ACCUSATION'; accusation: Solution };

/**
 * Summary of a finished game
 */
export interface GameResult {
  winner: string | null;
  reason: 'WIN' | GameOverReason;
  envelope: Solution;
  turnsPlayed: number;
  players: { id: string; agent: AgentKind; isOut: boolean }[];
}

/**
 * Result from a state transition
 */
export interface TransitionResult {
  state: GameState;
  sideEffects: SideEffect[];
}

/**
 * Side effects to execute after state transition
 */
export type SideEffect =
  | { type: 'ANNOUNCE_PUBLIC'; message: string }
  | { type: 'ANNOUNCE_PRIVATE'; playerId: string; message: string }
  | { type: 'SHOW_TURN'; playerId: string }
  | { type: 'SHOW_DICE_ROLL'; playerId: string; roll: number }
  | { type: 'SHOW_MOVEMENT'; playerId: string; location: Location }
  | { type: 'SHOW_GUESS'; playerId: string; guess: Solution; accusation: boolean }
  | { type: 'VICTORY'; playerId: string }
  | { type: 'GAME_OVER'; reason: GameOverReason }
  | { type: 'LOG_RESULT'; result: GameResult };

export function cardKey(card: Card): string {
  return `${card.category}:${card.name}`;
}

export function sameCard(a: Card, b: Card): boolean {
  return a.category === b.category && a.name === b.name;
}

export function sameSolution(a: Solution, b: Solution): boolean {
  return sameCard(a.suspect, b.suspect) && sameCard(a.weapon, b.weapon) && sameCard(a.room, b.room);
}

export function solutionCards(solution: Solution): [Card, Card, Card] {
  return [solution.suspect, solution.weapon, solution.room];
}

export function describeLocation(location: Location): string {
  switch (location.kind) {
    case 'room':
      return location.name;
    case 'space':
      return `space ${location.id}`;
  }
}

export function describeSolution(solution: Solution): string {
  return `${solution.suspect.name} with the ${solution.weapon.name} in the ${solution.room.name}`;
}
