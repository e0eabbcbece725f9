/**
 * Turn ring helpers. The player array is fixed; the successor of the last player is the first.
 */

import { Player } from './types';
import { GameInvariantError } from './errors';

export type RingLookup =
  | { ok: true; current: Player; next: Player; index: number }
  | { ok: false; reason: 'EMPTY_RING' | 'PLAYER_NOT_FOUND' };

export function findTurnPair(players: readonly Player[], currentId: string): RingLookup {
  if (players.length === 0) return { ok: false, reason: 'EMPTY_RING' };

  const index = players.findIndex((p) => p.id === currentId);
  if (index === -1) return { ok: false, reason: 'PLAYER_NOT_FOUND' };

  return { ok: true, current: players[index], next: players[(index + 1) % players.length], index };
}

/**
 * Lookup that treats a failed lookup as fatal
 */
export function requireTurnPair(players: readonly Player[], currentId: string): { current: Player; next: Player; index: number } {
  const lookup = findTurnPair(players, currentId);
  if (!lookup.ok) {
    const message = lookup.reason === 'EMPTY_RING' ? 'No players in game' : `No player with suspect name ${currentId}`;
    throw new GameInvariantError(lookup.reason, message);
  }
  return lookup;
}

/**
 * Players asked to disprove a guess: everyone after the guesser, wrapping once, guesser excluded.
 */
export function getRevealOrder(players: readonly Player[], guesserId: string): Player[] {
  const { index } = requireTurnPair(players, guesserId);
  const order: Player[] = [];
  for (let offset = 1; offset < players.length; offset++) {
    order.push(players[(index + offset) % players.length]);
  }
  return order;
}

export function replacePlayer(players: readonly Player[], player: Player): Player[] {
  const { index } = requireTurnPair(players, player.id);
  const next = [...players];
  next[index] = player;
  return next;
}

export function allOut(players: readonly Player[]): boolean {
  return players.every((p) => p.isOut);
}

export function hasActiveHuman(players: readonly Player[]): boolean {
  return players.some((p) => !p.isOut && p.agent === 'human');
}
