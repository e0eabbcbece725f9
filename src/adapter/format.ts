/**
 * Text shared by every display
 */

import { Card, GameState, Location, Move, MovementOption, Player, Solution, describeLocation, describeSolution } from '../game/types';
import { PromptOption } from './types';

export function formatTurn(state: GameState, player: Player): string {
  return `Turn ${state.turnsPlayed + 1}: ${player.id} (${describeLocation(player.location)})`;
}

export function formatMove(player: Player, move: Move): string {
  return move.type === 'ROLL'
    ? `${player.id} rolls the dice.`
    : `${player.id} takes the secret passage to ${describeLocation(move.destination)}.`;
}

export function formatMovement(player: Player, location: Location): string {
  return location.kind === 'room'
    ? `${player.id} entered ${location.name}.`
    : `${player.id} landed on space ${location.id}.`;
}

export function formatGuess(player: Player, guess: Solution, accusation: boolean): string {
  return `${player.id} ${accusation ? 'accuses' : 'suggests'} ${describeSolution(guess)}.`;
}

export function moveOptions(options: Move[]): PromptOption<Move>[] {
  return options.map((move) => ({
    label: move.type === 'ROLL' ? 'Roll' : `Passage to ${describeLocation(move.destination)}`,
    value: move,
  }));
}

export function movementOptions(options: MovementOption[]): PromptOption<Location>[] {
  return options.map((o) => ({
    label: o.entersRoom ? `Enter ${o.room}` : `Toward ${o.room} (${describeLocation(o.location)})`,
    value: o.location,
  }));
}

export function cardOptions(options: Card[]): PromptOption<Card>[] {
  return options.map((card) => ({ label: card.name, value: card }));
}
