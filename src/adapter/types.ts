/**
 * Display Adapter Interface
 * Abstracts presentation and human prompting for testing and implementation flexibility
 */

import { Card, GameState, Location, Move, MovementOption, Player, Solution } from '../game/types';

/**
 * Display configuration for initialization
 */
export interface DisplayConfig {
  promptTimeoutSeconds: number; // 0 = wait forever
  input?: NodeJS.ReadableStream; // defaults to stdin
  output?: NodeJS.WritableStream; // defaults to stdout
  terminal?: boolean;
  // Ctrl+C at a prompt. Without a handler the input is closed.
  onInterrupt?: () => void;
}

/**
 * A labelled choice offered to a human
 */
export interface PromptOption<T> {
  label: string;
  value: T;
}

/**
 * Abstract interface for everything the players see and type.
 * Output methods contribute nothing back to the game; prompts return the human's choice.
 */
export interface IDisplay {
  // Output
  printTurn(state: GameState, player: Player): void;
  printMove(player: Player, move: Move): void;
  printDiceRoll(player: Player, roll: number): void;
  printMovement(player: Player, location: Location): void;
  printGuess(player: Player, guess: Solution, accusation: boolean): void;
  displayMessage(message: string): void;
  displayPrivate(player: Player, message: string): void;
  displayError(message: string): void;
  displayVictory(player: Player, envelope: Solution): void;
  displayGameOver(message: string): void;

  // Prompts (human players only)
  promptMove(player: Player, options: Move[]): Promise<Move>;
  promptMovement(player: Player, options: MovementOption[]): Promise<Location>;
  promptCard(player: Player, question: string, options: Card[]): Promise<Card>;
  promptReveal(player: Player, askerId: string, options: Card[]): Promise<Card>;

  // Cleanup
  close(): void | Promise<void>;
}

