/**
 * Mock Display Adapter for Testing
 */

import { IDisplay, DisplayConfig, PromptOption } from './types';
import { Card, GameState, Location, Move, MovementOption, Player, Solution, describeSolution } from '../game/types';
import { CommandType, parseCommand, resolveOption } from '../commands/handler';
import { cardOptions, formatGuess, formatMove, formatMovement, formatTurn, moveOptions, movementOptions } from './format';

interface RecordedMessage {
  type: 'public' | 'private' | 'error' | 'victory' | 'game_over';
  message: string;
  playerId?: string;
}

interface RecordedPrompt {
  playerId: string;
  labels: string[];
  answer: string;
}

/**
 * Mock implementation of IDisplay. Human answers are scripted in advance and
 * resolved exactly as typed input would be.
 */
export class MockDisplay implements IDisplay {
  private messages: RecordedMessage[] = [];
  private prompts: RecordedPrompt[] = [];
  private answers: string[] = [];

  constructor(_config: DisplayConfig = { promptTimeoutSeconds: 0 }) {
    // Timeouts are not simulated
  }

  printTurn(state: GameState, player: Player): void {
    this.record('public', formatTurn(state, player));
  }

  printMove(player: Player, move: Move): void {
    this.record('public', formatMove(player, move));
  }

  printDiceRoll(player: Player, roll: number): void {
    this.record('public', `${player.id} rolled a ${roll}.`);
  }

  printMovement(player: Player, location: Location): void {
    this.record('public', formatMovement(player, location));
  }

  printGuess(player: Player, guess: Solution, accusation: boolean): void {
    this.record('public', formatGuess(player, guess, accusation));
  }

  displayMessage(message: string): void {
    this.record('public', message);
  }

  displayPrivate(player: Player, message: string): void {
    this.record('private', message, player.id);
  }

  displayError(message: string): void {
    this.record('error', message);
  }

  displayVictory(player: Player, envelope: Solution): void {
    this.record('victory', `${player.id} wins! It was ${describeSolution(envelope)}.`, player.id);
  }

  displayGameOver(message: string): void {
    this.record('game_over', message);
  }

  promptMove(player: Player, options: Move[]): Promise<Move> {
    return this.answer(player, moveOptions(options));
  }

  promptMovement(player: Player, options: MovementOption[]): Promise<Location> {
    return this.answer(player, movementOptions(options));
  }

  promptCard(player: Player, _question: string, options: Card[]): Promise<Card> {
    return this.answer(player, cardOptions(options));
  }

  promptReveal(player: Player, _askerId: string, options: Card[]): Promise<Card> {
    return this.answer(player, cardOptions(options));
  }

  close(): void {
    this.answers = [];
  }

  private record(type: RecordedMessage['type'], message: string, playerId?: string): void {
    this.messages.push({ type, message, playerId });
  }

  private async answer<T>(player: Player, options: PromptOption<T>[]): Promise<T> {
    for (;;) {
      const next = this.answers.shift();
      if (next === undefined) {
        throw new Error(`No scripted answer left for ${player.id}`);
      }

      this.prompts.push({ playerId: player.id, labels: options.map((o) => o.label), answer: next });
      const command = parseCommand(next);
      if (command.type === CommandType.NOTES || command.type === CommandType.HELP) continue;

      const resolved = resolveOption(command, options);
      if (resolved.valid && resolved.value !== undefined) {
        return resolved.value;
      }
      this.displayError(resolved.error ?? 'Invalid choice');
    }
  }

  // === Test Helper Methods ===

  /**
   * Script the next answers typed by human players
   */
  queueAnswers(...answers: string[]): void {
    this.answers.push(...answers);
  }

  getRemainingAnswers(): number {
    return this.answers.length;
  }

  /**
   * Get all recorded messages (for assertions)
   */
  getRecordedMessages(): RecordedMessage[] {
    return [...this.messages];
  }

  getPublicMessages(): string[] {
    return this.messages.filter((m) => m.type === 'public').map((m) => m.message);
  }

  getPrivateMessages(playerId: string): string[] {
    return this.messages.filter((m) => m.type === 'private' && m.playerId === playerId).map((m) => m.message);
  }

  getErrors(): string[] {
    return this.messages.filter((m) => m.type === 'error').map((m) => m.message);
  }

  getPrompts(): RecordedPrompt[] {
    return [...this.prompts];
  }

  /**
   * Clear recorded output (useful between test assertions)
   */
  clearMessages(): void {
    this.messages = [];
    this.prompts = [];
  }
}
