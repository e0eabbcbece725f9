/**
 * Console Display Adapter - hot-seat play in a terminal
 *
 * Everything public is printed to stdout. Private messages are printed only for
 * human players; what automated players learn goes to the debug log.
 */

import * as readline from 'readline';
import { IDisplay, DisplayConfig, PromptOption } from './types';
import { Card, GameState, Location, Move, MovementOption, Player, Solution, describeSolution } from '../game/types';
import { CommandType, formatOptions, generateHelpText, generateNotesText, parseCommand, resolveOption } from '../commands/handler';
import { cardOptions, formatGuess, formatMove, formatMovement, formatTurn, moveOptions, movementOptions } from './format';
import { GameInvariantError } from '../game/errors';
import { displayLogger } from '../utils/logger';

interface PendingLine {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

export class ConsoleDisplay implements IDisplay {
  private config: DisplayConfig;
  private output: NodeJS.WritableStream;
  private rl: readline.Interface | null = null;
  private lines: string[] = []; // typed before the prompt that reads them
  private pending: PendingLine | null = null;
  private inputClosed = false;

  constructor(config: DisplayConfig) {
    this.config = config;
    this.output = config.output ?? process.stdout;
  }

  private getInterface(): readline.Interface {
    if (!this.rl) {
      const rl = readline.createInterface({
        input: this.config.input ?? process.stdin,
        output: this.output,
        terminal: this.config.terminal,
      });

      rl.on('line', (line) => {
        const pending = this.pending;
        if (pending) {
          this.pending = null;
          pending.resolve(line);
        } else {
          this.lines.push(line);
        }
      });

      rl.on('close', () => {
        this.inputClosed = true;
        const pending = this.pending;
        this.pending = null;
        pending?.reject(new Error('Input closed while waiting for an answer'));
      });

      rl.on('SIGINT', () => {
        displayLogger.info('Interrupted at prompt');
        if (this.config.onInterrupt) {
          this.config.onInterrupt();
        } else {
          rl.close();
        }
      });

      this.rl = rl;
    }
    return this.rl;
  }

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }

  printTurn(state: GameState, player: Player): void {
    this.print(`\n=== ${formatTurn(state, player)} ===`);
  }

  printMove(player: Player, move: Move): void {
    this.print(formatMove(player, move));
  }

  printDiceRoll(player: Player, roll: number): void {
    this.print(`${player.id} rolled a ${roll}.`);
  }

  printMovement(player: Player, location: Location): void {
    this.print(formatMovement(player, location));
  }

  printGuess(player: Player, guess: Solution, accusation: boolean): void {
    this.print(formatGuess(player, guess, accusation));
  }

  displayMessage(message: string): void {
    this.print(message);
  }

  displayPrivate(player: Player, message: string): void {
    if (player.agent === 'human') {
      this.print(`[to ${player.id}] ${message}`);
    } else {
      displayLogger.debug({ player: player.id, message }, 'Private message');
    }
  }

  displayError(message: string): void {
    this.print(`Error: ${message}`);
  }

  displayVictory(player: Player, envelope: Solution): void {
    this.print(`\n*** ${player.id} wins! It was ${describeSolution(envelope)}. ***`);
  }

  displayGameOver(message: string): void {
    this.print(`\nGame over. ${message}`);
  }

  promptMove(player: Player, options: Move[]): Promise<Move> {
    return this.promptChoice(player, `${player.id}, roll or take a passage?`, moveOptions(options));
  }

  promptMovement(player: Player, options: MovementOption[]): Promise<Location> {
    return this.promptChoice(player, `${player.id}, where do you want to go?`, movementOptions(options));
  }

  promptCard(player: Player, question: string, options: Card[]): Promise<Card> {
    return this.promptChoice(player, `${player.id}, ${question}`, cardOptions(options));
  }

  promptReveal(player: Player, askerId: string, options: Card[]): Promise<Card> {
    return this.promptChoice(player, `${player.id}, which card do you show ${askerId}?`, cardOptions(options));
  }

  /**
   * Ask until the answer picks an option. On timeout the first option is taken.
   */
  private async promptChoice<T>(player: Player, question: string, options: PromptOption<T>[]): Promise<T> {
    if (options.length === 0) {
      throw new GameInvariantError('EMPTY_CHOICE', `Nothing to offer ${player.id}: ${question}`);
    }

    for (;;) {
      const answer = await this.readLine(`${question}\n${formatOptions(options)}\n> `);
      if (answer === null) {
        this.print(`No answer in time, choosing "${options[0].label}".`);
        displayLogger.info({ player: player.id, choice: options[0].label }, 'Prompt timed out');
        return options[0].value;
      }

      const command = parseCommand(answer);
      if (command.type === CommandType.NOTES) {
        this.print(generateNotesText(player));
        continue;
      }
      if (command.type === CommandType.HELP) {
        this.print(generateHelpText());
        continue;
      }

      const resolved = resolveOption(command, options);
      if (resolved.valid && resolved.value !== undefined) {
        return resolved.value;
      }
      this.displayError(resolved.error ?? 'Invalid choice');
    }
  }

  /**
   * Resolves with the next typed line, or null when the prompt timeout expires
   */
  private readLine(query: string): Promise<string | null> {
    const rl = this.getInterface();
    rl.setPrompt(query);
    rl.prompt();

    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.inputClosed) return Promise.reject(new Error('Input closed while waiting for an answer'));

    const ms = this.config.promptTimeoutSeconds * 1000;
    return new Promise((resolve, reject) => {
      const timer =
        ms > 0
          ? setTimeout(() => {
              this.pending = null;
              this.print('');
              resolve(null);
            }, ms)
          : null;

      this.pending = {
        resolve: (line) => {
          if (timer) clearTimeout(timer);
          resolve(line);
        },
        reject: (error) => {
          if (timer) clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  close(): void {
    // A prompt still waiting is abandoned, not failed
    this.pending = null;
    this.lines = [];
    if (this.rl) {
      this.rl.close();
      this.rl = null;
    }
  }
}

/**
 * Create the terminal display
 */
export function createConsoleDisplay(config: DisplayConfig): ConsoleDisplay {
  return new ConsoleDisplay(config);
}
