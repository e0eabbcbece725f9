/**
 * Game Controller - drives the turn state machine to a terminal state
 *
 * The loop is iterative: each pass asks the current player's agent for the
 * decision the phase needs, feeds it to transition(), and executes the
 * resulting side effects on the display.
 */

import { IBoard } from '../board/types';
import { IDisplay } from '../adapter/types';
import { IResultStore } from '../storage/result-store';
import { AgentContext, PlayerAgent } from '../agents/types';
import { AiAgent } from '../agents/ai.agent';
import { HumanAgent } from '../agents/human.agent';
import {
  AgentKind,
  GameOverReason,
  GameResult,
  GameState,
  Player,
  Reveal,
  SideEffect,
  Solution,
  TransitionResult,
  TurnPhase,
  describeSolution,
} from './types';
import { describeMove, getPhaseDescription, isTerminal, transition } from './state-machine';
import { getRevealOrder, requireTurnPair } from './ring';
import { GameInvariantError } from './errors';
import { RandomSource, rollDice } from '../utils/random';
import { withRetry } from '../utils/retry';
import { gameLogger } from '../utils/logger';

export interface GameControllerOptions {
  board: IBoard;
  display: IDisplay;
  rng: RandomSource;
  store?: IResultStore | null;
  agents?: Partial<Record<AgentKind, PlayerAgent>>;
}

export interface GameStatus {
  phase: TurnPhase;
  phaseDescription: string;
  currentPlayer: string;
  turnsPlayed: number;
  playersActive: number;
  playersOut: number;
  winner: string | null;
}

const GAME_OVER_MESSAGES: Record<GameOverReason, string> = {
  ALL_ELIMINATED: 'Every player has been eliminated.',
  NO_HUMANS_LEFT: 'No human players are left in the game.',
  TURN_LIMIT: 'The turn limit was reached without a correct accusation.',
};

export class GameController {
  private board: IBoard;
  private display: IDisplay;
  private rng: RandomSource;
  private store: IResultStore | null;
  private agents: Record<AgentKind, PlayerAgent>;
  private state: GameState;
  private result: GameResult | null = null;

  constructor(initialState: GameState, options: GameControllerOptions) {
    this.state = initialState;
    this.board = options.board;
    this.display = options.display;
    this.rng = options.rng;
    this.store = options.store ?? null;
    this.agents = {
      ai: options.agents?.ai ?? new AiAgent(options.rng),
      human: options.agents?.human ?? new HumanAgent(options.display),
    };
  }

  /**
   * Play until someone wins or the game stops
   */
  async run(): Promise<GameState> {
    gameLogger.info(
      { players: this.state.players.map((p) => p.id), firstPlayer: this.state.public.currentPlayer, aiOnly: this.state.public.aiOnly },
      'Game started'
    );

    try {
      while (!isTerminal(this.state)) {
        await this.step();
      }
    } catch (error) {
      if (error instanceof GameInvariantError) {
        gameLogger.error({ code: error.code, phase: this.state.phase }, error.message);
        this.display.displayError(error.message);
      }
      throw error;
    }

    gameLogger.info({ phase: this.state.phase, winner: this.state.winner, turns: this.state.turnsPlayed }, 'Game finished');
    return this.state;
  }

  /**
   * Advance by one decision
   */
  async step(): Promise<void> {
    switch (this.state.phase) {
      case TurnPhase.TURN_START:
        await this.applyTransition(transition(this.state, { type: 'START_TURN' }));
        return;
      case TurnPhase.AWAIT_MOVE:
        await this.handleMove();
        return;
      case TurnPhase.AWAIT_MOVEMENT:
        await this.handleMovement();
        return;
      case TurnPhase.AWAIT_GUESS:
        await this.handleGuess();
        return;
      case TurnPhase.AWAIT_ACCUSATION:
        await this.handleAccusation();
        return;
      case TurnPhase.WIN:
      case TurnPhase.GAME_OVER:
        return;
    }
  }

  private currentPlayer(): Player {
    return requireTurnPair(this.state.players, this.state.public.currentPlayer).current;
  }

  private agentFor(player: Player): PlayerAgent {
    return this.agents[player.agent];
  }

  private contextFor(player: Player): AgentContext {
    return { player, public: this.state.public };
  }

  private async handleMove(): Promise<void> {
    const player = this.currentPlayer();
    const options = this.board.getMoveOptions(this.state, player);
    const move = await this.agentFor(player).chooseMove(this.contextFor(player), options);
    this.display.printMove(player, move);
    gameLogger.debug({ player: player.id, move: describeMove(move) }, 'Move chosen');

    const roll = move.type === 'ROLL' ? rollDice(this.rng) : undefined;
    await this.applyTransition(transition(this.state, { type: 'CHOOSE_MOVE', move, roll }));
  }

  private async handleMovement(): Promise<void> {
    const player = this.currentPlayer();
    const roll = this.state.turn?.roll;
    if (roll === null || roll === undefined) {
      throw new GameInvariantError('EMPTY_CHOICE', `${player.id} has no roll to move with`);
    }

    const options = this.board.getMovementOptions(this.state, player, roll);
    const location = await this.agentFor(player).chooseMovement(this.contextFor(player), options);
    await this.applyTransition(transition(this.state, { type: 'CHOOSE_MOVEMENT', location }));
  }

  private async handleGuess(): Promise<void> {
    const guesser = this.currentPlayer();
    const guess = await this.agentFor(guesser).chooseGuess(this.contextFor(guesser));
    const reveal = await this.collectReveal(guesser, guess);
    gameLogger.debug({ guesser: guesser.id, guess: describeSolution(guess), revealer: reveal?.revealerId ?? null }, 'Guess resolved');
    await this.applyTransition(transition(this.state, { type: 'SUBMIT_GUESS', guess, reveal }));
  }

  /**
   * Ask each player after the guesser, in ring order, until one shows a card
   */
  private async collectReveal(guesser: Player, guess: Solution): Promise<Reveal | null> {
    for (const player of getRevealOrder(this.state.players, guesser.id)) {
      const card = await this.agentFor(player).chooseReveal(this.contextFor(player), guess, guesser.id);
      if (card) return { revealerId: player.id, card };
    }
    return null;
  }

  private async handleAccusation(): Promise<void> {
    const player = this.currentPlayer();
    const accusation = await this.agentFor(player).chooseAccusation(this.contextFor(player));
    await this.applyTransition(transition(this.state, { type: 'SUBMIT_ACCUSATION', accusation }));
  }

  private async applyTransition(result: TransitionResult): Promise<void> {
    if (result.state.phase !== this.state.phase) {
      gameLogger.debug({ from: this.state.phase, to: result.state.phase, player: result.state.public.currentPlayer }, 'Phase changed');
    }
    this.state = result.state;
    await this.executeSideEffects(result.sideEffects);
  }

  private playerById(id: string): Player {
    return requireTurnPair(this.state.players, id).current;
  }

  private async executeSideEffects(effects: SideEffect[]): Promise<void> {
    for (const effect of effects) {
      switch (effect.type) {
        case 'ANNOUNCE_PUBLIC':
          this.display.displayMessage(effect.message);
          break;
        case 'ANNOUNCE_PRIVATE':
          this.display.displayPrivate(this.playerById(effect.playerId), effect.message);
          break;
        case 'SHOW_TURN':
          this.display.printTurn(this.state, this.playerById(effect.playerId));
          break;
        case 'SHOW_DICE_ROLL':
          this.display.printDiceRoll(this.playerById(effect.playerId), effect.roll);
          break;
        case 'SHOW_MOVEMENT':
          this.display.printMovement(this.playerById(effect.playerId), effect.location);
          break;
        case 'SHOW_GUESS':
          this.display.printGuess(this.playerById(effect.playerId), effect.guess, effect.accusation);
          break;
        case 'VICTORY':
          this.display.displayVictory(this.playerById(effect.playerId), this.state.envelope);
          break;
        case 'GAME_OVER':
          this.display.displayGameOver(`${GAME_OVER_MESSAGES[effect.reason]} It was ${describeSolution(this.state.envelope)}.`);
          break;
        case 'LOG_RESULT':
          await this.logResult(effect.result);
          break;
      }
    }
  }

  private async logResult(result: GameResult): Promise<void> {
    this.result = result;
    gameLogger.info({ gameResult: { ...result, envelope: describeSolution(result.envelope) } }, 'Game completed');

    const store = this.store;
    if (!store) return;
    try {
      await withRetry(() => store.saveResult(result), { label: 'save game result' });
    } catch (error) {
      gameLogger.error({ error }, 'Failed to save game result');
    }
  }

  getState(): GameState { return this.state; }
  getResult(): GameResult | null { return this.result; }
  getTurnsPlayed(): number { return this.state.turnsPlayed; }

  getStatus(): GameStatus {
    const out = this.state.players.filter((p) => p.isOut).length;
    return {
      phase: this.state.phase,
      phaseDescription: getPhaseDescription(this.state.phase),
      currentPlayer: this.state.public.currentPlayer,
      turnsPlayed: this.state.turnsPlayed,
      playersActive: this.state.players.length - out,
      playersOut: out,
      winner: this.state.winner,
    };
  }
}
