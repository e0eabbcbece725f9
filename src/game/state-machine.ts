/**
 * Pure Turn State Machine
 */

import {
  GameState,
  GameAction,
  GameOverReason,
  GameResult,
  Location,
  Move,
  Player,
  Reveal,
  SideEffect,
  Solution,
  TransitionResult,
  TurnPhase,
  describeLocation,
  sameSolution,
} from './types';
import { allOut, hasActiveHuman, replacePlayer, requireTurnPair } from './ring';
import { markNoDisprove, noteShownTo, recordShown } from './sheet';

export function transition(state: GameState, action: GameAction): TransitionResult {
  switch (action.type) {
    case 'START_TURN':
      return handleStartTurn(state);
    case 'CHOOSE_MOVE':
      return handleChooseMove(state, action.move, action.roll);
    case 'CHOOSE_MOVEMENT':
      return handleChooseMovement(state, action.location);
    case 'SUBMIT_GUESS':
      return handleSubmitGuess(state, action.guess, action.reveal);
    case 'SUBMIT_ACCUSATION':
      return handleSubmitAccusation(state, action.accusation);
    default:
      return { state, sideEffects: [] };
  }
}

export function isTerminal(state: GameState): boolean {
  return state.phase === TurnPhase.WIN || state.phase === TurnPhase.GAME_OVER;
}

function buildResult(state: GameState, reason: GameResult['reason']): GameResult {
  return {
    winner: state.winner,
    reason,
    envelope: state.envelope,
    turnsPlayed: state.turnsPlayed,
    players: state.players.map((p) => ({ id: p.id, agent: p.agent, isOut: p.isOut })),
  };
}

function gameOver(state: GameState, reason: GameOverReason, sideEffects: SideEffect[]): TransitionResult {
  const ended: GameState = { ...state, phase: TurnPhase.GAME_OVER, turn: null, gameOverReason: reason };
  return {
    state: ended,
    sideEffects: [...sideEffects, { type: 'GAME_OVER', reason }, { type: 'LOG_RESULT', result: buildResult(ended, reason) }],
  };
}

/**
 * Hand the turn to `nextId` and go back to TURN_START
 */
function advance(state: GameState, nextId: string, sideEffects: SideEffect[]): TransitionResult {
  return {
    state: {
      ...state,
      phase: TurnPhase.TURN_START,
      public: { ...state.public, currentPlayer: nextId },
      turn: null,
      turnsPlayed: state.turnsPlayed + 1,
    },
    sideEffects,
  };
}

function handleStartTurn(state: GameState): TransitionResult {
  if (state.phase !== TurnPhase.TURN_START) return { state, sideEffects: [] };

  const { current, next } = requireTurnPair(state.players, state.public.currentPlayer);

  if (current.isOut) {
    if (allOut(state.players)) return gameOver(state, 'ALL_ELIMINATED', []);
    return {
      state: { ...state, public: { ...state.public, currentPlayer: next.id } },
      sideEffects: [],
    };
  }

  if (state.settings.maxTurns > 0 && state.turnsPlayed >= state.settings.maxTurns) {
    return gameOver(state, 'TURN_LIMIT', [
      { type: 'ANNOUNCE_PUBLIC', message: `Turn limit of ${state.settings.maxTurns} reached.` },
    ]);
  }

  return {
    state: { ...state, phase: TurnPhase.AWAIT_MOVE, turn: { playerId: current.id, roll: null } },
    sideEffects: [{ type: 'SHOW_TURN', playerId: current.id }],
  };
}

function handleChooseMove(state: GameState, move: Move, roll: number | undefined): TransitionResult {
  if (state.phase !== TurnPhase.AWAIT_MOVE || !state.turn) return { state, sideEffects: [] };

  if (move.type === 'PASSAGE') {
    return resolveLocation(state, move.destination, []);
  }

  if (roll === undefined || roll < 2 || roll > 12) return { state, sideEffects: [] };

  return {
    state: { ...state, phase: TurnPhase.AWAIT_MOVEMENT, turn: { ...state.turn, roll } },
    sideEffects: [{ type: 'SHOW_DICE_ROLL', playerId: state.turn.playerId, roll }],
  };
}

function handleChooseMovement(state: GameState, location: Location): TransitionResult {
  if (state.phase !== TurnPhase.AWAIT_MOVEMENT || !state.turn) return { state, sideEffects: [] };
  return resolveLocation(state, location, []);
}

/**
 * Store the new location, then decide what the landing square lets the player do
 */
function resolveLocation(state: GameState, location: Location, sideEffects: SideEffect[]): TransitionResult {
  const { current, next } = requireTurnPair(state.players, state.public.currentPlayer);
  const moved: Player = { ...current, location };
  const players = replacePlayer(state.players, moved);
  const effects: SideEffect[] = [...sideEffects, { type: 'SHOW_MOVEMENT', playerId: moved.id, location }];

  if (location.kind === 'room' && location.name === state.public.accusationRoom) {
    return { state: { ...state, players, phase: TurnPhase.AWAIT_ACCUSATION }, sideEffects: effects };
  }

  if (location.kind === 'room') {
    return { state: { ...state, players, phase: TurnPhase.AWAIT_GUESS }, sideEffects: effects };
  }

  return advance({ ...state, players }, next.id, effects);
}

function handleSubmitGuess(state: GameState, guess: Solution, reveal: Reveal | null): TransitionResult {
  if (state.phase !== TurnPhase.AWAIT_GUESS || !state.turn) return { state, sideEffects: [] };

  const { current: guesser, next } = requireTurnPair(state.players, state.public.currentPlayer);
  const sideEffects: SideEffect[] = [{ type: 'SHOW_GUESS', playerId: guesser.id, guess, accusation: false }];

  if (!reveal) {
    const updated: Player = { ...guesser, sheet: markNoDisprove(guesser.sheet, guess) };
    sideEffects.push({ type: 'ANNOUNCE_PUBLIC', message: 'No one could disprove the guess.' });
    return advance({ ...state, players: replacePlayer(state.players, updated) }, next.id, sideEffects);
  }

  const { current: revealer } = requireTurnPair(state.players, reveal.revealerId);
  const updatedGuesser: Player = { ...guesser, sheet: recordShown(guesser.sheet, reveal.card, revealer.id) };
  const updatedRevealer: Player = { ...revealer, sheet: noteShownTo(revealer.sheet, reveal.card, guesser.id) };
  const players = replacePlayer(replacePlayer(state.players, updatedGuesser), updatedRevealer);

  sideEffects.push(
    { type: 'ANNOUNCE_PUBLIC', message: `${revealer.id} showed a card to ${guesser.id}.` },
    { type: 'ANNOUNCE_PRIVATE', playerId: guesser.id, message: `${revealer.id} showed you ${reveal.card.name}.` }
  );

  return advance({ ...state, players }, next.id, sideEffects);
}

function handleSubmitAccusation(state: GameState, accusation: Solution): TransitionResult {
  if (state.phase !== TurnPhase.AWAIT_ACCUSATION || !state.turn) return { state, sideEffects: [] };

  const { current, next } = requireTurnPair(state.players, state.public.currentPlayer);
  const sideEffects: SideEffect[] = [{ type: 'SHOW_GUESS', playerId: current.id, guess: accusation, accusation: true }];

  if (sameSolution(accusation, state.envelope)) {
    const won: GameState = { ...state, phase: TurnPhase.WIN, winner: current.id, turn: null };
    return {
      state: won,
      sideEffects: [...sideEffects, { type: 'VICTORY', playerId: current.id }, { type: 'LOG_RESULT', result: buildResult(won, 'WIN') }],
    };
  }

  const players = replacePlayer(state.players, { ...current, isOut: true });
  sideEffects.push({
    type: 'ANNOUNCE_PUBLIC',
    message: `${current.id} guessed incorrectly, and is out of the game.`,
  });

  const eliminated: GameState = { ...state, players };
  if (allOut(players)) return gameOver(eliminated, 'ALL_ELIMINATED', sideEffects);
  if (!state.public.aiOnly && !hasActiveHuman(players)) return gameOver(eliminated, 'NO_HUMANS_LEFT', sideEffects);

  return advance(eliminated, next.id, sideEffects);
}

export function getCurrentActor(state: GameState): string | null {
  return state.turn?.playerId ?? null;
}

export function getPhaseDescription(phase: TurnPhase): string {
  const names: Record<TurnPhase, string> = {
    [TurnPhase.TURN_START]: 'Starting turn',
    [TurnPhase.AWAIT_MOVE]: 'Choosing move',
    [TurnPhase.AWAIT_MOVEMENT]: 'Moving',
    [TurnPhase.AWAIT_GUESS]: 'Guessing',
    [TurnPhase.AWAIT_ACCUSATION]: 'Accusing',
    [TurnPhase.WIN]: 'Won',
    [TurnPhase.GAME_OVER]: 'Game over',
  };
  return names[phase] ?? 'Unknown';
}

export function describeMove(move: Move): string {
  return move.type === 'ROLL' ? 'Roll dice' : `Secret passage to ${describeLocation(move.destination)}`;
}
