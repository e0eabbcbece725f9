/**
 * Unit Tests for the Turn State Machine
 */

import { describeMove, getCurrentActor, getPhaseDescription, isTerminal, transition } from '../../src/game/state-machine';
import { getBelief } from '../../src/game/sheet';
import { GameState, TurnPhase } from '../../src/game/types';
import { ENVELOPE, makePlayer, makeState, room, suspect, weapon } from '../fixtures/game';

function playerById(state: GameState, id: string) {
  const player = state.players.find((p) => p.id === id);
  if (!player) throw new Error(`missing player ${id}`);
  return player;
}

describe('State Machine', () => {
  const awaiting = (phase: TurnPhase, overrides: Partial<GameState> = {}): GameState =>
    makeState({ phase, turn: { playerId: 'Red', roll: null }, ...overrides });

  describe('START_TURN', () => {
    it('should start the current player on their move', () => {
      const result = transition(makeState(), { type: 'START_TURN' });

      expect(result.state.phase).toBe(TurnPhase.AWAIT_MOVE);
      expect(result.state.turn).toEqual({ playerId: 'Red', roll: null });
      expect(result.sideEffects).toEqual([{ type: 'SHOW_TURN', playerId: 'Red' }]);
      expect(getCurrentActor(result.state)).toBe('Red');
    });

    it('should skip a player who is out without counting a turn', () => {
      const state = makeState({
        players: [makePlayer('Red', { isOut: true }), makePlayer('Green'), makePlayer('Blue')],
      });
      const result = transition(state, { type: 'START_TURN' });

      expect(result.state.phase).toBe(TurnPhase.TURN_START);
      expect(result.state.public.currentPlayer).toBe('Green');
      expect(result.state.turnsPlayed).toBe(0);
      expect(result.sideEffects).toEqual([]);
    });

    it('should end the game when every player is out', () => {
      const state = makeState({
        players: ['Red', 'Green', 'Blue'].map((id) => makePlayer(id, { isOut: true })),
      });
      const result = transition(state, { type: 'START_TURN' });

      expect(result.state.phase).toBe(TurnPhase.GAME_OVER);
      expect(result.state.gameOverReason).toBe('ALL_ELIMINATED');
      expect(result.sideEffects.map((e) => e.type)).toEqual(['GAME_OVER', 'LOG_RESULT']);
    });

    it('should stop at the turn limit', () => {
      const state = makeState({ turnsPlayed: 3, settings: { maxTurns: 3 } });
      const result = transition(state, { type: 'START_TURN' });

      expect(result.state.phase).toBe(TurnPhase.GAME_OVER);
      expect(result.state.gameOverReason).toBe('TURN_LIMIT');
      expect(result.sideEffects[0]).toEqual({ type: 'ANNOUNCE_PUBLIC', message: 'Turn limit of 3 reached.' });
      expect(result.sideEffects[1]).toEqual({ type: 'GAME_OVER', reason: 'TURN_LIMIT' });
    });

    it('should not mutate the previous state', () => {
      const state = makeState();
      transition(state, { type: 'START_TURN' });

      expect(state.phase).toBe(TurnPhase.TURN_START);
      expect(state.turn).toBeNull();
    });
  });

  describe('CHOOSE_MOVE', () => {
    it('should wait for movement after a roll', () => {
      const result = transition(awaiting(TurnPhase.AWAIT_MOVE), { type: 'CHOOSE_MOVE', move: { type: 'ROLL' }, roll: 7 });

      expect(result.state.phase).toBe(TurnPhase.AWAIT_MOVEMENT);
      expect(result.state.turn).toEqual({ playerId: 'Red', roll: 7 });
      expect(result.sideEffects).toEqual([{ type: 'SHOW_DICE_ROLL', playerId: 'Red', roll: 7 }]);
    });

    it('should ignore an impossible roll', () => {
      const state = awaiting(TurnPhase.AWAIT_MOVE);
      const result = transition(state, { type: 'CHOOSE_MOVE', move: { type: 'ROLL' }, roll: 13 });

      expect(result.state).toBe(state);
      expect(result.sideEffects).toEqual([]);
    });

    it('should move straight into the room at the end of a secret passage', () => {
      const result = transition(awaiting(TurnPhase.AWAIT_MOVE), {
        type: 'CHOOSE_MOVE',
        move: { type: 'PASSAGE', destination: { kind: 'room', name: 'Kitchen' } },
      });

      expect(result.state.phase).toBe(TurnPhase.AWAIT_GUESS);
      expect(playerById(result.state, 'Red').location).toEqual({ kind: 'room', name: 'Kitchen' });
      expect(result.sideEffects).toEqual([
        { type: 'SHOW_MOVEMENT', playerId: 'Red', location: { kind: 'room', name: 'Kitchen' } },
      ]);
    });

    it('should ignore actions outside their phase', () => {
      const state = makeState();
      const result = transition(state, { type: 'CHOOSE_MOVE', move: { type: 'ROLL' }, roll: 6 });

      expect(result.state).toBe(state);
      expect(result.sideEffects).toEqual([]);
    });
  });

  describe('CHOOSE_MOVEMENT', () => {
    const rolled = () =>
      makeState({ phase: TurnPhase.AWAIT_MOVEMENT, turn: { playerId: 'Red', roll: 4 } });

    it('should pass the turn after landing on a space', () => {
      const result = transition(rolled(), { type: 'CHOOSE_MOVEMENT', location: { kind: 'space', id: 's3' } });

      expect(result.state.phase).toBe(TurnPhase.TURN_START);
      expect(result.state.public.currentPlayer).toBe('Green');
      expect(result.state.turnsPlayed).toBe(1);
      expect(result.state.turn).toBeNull();
      expect(playerById(result.state, 'Red').location).toEqual({ kind: 'space', id: 's3' });
    });

    it('should wait for a guess after entering a room', () => {
      const result = transition(rolled(), { type: 'CHOOSE_MOVEMENT', location: { kind: 'room', name: 'Library' } });

      expect(result.state.phase).toBe(TurnPhase.AWAIT_GUESS);
      expect(result.state.public.currentPlayer).toBe('Red');
    });

    it('should wait for an accusation after entering the accusation room', () => {
      const result = transition(rolled(), { type: 'CHOOSE_MOVEMENT', location: { kind: 'room', name: 'Cellar' } });

      expect(result.state.phase).toBe(TurnPhase.AWAIT_ACCUSATION);
    });
  });

  describe('SUBMIT_GUESS', () => {
    const guess = { suspect: suspect('Red'), weapon: weapon('Knife'), room: room('Library') };

    it('should record a revealed card on both sheets and pass the turn', () => {
      const result = transition(awaiting(TurnPhase.AWAIT_GUESS), {
        type: 'SUBMIT_GUESS',
        guess,
        reveal: { revealerId: 'Green', card: weapon('Knife') },
      });

      expect(getBelief(playerById(result.state, 'Red').sheet, weapon('Knife'))).toEqual({
        type: 'SHOWN_BY',
        playerId: 'Green',
      });
      expect(getBelief(playerById(result.state, 'Green').sheet, weapon('Knife'))).toEqual({
        type: 'MINE',
        shownTo: ['Red'],
      });
      expect(result.state.public.currentPlayer).toBe('Green');
      expect(result.state.phase).toBe(TurnPhase.TURN_START);
      expect(result.sideEffects).toEqual([
        { type: 'SHOW_GUESS', playerId: 'Red', guess, accusation: false },
        { type: 'ANNOUNCE_PUBLIC', message: 'Green showed a card to Red.' },
        { type: 'ANNOUNCE_PRIVATE', playerId: 'Red', message: 'Green showed you Knife.' },
      ]);
    });

    it('should move unknown guessed cards to the envelope when nobody disproves', () => {
      const undisputed = { suspect: suspect('Blue'), weapon: weapon('Rope'), room: room('Library') };
      const result = transition(awaiting(TurnPhase.AWAIT_GUESS), { type: 'SUBMIT_GUESS', guess: undisputed, reveal: null });
      const sheet = playerById(result.state, 'Red').sheet;

      expect(getBelief(sheet, suspect('Blue'))).toEqual({ type: 'ENVELOPE' });
      expect(getBelief(sheet, weapon('Rope'))).toEqual({ type: 'ENVELOPE' });
      expect(getBelief(sheet, room('Library'))).toEqual({ type: 'MINE', shownTo: [] });
      expect(result.state.public.currentPlayer).toBe('Green');
      expect(result.sideEffects[1]).toEqual({ type: 'ANNOUNCE_PUBLIC', message: 'No one could disprove the guess.' });
    });
  });

  describe('SUBMIT_ACCUSATION', () => {
    it('should end in a win when the accusation matches the envelope', () => {
      const result = transition(awaiting(TurnPhase.AWAIT_ACCUSATION), { type: 'SUBMIT_ACCUSATION', accusation: ENVELOPE });

      expect(result.state.phase).toBe(TurnPhase.WIN);
      expect(result.state.winner).toBe('Red');
      expect(isTerminal(result.state)).toBe(true);
      expect(result.sideEffects.map((e) => e.type)).toEqual(['SHOW_GUESS', 'VICTORY', 'LOG_RESULT']);
      expect(result.sideEffects[2]).toEqual({
        type: 'LOG_RESULT',
        result: {
          winner: 'Red',
          reason: 'WIN',
          envelope: ENVELOPE,
          turnsPlayed: 0,
          players: [
            { id: 'Red', agent: 'ai', isOut: false },
            { id: 'Green', agent: 'ai', isOut: false },
            { id: 'Blue', agent: 'ai', isOut: false },
          ],
        },
      });
    });

    it('should eliminate a wrong accuser and pass the turn', () => {
      const wrong = { ...ENVELOPE, weapon: weapon('Knife') };
      const result = transition(awaiting(TurnPhase.AWAIT_ACCUSATION), { type: 'SUBMIT_ACCUSATION', accusation: wrong });

      expect(playerById(result.state, 'Red').isOut).toBe(true);
      expect(result.state.phase).toBe(TurnPhase.TURN_START);
      expect(result.state.public.currentPlayer).toBe('Green');
      expect(result.state.turnsPlayed).toBe(1);
      expect(result.sideEffects[1]).toEqual({
        type: 'ANNOUNCE_PUBLIC',
        message: 'Red guessed incorrectly, and is out of the game.',
      });
    });

    it('should stop when the last human is eliminated', () => {
      const state = awaiting(TurnPhase.AWAIT_ACCUSATION, {
        players: [makePlayer('Red', { agent: 'human' }), makePlayer('Green'), makePlayer('Blue')],
        public: { currentPlayer: 'Red', accusationRoom: 'Cellar', aiOnly: false },
      });
      const result = transition(state, { type: 'SUBMIT_ACCUSATION', accusation: { ...ENVELOPE, room: room('Kitchen') } });

      expect(result.state.phase).toBe(TurnPhase.GAME_OVER);
      expect(result.state.gameOverReason).toBe('NO_HUMANS_LEFT');
      expect(result.state.winner).toBeNull();
    });

    it('should keep an all-automated game going after an elimination', () => {
      const state = awaiting(TurnPhase.AWAIT_ACCUSATION);
      const result = transition(state, { type: 'SUBMIT_ACCUSATION', accusation: { ...ENVELOPE, room: room('Kitchen') } });

      expect(result.state.phase).toBe(TurnPhase.TURN_START);
    });

    it('should stop when the last player standing is eliminated', () => {
      const state = awaiting(TurnPhase.AWAIT_ACCUSATION, {
        players: [makePlayer('Red'), makePlayer('Green', { isOut: true }), makePlayer('Blue', { isOut: true })],
      });
      const result = transition(state, { type: 'SUBMIT_ACCUSATION', accusation: { ...ENVELOPE, suspect: suspect('Red') } });

      expect(result.state.gameOverReason).toBe('ALL_ELIMINATED');
      expect(result.sideEffects.map((e) => e.type)).toEqual(['SHOW_GUESS', 'ANNOUNCE_PUBLIC', 'GAME_OVER', 'LOG_RESULT']);
    });
  });

  describe('descriptions', () => {
    it('should describe phases and moves', () => {
      expect(getPhaseDescription(TurnPhase.AWAIT_GUESS)).toBe('Guessing');
      expect(describeMove({ type: 'ROLL' })).toBe('Roll dice');
      expect(describeMove({ type: 'PASSAGE', destination: { kind: 'room', name: 'Kitchen' } })).toBe(
        'Secret passage to Kitchen'
      );
    });
  });
});
