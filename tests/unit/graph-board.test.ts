/**
 * Unit Tests for the Graph Board
 */

import { GraphBoard } from '../../src/board/graph.board';
import { enter, makePlayer, makeState, smallDefinition, toward } from '../fixtures/game';

describe('Graph Board', () => {
  const board = new GraphBoard(smallDefinition());
  const state = makeState();
  const inLibrary = makePlayer('Red', { location: { kind: 'room', name: 'Library' } });

  describe('toLocation', () => {
    it('should tell rooms from spaces', () => {
      expect(board.toLocation('Cellar')).toEqual({ kind: 'room', name: 'Cellar' });
      expect(board.toLocation('s1')).toEqual({ kind: 'space', id: 's1' });
    });
  });

  describe('getMoveOptions', () => {
    it('should offer a roll plus the passages out of the current room', () => {
      expect(board.getMoveOptions(state, inLibrary)).toEqual([
        { type: 'ROLL' },
        { type: 'PASSAGE', destination: { kind: 'room', name: 'Hall' } },
      ]);
    });

    it('should only offer a roll from a space', () => {
      expect(board.getMoveOptions(state, makePlayer('Red'))).toEqual([{ type: 'ROLL' }]);
    });
  });

  describe('getMovementOptions', () => {
    it('should enter rooms in reach and approach the others on matching parity', () => {
      expect(board.getMovementOptions(state, inLibrary, 4)).toEqual([
        enter('Kitchen'),
        toward('Hall', 's4'),
        toward('Cellar', 's6'),
      ]);
    });

    it('should enter every room when the roll covers them', () => {
      expect(board.getMovementOptions(state, inLibrary, 5)).toEqual([enter('Kitchen'), enter('Hall'), enter('Cellar')]);
    });

    it('should pick the reachable space closest to each room', () => {
      expect(board.getMovementOptions(state, makePlayer('Red'), 2)).toEqual([
        enter('Library'),
        toward('Kitchen', 's3'),
        toward('Hall', 's3'),
        toward('Cellar', 's5'),
      ]);
    });

    it('should never offer the room the player is leaving', () => {
      const rooms = board.getMovementOptions(state, inLibrary, 12).map((o) => o.room);

      expect(rooms).toEqual(['Kitchen', 'Hall', 'Cellar']);
    });
  });
});
