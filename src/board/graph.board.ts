/**
 * Graph Board - rooms and spaces joined by edges, read from the game definition.
 *
 * Entering a room ends movement, so paths never pass through a room.
 * A space can be landed on when its distance has the same parity as the roll
 * (the leftover steps are spent walking back and forth).
 */

import { IBoard } from './types';
import { GameDefinition } from './definition';
import { GameState, Location, Move, MovementOption, Player } from '../game/types';
import { boardLogger } from '../utils/logger';

export class GraphBoard implements IBoard {
  private rooms: string[];
  private roomSet: Set<string>;
  private spaces: string[];
  private adjacency: Map<string, string[]> = new Map();
  private passages: Map<string, string[]> = new Map();
  private roomDistances: Map<string, Map<string, number>> = new Map();

  constructor(definition: GameDefinition) {
    this.rooms = [...definition.rooms, definition.accusationRoom];
    this.roomSet = new Set(this.rooms);
    this.spaces = [...definition.board.spaces];

    for (const node of [...this.rooms, ...this.spaces]) {
      this.adjacency.set(node, []);
    }
    for (const [a, b] of definition.board.edges) {
      this.link(this.adjacency, a, b);
    }
    for (const [a, b] of definition.board.passages) {
      this.link(this.passages, a, b);
    }
  }

  private link(map: Map<string, string[]>, a: string, b: string): void {
    const fromA = map.get(a) ?? [];
    const fromB = map.get(b) ?? [];
    if (!fromA.includes(b)) fromA.push(b);
    if (!fromB.includes(a)) fromB.push(a);
    map.set(a, fromA);
    map.set(b, fromB);
  }

  toLocation(node: string): Location {
    return this.roomSet.has(node) ? { kind: 'room', name: node } : { kind: 'space', id: node };
  }

  private nodeOf(location: Location): string {
    return location.kind === 'room' ? location.name : location.id;
  }

  /**
   * Breadth-first distances from `start`, not expanding through rooms other than the start
   */
  private distancesFrom(start: string): Map<string, number> {
    const dist = new Map<string, number>([[start, 0]]);
    const queue = [start];

    while (queue.length > 0) {
      const node = queue.shift() ?? start;
      if (node !== start && this.roomSet.has(node)) continue;
      const d = dist.get(node) ?? 0;
      for (const neighbour of this.adjacency.get(node) ?? []) {
        if (dist.has(neighbour)) continue;
        dist.set(neighbour, d + 1);
        queue.push(neighbour);
      }
    }

    return dist;
  }

  private distancesToRoom(room: string): Map<string, number> {
    let cached = this.roomDistances.get(room);
    if (!cached) {
      cached = this.distancesFrom(room);
      this.roomDistances.set(room, cached);
    }
    return cached;
  }

  getMoveOptions(_state: GameState, player: Player): Move[] {
    const moves: Move[] = [{ type: 'ROLL' }];
    if (player.location.kind === 'room') {
      for (const room of this.passages.get(player.location.name) ?? []) {
        moves.push({ type: 'PASSAGE', destination: { kind: 'room', name: room } });
      }
    }
    return moves;
  }

  getMovementOptions(_state: GameState, player: Player, roll: number): MovementOption[] {
    const origin = this.nodeOf(player.location);
    const reach = this.distancesFrom(origin);

    const reachableSpaces = this.spaces.filter((s) => {
      const d = reach.get(s);
      return d !== undefined && d > 0 && d <= roll;
    });
    const landable = reachableSpaces.filter((s) => ((roll - (reach.get(s) ?? 0)) % 2) === 0);
    const spaces = landable.length > 0 ? landable : reachableSpaces;

    const options: MovementOption[] = [];
    for (const room of this.rooms) {
      if (room === origin) continue;

      const d = reach.get(room);
      if (d !== undefined && d <= roll) {
        options.push({ location: { kind: 'room', name: room }, room, entersRoom: true });
        continue;
      }

      const toRoom = this.distancesToRoom(room);
      let best: string | null = null;
      let bestDistance = Infinity;
      for (const space of spaces) {
        const remaining = toRoom.get(space);
        if (remaining !== undefined && remaining < bestDistance) {
          best = space;
          bestDistance = remaining;
        }
      }
      if (best !== null) {
        options.push({ location: { kind: 'space', id: best }, room, entersRoom: false });
      }
    }

    boardLogger.debug({ player: player.id, roll, options: options.length }, 'Movement options computed');
    return options;
  }
}
