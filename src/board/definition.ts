/**
 * Game definition files: card lists, seating, and the board graph
 */

import * as fs from 'fs';
import { z } from 'zod';
import { boardLogger } from '../utils/logger';

const NameSchema = z.string().trim().min(1);

export const GameDefinitionSchema = z
  .object({
    suspects: z.array(NameSchema).min(1),
    weapons: z.array(NameSchema).min(1),
    rooms: z.array(NameSchema).min(1),
    accusationRoom: NameSchema,
    players: z
      .array(
        z.object({
          suspect: NameSchema,
          agent: z.enum(['human', 'ai']).default('ai'),
        })
      )
      .min(1),
    firstPlayer: NameSchema.optional(),
    // Fixed solution, mostly for scripted games. Drawn at random when absent.
    envelope: z
      .object({
        suspect: NameSchema,
        weapon: NameSchema,
        room: NameSchema,
      })
      .optional(),
    board: z.object({
      spaces: z.array(NameSchema),
      edges: z.array(z.tuple([NameSchema, NameSchema])),
      passages: z.array(z.tuple([NameSchema, NameSchema])).default([]),
      start: z.record(NameSchema, NameSchema),
    }),
  })
  .superRefine((def, ctx) => {
    const issue = (message: string): void => {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    };

    for (const [label, list] of [
      ['suspect', def.suspects],
      ['weapon', def.weapons],
      ['room', def.rooms],
      ['space', def.board.spaces],
    ] as const) {
      const seen = new Set<string>();
      for (const name of list) {
        if (seen.has(name)) issue(`Duplicate ${label} "${name}"`);
        seen.add(name);
      }
    }

    if (def.rooms.includes(def.accusationRoom)) {
      issue(`Accusation room "${def.accusationRoom}" must not also be a room card`);
    }

    const rooms = new Set([...def.rooms, def.accusationRoom]);
    const locations = new Set([...rooms, ...def.board.spaces]);
    for (const space of def.board.spaces) {
      if (rooms.has(space)) issue(`Space "${space}" has the same name as a room`);
    }

    for (const [a, b] of def.board.edges) {
      if (!locations.has(a) || !locations.has(b)) issue(`Edge ${a} - ${b} references an unknown location`);
    }
    for (const [a, b] of def.board.passages) {
      if (!rooms.has(a) || !rooms.has(b)) issue(`Passage ${a} - ${b} must join two rooms`);
    }

    const seated = new Set<string>();
    for (const player of def.players) {
      if (!def.suspects.includes(player.suspect)) issue(`Player "${player.suspect}" is not a suspect`);
      if (seated.has(player.suspect)) issue(`Player "${player.suspect}" is seated twice`);
      seated.add(player.suspect);
      const start = def.board.start[player.suspect];
      if (!start || !locations.has(start)) issue(`Player "${player.suspect}" has no valid start location`);
    }

    if (def.firstPlayer && !seated.has(def.firstPlayer)) {
      issue(`First player "${def.firstPlayer}" is not seated`);
    }

    if (def.envelope) {
      if (!def.suspects.includes(def.envelope.suspect)) issue(`Envelope suspect "${def.envelope.suspect}" is unknown`);
      if (!def.weapons.includes(def.envelope.weapon)) issue(`Envelope weapon "${def.envelope.weapon}" is unknown`);
      if (!def.rooms.includes(def.envelope.room)) issue(`Envelope room "${def.envelope.room}" is unknown`);
    }
  });

export type GameDefinition = z.infer<typeof GameDefinitionSchema>;

export function parseGameDefinition(raw: unknown, source = 'game definition'): GameDefinition {
  const parsed = GameDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid ${source}: ${details}`);
  }
  return parsed.data;
}

export function loadGameDefinition(filePath: string): GameDefinition {
  boardLogger.info({ filePath }, 'Loading game definition');

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    boardLogger.error({ error, filePath }, 'Failed to read game definition');
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read game file ${filePath}: ${reason}`);
  }

  const definition = parseGameDefinition(raw, `game file ${filePath}`);
  boardLogger.info(
    { players: definition.players.length, rooms: definition.rooms.length, spaces: definition.board.spaces.length },
    'Game definition loaded'
  );
  return definition;
}
