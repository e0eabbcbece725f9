/**
 * Command Handler - turns a line typed at a prompt into a choice
 *
 * At any prompt a human may type:
 * - a number -> pick that option
 * - a name (or the start of one) -> pick the option with that label
 * - "notes" / "sheet" -> show their detective notes
 * - "help" / "?" -> show help
 */

import { CARD_CATEGORIES, CardCategory, Player } from '../game/types';
import { describeBelief, entriesOf } from '../game/sheet';
import { PromptOption } from '../adapter/types';
import { normalizeString, parseOptionIndex, sanitizeInput } from '../utils/sanitize';

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  raw: string;
}

export enum CommandType {
  CHOICE = 'CHOICE',
  NOTES = 'NOTES',
  HELP = 'HELP',
  EMPTY = 'EMPTY',
}

const NOTES_WORDS = ['notes', 'sheet', 'n'];

const HELP_WORDS = ['help', '?', 'h'];

/**
 * Parse a prompt answer into a command
 */
export function parseCommand(message: string): ParsedCommand {
  const trimmed = sanitizeInput(message);
  const normalized = normalizeString(trimmed);

  if (!normalized) {
    return { type: CommandType.EMPTY, args: [], raw: message };
  }

  if (NOTES_WORDS.includes(normalized)) {
    return { type: CommandType.NOTES, args: [], raw: message };
  }

  if (HELP_WORDS.includes(normalized)) {
    return { type: CommandType.HELP, args: [], raw: message };
  }

  return { type: CommandType.CHOICE, args: [normalized], raw: message };
}

/**
 * Match a choice against the offered options, by number or by label
 */
export function resolveOption<T>(
  command: ParsedCommand,
  options: PromptOption<T>[]
): { valid: boolean; error?: string; value?: T } {
  if (command.type !== CommandType.CHOICE) {
    return { valid: false, error: 'Choose one of the options' };
  }

  const answer = command.args[0];
  if (/^\d+$/.test(answer)) {
    const parsed = parseOptionIndex(answer, options.length);
    if (!parsed.valid || parsed.index === undefined) {
      return { valid: false, error: parsed.error };
    }
    return { valid: true, value: options[parsed.index].value };
  }

  const exact = options.filter((o) => normalizeString(o.label) === answer);
  if (exact.length === 1) {
    return { valid: true, value: exact[0].value };
  }

  const partial = options.filter((o) => normalizeString(o.label).startsWith(answer));
  if (partial.length === 1) {
    return { valid: true, value: partial[0].value };
  }
  if (partial.length > 1) {
    return { valid: false, error: `"${command.args[0]}" matches more than one option` };
  }

  return { valid: false, error: `Unknown option "${command.args[0]}"` };
}

/**
 * Numbered option list shown under a prompt
 */
export function formatOptions<T>(options: PromptOption<T>[]): string {
  return options.map((o, i) => `  ${i + 1}. ${o.label}`).join('\n');
}

/**
 * Generate help text
 */
export function generateHelpText(): string {
  return `
WHODUNIT - HELP

Find the suspect, weapon and room sealed in the envelope.
- Roll the dice or take a secret passage, then pick where to go.
- Entering a room lets you guess; the other players must show you a card if they can.
- Entering the accusation room forces a final accusation: right wins, wrong is out.

At any prompt:
  a number       pick that option
  a name         pick the option starting with it
  notes          show your detective notes
  help           show this text
`;
}

/**
 * Generate the detective notes for one player
 */
export function generateNotesText(player: Player): string {
  const titles: Record<CardCategory, string> = {
    [CardCategory.SUSPECT]: 'Suspects',
    [CardCategory.WEAPON]: 'Weapons',
    [CardCategory.ROOM]: 'Rooms',
  };

  let text = `\nNOTES - ${player.id}\n`;
  for (const category of CARD_CATEGORIES) {
    text += `\n${titles[category]}:\n`;
    for (const entry of entriesOf(player.sheet, category)) {
      text += `  ${entry.card.name.padEnd(20)} ${describeBelief(entry.belief)}\n`;
    }
  }

  return text;
}
