/**
 * Unit Tests for prompt command parsing
 */

import {
  CommandType,
  formatOptions,
  generateHelpText,
  generateNotesText,
  parseCommand,
  resolveOption,
} from '../../src/commands/handler';
import { noteShownTo, recordShown } from '../../src/game/sheet';
import { makePlayer, room, weapon } from '../fixtures/game';

describe('Command Handler', () => {
  describe('parseCommand', () => {
    it('should recognise notes and help words', () => {
      expect(parseCommand(' Notes ').type).toBe(CommandType.NOTES);
      expect(parseCommand('sheet').type).toBe(CommandType.NOTES);
      expect(parseCommand('?').type).toBe(CommandType.HELP);
      expect(parseCommand('HELP').type).toBe(CommandType.HELP);
    });

    it('should treat blank input as empty', () => {
      expect(parseCommand('   ')).toEqual({ type: CommandType.EMPTY, args: [], raw: '   ' });
    });

    it('should normalize a choice', () => {
      expect(parseCommand('  Lead   Pipe ')).toEqual({ type: CommandType.CHOICE, args: ['lead pipe'], raw: '  Lead   Pipe ' });
    });
  });

  describe('resolveOption', () => {
    const options = ['Knife', 'Lead Pipe', 'Rope', 'Revolver'].map((label) => ({ label, value: label }));
    const resolve = (input: string) => resolveOption(parseCommand(input), options);

    it('should accept a 1-based number', () => {
      expect(resolve('2')).toEqual({ valid: true, value: 'Lead Pipe' });
    });

    it('should reject numbers out of range', () => {
      expect(resolve('9')).toEqual({ valid: false, error: 'Choose a number between 1 and 4' });
      expect(resolve('0')).toEqual({ valid: false, error: 'Choose a number between 1 and 4' });
    });

    it('should accept an exact label regardless of case', () => {
      expect(resolve('ROPE')).toEqual({ valid: true, value: 'Rope' });
    });

    it('should accept a unique prefix', () => {
      expect(resolve('le')).toEqual({ valid: true, value: 'Lead Pipe' });
      expect(resolve('rev')).toEqual({ valid: true, value: 'Revolver' });
    });

    it('should reject an ambiguous prefix', () => {
      expect(resolve('r')).toEqual({ valid: false, error: '"r" matches more than one option' });
    });

    it('should reject unknown answers', () => {
      expect(resolve('axe')).toEqual({ valid: false, error: 'Unknown option "axe"' });
    });

    it('should reject non-choices', () => {
      expect(resolve('notes')).toEqual({ valid: false, error: 'Choose one of the options' });
    });
  });

  describe('text', () => {
    it('should number options', () => {
      expect(formatOptions([{ label: 'Roll', value: 1 }, { label: 'Passage to Hall', value: 2 }])).toBe(
        '  1. Roll\n  2. Passage to Hall'
      );
    });

    it('should list what a player knows', () => {
      const player = makePlayer('Red');
      const seen = { ...player, sheet: noteShownTo(recordShown(player.sheet, weapon('Knife'), 'Green'), room('Library'), 'Blue') };
      const text = generateNotesText(seen);

      expect(text).toContain('NOTES - Red\n');
      expect(text).toContain(`  ${'Knife'.padEnd(20)} shown by Green\n`);
      expect(text).toContain(`  ${'Library'.padEnd(20)} mine (shown to Blue)\n`);
      expect(text).toContain(`  ${'Rope'.padEnd(20)} ?\n`);
    });

    it('should explain the prompt commands', () => {
      expect(generateHelpText()).toContain('notes          show your detective notes');
    });
  });
});
