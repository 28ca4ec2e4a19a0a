/**
 * @file messages.test.ts
 * @description Unit tests for command argument parsing and Telegram message splitting
 * @depends vitest, src/bot/context, src/bot/notifications
 */

import { describe, expect, it } from 'vitest';
import { commandArguments } from '../../src/bot/context.js';
import { splitMessage } from '../../src/bot/notifications.js';

describe('commandArguments', () => {
  it('drops the command and bot mention', () => {
    expect(commandArguments('/tool@lectern_bot flashcards  count=10')).toEqual(['flashcards', 'count=10']);
  });

  it('returns nothing for a bare command', () => {
    expect(commandArguments('/retry')).toEqual([]);
    expect(commandArguments(undefined)).toEqual([]);
  });
});

describe('splitMessage', () => {
  it('leaves short messages whole', () => {
    expect(splitMessage('short', 10)).toEqual(['short']);
  });

  it('prefers to split on line breaks', () => {
    expect(splitMessage('aaaa\nbbbb\ncccc', 10)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('hard-splits lines longer than the limit', () => {
    expect(splitMessage('abcdefghij12', 5)).toEqual(['abcde', 'fghij', '12']);
  });
});
