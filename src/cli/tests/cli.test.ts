import { describe, it, expect } from '@jest/globals';
import fixture from '../../../tests/fixtures/seed42-basic.json';
import { defaultConfig } from '../../config/index.js';
import { handRecordSchema, summarize } from '../../games/blackjack/records.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import { parseCommand, recordRow, summaryLine } from '../simulate.js';
import { getPalette } from '../theme.js';
import { formatLine, renderTable } from '../ui.js';

const records = handRecordSchema.array().parse(fixture.records);

describe('parseCommand', () => {
  const config = defaultConfig();

  it('uses configuration defaults', () => {
    const cmd = parseCommand([], config);
    expect(cmd.format).toBe('table');
    expect(cmd.sessions).toBe(1);
    expect(cmd.help).toBe(false);
    expect(cmd.request).toEqual({
      rounds: 10, numDecks: 6, baseBet: 10, strategy: 'basic', betMode: 'fixed', seed: undefined, rules: config.rules,
    });
  });

  it('reads flags', () => {
    const cmd = parseCommand(
      ['--rounds', '20', '--decks', '2', '--bet', '5', '--strategy', 'simplest', '--bet-mode', 'hi-lo', '--seed', '7', '--format', 'ndjson', '--sessions', '3'],
      config,
    );
    expect(cmd.format).toBe('ndjson');
    expect(cmd.sessions).toBe(3);
    expect(cmd.request).toMatchObject({ rounds: 20, numDecks: 2, baseBet: 5, strategy: 'simplest', betMode: 'hi-lo', seed: 7 });
    expect(parseCommand(['--list-strategies'], config).listStrategies).toBe(true);
    expect(parseCommand(['-h'], config).help).toBe(true);
  });

  it('rejects bad input as a configuration error', () => {
    expect(() => parseCommand(['--bogus'], config)).toThrow(InvalidConfigurationError);
    expect(() => parseCommand(['--format', 'xml'], config)).toThrow('--format must be table or ndjson, got "xml"');
    expect(() => parseCommand(['--sessions', '0'], config)).toThrow('--sessions must be a positive integer');
    expect(() => parseCommand(['--rounds', 'ten'], config)).toThrow('--rounds expects a number, got "ten"');
  });
});

describe('output', () => {
  it('flattens a record into a table row', () => {
    expect(recordRow(records[0])).toEqual({
      round: 1,
      hand: 1,
      dealer: 'K 2',
      player: '7 6 A K',
      actions: 'hit,hit',
      wager: 10,
      outcome: 'bust',
      profit: -10,
      rc: -1,
      tc: -0.2,
    });
  });

  it('summarizes a session on one line', () => {
    const [s] = summarize(records);
    expect(summaryLine(s)).toBe(
      'seed-42 [basic] 5 rounds, 5 hands: 2W 3L 0P, 0 blackjacks, 2 busts; wagered 60, net -20 (-33.333%)',
    );
  });

  it('aligns table columns', () => {
    expect(renderTable([{ a: 1, bb: 'x' }, { a: 22, bb: 'yy' }])).toEqual(['a   bb', '1   x', '22  yy']);
    expect(renderTable([])).toEqual(['(none)']);
  });

  it('formats plain lines without colour', () => {
    const palette = getPalette(true);
    expect(formatLine('shuffling', 'dim', palette)).toBe('shuffling');
    expect(formatLine('done', 'title', palette)).toBe('done');
  });
});
