import { parseArgs } from '../src/cli/args.js';
import { UserError } from '../src/util/errors.js';

describe('cli arguments', () => {
  test('no arguments means help', () => {
    expect(parseArgs([]).command).toBe('help');
    expect(parseArgs(['--help']).command).toBe('help');
  });

  test('simulate defaults', () => {
    expect(parseArgs(['simulate'])).toEqual({
      command: 'simulate',
      rounds: 10000,
      bet: 100,
      strategy: 'naive',
      rules: {},
    });
  });

  test('options and rule flags', () => {
    const args = parseArgs([
      'simulate', '--rounds', '500', '--seed', '7', '--bet', '250', '--strategy', 'basic',
      '--decks', '2', '--s17', '--no-double', '--surrender', '--no-peek', '--pays', '6:5', '--quiet',
    ]);
    expect(args).toEqual({
      command: 'simulate',
      rounds: 500,
      seed: 7,
      bet: 250,
      strategy: 'basic',
      rules: {
        numDecks: 2,
        dealerHitsSoft17: false,
        doubleAllowed: false,
        surrender: true,
        peekForBlackjack: false,
        blackjackPaysNum: 6,
        blackjackPaysDen: 5,
      },
    });
  });

  test('rules file path is kept', () => {
    expect(parseArgs(['rules', '--rules-file', 'x.json']).rulesFile).toBe('x.json');
  });

  test('bad input raises a user error', () => {
    expect(() => parseArgs(['blackjack'])).toThrow(UserError);
    expect(() => parseArgs(['simulate', '--rounds', '0'])).toThrow('--rounds expects an integer >= 1, got 0');
    expect(() => parseArgs(['simulate', '--bet'])).toThrow('--bet expects an integer >= 1, got nothing');
    expect(() => parseArgs(['deal', '--strategy', 'oracle'])).toThrow(UserError);
    expect(() => parseArgs(['deal', '--split'])).toThrow(UserError);
  });
});
