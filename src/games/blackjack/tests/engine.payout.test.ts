import { payoutFor, stakeFor } from '../engine.js';
import { makeRules } from '../rules.js';

const r32 = makeRules();
const r65 = makeRules({ blackjackPaysNum: 6, blackjackPaysDen: 5 });

describe('blackjack payouts', () => {
  test('natural pays stake plus bonus', () => {
    expect(payoutFor('player_blackjack', 100, false, r32)).toBe(250);
    expect(payoutFor('player_blackjack', 100, false, r65)).toBe(220);
  });

  test('odd stakes truncate the bonus', () => {
    // 101 * 3 / 2 = 151.5
    expect(payoutFor('player_blackjack', 101, false, r32)).toBe(252);
    // 7 * 6 / 5 = 8.4
    expect(payoutFor('player_blackjack', 7, false, r65)).toBe(15);
  });

  test('wins return twice the stake, four times when doubled', () => {
    expect(payoutFor('player_win', 100, false, r32)).toBe(200);
    expect(payoutFor('dealer_bust', 100, false, r32)).toBe(200);
    expect(payoutFor('player_win', 100, true, r32)).toBe(400);
    expect(payoutFor('dealer_bust', 100, true, r32)).toBe(400);
  });

  test('push returns the stake that was put up', () => {
    expect(payoutFor('push', 100, false, r32)).toBe(100);
    expect(payoutFor('push', 100, true, r32)).toBe(200);
  });

  test('losses return nothing', () => {
    expect(payoutFor('dealer_win', 100, false, r32)).toBe(0);
    expect(payoutFor('dealer_win', 100, true, r32)).toBe(0);
    expect(payoutFor('dealer_blackjack', 100, false, r32)).toBe(0);
    expect(payoutFor('player_bust', 100, true, r32)).toBe(0);
  });

  test('surrender returns half the stake, rounded down', () => {
    expect(payoutFor('player_surrender', 100, false, r32)).toBe(50);
    expect(payoutFor('player_surrender', 101, false, r32)).toBe(50);
  });

  test('stake doubles with the hand', () => {
    expect(stakeFor(100, false)).toBe(100);
    expect(stakeFor(100, true)).toBe(200);
  });
});
