import type { Rules } from './types.js';

// 6 decks, H17, DAS, no surrender, peek, 3:2
export const DEFAULT_RULES: Rules = Object.freeze({
  numDecks: 6,
  dealerHitsSoft17: true,
  doubleAllowed: true,
  doubleAfterSplit: true,
  surrender: false,
  peekForBlackjack: true,
  blackjackPaysNum: 3,
  blackjackPaysDen: 2,
});

export function makeRules(overrides: Partial<Rules> = {}): Rules {
  return Object.freeze({ ...DEFAULT_RULES, ...overrides });
}

export function describeRules(r: Rules): string {
  const parts = [
    `${r.numDecks} deck${r.numDecks === 1 ? '' : 's'}`,
    r.dealerHitsSoft17 ? 'H17' : 'S17',
    r.doubleAllowed ? 'DOA' : 'no double',
    r.surrender ? 'LS' : 'no surrender',
    r.peekForBlackjack ? 'peek' : 'no peek',
    `BJ ${r.blackjackPaysNum}:${r.blackjackPaysDen}`,
  ];
  return parts.join(', ');
}
