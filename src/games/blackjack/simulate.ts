import { createLogger } from '../../log.js';
import { Round, stakeFor } from './engine.js';
import { Shoe } from './shoe.js';
import { NaiveStrategy } from './strategy.js';
import type { RoundResult, Rules, SimStats, Strategy } from './types.js';

const log = createLogger('simulate');

export function emptyStats(): SimStats {
  return {
    rounds: 0,
    playerWins: 0,
    dealerWins: 0,
    pushes: 0,
    playerBlackjacks: 0,
    dealerBlackjacks: 0,
    busts: 0,
    surrenders: 0,
    doubles: 0,
    wagered: 0,
    bankroll: 0,
  };
}

export function recordResult(stats: SimStats, res: RoundResult, bet: number): void {
  const staked = stakeFor(bet, res.doubled);
  stats.rounds++;
  stats.wagered += staked;
  stats.bankroll += res.payout - staked;
  if (res.doubled) stats.doubles++;
  switch (res.outcome) {
    case 'player_blackjack': stats.playerBlackjacks++; stats.playerWins++; break;
    case 'dealer_blackjack': stats.dealerBlackjacks++; stats.dealerWins++; break;
    case 'dealer_bust': stats.playerWins++; stats.busts++; break;
    case 'player_bust': stats.dealerWins++; stats.busts++; break;
    case 'player_win': stats.playerWins++; break;
    case 'dealer_win': stats.dealerWins++; break;
    case 'push': stats.pushes++; break;
    case 'player_surrender': stats.surrenders++; break;
  }
}

export type SimulateHooks = {
  /** Called after every round with the running stats. */
  onRound?: (stats: Readonly<SimStats>, result: RoundResult) => void;
};

/**
 * Plays `n` rounds back to back on one shoe. The shoe is never reset between
 * rounds; it only reshuffles itself when it runs dry.
 */
export function simulate(
  n: number,
  rules: Rules,
  seed = 42,
  bet = 100,
  strategy: Strategy = new NaiveStrategy(),
  hooks: SimulateHooks = {},
): SimStats {
  const shoe = new Shoe(rules.numDecks, seed);
  const stats = emptyStats();
  for (let i = 0; i < n; i++) {
    const res = new Round(rules, shoe, strategy, bet).play();
    recordResult(stats, res, bet);
    hooks.onRound?.(stats, res);
  }
  log.debug({ msg: 'simulate_done', rounds: stats.rounds, seed, bankroll: stats.bankroll });
  return stats;
}

export interface SimSummary {
  winRate: number;
  lossRate: number;
  pushRate: number;
  surrenderRate: number;
  /** Net result per unit staked; negative means the house is ahead. */
  expectedValue: number;
}

export function summarize(stats: SimStats): SimSummary {
  const rate = (k: number) => (stats.rounds === 0 ? 0 : k / stats.rounds);
  return {
    winRate: rate(stats.playerWins),
    lossRate: rate(stats.dealerWins),
    pushRate: rate(stats.pushes),
    surrenderRate: rate(stats.surrenders),
    expectedValue: stats.wagered === 0 ? 0 : stats.bankroll / stats.wagered,
  };
}
