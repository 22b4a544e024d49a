import { z } from 'zod';
import { cardValue } from '../../cards/Card.js';
import { handTotal } from './hand.js';
import rawTable from './data/basic-strategy.json';
import type { Decision, Situation, Strategy } from './types.js';

/**
 * Baseline policy: double a two-card 9-11 when doubling is legal, otherwise
 * hit below 17 and stand from 17 up. Used when a caller supplies no strategy.
 */
export class NaiveStrategy implements Strategy {
  decide(s: Situation): Decision {
    const total = s.player.hardTotal();
    if (s.canDouble && s.player.size === 2 && total >= 9 && total <= 11) return 'double';
    if (total < 17) return 'hit';
    return 'stand';
  }
}

// H=hit, S=stand, Dh/Ds=double else hit/stand, Rh/Rs=surrender else hit/stand
const actionCode = z.enum(['H', 'S', 'Dh', 'Ds', 'Rh', 'Rs']);
export type ActionCode = z.infer<typeof actionCode>;

const strategyTableSchema = z.object({
  upcards: z.array(z.string()).length(10),
  hard: z.record(z.array(actionCode).length(10)),
  soft: z.record(z.array(actionCode).length(10)),
});

export type StrategyTable = z.infer<typeof strategyTableSchema>;

export const BASIC_STRATEGY_TABLE: StrategyTable = strategyTableSchema.parse(rawTable);

function upcardIndex(upValue: number): number {
  // 2-10 map to 0-8, Ace (11) to 9
  return upValue === 11 ? 9 : upValue - 2;
}

function resolve(code: ActionCode, canDouble: boolean, canSurrender: boolean): Decision {
  switch (code) {
    case 'H': return 'hit';
    case 'S': return 'stand';
    case 'Dh': return canDouble ? 'double' : 'hit';
    case 'Ds': return canDouble ? 'double' : 'stand';
    case 'Rh': return canSurrender ? 'surrender' : 'hit';
    case 'Rs': return canSurrender ? 'surrender' : 'stand';
  }
}

/** Table-lookup basic strategy keyed by player total and dealer upcard. */
export class BasicStrategy implements Strategy {
  constructor(private readonly table: StrategyTable = BASIC_STRATEGY_TABLE) {}

  lookup(total: number, soft: boolean, upValue: number): ActionCode {
    const rows = soft ? this.table.soft : this.table.hard;
    const row = rows[String(total)];
    if (!row) return total >= 17 ? 'S' : 'H';
    return row[upcardIndex(upValue)];
  }

  decide(s: Situation): Decision {
    const { total, soft } = handTotal(s.player.cards);
    const code = this.lookup(total, soft, cardValue(s.dealerUpcard.rank));
    const canSurrender = s.rules.surrender && s.player.size === 2;
    return resolve(code, s.canDouble, canSurrender);
  }
}

export type StrategyName = 'naive' | 'basic';

export const STRATEGY_NAMES: readonly StrategyName[] = ['naive', 'basic'];

export function isStrategyName(s: string): s is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(s);
}

export function strategyByName(name: StrategyName): Strategy {
  return name === 'basic' ? new BasicStrategy() : new NaiveStrategy();
}
