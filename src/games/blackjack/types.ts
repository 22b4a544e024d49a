import type { Card } from '../../cards/Card.js';
import type { Hand } from './hand.js';

export interface Rules {
  readonly numDecks: number;
  readonly dealerHitsSoft17: boolean; // H17 when true, S17 when false
  readonly doubleAllowed: boolean;
  readonly doubleAfterSplit: boolean; // reserved: the engine has no splits
  readonly surrender: boolean; // late surrender
  readonly peekForBlackjack: boolean;
  readonly blackjackPaysNum: number;
  readonly blackjackPaysDen: number;
}

export type Decision = 'hit' | 'stand' | 'double' | 'surrender';

export type Outcome =
  | 'player_blackjack'
  | 'dealer_blackjack'
  | 'player_bust'
  | 'dealer_bust'
  | 'player_win'
  | 'dealer_win'
  | 'push'
  | 'player_surrender';

/** What a strategy is allowed to see at a decision point. */
export interface Situation {
  readonly player: Hand;
  readonly dealerUpcard: Card;
  readonly rules: Rules;
  readonly canDouble: boolean;
}

export interface Strategy {
  decide(situation: Situation): Decision;
}

export interface CardSource {
  draw(): Card;
}

export interface RoundResult {
  readonly outcome: Outcome;
  readonly playerTotal: number;
  readonly dealerTotal: number;
  readonly payout: number; // minor units (cents), stake included
  readonly doubled: boolean;
}

export interface SimStats {
  rounds: number;
  playerWins: number;
  dealerWins: number;
  pushes: number;
  playerBlackjacks: number;
  dealerBlackjacks: number;
  busts: number;
  surrenders: number;
  doubles: number;
  wagered: number;
  bankroll: number; // net, minor units
}
