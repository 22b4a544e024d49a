import { Hand } from './hand.js';
import type { CardSource, Decision, Outcome, RoundResult, Rules, Strategy } from './types.js';

/**
 * Total returned to the player for a settled round, stake included. All
 * amounts are integers in the stake's minor unit; fractional bonuses truncate.
 */
export function payoutFor(outcome: Outcome, bet: number, doubled: boolean, rules: Rules): number {
  switch (outcome) {
    case 'player_blackjack':
      return bet + Math.trunc((bet * rules.blackjackPaysNum) / rules.blackjackPaysDen);
    case 'dealer_blackjack':
    case 'player_bust':
    case 'dealer_win':
      return 0;
    case 'dealer_bust':
    case 'player_win':
      return doubled ? bet * 4 : bet * 2;
    case 'push':
      return doubled ? bet * 2 : bet;
    case 'player_surrender':
      return Math.trunc(bet / 2);
  }
}

/** Amount actually put at risk for the round. */
export function stakeFor(bet: number, doubled: boolean): number {
  return doubled ? bet * 2 : bet;
}

/**
 * One hand of single-seat blackjack. Rules, card source and strategy are
 * borrowed and may be shared across many rounds; the two hands belong to the
 * round and are rebuilt on every play().
 */
export class Round {
  private playerHand = new Hand();
  private dealerHand = new Hand();

  constructor(
    private readonly rules: Rules,
    private readonly shoe: CardSource,
    private readonly strategy: Strategy,
    private readonly bet = 100,
  ) {}

  get player(): Hand {
    return this.playerHand;
  }

  get dealer(): Hand {
    return this.dealerHand;
  }

  play(): RoundResult {
    this.playerHand = new Hand();
    this.dealerHand = new Hand();
    const player = this.playerHand;
    const dealer = this.dealerHand;

    player.add(this.shoe.draw());
    dealer.add(this.shoe.draw());
    player.add(this.shoe.draw());
    dealer.add(this.shoe.draw());

    if (this.rules.peekForBlackjack && dealer.isBlackjack()) {
      return this.settle(player.isBlackjack() ? 'push' : 'dealer_blackjack');
    }
    if (player.isBlackjack()) return this.settle('player_blackjack');

    const playerOutcome = this.playerTurn();
    if (playerOutcome) return this.settle(playerOutcome);

    this.dealerTurn();

    if (dealer.isBust()) return this.settle('dealer_bust');
    const pt = player.hardTotal();
    const dt = dealer.hardTotal();
    if (pt > dt) return this.settle('player_win');
    if (pt < dt) return this.settle('dealer_win');
    return this.settle('push');
  }

  // Returns an outcome when the player's action ends the round outright.
  private playerTurn(): Outcome | null {
    const player = this.playerHand;
    const upcard = this.dealerHand.cards[0];
    let canDouble = this.rules.doubleAllowed;

    while (true) {
      const decision: Decision = this.strategy.decide({
        player,
        dealerUpcard: upcard,
        rules: this.rules,
        canDouble,
      });

      if (decision === 'surrender' && this.rules.surrender && player.size === 2) {
        player.surrendered = true;
        return 'player_surrender';
      }

      if (decision === 'double' && canDouble) {
        player.doubled = true;
        player.add(this.shoe.draw());
        return player.isBust() ? 'player_bust' : null;
      }

      if (decision === 'hit') {
        player.add(this.shoe.draw());
        if (player.isBust()) return 'player_bust';
        canDouble = false;
        continue;
      }

      // stand, or a double/surrender that is not legal here
      return null;
    }
  }

  private dealerTurn(): void {
    const dealer = this.dealerHand;
    while (true) {
      const total = dealer.hardTotal();
      if (total < 17) {
        dealer.add(this.shoe.draw());
        continue;
      }
      if (total === 17 && dealer.isSoft() && this.rules.dealerHitsSoft17) {
        dealer.add(this.shoe.draw());
        continue;
      }
      return;
    }
  }

  private settle(outcome: Outcome): RoundResult {
    const doubled = this.playerHand.doubled;
    return Object.freeze({
      outcome,
      playerTotal: this.playerHand.hardTotal(),
      dealerTotal: this.dealerHand.hardTotal(),
      payout: payoutFor(outcome, this.bet, doubled, this.rules),
      doubled,
    });
  }
}
