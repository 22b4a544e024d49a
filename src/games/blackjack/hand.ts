import { type Card, cardValue } from '../../cards/Card.js';

export interface HandValue {
  total: number;
  soft: boolean;
}

export function handTotal(cards: readonly Card[]): HandValue {
  let total = 0;
  let aces = 0;
  for (const c of cards) {
    total += cardValue(c.rank);
    if (c.rank === 'A') aces++;
  }
  while (total > 21 && aces > 0) {
    total -= 10; // count one Ace as 1 instead of 11
    aces--;
  }
  // any Ace left unreduced still counts 11, which only happens at or under 21
  return { total, soft: aces > 0 };
}

/** Cards dealt to one participant during a single round. */
export class Hand {
  private readonly dealt: Card[] = [];
  doubled = false;
  surrendered = false;

  add(c: Card): void {
    this.dealt.push(c);
  }

  get cards(): readonly Card[] {
    return this.dealt;
  }

  get size(): number {
    return this.dealt.length;
  }

  hardTotal(): number {
    return handTotal(this.dealt).total;
  }

  isSoft(): boolean {
    return handTotal(this.dealt).soft;
  }

  isBlackjack(): boolean {
    return this.dealt.length === 2 && this.hardTotal() === 21;
  }

  isBust(): boolean {
    return this.hardTotal() > 21;
  }
}
