import { type Card, parseCards } from '../../../cards/Card.js';
import { Hand } from '../hand.js';
import type { CardSource, Decision, Situation, Strategy } from '../types.js';

/** Deals a fixed sequence, in order: player, dealer, player, dealer, then draws. */
export class StackedSource implements CardSource {
  private readonly cards: Card[];

  constructor(text: string) {
    this.cards = parseCards(text);
  }

  draw(): Card {
    const c = this.cards.shift();
    if (!c) throw new Error('stacked source exhausted');
    return c;
  }

  get left(): number {
    return this.cards.length;
  }
}

/** Answers with the given decisions in order, then stands; records what it was shown. */
export class ScriptedStrategy implements Strategy {
  readonly seen: Array<{ cards: string; upcard: string; canDouble: boolean }> = [];
  private readonly queue: Decision[];

  constructor(...decisions: Decision[]) {
    this.queue = decisions;
  }

  decide(s: Situation): Decision {
    this.seen.push({
      cards: s.player.cards.map((c) => `${c.rank}${c.suit}`).join(' '),
      upcard: `${s.dealerUpcard.rank}${s.dealerUpcard.suit}`,
      canDouble: s.canDouble,
    });
    return this.queue.shift() ?? 'stand';
  }
}

export function handOf(text: string): Hand {
  const h = new Hand();
  for (const c of parseCards(text)) h.add(c);
  return h;
}
