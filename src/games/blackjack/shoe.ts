import { card, type Card, RANKS, SUITS } from '../../cards/Card.js';
import { type RNG, randomSeed, seededRNG, shuffleInPlace } from '../../util/rng.js';
import type { CardSource } from './types.js';

export function buildDecks(decks: number): Card[] {
  const cards: Card[] = [];
  for (let d = 0; d < decks; d++) {
    for (const s of SUITS) {
      for (const r of RANKS) {
        cards.push(card(r, s));
      }
    }
  }
  return cards;
}

/**
 * Multi-deck shoe with a draw cursor. When the cursor reaches the end the
 * whole sequence is reshuffled in place; there is no discard tray or cut card.
 *
 * The RNG is created once from the seed and keeps advancing across draws,
 * shuffles and resets, so a seed fixes the entire draw sequence.
 */
export class Shoe implements CardSource {
  private cards: Card[] = [];
  private cursor = 0;
  private readonly rng: RNG;

  constructor(decks = 6, seed: number = randomSeed()) {
    this.rng = seededRNG(seed);
    this.reset(decks);
  }

  reset(decks: number): void {
    this.cards = buildDecks(decks);
    this.shuffle();
    this.cursor = 0;
  }

  shuffle(): void {
    shuffleInPlace(this.cards, this.rng);
  }

  draw(): Card {
    if (this.cursor >= this.cards.length) {
      this.shuffle();
      this.cursor = 0;
    }
    return this.cards[this.cursor++];
  }

  remaining(): number {
    return this.cards.length - this.cursor;
  }

  get size(): number {
    return this.cards.length;
  }
}
