import type { Card, Rank, Suit } from './Card.js';

// Unicode Playing Cards block (no Knights)
// Ace code points: Spades U+1F0A1, Hearts U+1F0B1, Diamonds U+1F0C1, Clubs U+1F0D1
const SUIT_BASE: Record<Suit, number> = { S: 0x1f0a1, H: 0x1f0b1, D: 0x1f0c1, C: 0x1f0d1 };

const RANK_OFFSET: Record<Rank, number> = {
  A: 0, '2': 1, '3': 2, '4': 3, '5': 4, '6': 5, '7': 6, '8': 7, '9': 8, '10': 9,
  J: 10, Q: 12, K: 13,
};

export function cardToUnicode(card: Card): string {
  // Knight (offset 11) is skipped by the offset table.
  return String.fromCodePoint(SUIT_BASE[card.suit] + RANK_OFFSET[card.rank]);
}

export function handToUnicode(cards: readonly Card[]): string {
  const thin = '\u2009';
  return cards.map(cardToUnicode).join(thin);
}
