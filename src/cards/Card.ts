export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 'A' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K';
export type Card = { readonly suit: Suit; readonly rank: Rank };

export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];
export const SUITS: readonly Suit[] = ['C', 'D', 'H', 'S'];

export function card(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

/** Blackjack point value; an Ace counts 11 here and is reduced by the hand. */
export function cardValue(rank: Rank): number {
  if (rank === 'A') return 11;
  if (rank === 'K' || rank === 'Q' || rank === 'J' || rank === '10') return 10;
  return parseInt(rank, 10);
}

export function isTenValue(rank: Rank): boolean {
  return cardValue(rank) === 10;
}

export function cardLabel(c: Card): string {
  return `${c.rank}${c.suit}`;
}

function isRank(s: string): s is Rank {
  return (RANKS as readonly string[]).includes(s);
}

function isSuit(s: string): s is Suit {
  return (SUITS as readonly string[]).includes(s);
}

// Accepts "AS", "10h", "TD" (T is shorthand for 10).
export function parseCard(text: string): Card {
  const t = text.trim().toUpperCase();
  const rankPart = t.slice(0, -1);
  const suitPart = t.slice(-1);
  const rank = rankPart === 'T' ? '10' : rankPart;
  if (!isRank(rank) || !isSuit(suitPart)) throw new Error(`Invalid card: ${text}`);
  return card(rank, suitPart);
}

export function parseCards(text: string): Card[] {
  return text
    .split(/[\s,]+/)
    .filter((s) => s.length > 0)
    .map(parseCard);
}
