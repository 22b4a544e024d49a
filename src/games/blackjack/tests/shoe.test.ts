import { cardLabel, type Card } from '../../../cards/Card.js';
import { buildDecks, Shoe } from '../shoe.js';

const labels = (cards: Card[]) => cards.map(cardLabel);

function drawMany(shoe: Shoe, n: number): Card[] {
  const out: Card[] = [];
  for (let i = 0; i < n; i++) out.push(shoe.draw());
  return out;
}

describe('shoe', () => {
  test('one deck holds every rank and suit once', () => {
    const deck = buildDecks(1);
    expect(deck).toHaveLength(52);
    expect(new Set(labels(deck)).size).toBe(52);
  });

  test('six decks: 312 cards, 24 of each rank', () => {
    const shoe = new Shoe(6, 1);
    expect(shoe.size).toBe(312);
    expect(shoe.remaining()).toBe(312);
    const aces = drawMany(shoe, 312).filter((c) => c.rank === 'A');
    expect(aces).toHaveLength(24);
  });

  test('draws the full shoe before reshuffling', () => {
    const shoe = new Shoe(1, 7);
    const first = drawMany(shoe, 52);
    expect(new Set(labels(first)).size).toBe(52);
    expect(shoe.remaining()).toBe(0);
    shoe.draw();
    expect(shoe.remaining()).toBe(51);
  });

  test('same seed gives the same sequence, across reshuffles too', () => {
    const a = labels(drawMany(new Shoe(1, 42), 130));
    const b = labels(drawMany(new Shoe(1, 42), 130));
    expect(a).toEqual(b);
  });

  test('different seeds give different orders', () => {
    const a = labels(drawMany(new Shoe(1, 1), 52));
    const b = labels(drawMany(new Shoe(1, 2), 52));
    expect(a).not.toEqual(b);
  });

  test('reset rebuilds to the new deck count', () => {
    const shoe = new Shoe(1, 3);
    drawMany(shoe, 10);
    shoe.reset(2);
    expect(shoe.size).toBe(104);
    expect(shoe.remaining()).toBe(104);
  });

  test('shuffle keeps the remaining count and the card set', () => {
    const shoe = new Shoe(1, 9);
    drawMany(shoe, 5);
    shoe.shuffle();
    expect(shoe.remaining()).toBe(47);
    shoe.reset(1);
    expect(new Set(labels(drawMany(shoe, 52))).size).toBe(52);
  });
});
