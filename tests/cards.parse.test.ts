import { cardLabel, cardValue, isTenValue, parseCard, parseCards } from '../src/cards/Card.js';

describe('card model', () => {
  test('point values', () => {
    expect(cardValue('2')).toBe(2);
    expect(cardValue('9')).toBe(9);
    expect(cardValue('10')).toBe(10);
    expect(cardValue('J')).toBe(10);
    expect(cardValue('K')).toBe(10);
    expect(cardValue('A')).toBe(11);
    expect(isTenValue('Q')).toBe(true);
    expect(isTenValue('A')).toBe(false);
  });

  test('parses short labels, with T for ten', () => {
    expect(parseCard('as')).toEqual({ rank: 'A', suit: 'S' });
    expect(parseCard('TD')).toEqual({ rank: '10', suit: 'D' });
    expect(cardLabel(parseCard('10h'))).toBe('10H');
    expect(parseCards('AS, KH  2C').map(cardLabel)).toEqual(['AS', 'KH', '2C']);
  });

  test('rejects unknown cards', () => {
    expect(() => parseCard('1S')).toThrow('Invalid card: 1S');
    expect(() => parseCard('AX')).toThrow('Invalid card: AX');
  });

  test('cards are frozen', () => {
    expect(Object.isFrozen(parseCard('AS'))).toBe(true);
  });
});
