import { cardToUnicode, handToUnicode } from '../src/cards/unicode.js';
import { parseCards } from '../src/cards/Card.js';

describe('unicode playing cards', () => {
  test('specific glyphs', () => {
    expect(cardToUnicode({ suit: 'S', rank: 'A' })).toBe('\u{1F0A1}');
    expect(cardToUnicode({ suit: 'H', rank: 'Q' })).toBe('\u{1F0BD}');
    expect(cardToUnicode({ suit: 'D', rank: '5' })).toBe('\u{1F0C5}');
    expect(cardToUnicode({ suit: 'C', rank: 'K' })).toBe('\u{1F0DE}');
  });

  test('hands join with a thin space', () => {
    expect(handToUnicode(parseCards('AS 10H'))).toBe('\u{1F0A1}\u2009\u{1F0BA}');
  });
});
