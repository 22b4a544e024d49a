import { type Card, cardLabel } from '../cards/Card.js';
import { handToUnicode } from '../cards/unicode.js';
import { getPalette, type Palette } from '../cli/theme.js';
import { stakeFor } from '../games/blackjack/engine.js';
import type { Hand } from '../games/blackjack/hand.js';
import type { RoundResult } from '../games/blackjack/types.js';
import { deltaBadge, formatCents, outcomeMessage } from './outcome.js';

function colorCard(c: Card, palette: Palette): string {
  const paint = c.suit === 'H' || c.suit === 'D' ? palette.redSuit : palette.blackSuit;
  return paint(cardLabel(c));
}

export function handLine(label: string, hand: Hand, palette: Palette = getPalette()): string {
  const labels = hand.cards.map((c) => colorCard(c, palette)).join(' ');
  const soft = hand.isSoft() ? ' soft' : '';
  return `${label.padEnd(7)} ${handToUnicode(hand.cards)}  ${labels}  ${palette.dim(`(${hand.hardTotal()}${soft})`)}`;
}

/** Text block for a finished round: both hands, the outcome and the money. */
export function renderRound(
  player: Hand,
  dealer: Hand,
  result: RoundResult,
  bet: number,
  palette: Palette = getPalette(),
): string[] {
  const net = result.payout - stakeFor(bet, result.doubled);
  const tags = [player.doubled ? 'doubled' : '', player.surrendered ? 'surrendered' : ''].filter(Boolean);
  const paint = net > 0 ? palette.success : net < 0 ? palette.error : palette.warn;
  return [
    handLine('Dealer', dealer, palette),
    handLine('You', player, palette) + (tags.length ? ` ${palette.dim(`[${tags.join(', ')}]`)}` : ''),
    paint(`${outcomeMessage(result.outcome)} Payout ${formatCents(result.payout)} (${deltaBadge(net)})`),
  ];
}
