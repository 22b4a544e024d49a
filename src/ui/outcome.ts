import type { Outcome } from '../games/blackjack/types.js';

/** Minor units to a two-decimal amount, e.g. 250 -> "2.50", -75 -> "-0.75". */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(Math.trunc(cents));
  const whole = Math.floor(abs / 100).toLocaleString('en-US');
  const frac = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${frac}`;
}

export function deltaBadge(cents: number): string {
  const sign = cents >= 0 ? '+' : '−';
  return `${sign}${formatCents(Math.abs(cents))}`;
}

export function outcomeMessage(outcome: Outcome): string {
  switch (outcome) {
    case 'player_blackjack': return 'Blackjack! You win.';
    case 'dealer_blackjack': return 'Dealer has blackjack.';
    case 'player_bust': return 'You bust.';
    case 'dealer_bust': return 'Dealer busts. You win.';
    case 'player_win': return 'You win.';
    case 'dealer_win': return 'Dealer wins.';
    case 'push': return 'Push. Your bet is returned.';
    case 'player_surrender': return 'You surrender half your bet.';
  }
}
