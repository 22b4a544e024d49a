#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs, USAGE, type CliArgs } from './cli/args.js';
import { ui } from './cli/ui.js';
import { resolveRules } from './config/index.js';
import { Round } from './games/blackjack/engine.js';
import { describeRules } from './games/blackjack/rules.js';
import { Shoe } from './games/blackjack/shoe.js';
import { simulate, summarize } from './games/blackjack/simulate.js';
import { strategyByName } from './games/blackjack/strategy.js';
import { createLogger } from './log.js';
import { renderRound } from './ui/cardsDisplay.js';
import { deltaBadge, formatCents } from './ui/outcome.js';
import { normalizeError, shortStack, UserError } from './util/errors.js';
import { randomSeed } from './util/rng.js';

const log = createLogger('cli');

const pct = (x: number) => `${(x * 100).toFixed(2)}%`;

function runSimulate(args: CliArgs): void {
  const rules = resolveRules({ file: args.rulesFile, overrides: args.rules });
  const seed = args.seed ?? randomSeed();
  ui.banner('Blackjack simulation', `${describeRules(rules)} | seed ${seed} | ${args.strategy} strategy`);

  const progress = ui.bar(args.rounds);
  const step = Math.max(1, Math.floor(args.rounds / 100));
  const stats = ui.timed(`Simulated ${args.rounds.toLocaleString('en-US')} rounds`, () => {
    try {
      return simulate(args.rounds, rules, seed, args.bet, strategyByName(args.strategy), {
        onRound: (s) => { if (s.rounds % step === 0) progress.update(s.rounds); },
      });
    } finally {
      progress.stop();
    }
  });
  const sum = summarize(stats);

  ui.table([
    { stat: 'rounds', value: stats.rounds, rate: '' },
    { stat: 'player wins', value: stats.playerWins, rate: pct(sum.winRate) },
    { stat: 'dealer wins', value: stats.dealerWins, rate: pct(sum.lossRate) },
    { stat: 'pushes', value: stats.pushes, rate: pct(sum.pushRate) },
    { stat: 'player blackjacks', value: stats.playerBlackjacks, rate: '' },
    { stat: 'dealer blackjacks', value: stats.dealerBlackjacks, rate: '' },
    { stat: 'busts', value: stats.busts, rate: '' },
    { stat: 'surrenders', value: stats.surrenders, rate: pct(sum.surrenderRate) },
    { stat: 'doubles', value: stats.doubles, rate: '' },
    { stat: 'wagered', value: formatCents(stats.wagered), rate: '' },
    { stat: 'bankroll', value: deltaBadge(stats.bankroll), rate: pct(sum.expectedValue) },
  ]);
  log.info({ msg: 'simulate_finished', seed, rounds: stats.rounds, bankroll: stats.bankroll });
}

function runDeal(args: CliArgs): void {
  const rules = resolveRules({ file: args.rulesFile, overrides: args.rules });
  const seed = args.seed ?? randomSeed();
  const round = new Round(rules, new Shoe(rules.numDecks, seed), strategyByName(args.strategy), args.bet);
  const result = round.play();
  ui.say(`${describeRules(rules)} | seed ${seed} | bet ${formatCents(args.bet)}`, 'dim');
  for (const line of renderRound(round.player, round.dealer, result, args.bet)) ui.say(line, 'plain');
}

function runRules(args: CliArgs): void {
  const rules = resolveRules({ file: args.rulesFile, overrides: args.rules });
  ui.say(describeRules(rules), 'info');
  ui.table(Object.entries(rules).map(([option, value]) => ({ option, value: String(value) })));
}

export function main(argv: readonly string[] = process.argv.slice(2)): number {
  try {
    const args = parseArgs(argv);
    log.debug({ msg: 'command_start', command: args.command });
    switch (args.command) {
      case 'simulate': runSimulate(args); break;
      case 'deal': runDeal(args); break;
      case 'rules': runRules(args); break;
      case 'help': ui.say(USAGE, 'plain'); break;
    }
    return 0;
  } catch (err) {
    const info = normalizeError(err);
    if (err instanceof UserError) {
      ui.say(info.message, 'error');
    } else {
      ui.say(`${info.name}: ${info.message}`, 'error');
      ui.say(shortStack(err, 6), 'dim');
    }
    log.error({ msg: 'command_failed', error: info });
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main();
}
