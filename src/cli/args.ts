import { parsePayout, type RuleOverrides } from '../config/index.js';
import { isStrategyName, STRATEGY_NAMES, type StrategyName } from '../games/blackjack/strategy.js';
import { UserError } from '../util/errors.js';

export type Command = 'simulate' | 'deal' | 'rules' | 'help';

export interface CliArgs {
  command: Command;
  rounds: number;
  seed?: number;
  bet: number;
  strategy: StrategyName;
  rules: RuleOverrides;
  rulesFile?: string;
}

export const USAGE = [
  'Usage: blackjack-lab <command> [options]',
  '',
  'Commands:',
  '  simulate   play many rounds on one shoe and print statistics',
  '  deal       play and show a single round',
  '  rules      print the effective table rules',
  '',
  'Options:',
  '  --rounds N          rounds to simulate (default 10000)',
  '  --seed N            shoe seed (default: random)',
  '  --bet CENTS         stake per round in cents (default 100)',
  `  --strategy NAME     ${STRATEGY_NAMES.join(' | ')} (default naive)`,
  '  --rules-file PATH   JSON rules file (default ./config/rules.json)',
  '  --decks N  --h17  --s17  --no-double  --surrender  --no-peek  --pays N:D',
  '  --quiet  --no-color',
].join('\n');

const COMMANDS: readonly Command[] = ['simulate', 'deal', 'rules', 'help'];

function isCommand(s: string): s is Command {
  return (COMMANDS as readonly string[]).includes(s);
}

function intArg(flag: string, value: string | undefined, min: number): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < min) {
    throw new UserError(`${flag} expects an integer >= ${min}, got ${value ?? 'nothing'}`);
  }
  return n;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv;
  if (first === undefined || first === '--help' || first === '-h') {
    return { command: 'help', rounds: 0, bet: 0, strategy: 'naive', rules: {} };
  }
  if (!isCommand(first)) throw new UserError(`Unknown command "${first}"\n\n${USAGE}`);

  const out: CliArgs = { command: first, rounds: 10_000, bet: 100, strategy: 'naive', rules: {} };
  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    const next = (): string | undefined => rest[++i];
    switch (flag) {
      case '--rounds': out.rounds = intArg(flag, next(), 1); break;
      case '--seed': out.seed = intArg(flag, next(), 0); break;
      case '--bet': out.bet = intArg(flag, next(), 1); break;
      case '--strategy': {
        const name = next();
        if (name === undefined || !isStrategyName(name)) {
          throw new UserError(`--strategy expects one of ${STRATEGY_NAMES.join(', ')}`);
        }
        out.strategy = name;
        break;
      }
      case '--rules-file': {
        const file = next();
        if (!file) throw new UserError('--rules-file expects a path');
        out.rulesFile = file;
        break;
      }
      case '--decks': out.rules.numDecks = intArg(flag, next(), 1); break;
      case '--h17': out.rules.dealerHitsSoft17 = true; break;
      case '--s17': out.rules.dealerHitsSoft17 = false; break;
      case '--no-double': out.rules.doubleAllowed = false; break;
      case '--surrender': out.rules.surrender = true; break;
      case '--no-peek': out.rules.peekForBlackjack = false; break;
      case '--pays': Object.assign(out.rules, parsePayout(next() ?? '')); break;
      case '--quiet':
      case '--no-color':
        break; // read straight from process.argv by the ui
      default:
        throw new UserError(`Unknown option "${flag}"\n\n${USAGE}`);
    }
  }
  return out;
}
