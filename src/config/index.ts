import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_RULES } from '../games/blackjack/rules.js';
import type { Rules } from '../games/blackjack/types.js';
import { envBool, envInt, envString } from '../util/env.js';
import { ConfigError } from '../util/errors.js';

const rulesSchema = z.object({
  numDecks: z.number().int().positive(),
  dealerHitsSoft17: z.boolean(),
  doubleAllowed: z.boolean(),
  doubleAfterSplit: z.boolean(),
  surrender: z.boolean(),
  peekForBlackjack: z.boolean(),
  blackjackPaysNum: z.number().int().positive(),
  blackjackPaysDen: z.number().int().positive(),
}).strict();

const rulesFileSchema = rulesSchema.partial().strict();

export type RuleOverrides = { -readonly [K in keyof Rules]?: Rules[K] };

export const DEFAULT_RULES_FILE = path.resolve(process.cwd(), 'config', 'rules.json');

function formatIssues(err: z.ZodError): string[] {
  return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/** Parses "3:2" or "6/5" into a payout ratio. */
export function parsePayout(text: string): { blackjackPaysNum: number; blackjackPaysDen: number } {
  const m = /^\s*(\d+)\s*[:/]\s*(\d+)\s*$/.exec(text);
  if (!m) throw new ConfigError(`Invalid blackjack payout "${text}"`, ['expected the form N:D, e.g. 3:2']);
  const num = parseInt(m[1], 10);
  const den = parseInt(m[2], 10);
  if (num <= 0 || den <= 0) throw new ConfigError(`Invalid blackjack payout "${text}"`, ['both sides must be positive']);
  return { blackjackPaysNum: num, blackjackPaysDen: den };
}

export function loadRulesFile(file: string = DEFAULT_RULES_FILE): RuleOverrides {
  if (!fs.existsSync(file)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Could not parse ${file}`, [e instanceof Error ? e.message : String(e)]);
  }
  const parsed = rulesFileSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`Invalid rules in ${file}`, formatIssues(parsed.error));
  return parsed.data;
}

// Only variables that are set (and parse) appear in the result, so unset ones
// never shadow a lower layer.
export function rulesFromEnv(): RuleOverrides {
  const out: RuleOverrides = {};
  const decks = envInt('BJ_DECKS');
  if (decks !== undefined) out.numDecks = decks;
  const h17 = envBool('BJ_H17');
  if (h17 !== undefined) out.dealerHitsSoft17 = h17;
  const dbl = envBool('BJ_DOUBLE');
  if (dbl !== undefined) out.doubleAllowed = dbl;
  const das = envBool('BJ_DAS');
  if (das !== undefined) out.doubleAfterSplit = das;
  const surrender = envBool('BJ_SURRENDER');
  if (surrender !== undefined) out.surrender = surrender;
  const peek = envBool('BJ_PEEK');
  if (peek !== undefined) out.peekForBlackjack = peek;
  const pays = envString('BJ_PAYS');
  if (pays) Object.assign(out, parsePayout(pays));
  return out;
}

export type ResolveRulesOptions = {
  file?: string;
  overrides?: RuleOverrides;
};

/** defaults <- rules file <- BJ_* environment <- explicit overrides, validated and frozen. */
export function resolveRules(opts: ResolveRulesOptions = {}): Rules {
  const merged = {
    ...DEFAULT_RULES,
    ...loadRulesFile(opts.file),
    ...rulesFromEnv(),
    ...opts.overrides,
  };
  const parsed = rulesSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError('Invalid table rules', formatIssues(parsed.error));
  return Object.freeze(parsed.data);
}
