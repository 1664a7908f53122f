/**
 * gamelog-features - Configuration
 */

import { z } from 'zod';
import { InvalidOptionError } from './errors.js';

// ─── Column names of the standard team game log ───

export const COLUMNS = {
  team: 'Team',
  opponent: 'Opponent',
  date: 'date',
  gameNumber: 'game_number',
  gamesPlayed: 'GP',
  wins: 'W',
  losses: 'L',
  points: 'PTS',
  goalsFor: 'GF',
  goalsAgainst: 'GA',
  goalDiff: 'DIFF',
  result: 'result',
  location: 'location',
  conference: 'conference',
  division: 'division',
  opponentWins: 'opponent_wins',
  winPct: 'win_pct',
} as const;

// ─── Neutral defaults for undefined metrics ───

export const NEUTRAL = {
  rate: 0.5,            // any win rate with no games behind it
};

// ─── Enhanced strength index weights & scales ───

export const STRENGTH_WEIGHTS = {
  winRate: 0.3,
  goalDiffPerGame: 0.2,
  pythagorean: 0.3,
  goalsForPerGame: 0.1,
  goalsAgainstPerGame: 0.1,
};

/** Goal differential per game that maps to 0 / 1 is -GD_SCALE / +GD_SCALE */
export const GOAL_DIFF_SCALE = 2;
/** Goals per game treated as the top of the scale */
export const GOALS_PER_GAME_CEILING = 5;

// ─── Pipeline defaults ───

const FeatureConfigSchema = z.object({
  groupBy: z.string().min(1).optional(),
  timestampColumn: z.string().min(1),
  sequenceColumn: z.string().min(1),
  window: z.number().int().positive(),
  alpha: z.number().gt(0).lte(1).optional(),
  span: z.number().positive().optional(),
  lags: z.array(z.number().int().positive()).min(1)
    .refine(lags => new Set(lags).size === lags.length, { message: 'lag periods must be unique' }),
  momentumWindow: z.number().int().positive(),
  hotStreakThreshold: z.number().int().positive(),
  firstGameRestDays: z.number().nonnegative(),
  timeDecayRate: z.number().nonnegative(),
  nSplits: z.number().int().positive(),
  testFraction: z.number().gt(0).lt(1),
  seed: z.number().int(),
  target: z.string().min(1).optional(),
}).refine(cfg => (cfg.alpha === undefined) !== (cfg.span === undefined), {
  message: 'set exactly one of alpha or span',
  path: ['alpha'],
});

export type FeatureConfig = z.infer<typeof FeatureConfigSchema>;

export const FEATURE_CONFIG: FeatureConfig = {
  groupBy: COLUMNS.team,
  timestampColumn: COLUMNS.date,
  sequenceColumn: COLUMNS.gameNumber,
  window: 5,
  alpha: 0.3,
  lags: [1, 3, 5],
  momentumWindow: 10,
  hotStreakThreshold: 3,
  firstGameRestDays: 3,
  timeDecayRate: 0.05,
  nSplits: 5,
  testFraction: 0.2,
  seed: 42,
  target: 'playoff_status',
};

type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidOptionError(name, `expected a number, got "${raw}"`);
  }
  return value;
}

function stringFromEnv(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Defaults <- environment (FEATURES_*) <- explicit overrides, validated.
 *
 * A blank FEATURES_GROUP_BY (set but empty) turns grouping off, so the
 * whole table is one series. Other blank variables are ignored.
 */
export function loadFeatureConfig(
  env: Env = process.env,
  overrides: Partial<FeatureConfig> = {},
): FeatureConfig {
  const fromEnv: Partial<FeatureConfig> = {};

  const window = numberFromEnv(env, 'FEATURES_WINDOW');
  if (window !== undefined) fromEnv.window = window;

  const span = numberFromEnv(env, 'FEATURES_SPAN');
  const alpha = numberFromEnv(env, 'FEATURES_ALPHA');
  if (span !== undefined) {
    fromEnv.span = span;
    fromEnv.alpha = undefined;
  }
  if (alpha !== undefined) fromEnv.alpha = alpha;

  const lags = stringFromEnv(env, 'FEATURES_LAGS');
  if (lags) {
    fromEnv.lags = lags.split(',').map(part => {
      const value = Number(part.trim());
      if (Number.isNaN(value)) {
        throw new InvalidOptionError('FEATURES_LAGS', `expected a comma list of integers, got "${lags}"`);
      }
      return value;
    });
  }

  if (env.FEATURES_GROUP_BY !== undefined) {
    fromEnv.groupBy = stringFromEnv(env, 'FEATURES_GROUP_BY');
  }

  const nSplits = numberFromEnv(env, 'FEATURES_N_SPLITS');
  if (nSplits !== undefined) fromEnv.nSplits = nSplits;

  const testFraction = numberFromEnv(env, 'FEATURES_TEST_FRACTION');
  if (testFraction !== undefined) fromEnv.testFraction = testFraction;

  const seed = numberFromEnv(env, 'FEATURES_SEED');
  if (seed !== undefined) fromEnv.seed = seed;

  const target = stringFromEnv(env, 'FEATURES_TARGET');
  if (target) fromEnv.target = target;

  const merged = { ...FEATURE_CONFIG, ...fromEnv, ...overrides };
  if (overrides.span !== undefined && overrides.alpha === undefined) {
    merged.alpha = undefined;
  }
  if (overrides.alpha !== undefined && overrides.span === undefined) {
    merged.span = undefined;
  }

  const parsed = FeatureConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const option = issue.path.join('.') || 'config';
    throw new InvalidOptionError(option, issue.message);
  }
  return parsed.data;
}
