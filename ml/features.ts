/**
 * Feature Pipeline
 *
 * Builds the feature table from a flat game log in declared passes.
 *
 * 1. The table is grouped once (per team, time-ordered). Every pass reuses
 *    the same GroupedSeries and reads values through the CURRENT table, so
 *    a pass sees the columns added by the passes before it.
 * 2. Each pass declares the columns it requires and produces. The whole
 *    plan is checked before anything runs.
 * 3. 'series' passes (per-team time-series features) run first, then
 *    'season' passes (cross-row aggregates). A season pass can depend on
 *    any series output; the reverse is rejected.
 * 4. Passes return patches; every patch yields a new table.
 */

import type {
  GroupedSeries,
  GroupingOptions,
  MetricScope,
  RollingStatistic,
  RowPatch,
  RowTable,
} from '../src/types/index.js';
import type { FeatureConfig } from '../src/config.js';
import { COLUMNS } from '../src/config.js';
import { InvalidOptionError, MalformedTimestampError, UnknownColumnError } from '../src/errors.js';
import { createConsoleLogger, type Logger } from '../src/logger.js';
import { applyPatches } from '../src/table.js';
import { groupSeries } from './grouping.js';
import { rolling, rollingColumnName } from './rolling.js';
import { ewma } from './ewma.js';
import { lag, lagColumnName } from './lags.js';
import { momentum, STREAK_COLUMNS, streaks } from './streaks.js';
import { restColumns, restDays } from './fatigue.js';
import {
  cumulative,
  cumulativeColumnName,
  rankWithinGroup,
  type CumulativeStatistic,
} from './cumulative.js';
import {
  clutchFactor,
  CONFERENCE_COLUMNS,
  conferenceAdjustments,
  consistency,
  CONSISTENCY_COLUMNS,
  enhancedStrengthIndex,
  headToHead,
  HOME_AWAY_COLUMNS,
  homeAwaySplits,
  pythagorean,
  PYTHAGOREAN_COLUMNS,
  strengthOfSchedule,
  teamStrengthIndex,
} from './strength.js';
import {
  interaction,
  interactionColumnName,
  minMaxNormalize,
  normalizeColumnName,
  polynomial,
  polynomialColumnNames,
  rateColumnName,
  rateStat,
  timeDecay,
  winPct,
  type Bounds,
} from './transforms.js';

// ─── Pass model ───

export type PassPhase = 'series' | 'season';

export interface PassContext {
  /** Table as left by the previous pass */
  table: RowTable;
  grouped: GroupedSeries;
  logger: Logger;
}

export interface FeaturePass {
  name: string;
  phase: PassPhase;
  requires: readonly string[];
  produces: readonly string[];
  run(ctx: PassContext): RowPatch;
}

export interface BuildOptions extends GroupingOptions {
  logger?: Logger;
}

export interface BuildResult {
  table: RowTable;
  grouped: GroupedSeries;
  excluded: MalformedTimestampError[];
}

/** Series passes first, then season passes; declared order within a phase */
export function orderPasses(passes: readonly FeaturePass[]): FeaturePass[] {
  return [
    ...passes.filter(p => p.phase === 'series'),
    ...passes.filter(p => p.phase === 'season'),
  ];
}

/**
 * Check the plan against the input columns: every required column must
 * exist or be produced by a pass that runs earlier, and no two sources
 * may produce the same column.
 */
export function validatePasses(columns: readonly string[], passes: readonly FeaturePass[]): void {
  const available = new Set(columns);
  for (const pass of orderPasses(passes)) {
    for (const column of pass.requires) {
      if (!available.has(column)) {
        throw new UnknownColumnError(column, [...available], pass.name);
      }
    }
    for (const column of pass.produces) {
      if (available.has(column)) {
        throw new InvalidOptionError(column, `pass "${pass.name}" would overwrite an existing column`);
      }
      available.add(column);
    }
  }
}

export function buildFeatures(
  table: RowTable,
  passes: readonly FeaturePass[],
  options: BuildOptions = {},
): BuildResult {
  const { logger = createConsoleLogger('features'), ...grouping } = options;

  const ordered = orderPasses(passes);
  validatePasses(table.columns, ordered);

  const grouped = groupSeries(table, grouping, logger);
  logger.info(`${table.rows.length} rows, ${grouped.groups.size} series, ${ordered.length} passes`);

  let current = table;
  for (const pass of ordered) {
    const patch = pass.run({ table: current, grouped, logger });
    current = applyPatches(current, patch, pass.produces);
    logger.debug(`${pass.name} (${pass.phase}): +${pass.produces.join(', ')}`);
  }

  logger.info(`Built ${current.columns.length - table.columns.length} feature columns`);
  return { table: current, grouped, excluded: grouped.excluded };
}

// ─── Pass factories: series phase ───

export function rollingPass(options: {
  column: string;
  window: number;
  statistic: RollingStatistic;
  outputColumn?: string;
  flagPartial?: boolean;
}): FeaturePass {
  const output = options.outputColumn ?? rollingColumnName(options.column, options.statistic, options.window);
  return {
    name: `rolling(${output})`,
    phase: 'series',
    requires: [options.column],
    produces: options.flagPartial ? [output, `${output}_partial`] : [output],
    run: ({ table, grouped }) => rolling(table, grouped, { ...options, outputColumn: output }),
  };
}

export function ewmaPass(options: {
  column: string;
  alpha?: number;
  span?: number;
  outputColumn?: string;
}): FeaturePass {
  const output = options.outputColumn ?? `${options.column}_ewma`;
  return {
    name: `ewma(${output})`,
    phase: 'series',
    requires: [options.column],
    produces: [output],
    run: ({ table, grouped }) => ewma(table, grouped, { ...options, outputColumn: output }),
  };
}

export function lagPass(options: { column: string; periods: readonly number[] }): FeaturePass {
  return {
    name: `lag(${options.column})`,
    phase: 'series',
    requires: [options.column],
    produces: options.periods.map(k => lagColumnName(options.column, k)),
    run: ({ table, grouped }) => lag(table, grouped, options),
  };
}

export function streakPass(options: { column: string; hotThreshold?: number }): FeaturePass {
  return {
    name: 'streaks',
    phase: 'series',
    requires: [options.column],
    produces: STREAK_COLUMNS,
    run: ({ table, grouped }) => streaks(table, grouped, options),
  };
}

export function momentumPass(options: { column: string; window?: number; outputColumn?: string }): FeaturePass {
  const output = options.outputColumn ?? 'momentum_score';
  return {
    name: 'momentum',
    phase: 'series',
    requires: [options.column],
    produces: [output],
    run: ({ table, grouped }) => momentum(table, grouped, { ...options, outputColumn: output }),
  };
}

export function restDaysPass(options: { firstGameRestDays?: number; congestionWindowDays?: number } = {}): FeaturePass {
  return {
    name: 'restDays',
    phase: 'series',
    requires: [],
    produces: restColumns(options.congestionWindowDays),
    run: ({ table, grouped }) => restDays(table, grouped, options),
  };
}

export function cumulativePass(options: {
  column: string;
  statistic?: CumulativeStatistic;
  outputColumn?: string;
}): FeaturePass {
  const output = options.outputColumn ?? cumulativeColumnName(options.column, options.statistic);
  return {
    name: `cumulative(${output})`,
    phase: 'series',
    requires: [options.column],
    produces: [output],
    run: ({ table, grouped }) => cumulative(table, grouped, { ...options, outputColumn: output }),
  };
}

export function rankPass(options: { column: string; ascending?: boolean; outputColumn?: string }): FeaturePass {
  const output = options.outputColumn ?? `${options.column}_rank`;
  return {
    name: `rank(${output})`,
    phase: 'series',
    requires: [options.column],
    produces: [output],
    run: ({ table, grouped }) => rankWithinGroup(table, grouped, { ...options, outputColumn: output }),
  };
}

/** Row-wise, but in the series phase so EWMA and friends can use it */
export function winPctPass(options: { winsColumn: string; gamesPlayedColumn: string; outputColumn?: string }): FeaturePass {
  const output = options.outputColumn ?? 'win_pct';
  return {
    name: 'winPct',
    phase: 'series',
    requires: [options.winsColumn, options.gamesPlayedColumn],
    produces: [output],
    run: ({ table }) => winPct(table, { ...options, outputColumn: output }),
  };
}

// ─── Pass factories: season phase ───

export function pythagoreanPass(options: {
  goalsForColumn: string;
  goalsAgainstColumn: string;
  gamesPlayedColumn: string;
  winsColumn?: string;
}): FeaturePass {
  const { goalsForColumn, goalsAgainstColumn, gamesPlayedColumn, winsColumn } = options;
  return {
    name: 'pythagorean',
    phase: 'season',
    requires: [goalsForColumn, goalsAgainstColumn, gamesPlayedColumn, ...(winsColumn ? [winsColumn] : [])],
    produces: PYTHAGOREAN_COLUMNS,
    run: ({ table }) => pythagorean(table, options),
  };
}

export function consistencyPass(options: { column: string; scope?: MetricScope }): FeaturePass {
  return {
    name: `consistency(${options.column})`,
    phase: 'season',
    requires: [options.column],
    produces: CONSISTENCY_COLUMNS,
    run: ({ table, grouped }) => consistency(table, grouped, options),
  };
}

export function clutchPass(options: { goalDiffColumn: string; resultColumn: string; scope?: MetricScope }): FeaturePass {
  return {
    name: 'clutchFactor',
    phase: 'season',
    requires: [options.goalDiffColumn, options.resultColumn],
    produces: ['clutch_factor'],
    run: ({ table, grouped }) => clutchFactor(table, grouped, options),
  };
}

export function strengthOfSchedulePass(options: { opponentWinsColumn: string; scope?: MetricScope }): FeaturePass {
  return {
    name: 'strengthOfSchedule',
    phase: 'season',
    requires: [options.opponentWinsColumn],
    produces: ['strength_of_schedule'],
    run: ({ table, grouped }) => strengthOfSchedule(table, grouped, options),
  };
}

export function headToHeadPass(options: {
  teamColumn: string;
  opponentColumn: string;
  resultColumn: string;
  scope?: MetricScope;
}): FeaturePass {
  return {
    name: 'headToHead',
    phase: 'season',
    requires: [options.teamColumn, options.opponentColumn, options.resultColumn],
    produces: ['h2h_win_rate'],
    run: ({ table, grouped }) => headToHead(table, grouped, options),
  };
}

export function conferencePass(options: {
  conferenceColumn: string;
  divisionColumn?: string;
  winPctColumn: string;
  scope?: MetricScope;
}): FeaturePass {
  const { conferenceColumn, divisionColumn, winPctColumn } = options;
  return {
    name: 'conferenceAdjustments',
    phase: 'season',
    requires: [conferenceColumn, winPctColumn, ...(divisionColumn ? [divisionColumn] : [])],
    produces: CONFERENCE_COLUMNS,
    run: ({ table, grouped }) => conferenceAdjustments(table, grouped, options),
  };
}

export function strengthIndexPass(options: { winsColumn: string; lossesColumn: string; diffColumn: string }): FeaturePass {
  return {
    name: 'teamStrengthIndex',
    phase: 'season',
    requires: [options.winsColumn, options.lossesColumn, options.diffColumn],
    produces: ['win_rate', 'team_strength_index'],
    run: ({ table }) => teamStrengthIndex(table, options),
  };
}

export function enhancedStrengthPass(options: {
  winsColumn: string;
  lossesColumn: string;
  goalsForColumn: string;
  goalsAgainstColumn: string;
  gamesPlayedColumn?: string;
}): FeaturePass {
  const { winsColumn, lossesColumn, goalsForColumn, goalsAgainstColumn, gamesPlayedColumn } = options;
  return {
    name: 'enhancedStrengthIndex',
    phase: 'season',
    requires: [winsColumn, lossesColumn, goalsForColumn, goalsAgainstColumn, ...(gamesPlayedColumn ? [gamesPlayedColumn] : [])],
    produces: ['enhanced_strength_index'],
    run: ({ table }) => enhancedStrengthIndex(table, options),
  };
}

export function homeAwayPass(options: { locationColumn: string; resultColumn: string }): FeaturePass {
  return {
    name: 'homeAwaySplits',
    phase: 'season',
    requires: [options.locationColumn, options.resultColumn],
    produces: HOME_AWAY_COLUMNS,
    run: ({ table, grouped }) => homeAwaySplits(table, grouped, options),
  };
}

export function interactionPass(options: { left: string; right: string; outputColumn?: string }): FeaturePass {
  const output = interactionColumnName(options);
  return {
    name: `interaction(${output})`,
    phase: 'season',
    requires: [options.left, options.right],
    produces: [output],
    run: ({ table }) => interaction(table, options),
  };
}

export function polynomialPass(options: { column: string; degree?: number }): FeaturePass {
  return {
    name: `polynomial(${options.column})`,
    phase: 'season',
    requires: [options.column],
    produces: polynomialColumnNames(options.column, options.degree),
    run: ({ table }) => polynomial(table, options),
  };
}

export function ratePass(options: { numerator: string; denominator: string; outputColumn?: string }): FeaturePass {
  const output = rateColumnName(options);
  return {
    name: `rate(${output})`,
    phase: 'season',
    requires: [options.numerator, options.denominator],
    produces: [output],
    run: ({ table }) => rateStat(table, options),
  };
}

export function normalizePass(options: { column: string; outputColumn?: string; bounds?: Bounds }): FeaturePass {
  const output = normalizeColumnName(options);
  return {
    name: `normalize(${output})`,
    phase: 'season',
    requires: [options.column],
    produces: [output],
    run: ({ table }) => minMaxNormalize(table, options),
  };
}

export function timeDecayPass(options: { timestampColumn: string; decayRate: number; outputColumn?: string }): FeaturePass {
  const output = options.outputColumn ?? 'time_weight';
  return {
    name: 'timeDecay',
    phase: 'season',
    requires: [options.timestampColumn],
    produces: [output],
    run: ({ table }) => timeDecay(table, { ...options, outputColumn: output }),
  };
}

// ─── Standard game-log pipeline ───

/**
 * Grouping for a table under `config`: the group column only when the
 * table has it, then the timestamp column, else the sequence column,
 * else input order.
 */
export function resolveGrouping(
  config: FeatureConfig,
  columns: readonly string[],
  logger: Logger = createConsoleLogger('features'),
): GroupingOptions {
  const has = (column: string) => columns.includes(column);
  const grouping: GroupingOptions = {};

  if (config.groupBy !== undefined) {
    if (has(config.groupBy)) grouping.groupBy = config.groupBy;
    else logger.warn(`No ${config.groupBy} column; treating the table as one series`);
  }

  if (has(config.timestampColumn)) {
    grouping.timestampColumn = config.timestampColumn;
  } else if (has(config.sequenceColumn)) {
    grouping.sequenceColumn = config.sequenceColumn;
  } else {
    logger.warn(`No ${config.timestampColumn} or ${config.sequenceColumn} column; keeping input order`);
  }
  return grouping;
}

/**
 * Default passes for a team game log. A pass is only included when its
 * source columns are in the table (or produced by an included pass) and
 * its outputs are not already there.
 */
export function standardPasses(config: FeatureConfig, columns: readonly string[]): FeaturePass[] {
  const available = new Set(columns);
  const passes: FeaturePass[] = [];
  const add = (pass: FeaturePass) => {
    if (!pass.requires.every(c => available.has(c))) return;
    if (pass.produces.some(c => available.has(c))) return;
    passes.push(pass);
    for (const column of pass.produces) available.add(column);
  };
  const C = COLUMNS;

  // Series phase
  add(winPctPass({ winsColumn: C.wins, gamesPlayedColumn: C.gamesPlayed }));
  for (const column of [C.points, C.goalsFor, C.goalsAgainst]) {
    add(rollingPass({ column, window: config.window, statistic: 'mean' }));
  }
  add(ewmaPass({ column: C.winPct, alpha: config.alpha, span: config.span }));
  add(lagPass({ column: C.points, periods: config.lags }));
  add(cumulativePass({ column: C.points, statistic: 'sum' }));
  add(streakPass({ column: C.result, hotThreshold: config.hotStreakThreshold }));
  add(momentumPass({ column: C.result, window: config.momentumWindow }));
  if (available.has(config.timestampColumn)) {
    add(restDaysPass({ firstGameRestDays: config.firstGameRestDays }));
  }

  // Season phase
  add(strengthIndexPass({ winsColumn: C.wins, lossesColumn: C.losses, diffColumn: C.goalDiff }));
  add(pythagoreanPass({
    goalsForColumn: C.goalsFor,
    goalsAgainstColumn: C.goalsAgainst,
    gamesPlayedColumn: C.gamesPlayed,
    winsColumn: available.has(C.wins) ? C.wins : undefined,
  }));
  add(enhancedStrengthPass({
    winsColumn: C.wins,
    lossesColumn: C.losses,
    goalsForColumn: C.goalsFor,
    goalsAgainstColumn: C.goalsAgainst,
    gamesPlayedColumn: available.has(C.gamesPlayed) ? C.gamesPlayed : undefined,
  }));
  add(consistencyPass({ column: C.goalsFor }));
  add(clutchPass({ goalDiffColumn: C.goalDiff, resultColumn: C.result }));
  add(strengthOfSchedulePass({ opponentWinsColumn: C.opponentWins }));
  add(headToHeadPass({ teamColumn: C.team, opponentColumn: C.opponent, resultColumn: C.result }));
  add(conferencePass({
    conferenceColumn: C.conference,
    divisionColumn: available.has(C.division) ? C.division : undefined,
    winPctColumn: C.winPct,
  }));
  add(homeAwayPass({ locationColumn: C.location, resultColumn: C.result }));
  add(interactionPass({ left: C.goalsFor, right: C.winPct, outputColumn: 'offense_efficiency' }));
  add(interactionPass({ left: C.goalsAgainst, right: C.winPct, outputColumn: 'defense_efficiency' }));
  add(polynomialPass({ column: C.goalDiff, degree: 2 }));
  add(polynomialPass({ column: C.points, degree: 2 }));
  add(ratePass({ numerator: C.goalsFor, denominator: C.gamesPlayed }));
  add(ratePass({ numerator: C.goalsAgainst, denominator: C.gamesPlayed }));
  for (const column of [C.points, C.goalsFor, C.goalsAgainst]) {
    add(normalizePass({ column }));
  }
  add(timeDecayPass({ timestampColumn: config.timestampColumn, decayRate: config.timeDecayRate }));

  return passes;
}

/** Columns a set of passes adds, in execution order */
export function producedColumns(passes: readonly FeaturePass[]): string[] {
  return orderPasses(passes).flatMap(p => [...p.produces]);
}
