/**
 * Team Strength Metrics
 *
 * Aggregates over a team's games (or over the whole table) broadcast back
 * onto each row.
 *
 * Scope:
 * - 'season' metrics use every game of the team, including games played
 *   AFTER the row. They describe the season, they are not leakage-free.
 * - 'asOf' metrics only use the team's rows with time <= the row's time.
 *
 * Every rate with an empty denominator falls back to a neutral value
 * (0.5) instead of NaN.
 */

import type {
  FieldValue,
  GroupedSeries,
  MetricScope,
  Row,
  RowPatch,
  RowTable,
  SeriesEntry,
} from '../src/types/index.js';
import { GOAL_DIFF_SCALE, GOALS_PER_GAME_CEILING, NEUTRAL, STRENGTH_WEIGHTS } from '../src/config.js';
import { InvalidOptionError } from '../src/errors.js';
import { getField, numericField, requireColumns } from '../src/table.js';
import { ALL_ROWS_KEY, asOfEnd } from './grouping.js';
import { parseOutcome } from './streaks.js';

type Patch = Map<number, Record<string, FieldValue>>;

// ─── Helpers ───

export function winRate(wins: number, games: number): number {
  return games > 0 ? wins / games : NEUTRAL.rate;
}

/** GF² / (GF² + GA²); undefined unless both totals are positive */
export function pythagoreanWinPct(goalsFor: number, goalsAgainst: number): number | undefined {
  if (!(goalsFor > 0 && goalsAgainst > 0)) return undefined;
  return goalsFor ** 2 / (goalsFor ** 2 + goalsAgainst ** 2);
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Every row index of each entity, including rows the grouper left out
 * of time ordering (season metrics do not need a timestamp).
 */
function entityRows(table: RowTable, grouped: GroupedSeries): Map<string, number[]> {
  const byEntity = new Map<string, number[]>();
  const { groupBy } = grouped;
  table.rows.forEach((row, index) => {
    const raw = groupBy === undefined ? ALL_ROWS_KEY : getField(row, groupBy);
    const key = raw === undefined ? '' : String(raw).trim();
    let indices = byEntity.get(key);
    if (!indices) {
      indices = [];
      byEntity.set(key, indices);
    }
    indices.push(index);
  });
  return byEntity;
}

/**
 * Run `aggregate` over the rows each row may see under `scope` and
 * broadcast its fields.
 */
function broadcast(
  table: RowTable,
  grouped: GroupedSeries,
  scope: MetricScope,
  aggregate: (rows: Row[]) => Record<string, FieldValue>,
): Patch {
  const patch: Patch = new Map();

  if (scope === 'season') {
    for (const indices of entityRows(table, grouped).values()) {
      const fields = aggregate(indices.map(i => table.rows[i]));
      for (const index of indices) patch.set(index, fields);
    }
    return patch;
  }

  for (const entries of grouped.groups.values()) {
    for (let i = 0; i < entries.length; i++) {
      const end = asOfEnd(entries, i);
      const visible = entries.slice(0, end + 1).map((e: SeriesEntry) => table.rows[e.index]);
      patch.set(entries[i].index, aggregate(visible));
    }
  }
  return patch;
}

function validateScope(scope: MetricScope): void {
  if (scope !== 'season' && scope !== 'asOf') {
    throw new InvalidOptionError('scope', `expected "season" or "asOf", got "${String(scope)}"`);
  }
}

// ─── Pythagorean expectation ───

export interface PythagoreanOptions {
  goalsForColumn: string;
  goalsAgainstColumn: string;
  gamesPlayedColumn: string;
  /** Actual wins, for the luck factor */
  winsColumn?: string;
}

export const PYTHAGOREAN_COLUMNS = ['pythagorean_win_pct', 'pythagorean_wins', 'luck_factor'] as const;

/**
 * Row-wise: the row's GF/GA/GP are season totals to date.
 */
export function pythagorean(table: RowTable, options: PythagoreanOptions): RowPatch {
  const { goalsForColumn, goalsAgainstColumn, gamesPlayedColumn, winsColumn } = options;
  requireColumns(
    table,
    [goalsForColumn, goalsAgainstColumn, gamesPlayedColumn, ...(winsColumn ? [winsColumn] : [])],
    'pythagorean',
  );

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const pct = pythagoreanWinPct(
      numericField(row, goalsForColumn) ?? 0,
      numericField(row, goalsAgainstColumn) ?? 0,
    );
    const games = numericField(row, gamesPlayedColumn);
    const expectedWins = pct !== undefined && games !== undefined ? pct * games : undefined;
    const actualWins = winsColumn ? numericField(row, winsColumn) : undefined;

    patch.set(index, {
      pythagorean_win_pct: pct,
      pythagorean_wins: expectedWins,
      luck_factor: expectedWins !== undefined && actualWins !== undefined
        ? actualWins - expectedWins
        : undefined,
    });
  });
  return patch;
}

// ─── Consistency ───

export interface ConsistencyOptions {
  column: string;
  scope?: MetricScope;
}

export const CONSISTENCY_COLUMNS = ['score_mean', 'score_std_dev', 'score_cv', 'consistency_score'] as const;

/**
 * Population mean / std-dev of a scoring column. The coefficient of
 * variation (and the consistency score 1 - cv) is unset when the mean is 0.
 */
export function consistency(table: RowTable, grouped: GroupedSeries, options: ConsistencyOptions): RowPatch {
  const { column, scope = 'season' } = options;
  requireColumns(table, [column], 'consistency');
  validateScope(scope);

  return broadcast(table, grouped, scope, rows => {
    const scores = rows.map(r => numericField(r, column)).filter((v): v is number => v !== undefined);
    if (scores.length === 0) {
      return { score_mean: undefined, score_std_dev: undefined, score_cv: undefined, consistency_score: undefined };
    }
    const mean = scores.reduce((a, b) => a + b, 0) / scores.length;
    const variance = scores.reduce((s, v) => s + (v - mean) ** 2, 0) / scores.length;
    const stdDev = Math.sqrt(variance);
    const cv = mean !== 0 ? stdDev / mean : undefined;
    return {
      score_mean: mean,
      score_std_dev: stdDev,
      score_cv: cv,
      consistency_score: cv !== undefined ? 1 - cv : undefined,
    };
  });
}

// ─── Clutch factor ───

export interface ClutchOptions {
  goalDiffColumn: string;
  resultColumn: string;
  scope?: MetricScope;
}

/**
 * Win rate in close games (|goal differential| <= 1).
 */
export function clutchFactor(table: RowTable, grouped: GroupedSeries, options: ClutchOptions): RowPatch {
  const { goalDiffColumn, resultColumn, scope = 'season' } = options;
  requireColumns(table, [goalDiffColumn, resultColumn], 'clutchFactor');
  validateScope(scope);

  return broadcast(table, grouped, scope, rows => {
    const close = rows.filter(r => {
      const diff = numericField(r, goalDiffColumn);
      return diff !== undefined && Math.abs(diff) <= 1;
    });
    const wins = close.filter(r => parseOutcome(getField(r, resultColumn)) === 'W').length;
    return { clutch_factor: winRate(wins, close.length) };
  });
}

// ─── Strength of schedule ───

export interface StrengthOfScheduleOptions {
  opponentWinsColumn: string;
  scope?: MetricScope;
}

/**
 * Mean of the opponents' win totals over the team's games.
 */
export function strengthOfSchedule(
  table: RowTable,
  grouped: GroupedSeries,
  options: StrengthOfScheduleOptions,
): RowPatch {
  const { opponentWinsColumn, scope = 'season' } = options;
  requireColumns(table, [opponentWinsColumn], 'strengthOfSchedule');
  validateScope(scope);

  return broadcast(table, grouped, scope, rows => {
    const opponentWins = rows
      .map(r => numericField(r, opponentWinsColumn))
      .filter((v): v is number => v !== undefined);
    const sos = opponentWins.length > 0
      ? opponentWins.reduce((a, b) => a + b, 0) / opponentWins.length
      : NEUTRAL.rate;
    return { strength_of_schedule: sos };
  });
}

// ─── Head-to-head ───

export interface HeadToHeadOptions {
  teamColumn: string;
  opponentColumn: string;
  resultColumn: string;
  scope?: MetricScope;
}

function pairKey(a: string, b: string): string {
  return [a, b].sort().join('|');
}

function textField(row: Row, column: string): string | undefined {
  const value = getField(row, column);
  if (value === undefined) return undefined;
  const text = String(value).trim();
  return text ? text : undefined;
}

/**
 * Wins of the row's team against this opponent, over all games between
 * the two (counted by unordered pair). 0.5 when they have not met.
 */
export function headToHead(table: RowTable, grouped: GroupedSeries, options: HeadToHeadOptions): RowPatch {
  const { teamColumn, opponentColumn, resultColumn, scope = 'season' } = options;
  requireColumns(table, [teamColumn, opponentColumn, resultColumn], 'headToHead');
  validateScope(scope);

  interface Meeting { order: number; team: string; won: boolean }
  const meetings = new Map<string, Meeting[]>();

  // Order of each row for as-of counting: its time, or its position when unordered
  const orderOf = new Map<number, number>();
  for (const entries of grouped.groups.values()) {
    for (const e of entries) orderOf.set(e.index, e.time ?? e.index);
  }

  table.rows.forEach((row, index) => {
    const team = textField(row, teamColumn);
    const opponent = textField(row, opponentColumn);
    if (team === undefined || opponent === undefined) return;
    const key = pairKey(team, opponent);
    let list = meetings.get(key);
    if (!list) {
      list = [];
      meetings.set(key, list);
    }
    list.push({
      order: orderOf.get(index) ?? Number.POSITIVE_INFINITY,
      team,
      won: parseOutcome(getField(row, resultColumn)) === 'W',
    });
  });

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const team = textField(row, teamColumn);
    const opponent = textField(row, opponentColumn);
    if (team === undefined || opponent === undefined) {
      patch.set(index, { h2h_win_rate: undefined });
      return;
    }

    let visible = meetings.get(pairKey(team, opponent)) ?? [];
    if (scope === 'asOf') {
      const order = orderOf.get(index);
      if (order === undefined) {
        patch.set(index, { h2h_win_rate: undefined });
        return;
      }
      visible = visible.filter(m => m.order <= order);
    }

    const wins = visible.filter(m => m.won && m.team === team).length;
    patch.set(index, { h2h_win_rate: winRate(wins, visible.length) });
  });
  return patch;
}

// ─── Conference / division adjustments ───

export interface ConferenceOptions {
  conferenceColumn: string;
  divisionColumn?: string;
  winPctColumn: string;
  scope?: MetricScope;
}

export const CONFERENCE_COLUMNS = ['conference_strength', 'division_strength', 'adjusted_win_pct'] as const;

/** Running mean per key */
class KeyedAverage {
  private readonly sums = new Map<string, { total: number; count: number }>();

  add(key: string | undefined, value: number | undefined): void {
    if (key === undefined || value === undefined) return;
    const entry = this.sums.get(key) ?? { total: 0, count: 0 };
    entry.total += value;
    entry.count++;
    this.sums.set(key, entry);
  }

  get(key: string | undefined): number | undefined {
    const entry = key !== undefined ? this.sums.get(key) : undefined;
    return entry ? entry.total / entry.count : undefined;
  }
}

/**
 * Mean win percentage per conference and per division, and the row's
 * win percentage normalized by its conference average
 * (win_pct / conference_avg * 0.5), unset when the average is 0.
 *
 * Averages run across teams. 'season' uses every row of the table;
 * 'asOf' uses the rows of every team with time <= the row's time (input
 * position when the series has no ordering column), and leaves rows the
 * grouper excluded unset.
 */
export function conferenceAdjustments(table: RowTable, grouped: GroupedSeries, options: ConferenceOptions): RowPatch {
  const { conferenceColumn, divisionColumn, winPctColumn, scope = 'season' } = options;
  requireColumns(
    table,
    [conferenceColumn, winPctColumn, ...(divisionColumn ? [divisionColumn] : [])],
    'conferenceAdjustments',
  );
  validateScope(scope);

  const conferenceAvg = new KeyedAverage();
  const divisionAvg = new KeyedAverage();
  const conferenceOf = (row: Row) => textField(row, conferenceColumn);
  const divisionOf = (row: Row) => (divisionColumn ? textField(row, divisionColumn) : undefined);
  const record = (row: Row) => {
    const winPct = numericField(row, winPctColumn);
    conferenceAvg.add(conferenceOf(row), winPct);
    divisionAvg.add(divisionOf(row), winPct);
  };
  const fieldsFor = (row: Row): Record<string, FieldValue> => {
    const confAvg = conferenceAvg.get(conferenceOf(row));
    const winPct = numericField(row, winPctColumn);
    return {
      conference_strength: confAvg,
      division_strength: divisionAvg.get(divisionOf(row)),
      adjusted_win_pct: confAvg !== undefined && confAvg !== 0 && winPct !== undefined
        ? (winPct / confAvg) * 0.5
        : undefined,
    };
  };

  const patch: Patch = new Map();
  if (scope === 'season') {
    table.rows.forEach(record);
    table.rows.forEach((row, index) => patch.set(index, fieldsFor(row)));
    return patch;
  }

  const ordered = [...grouped.groups.values()]
    .flat()
    .map(e => ({ index: e.index, order: e.time ?? e.index }))
    .sort((a, b) => a.order - b.order || a.index - b.index);
  const orderedIndices = new Set(ordered.map(e => e.index));

  // Rows sharing a time see each other
  for (let i = 0; i < ordered.length;) {
    let j = i;
    while (j < ordered.length && ordered[j].order === ordered[i].order) j++;
    for (let k = i; k < j; k++) record(table.rows[ordered[k].index]);
    for (let k = i; k < j; k++) patch.set(ordered[k].index, fieldsFor(table.rows[ordered[k].index]));
    i = j;
  }
  table.rows.forEach((_row, index) => {
    if (!orderedIndices.has(index)) {
      patch.set(index, { conference_strength: undefined, division_strength: undefined, adjusted_win_pct: undefined });
    }
  });
  return patch;
}

// ─── Strength indices ───

export interface StrengthIndexOptions {
  winsColumn: string;
  lossesColumn: string;
  diffColumn: string;
}

/**
 * win_rate * 50 + goal_diff * 0.5, with win_rate 0.5 for a team that has
 * not played.
 */
export function teamStrengthIndex(table: RowTable, options: StrengthIndexOptions): RowPatch {
  const { winsColumn, lossesColumn, diffColumn } = options;
  requireColumns(table, [winsColumn, lossesColumn, diffColumn], 'teamStrengthIndex');

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const wins = numericField(row, winsColumn) ?? 0;
    const losses = numericField(row, lossesColumn) ?? 0;
    const diff = numericField(row, diffColumn) ?? 0;
    const rate = winRate(wins, wins + losses);
    patch.set(index, {
      win_rate: rate,
      team_strength_index: rate * 50 + diff * 0.5,
    });
  });
  return patch;
}

export interface EnhancedStrengthOptions {
  winsColumn: string;
  lossesColumn: string;
  goalsForColumn: string;
  goalsAgainstColumn: string;
  /** Defaults to wins + losses */
  gamesPlayedColumn?: string;
}

export interface StrengthComponents {
  winRate: number;
  goalDiffPerGame: number;
  pythagorean: number;
  goalsForPerGame: number;
  goalsAgainstPerGame: number;
}

/**
 * Weighted composite on a 0-100 scale. Each component is mapped to [0, 1]
 * first; a team with no games scores exactly 50.
 */
export function enhancedScore(c: StrengthComponents): number {
  const goalDiff = clamp01((c.goalDiffPerGame + GOAL_DIFF_SCALE) / (2 * GOAL_DIFF_SCALE));
  const attack = clamp01(c.goalsForPerGame / GOALS_PER_GAME_CEILING);
  const defence = 1 - clamp01(c.goalsAgainstPerGame / GOALS_PER_GAME_CEILING);

  const score =
    STRENGTH_WEIGHTS.winRate * clamp01(c.winRate) +
    STRENGTH_WEIGHTS.goalDiffPerGame * goalDiff +
    STRENGTH_WEIGHTS.pythagorean * clamp01(c.pythagorean) +
    STRENGTH_WEIGHTS.goalsForPerGame * attack +
    STRENGTH_WEIGHTS.goalsAgainstPerGame * defence;
  return score * 100;
}

export function enhancedStrengthIndex(table: RowTable, options: EnhancedStrengthOptions): RowPatch {
  const { winsColumn, lossesColumn, goalsForColumn, goalsAgainstColumn, gamesPlayedColumn } = options;
  requireColumns(
    table,
    [winsColumn, lossesColumn, goalsForColumn, goalsAgainstColumn, ...(gamesPlayedColumn ? [gamesPlayedColumn] : [])],
    'enhancedStrengthIndex',
  );

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const wins = numericField(row, winsColumn) ?? 0;
    const losses = numericField(row, lossesColumn) ?? 0;
    const goalsFor = numericField(row, goalsForColumn) ?? 0;
    const goalsAgainst = numericField(row, goalsAgainstColumn) ?? 0;
    const games = (gamesPlayedColumn ? numericField(row, gamesPlayedColumn) : undefined) ?? wins + losses;
    const perGame = (total: number) => (games > 0 ? total / games : 0);

    patch.set(index, {
      enhanced_strength_index: enhancedScore({
        winRate: winRate(wins, games),
        goalDiffPerGame: perGame(goalsFor - goalsAgainst),
        pythagorean: pythagoreanWinPct(goalsFor, goalsAgainst) ?? NEUTRAL.rate,
        goalsForPerGame: perGame(goalsFor),
        goalsAgainstPerGame: perGame(goalsAgainst),
      }),
    });
  });
  return patch;
}

// ─── Home / away splits ───

export interface HomeAwayOptions {
  locationColumn: string;
  resultColumn: string;
}

export const HOME_AWAY_COLUMNS = ['home_win_rate', 'away_win_rate', 'home_away_diff'] as const;

function venue(value: FieldValue): 'home' | 'away' | undefined {
  const token = value === undefined ? '' : String(value).trim().toUpperCase();
  if (token === 'HOME' || token === 'H') return 'home';
  if (token === 'AWAY' || token === 'A' || token === 'ROAD') return 'away';
  return undefined;
}

/**
 * Season-level win rates at home and away for each team.
 */
export function homeAwaySplits(table: RowTable, grouped: GroupedSeries, options: HomeAwayOptions): RowPatch {
  const { locationColumn, resultColumn } = options;
  requireColumns(table, [locationColumn, resultColumn], 'homeAwaySplits');

  return broadcast(table, grouped, 'season', rows => {
    const rate = (where: 'home' | 'away') => {
      const games = rows.filter(r => venue(getField(r, locationColumn)) === where);
      const wins = games.filter(r => parseOutcome(getField(r, resultColumn)) === 'W').length;
      return winRate(wins, games.length);
    };
    const home = rate('home');
    const away = rate('away');
    return { home_win_rate: home, away_win_rate: away, home_away_diff: home - away };
  });
}
