/**
 * Team strength metrics
 *
 * Fixture: a three-team slate. A plays B twice and C once.
 */

import {
  clutchFactor,
  conferenceAdjustments,
  consistency,
  enhancedScore,
  enhancedStrengthIndex,
  headToHead,
  homeAwaySplits,
  pythagorean,
  strengthOfSchedule,
  teamStrengthIndex,
  winRate,
} from './strength';
import { groupSeries } from './grouping';
import { applyPatches, createTable, getField } from '../src/table';
import { UnknownColumnError } from '../src/errors';
import type { FieldValue, GroupedSeries, Row, RowPatch, RowTable } from '../src/types';

const slate: Row[] = [
  { Team: 'A', Opponent: 'B', date: '2024-01-01', result: 'W', DIFF: '1', GF: '3', opponent_wins: '10', location: 'home' },
  { Team: 'A', Opponent: 'C', date: '2024-01-02', result: 'L', DIFF: '-3', GF: '1', opponent_wins: '20', location: 'away' },
  { Team: 'A', Opponent: 'B', date: '2024-01-03', result: 'L', DIFF: '-2', GF: '2', opponent_wins: '12', location: 'away' },
  { Team: 'B', Opponent: 'A', date: '2024-01-01', result: 'L', DIFF: '-1', GF: '2', opponent_wins: '8', location: 'away' },
  { Team: 'B', Opponent: 'A', date: '2024-01-03', result: 'W', DIFF: '1', GF: '3', opponent_wins: '9', location: 'home' },
];

function setup(rows: Row[]): { table: RowTable; grouped: GroupedSeries } {
  const table = createTable(rows);
  return { table, grouped: groupSeries(table, { groupBy: 'Team', timestampColumn: 'date' }) };
}

function column(table: RowTable, patch: RowPatch, name: string): FieldValue[] {
  return applyPatches(table, patch).rows.map(r => getField(r, name));
}

describe('winRate', () => {
  it('should fall back to 0.5 without games', () => {
    expect(winRate(0, 0)).toBe(0.5);
    expect(winRate(3, 4)).toBe(0.75);
  });
});

describe('consistency', () => {
  it('should broadcast season mean, std-dev and cv per team', () => {
    const { table, grouped } = setup(slate);
    const patch = consistency(table, grouped, { column: 'GF' });

    expect(column(table, patch, 'score_mean')).toEqual([2, 2, 2, 2.5, 2.5]);
    const std = column(table, patch, 'score_std_dev');
    expect(std[0]).toBeCloseTo(Math.sqrt(2 / 3), 12);
    expect(std[3]).toBe(0.5);
    expect(column(table, patch, 'score_cv')[3]).toBe(0.2);
    expect(column(table, patch, 'consistency_score')[3]).toBe(0.8);
  });

  it('should only use earlier rows as of each row', () => {
    const { table, grouped } = setup(slate);
    const patch = consistency(table, grouped, { column: 'GF', scope: 'asOf' });

    expect(column(table, patch, 'score_mean')).toEqual([3, 2, 2, 2, 2.5]);
    expect(column(table, patch, 'score_cv').slice(0, 2)).toEqual([0, 0.5]);
  });

  it('should leave cv unset when the mean is 0', () => {
    const { table, grouped } = setup([
      { Team: 'C', date: '2024-01-01', GF: '0' },
      { Team: 'C', date: '2024-01-02', GF: '0' },
    ]);
    const patch = consistency(table, grouped, { column: 'GF' });
    expect(column(table, patch, 'score_mean')).toEqual([0, 0]);
    expect(column(table, patch, 'score_cv')).toEqual([undefined, undefined]);
    expect(column(table, patch, 'consistency_score')).toEqual([undefined, undefined]);
  });

  it('should include rows without a usable date in season aggregates only', () => {
    const { table, grouped } = setup([
      { Team: 'A', date: '2024-01-01', GF: '2' },
      { Team: 'A', date: 'tbd', GF: '4' },
    ]);
    expect(column(table, consistency(table, grouped, { column: 'GF' }), 'score_mean')).toEqual([3, 3]);
    expect(column(table, consistency(table, grouped, { column: 'GF', scope: 'asOf' }), 'score_mean'))
      .toEqual([2, undefined]);
  });
});

describe('clutchFactor', () => {
  it('should be the win rate in games decided by at most one goal', () => {
    const { table, grouped } = setup(slate);
    const patch = clutchFactor(table, grouped, { goalDiffColumn: 'DIFF', resultColumn: 'result' });
    expect(column(table, patch, 'clutch_factor')).toEqual([1, 1, 1, 0.5, 0.5]);
  });

  it('should grow with the season as of each row', () => {
    const { table, grouped } = setup(slate);
    const patch = clutchFactor(table, grouped, { goalDiffColumn: 'DIFF', resultColumn: 'result', scope: 'asOf' });
    expect(column(table, patch, 'clutch_factor')).toEqual([1, 1, 1, 0, 0.5]);
  });

  it('should default to 0.5 without close games', () => {
    const { table, grouped } = setup([{ Team: 'D', date: '2024-01-01', DIFF: '4', result: 'W' }]);
    const patch = clutchFactor(table, grouped, { goalDiffColumn: 'DIFF', resultColumn: 'result' });
    expect(column(table, patch, 'clutch_factor')).toEqual([0.5]);
  });
});

describe('strengthOfSchedule', () => {
  it('should average opponent win totals', () => {
    const { table, grouped } = setup(slate);
    expect(column(table, strengthOfSchedule(table, grouped, { opponentWinsColumn: 'opponent_wins' }), 'strength_of_schedule'))
      .toEqual([14, 14, 14, 8.5, 8.5]);
    expect(column(table, strengthOfSchedule(table, grouped, { opponentWinsColumn: 'opponent_wins', scope: 'asOf' }), 'strength_of_schedule'))
      .toEqual([10, 15, 14, 8, 8.5]);
  });

  it('should default to 0.5 without numeric opponent wins', () => {
    const { table, grouped } = setup([{ Team: 'D', date: '2024-01-01', opponent_wins: '?' }]);
    expect(column(table, strengthOfSchedule(table, grouped, { opponentWinsColumn: 'opponent_wins' }), 'strength_of_schedule'))
      .toEqual([0.5]);
  });
});

describe('headToHead', () => {
  const options = { teamColumn: 'Team', opponentColumn: 'Opponent', resultColumn: 'result' };

  it('should divide directed wins by all games of the pair', () => {
    const { table, grouped } = setup(slate);
    expect(column(table, headToHead(table, grouped, options), 'h2h_win_rate')).toEqual([0.25, 0, 0.25, 0.25, 0.25]);
  });

  it('should only count meetings up to the row as of each row', () => {
    const { table, grouped } = setup(slate);
    expect(column(table, headToHead(table, grouped, { ...options, scope: 'asOf' }), 'h2h_win_rate'))
      .toEqual([0.5, 0, 0.25, 0, 0.25]);
  });

  it('should leave rows without an opponent unset', () => {
    const { table, grouped } = setup([...slate, { Team: 'A', Opponent: '', date: '2024-01-04', result: 'W' }]);
    expect(column(table, headToHead(table, grouped, options), 'h2h_win_rate')[5]).toBeUndefined();
  });
});

describe('as-of metrics', () => {
  // Rows dated 2024-01-03 are the last games of the slate
  const lastDay = (r: Row) => getField(r, 'date') === '2024-01-03';
  const mutatedSlate = slate.map(r => (lastDay(r)
    ? { ...r, result: r.result === 'W' ? 'L' : 'W', DIFF: '0', GF: '9', opponent_wins: '30' }
    : r));
  const truncatedSlate = slate.filter(r => !lastDay(r));
  const earlier = slate.map((r, i) => (lastDay(r) ? -1 : i)).filter(i => i >= 0);

  const metrics: Array<[string, (table: RowTable, grouped: GroupedSeries) => RowPatch, string[]]> = [
    ['consistency', (t, g) => consistency(t, g, { column: 'GF', scope: 'asOf' }), ['score_mean', 'score_std_dev', 'score_cv']],
    ['clutchFactor', (t, g) => clutchFactor(t, g, { goalDiffColumn: 'DIFF', resultColumn: 'result', scope: 'asOf' }), ['clutch_factor']],
    ['strengthOfSchedule', (t, g) => strengthOfSchedule(t, g, { opponentWinsColumn: 'opponent_wins', scope: 'asOf' }), ['strength_of_schedule']],
    [
      'headToHead',
      (t, g) => headToHead(t, g, { teamColumn: 'Team', opponentColumn: 'Opponent', resultColumn: 'result', scope: 'asOf' }),
      ['h2h_win_rate'],
    ],
  ];

  it.each(metrics)('%s should not let later games change earlier rows', (_name, metric, outputs) => {
    const before = setup(slate);
    const mutated = setup(mutatedSlate);
    const truncated = setup(truncatedSlate);

    for (const output of outputs) {
      const original = column(before.table, metric(before.table, before.grouped), output);
      const changed = column(mutated.table, metric(mutated.table, mutated.grouped), output);
      const cut = column(truncated.table, metric(truncated.table, truncated.grouped), output);

      expect(earlier.map(i => changed[i])).toEqual(earlier.map(i => original[i]));
      expect(cut).toEqual(earlier.map(i => original[i]));
    }
  });
});

describe('homeAwaySplits', () => {
  it('should split win rates by venue', () => {
    const { table, grouped } = setup(slate);
    const patch = homeAwaySplits(table, grouped, { locationColumn: 'location', resultColumn: 'result' });
    expect(column(table, patch, 'home_win_rate')).toEqual([1, 1, 1, 1, 1]);
    expect(column(table, patch, 'away_win_rate')).toEqual([0, 0, 0, 0, 0]);
    expect(column(table, patch, 'home_away_diff')).toEqual([1, 1, 1, 1, 1]);
  });

  it('should use 0.5 for a venue without games', () => {
    const { table, grouped } = setup([{ Team: 'D', date: '2024-01-01', location: 'AWAY', result: 'W' }]);
    const patch = homeAwaySplits(table, grouped, { locationColumn: 'location', resultColumn: 'result' });
    expect(column(table, patch, 'home_win_rate')).toEqual([0.5]);
    expect(column(table, patch, 'away_win_rate')).toEqual([1]);
    expect(column(table, patch, 'home_away_diff')).toEqual([-0.5]);
  });
});

describe('pythagorean', () => {
  const table = createTable([
    { GF: '30', GA: '20', GP: '10', W: '7' },
    { GF: '0', GA: '5', GP: '3', W: '0' },
    { GF: '30', GA: '20', GP: 'x', W: '7' },
  ]);

  it('should compute expected win pct, wins and luck', () => {
    const patch = pythagorean(table, {
      goalsForColumn: 'GF',
      goalsAgainstColumn: 'GA',
      gamesPlayedColumn: 'GP',
      winsColumn: 'W',
    });
    const pct = column(table, patch, 'pythagorean_win_pct');
    const wins = column(table, patch, 'pythagorean_wins');
    const luck = column(table, patch, 'luck_factor');

    expect(pct[0]).toBeCloseTo(9 / 13, 12);
    expect(wins[0]).toBeCloseTo(90 / 13, 12);
    expect(luck[0]).toBeCloseTo(7 - 90 / 13, 12);

    // GF of 0: undefined
    expect([pct[1], wins[1], luck[1]]).toEqual([undefined, undefined, undefined]);
    // Non-numeric games played: pct only
    expect(pct[2]).toBeCloseTo(9 / 13, 12);
    expect([wins[2], luck[2]]).toEqual([undefined, undefined]);
  });

  it('should leave luck unset without a wins column', () => {
    const patch = pythagorean(table, { goalsForColumn: 'GF', goalsAgainstColumn: 'GA', gamesPlayedColumn: 'GP' });
    expect(column(table, patch, 'luck_factor')[0]).toBeUndefined();
  });

  it('should reject unknown columns', () => {
    expect(() => pythagorean(table, { goalsForColumn: 'GF', goalsAgainstColumn: 'GA', gamesPlayedColumn: 'games' }))
      .toThrow(UnknownColumnError);
  });
});

describe('conferenceAdjustments', () => {
  const table = createTable([
    { conference: 'East', division: 'Atlantic', win_pct: '0.6' },
    { conference: 'East', division: 'Atlantic', win_pct: '0.4' },
    { conference: 'East', division: 'Metro', win_pct: '0.8' },
    { conference: 'West', division: 'Pacific', win_pct: '0' },
    { conference: '', division: 'Pacific', win_pct: '0.5' },
  ]);
  const patch = conferenceAdjustments(table, groupSeries(table), {
    conferenceColumn: 'conference',
    divisionColumn: 'division',
    winPctColumn: 'win_pct',
  });

  it('should average win pct per conference and division', () => {
    const conference = column(table, patch, 'conference_strength');
    expect(conference[0]).toBeCloseTo(0.6, 12);
    expect(conference[3]).toBe(0);
    expect(conference[4]).toBeUndefined();

    const division = column(table, patch, 'division_strength');
    expect(division[0]).toBeCloseTo(0.5, 12);
    expect(division[2]).toBeCloseTo(0.8, 12);
    expect(division[3]).toBe(0.25);
  });

  it('should normalise win pct by the conference average', () => {
    const adjusted = column(table, patch, 'adjusted_win_pct');
    expect(adjusted[0]).toBeCloseTo(0.5, 12);
    expect(adjusted[2]).toBeCloseTo(0.8 / 0.6 * 0.5, 12);
    // Conference average of 0
    expect(adjusted[3]).toBeUndefined();
  });

  describe('as of each row', () => {
    const dated: Row[] = [
      { Team: 'A', date: '2024-01-02', conference: 'East', win_pct: '0.4' },
      { Team: 'B', date: '2024-01-01', conference: 'East', win_pct: '0.6' },
      { Team: 'C', date: '2024-01-02', conference: 'East', win_pct: '0.8' },
      { Team: 'A', date: '2024-01-03', conference: 'East', win_pct: '0.2' },
      { Team: 'B', date: 'tbd', conference: 'East', win_pct: '1' },
    ];
    const options = { conferenceColumn: 'conference', winPctColumn: 'win_pct', scope: 'asOf' as const };

    it('should average every team up to the row time', () => {
      const { table, grouped } = setup(dated);
      const conference = column(table, conferenceAdjustments(table, grouped, options), 'conference_strength');

      expect(conference[1]).toBeCloseTo(0.6, 12);
      // Same-day rows see each other
      expect(conference[0]).toBeCloseTo(0.6, 12);
      expect(conference[2]).toBeCloseTo(0.6, 12);
      expect(conference[3]).toBeCloseTo(0.5, 12);
      expect(conference[4]).toBeUndefined();
    });

    it('should not let later games change earlier averages', () => {
      const { table, grouped } = setup(dated);
      const before = column(table, conferenceAdjustments(table, grouped, options), 'adjusted_win_pct');

      const changed = setup(dated.map((r, i) => (i === 3 ? { ...r, win_pct: '0.9' } : r)));
      const after = column(changed.table, conferenceAdjustments(changed.table, changed.grouped, options), 'adjusted_win_pct');
      expect(after.slice(0, 3)).toEqual(before.slice(0, 3));

      const truncated = setup(dated.slice(0, 3));
      expect(column(truncated.table, conferenceAdjustments(truncated.table, truncated.grouped, options), 'adjusted_win_pct'))
        .toEqual(before.slice(0, 3));
    });
  });
});

describe('teamStrengthIndex', () => {
  it('should combine win rate and goal differential', () => {
    const table = createTable([
      { W: '6', L: '4', DIFF: '10' },
      { W: '0', L: '0', DIFF: '0' },
    ]);
    const patch = teamStrengthIndex(table, { winsColumn: 'W', lossesColumn: 'L', diffColumn: 'DIFF' });
    expect(column(table, patch, 'win_rate')).toEqual([0.6, 0.5]);
    expect(column(table, patch, 'team_strength_index')).toEqual([35, 25]);
  });
});

describe('enhancedStrengthIndex', () => {
  const options = {
    winsColumn: 'W',
    lossesColumn: 'L',
    goalsForColumn: 'GF',
    goalsAgainstColumn: 'GA',
    gamesPlayedColumn: 'GP',
  };

  it('should score a team without games at exactly the midpoint', () => {
    const table = createTable([{ W: '0', L: '0', GF: '0', GA: '0', GP: '0' }]);
    const [score] = column(table, enhancedStrengthIndex(table, options), 'enhanced_strength_index');
    expect(score).toBeCloseTo(50, 10);
  });

  it('should weight the five components', () => {
    const table = createTable([{ W: '6', L: '4', GF: '30', GA: '20', GP: '10' }]);
    const [score] = column(table, enhancedStrengthIndex(table, options), 'enhanced_strength_index');
    // 100 * (0.3*0.6 + 0.2*0.75 + 0.3*9/13 + 0.1*0.6 + 0.1*0.6)
    expect(score).toBeCloseTo(100 * (0.45 + 2.7 / 13), 10);
  });

  it('should clamp every component to [0, 1]', () => {
    expect(enhancedScore({
      winRate: 1,
      goalDiffPerGame: 10,
      pythagorean: 0.5,
      goalsForPerGame: 10,
      goalsAgainstPerGame: 0,
    })).toBeCloseTo(85, 10);
    expect(enhancedScore({
      winRate: 0,
      goalDiffPerGame: -10,
      pythagorean: 0,
      goalsForPerGame: 0,
      goalsAgainstPerGame: 9,
    })).toBe(0);
  });

  it('should fall back to wins + losses for games played', () => {
    const table = createTable([{ W: '0', L: '0', GF: '0', GA: '0' }]);
    const patch = enhancedStrengthIndex(table, {
      winsColumn: 'W',
      lossesColumn: 'L',
      goalsForColumn: 'GF',
      goalsAgainstColumn: 'GA',
    });
    expect(column(table, patch, 'enhanced_strength_index')[0]).toBeCloseTo(50, 10);
  });
});
