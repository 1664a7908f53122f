/**
 * Running aggregates & ranks
 */

import { cumulative, cumulativeColumnName, rankWithinGroup, type CumulativeStatistic } from './cumulative';
import { groupSeries } from './grouping';
import { applyPatches, createTable, getField } from '../src/table';
import type { FieldValue, Row, RowTable } from '../src/types';

function games(values: FieldValue[], team = 'A'): Row[] {
  return values.map((PTS, i) => ({ Team: team, date: `2024-01-${String(i + 1).padStart(2, '0')}`, PTS }));
}

function run(rows: Row[], statistic: CumulativeStatistic): FieldValue[] {
  const table = createTable(rows);
  const grouped = groupSeries(table, { groupBy: 'Team', timestampColumn: 'date' });
  return applyPatches(table, cumulative(table, grouped, { column: 'PTS', statistic }))
    .rows.map(r => getField(r, cumulativeColumnName('PTS', statistic)));
}

function ranks(rows: Row[], ascending?: boolean): FieldValue[] {
  const table: RowTable = createTable(rows);
  const grouped = groupSeries(table, { groupBy: 'Team', timestampColumn: 'date' });
  return applyPatches(table, rankWithinGroup(table, grouped, { column: 'PTS', ascending }))
    .rows.map(r => getField(r, 'PTS_rank'));
}

describe('cumulative', () => {
  const values = ['2', '0', '5', '1'];

  it('should keep a running sum, mean, max and min per group', () => {
    expect(run(games(values), 'sum')).toEqual([2, 2, 7, 8]);
    expect(run(games(values), 'mean')).toEqual([2, 1, 7 / 3, 2]);
    expect(run(games(values), 'max')).toEqual([2, 2, 5, 5]);
    expect(run(games(values), 'min')).toEqual([2, 0, 0, 0]);
  });

  it('should restart for each group and follow time order', () => {
    const rows: Row[] = [
      { Team: 'A', date: '2024-01-02', PTS: '3' },
      { Team: 'B', date: '2024-01-01', PTS: '10' },
      { Team: 'A', date: '2024-01-01', PTS: '1' },
    ];
    expect(run(rows, 'sum')).toEqual([4, 10, 1]);
  });

  it('should skip non-numeric values and stay unset until the first number', () => {
    expect(run(games(['', '4', 'x', '2']), 'sum')).toEqual([undefined, 4, 4, 6]);
  });

  it('should not let later games change earlier totals', () => {
    const before = run(games(values), 'mean');
    const mutated = games([...values.slice(0, 3), '100']);
    expect(run(mutated, 'mean').slice(0, 3)).toEqual(before.slice(0, 3));
    expect(run(games(values.slice(0, 2)), 'mean')).toEqual(before.slice(0, 2));
  });
});

describe('rankWithinGroup', () => {
  it('should rank against the group games so far, largest first', () => {
    expect(ranks(games(['3', '5', '1', '5']))).toEqual([1, 1, 3, 1]);
  });

  it('should rank smallest first when ascending', () => {
    expect(ranks(games(['3', '5', '1', '5']), true)).toEqual([1, 2, 1, 3]);
  });

  it('should leave non-numeric values unset without counting them', () => {
    expect(ranks(games(['4', '-', '2']))).toEqual([1, undefined, 2]);
  });

  it('should not let later games change earlier ranks', () => {
    const before = ranks(games(['3', '5', '1', '2']));
    expect(ranks(games(['3', '5', '1', '99'])).slice(0, 3)).toEqual(before.slice(0, 3));
  });
});
