/**
 * gamelog-features
 *
 * Time-series feature engineering and chronological fold splitting for
 * per-team game logs.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './table.js';
export { COLUMNS, FEATURE_CONFIG, NEUTRAL, loadFeatureConfig, type FeatureConfig } from './config.js';

export { ALL_ROWS_KEY, asOfEnd, groupSeries, parseTimestamp } from '../ml/grouping.js';
export { computeStatistic, rolling, rollingColumnName, ROLLING_STATISTICS } from '../ml/rolling.js';
export { ewma, resolveAlpha } from '../ml/ewma.js';
export { lag, lagColumnName } from '../ml/lags.js';
export { momentum, parseOutcome, STREAK_COLUMNS, streaks } from '../ml/streaks.js';
export { restColumns, restDays, RestTracker } from '../ml/fatigue.js';
export {
  clutchFactor,
  conferenceAdjustments,
  consistency,
  enhancedStrengthIndex,
  headToHead,
  homeAwaySplits,
  pythagorean,
  strengthOfSchedule,
  teamStrengthIndex,
  winRate,
} from '../ml/strength.js';
export { cumulative, cumulativeColumnName, rankWithinGroup } from '../ml/cumulative.js';
export {
  interaction,
  minMaxBounds,
  minMaxNormalize,
  polynomial,
  rateStat,
  timeDecay,
  winPct,
} from '../ml/transforms.js';
export * from '../ml/features.js';

export { stratifiedSplit, timeSeriesSplits } from '../backtest/splits.js';
export {
  bootstrapMetric,
  calibrationBins,
  detectOverfitting,
  errorConfidenceInterval,
  learningCurve,
  validateFeatureImportance,
} from '../backtest/evaluation.js';

export { loadTable, parseTable } from '../data/table-loader.js';
