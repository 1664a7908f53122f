/**
 * Fold diagnostics
 *
 * Checks run on a model's predictions for a test slice. The model itself
 * lives outside this package; these only need predicted and actual values.
 */

import { InsufficientDataError, InvalidOptionError, UndefinedMetricError } from '../src/errors.js';
import { createConsoleLogger, type Logger } from '../src/logger.js';
import { mulberry32, shuffle } from './random.js';

function checkPairs(predictions: readonly number[], actuals: readonly number[], metric: string): void {
  if (predictions.length !== actuals.length) {
    throw new InvalidOptionError(
      'actuals',
      `${predictions.length} predictions but ${actuals.length} actual values`,
    );
  }
  if (predictions.length === 0) {
    throw new UndefinedMetricError(metric, `${metric} needs at least one prediction`);
  }
}

function mean(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

// ─── Calibration ───

export interface CalibrationBin {
  bin: number;
  count: number;
  avgPredicted: number;
  avgActual: number;
  calibrationError: number;
}

export interface CalibrationResult {
  bins: CalibrationBin[];
  meanCalibrationError: number;
}

/**
 * Sort by prediction, cut into `nBins` equal-count bins (the last takes
 * the remainder), and compare mean predicted vs mean actual per bin.
 */
export function calibrationBins(
  predictions: readonly number[],
  actuals: readonly number[],
  nBins = 10,
  logger: Logger = createConsoleLogger('evaluation'),
): CalibrationResult {
  checkPairs(predictions, actuals, 'calibration');
  if (!Number.isInteger(nBins) || nBins < 1) {
    throw new InvalidOptionError('nBins', `must be a positive integer, got ${nBins}`);
  }
  if (predictions.length < nBins) {
    throw new InsufficientDataError(
      `${nBins} calibration bins need at least ${nBins} predictions`,
      nBins,
      predictions.length,
    );
  }

  const sorted = predictions
    .map((p, i) => ({ p, a: actuals[i] }))
    .sort((x, y) => x.p - y.p);
  const binSize = Math.floor(sorted.length / nBins);

  const bins: CalibrationBin[] = [];
  for (let i = 0; i < nBins; i++) {
    const start = i * binSize;
    const end = i === nBins - 1 ? sorted.length : (i + 1) * binSize;
    const slice = sorted.slice(start, end);
    const avgPredicted = mean(slice.map(s => s.p));
    const avgActual = mean(slice.map(s => s.a));
    bins.push({
      bin: i + 1,
      count: slice.length,
      avgPredicted,
      avgActual,
      calibrationError: Math.abs(avgPredicted - avgActual),
    });
  }

  const meanCalibrationError = mean(bins.map(b => b.calibrationError));
  logger.info(`Mean calibration error: ${meanCalibrationError.toFixed(4)} (${nBins} bins)`);
  return { bins, meanCalibrationError };
}

// ─── Error interval ───

export interface ErrorInterval {
  confidence: number;
  /** Absolute error not exceeded by `confidence` of the predictions */
  bound: number;
  meanError: number;
  medianError: number;
}

export function errorConfidenceInterval(
  predictions: readonly number[],
  actuals: readonly number[],
  confidence = 0.95,
): ErrorInterval {
  checkPairs(predictions, actuals, 'errorConfidenceInterval');
  if (!(confidence > 0 && confidence < 1)) {
    throw new InvalidOptionError('confidence', `must be in (0, 1), got ${confidence}`);
  }

  const errors = predictions.map((p, i) => Math.abs(p - actuals[i])).sort((a, b) => a - b);
  const at = (idx: number) => errors[Math.min(idx, errors.length - 1)];

  return {
    confidence,
    bound: at(Math.floor(errors.length * confidence)),
    meanError: mean(errors),
    medianError: at(Math.floor(errors.length / 2)),
  };
}

// ─── Overfitting ───

export interface OverfitSignal {
  metric: string;
  train: number;
  test: number;
  diff: number;
  /** |train - test| / |train| */
  pctDiff: number;
}

export interface OverfitReport {
  isOverfit: boolean;
  signals: OverfitSignal[];
}

/**
 * Flags every metric whose test value moved more than `threshold`
 * (relative to the train value) away from its train value. Metrics
 * missing from `testMetrics` are skipped.
 */
export function detectOverfitting(
  trainMetrics: Readonly<Record<string, number>>,
  testMetrics: Readonly<Record<string, number | undefined>>,
  threshold = 0.1,
  logger: Logger = createConsoleLogger('evaluation'),
): OverfitReport {
  if (!(threshold >= 0)) {
    throw new InvalidOptionError('threshold', `must be >= 0, got ${threshold}`);
  }

  const signals: OverfitSignal[] = [];
  for (const [metric, train] of Object.entries(trainMetrics)) {
    const test = testMetrics[metric];
    if (test === undefined) continue;
    if (train === 0) {
      throw new UndefinedMetricError(metric, `train value of ${metric} is 0, relative change is undefined`);
    }
    const diff = Math.abs(train - test);
    const pctDiff = diff / Math.abs(train);
    if (pctDiff > threshold) {
      signals.push({ metric, train, test, diff, pctDiff });
    }
  }

  if (signals.length > 0) {
    logger.warn(`Overfitting detected: ${signals.length} metric(s) degrade on the test slice`);
    for (const s of signals) {
      logger.warn(`  ${s.metric}: train=${s.train.toFixed(4)} test=${s.test.toFixed(4)} (${(s.pctDiff * 100).toFixed(1)}%)`);
    }
  } else {
    logger.info('No overfitting detected');
  }

  return { isOverfit: signals.length > 0, signals };
}

// ─── Bootstrap ───

export type BootstrapMetric = 'rmse' | 'mae' | 'r2';

export interface BootstrapOptions {
  metric?: BootstrapMetric;
  iterations?: number;
  seed?: number;
}

export interface BootstrapResult {
  metric: BootstrapMetric;
  /** Resamples that gave a defined score */
  iterations: number;
  mean: number;
  median: number;
  ci95Lower: number;
  ci95Upper: number;
  stdDev: number;
}

/** Undefined for r2 when every actual value is the same */
export function scoreMetric(
  metric: BootstrapMetric,
  predictions: readonly number[],
  actuals: readonly number[],
): number | undefined {
  const n = predictions.length;
  switch (metric) {
    case 'rmse':
      return Math.sqrt(predictions.reduce((s, p, i) => s + (p - actuals[i]) ** 2, 0) / n);
    case 'mae':
      return predictions.reduce((s, p, i) => s + Math.abs(p - actuals[i]), 0) / n;
    case 'r2': {
      const avg = mean(actuals);
      const ssTot = actuals.reduce((s, a) => s + (a - avg) ** 2, 0);
      if (ssTot === 0) return undefined;
      const ssRes = predictions.reduce((s, p, i) => s + (actuals[i] - p) ** 2, 0);
      return 1 - ssRes / ssTot;
    }
  }
}

/**
 * Resample (prediction, actual) pairs with replacement and report the
 * distribution of the metric. Deterministic for a given seed.
 */
export function bootstrapMetric(
  predictions: readonly number[],
  actuals: readonly number[],
  options: BootstrapOptions = {},
  logger: Logger = createConsoleLogger('evaluation'),
): BootstrapResult {
  const { metric = 'rmse', iterations = 1000, seed = 42 } = options;
  checkPairs(predictions, actuals, metric);
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new InvalidOptionError('iterations', `must be a positive integer, got ${iterations}`);
  }

  logger.info(`Bootstrapping ${metric} (${iterations} iterations)`);

  const rng = mulberry32(seed);
  const n = predictions.length;
  const scores: number[] = [];
  for (let it = 0; it < iterations; it++) {
    const samplePreds: number[] = [];
    const sampleActuals: number[] = [];
    for (let j = 0; j < n; j++) {
      const idx = Math.floor(rng() * n);
      samplePreds.push(predictions[idx]);
      sampleActuals.push(actuals[idx]);
    }
    const score = scoreMetric(metric, samplePreds, sampleActuals);
    if (score !== undefined) scores.push(score);
  }

  if (scores.length === 0) {
    throw new UndefinedMetricError(metric, `${metric} is undefined for every resample`);
  }

  scores.sort((a, b) => a - b);
  const at = (q: number) => scores[Math.min(Math.floor(scores.length * q), scores.length - 1)];
  const avg = mean(scores);

  return {
    metric,
    iterations: scores.length,
    mean: avg,
    median: scores[Math.floor(scores.length / 2)],
    ci95Lower: at(0.025),
    ci95Upper: at(0.975),
    stdDev: Math.sqrt(scores.reduce((s, v) => s + (v - avg) ** 2, 0) / scores.length),
  };
}

// ─── Learning curve ───

export interface LearningCurveOptions {
  /** Shares of the rows to train on, each in (0, 1] */
  trainFractions?: readonly number[];
  seed?: number;
}

export interface LearningCurvePoint<T> {
  trainFraction: number;
  trainSize: number;
  /** Random sample of `trainSize` rows; fit on it and record the scores */
  sample: T[];
}

/**
 * Training samples of growing size for a learning curve. Every sample
 * is drawn independently from the same seeded generator.
 */
export function learningCurve<T>(
  rows: readonly T[],
  options: LearningCurveOptions = {},
  logger: Logger = createConsoleLogger('evaluation'),
): LearningCurvePoint<T>[] {
  const { trainFractions = [0.1, 0.25, 0.5, 0.75, 1.0], seed = 42 } = options;
  for (const fraction of trainFractions) {
    if (!(fraction > 0 && fraction <= 1)) {
      throw new InvalidOptionError('trainFractions', `each fraction must be in (0, 1], got ${fraction}`);
    }
  }
  if (!Number.isInteger(seed)) {
    throw new InvalidOptionError('seed', `must be an integer, got ${seed}`);
  }
  if (rows.length === 0) {
    throw new InsufficientDataError('a learning curve needs at least one row', 1, 0);
  }

  const rng = mulberry32(seed);
  const points = trainFractions.map(trainFraction => {
    const trainSize = Math.floor(rows.length * trainFraction);
    return { trainFraction, trainSize, sample: shuffle([...rows], rng).slice(0, trainSize) };
  });

  logger.info(`Generated ${points.length} learning curve points`);
  return points;
}

// ─── Feature importance ───

export interface FeatureShare {
  feature: string;
  importance: number;
  /** importance / total importance */
  share: number;
  cumulativeShare: number;
}

export interface FeatureImportanceReport {
  topFeatures: FeatureShare[];
  /** Share of the total importance held by the top features */
  cumulativeImportance: number;
}

/**
 * The `topN` most important features with their share of the total.
 * Equal importances keep their input order.
 */
export function validateFeatureImportance(
  importances: Readonly<Record<string, number>>,
  topN = 10,
  logger: Logger = createConsoleLogger('evaluation'),
): FeatureImportanceReport {
  if (!Number.isInteger(topN) || topN < 1) {
    throw new InvalidOptionError('topN', `must be a positive integer, got ${topN}`);
  }
  const entries = Object.entries(importances);
  const total = entries.reduce((s, [, v]) => s + v, 0);
  if (!(total > 0)) {
    throw new UndefinedMetricError('featureImportance', 'total feature importance must be positive');
  }

  logger.info(`Validating top ${topN} features`);

  let cumulative = 0;
  const topFeatures = entries
    .sort((a, b) => b[1] - a[1])
    .slice(0, topN)
    .map(([feature, importance]) => {
      cumulative += importance;
      const share = importance / total;
      const cumulativeShare = cumulative / total;
      logger.info(
        `  ${feature}: ${importance.toFixed(4)} (${(share * 100).toFixed(2)}%, cumulative: ${(cumulativeShare * 100).toFixed(2)}%)`,
      );
      return { feature, importance, share, cumulativeShare };
    });

  return { topFeatures, cumulativeImportance: cumulative / total };
}
