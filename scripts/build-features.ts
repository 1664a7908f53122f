#!/usr/bin/env npx tsx
/**
 * Build features from a team game log CSV.
 *
 * Usage:
 *   npx tsx scripts/build-features.ts --input data/raw/games.csv
 *   npx tsx scripts/build-features.ts --input games.csv --output features.json
 *   npx tsx scripts/build-features.ts --input games.csv --group Team --target playoff_status
 *   npx tsx scripts/build-features.ts --input games.csv --no-group
 *
 * Settings not given as flags come from FEATURES_* environment variables.
 */

import { createWriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import type { Row } from '../src/types/index.js';
import { loadFeatureConfig, type FeatureConfig } from '../src/config.js';
import { InsufficientDataError, isFeatureError } from '../src/errors.js';
import { createConsoleLogger } from '../src/logger.js';
import { hasColumn } from '../src/table.js';
import { loadTable } from '../data/table-loader.js';
import { buildFeatures, producedColumns, resolveGrouping, standardPasses } from '../ml/features.js';
import { stratifiedSplit, timeSeriesSplits } from '../backtest/splits.js';

export interface CliArgs {
  input?: string;
  output: string;
  group?: string;
  /** Treat the whole table as one series */
  noGroup: boolean;
  target?: string;
}

export function parseArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = {
    output: join(__dirname, '..', 'data', 'processed', 'features.json'),
    noGroup: false,
  };
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--no-group') parsed.noGroup = true;
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) continue;
    if (args[i] === '--input') parsed.input = value;
    if (args[i] === '--output') parsed.output = value;
    if (args[i] === '--group') parsed.group = value;
    if (args[i] === '--target') parsed.target = value;
  }
  return parsed;
}

async function writeRows(path: string, rows: readonly Row[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  // Stream row by row; unset fields are written as null
  await new Promise<void>((resolve, reject) => {
    const stream = createWriteStream(path, { encoding: 'utf-8' });
    stream.on('error', reject);
    stream.write('[\n');
    rows.forEach((row, i) => {
      const json = JSON.stringify(row, (_key, value: unknown) => (value === undefined ? null : value));
      stream.write(i === 0 ? json : ',\n' + json);
    });
    stream.write('\n]\n');
    stream.end(() => resolve());
  });
}

async function main() {
  const log = createConsoleLogger('build-features');
  const args = parseArgs(process.argv.slice(2));
  if (!args.input) {
    console.error('Usage: build-features --input <games.csv> [--output <features.json>] [--group <column> | --no-group] [--target <column>]');
    process.exit(1);
  }

  const overrides: Partial<FeatureConfig> = {};
  if (args.group) overrides.groupBy = args.group;
  if (args.noGroup) overrides.groupBy = undefined;
  if (args.target) overrides.target = args.target;
  const config = loadFeatureConfig(process.env, overrides);

  log.info(`Loading ${args.input}...`);
  const table = await loadTable(args.input);
  log.info(`${table.rows.length} rows, ${table.columns.length} columns`);

  const passes = standardPasses(config, table.columns);
  log.info(`Feature passes: ${passes.map(p => p.name).join(', ')}`);

  const grouping = resolveGrouping(config, table.columns, log);
  const { table: features, excluded } = buildFeatures(table, passes, {
    ...grouping,
    logger: createConsoleLogger('features'),
  });
  if (excluded.length > 0) {
    const orderColumn = grouping.timestampColumn ?? grouping.sequenceColumn;
    log.warn(`${excluded.length} row(s) had no usable ${orderColumn}; their series features are unset`);
  }
  log.info(`Added ${producedColumns(passes).length} feature columns`);

  log.info(`Saving ${features.rows.length} rows to ${args.output}...`);
  await writeRows(args.output, features.rows);

  // Fold layout for downstream training
  if (hasColumn(features, config.timestampColumn)) {
    try {
      const folds = timeSeriesSplits(features, {
        timestampColumn: config.timestampColumn,
        nSplits: config.nSplits,
        testFraction: config.testFraction,
      }, createConsoleLogger('splits'));
      for (const fold of folds) {
        log.info(`Fold ${fold.fold}: train [${fold.trainRange.join(', ')}) test [${fold.testRange.join(', ')})`);
      }
    } catch (err) {
      if (!(err instanceof InsufficientDataError)) throw err;
      log.warn(`Skipping time-series folds: ${err.message}`);
    }
  }

  if (config.target && hasColumn(features, config.target)) {
    const split = stratifiedSplit(features, {
      targetColumn: config.target,
      testFraction: config.testFraction,
      seed: config.seed,
    }, createConsoleLogger('splits'));
    for (const [value, [train, test]] of split.classCounts) {
      log.info(`  ${config.target}=${String(value)}: train ${train}, test ${test}`);
    }
  }
}

if (require.main === module) {
  main().catch(err => {
    if (isFeatureError(err)) {
      console.error(`Fatal error [${err.code}]: ${err.message}`);
    } else {
      console.error('Fatal error:', err);
    }
    process.exit(1);
  });
}
