/**
 * Writes the PDF report for a filter selection to disk.
 *
 *   tsx scripts/render-report.ts --data data/placement_data.csv --year 2024 \
 *     --branch IT --branch Civil --out report.pdf
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';

import { DEFAULT_PLACEMENT_DATA_PATH } from '../src/infra/config/env.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  buildDashboard,
  createPdfReportRenderer,
  createPlacementRepo,
  createReportCache,
  createReportService,
  cryptoHasher,
  type FilterSelectionInput,
} from '../src/modules/placements/index.js';

const toNumber = (flag: string, raw: string): number => {
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${flag} expects a number, got '${raw}'`);
  }
  return value;
};

const toRange = (
  flag: string,
  min: string | undefined,
  max: string | undefined
): { min: number; max: number } | undefined => {
  if (min === undefined && max === undefined) return undefined;
  if (min === undefined || max === undefined) {
    throw new Error(`--${flag}-min and --${flag}-max must be given together`);
  }
  return { min: toNumber(`${flag}-min`, min), max: toNumber(`${flag}-max`, max) };
};

const main = async (): Promise<void> => {
  const { values } = parseArgs({
    options: {
      data: { type: 'string', default: DEFAULT_PLACEMENT_DATA_PATH },
      out: { type: 'string', default: 'placement_analytics_report.pdf' },
      year: { type: 'string', multiple: true },
      branch: { type: 'string', multiple: true },
      'package-min': { type: 'string' },
      'package-max': { type: 'string' },
      'pct-min': { type: 'string' },
      'pct-max': { type: 'string' },
    },
  });

  const logger = createLogger({ level: 'info', pretty: true });

  const packageRange = toRange('package', values['package-min'], values['package-max']);
  const placementPctRange = toRange('pct', values['pct-min'], values['pct-max']);
  const input: FilterSelectionInput = {
    ...(values.year !== undefined && { years: values.year.map((y) => toNumber('year', y)) }),
    ...(values.branch !== undefined && { branches: values.branch }),
    ...(packageRange !== undefined && { packageRange }),
    ...(placementPctRange !== undefined && { placementPctRange }),
  };

  const repo = createPlacementRepo({ filePath: values.data, logger });
  const loaded = await repo.load();
  if (loaded.isErr()) {
    console.error(loaded.error.message);
    process.exit(1);
  }

  const service = createReportService({
    renderer: createPdfReportRenderer({ hasher: cryptoHasher }),
    hasher: cryptoHasher,
    cache: createReportCache({ max: 1, ttlMs: 0 }),
  });

  const dashboard = buildDashboard(loaded.value, input);
  const report = service.generate(dashboard);
  if (report.isErr()) {
    console.error(report.error.message);
    process.exit(1);
  }

  const outPath = path.resolve(process.cwd(), values.out);
  await fs.writeFile(outPath, report.value.bytes);
  logger.info(
    { out: outPath, records: dashboard.recordCount, bytes: report.value.bytes.length },
    'Report written'
  );
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
