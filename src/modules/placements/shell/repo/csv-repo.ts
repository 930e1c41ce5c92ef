import fs from 'node:fs/promises';

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { parsePlacements } from '../../core/usecases/parse-placements.js';

import type { PlacementRepoError } from '../../core/errors.js';
import type { PlacementRepo } from '../../core/ports.js';
import type { PlacementDataset, RawPlacementTable } from '../../core/types.js';
import type { Logger } from 'pino';

export interface PlacementRepoOptions {
  filePath: string;
  logger: Logger;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

/**
 * Splits CSV text into a header row and data rows, all raw strings.
 */
export const tokenizeCsv = (contents: string): RawPlacementTable => {
  const records: string[][] = parse(contents, {
    bom: true,
    columns: false,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const [headers = [], ...rows] = records;
  return { headers, rows };
};

const readPlacementFile = async (
  filePath: string
): Promise<Result<PlacementDataset, PlacementRepoError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Placement data file not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read placement data at ${filePath}: ${errorMessage(error)}`,
      path: filePath,
    });
  }

  let table: RawPlacementTable;
  try {
    table = tokenizeCsv(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV at ${filePath}: ${errorMessage(error)}`,
      path: filePath,
    });
  }

  return parsePlacements(table);
};

/**
 * File-backed placement repository.
 *
 * The file is read once; concurrent callers share the in-flight load and a
 * failed load is retried on the next call.
 */
export const createPlacementRepo = (options: PlacementRepoOptions): PlacementRepo => {
  const { filePath, logger } = options;

  let dataset: PlacementDataset | null = null;
  let loadPromise: Promise<Result<PlacementDataset, PlacementRepoError>> | null = null;

  const loadOnce = async (): Promise<Result<PlacementDataset, PlacementRepoError>> => {
    const result = await readPlacementFile(filePath);
    if (result.isOk()) {
      logger.info({ path: filePath, rows: result.value.length }, 'Placement data loaded');
    } else {
      logger.error({ path: filePath, err: result.error }, 'Failed to load placement data');
    }
    return result;
  };

  return {
    async load(): Promise<Result<PlacementDataset, PlacementRepoError>> {
      if (dataset !== null) {
        return ok(dataset);
      }

      loadPromise ??= loadOnce();

      const result = await loadPromise;
      if (result.isOk()) {
        dataset = result.value;
      } else {
        loadPromise = null;
      }

      return result;
    },
  };
};

