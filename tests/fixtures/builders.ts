/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import type { AppConfig } from '@/infra/config/env.js';
import type { HealthCheckResult, HealthChecker } from '@/modules/health/index.js';
import type { CompanySlot, PlacementRecord } from '@/modules/placements/core/types.js';

/**
 * Create a health check result with defaults
 */
export const makeHealthCheckResult = (
  overrides: Partial<HealthCheckResult> = {}
): HealthCheckResult => ({
  name: 'test-check',
  status: 'healthy',
  ...overrides,
});

/**
 * Create a health checker function that returns a fixed result
 */
export const makeHealthChecker = (result: Partial<HealthCheckResult> = {}): HealthChecker => {
  const fullResult = makeHealthCheckResult(result);
  return async () => fullResult;
};

/**
 * Create a health checker that throws an error
 */
export const makeFailingHealthChecker = (errorMessage: string): HealthChecker => {
  return async () => {
    throw new Error(errorMessage);
  };
};

/**
 * Create a test configuration with defaults
 */
export const makeTestConfig = (overrides: Partial<AppConfig> = {}): AppConfig => {
  const defaults: AppConfig = {
    server: {
      port: 3000,
      host: '0.0.0.0',
      isDevelopment: false,
      isProduction: false,
      isTest: true,
    },
    logger: {
      level: 'silent',
      pretty: false,
    },
    placements: {
      dataPath: 'data/placement_data.csv',
    },
    report: {
      cacheMax: 8,
      cacheTtlMs: 60_000,
    },
    cors: {
      allowedOrigins: undefined,
      clientBaseUrl: undefined,
    },
  };

  return {
    ...defaults,
    ...overrides,
    server: { ...defaults.server, ...overrides.server },
    logger: { ...defaults.logger, ...overrides.logger },
    placements: { ...defaults.placements, ...overrides.placements },
    report: { ...defaults.report, ...overrides.report },
    cors: { ...defaults.cors, ...overrides.cors },
  };
};

const NO_COMPANY: CompanySlot = { name: null, students: null };

/**
 * Create a placement record. Company and role slots are empty unless given.
 */
export const makePlacementRecord = (overrides: Partial<PlacementRecord> = {}): PlacementRecord => ({
  year: 2023,
  branch: 'IT',
  totalStudents: 100,
  placedStudents: 80,
  unplacedStudents: 20,
  placementPercentage: 80,
  highestPackageLpa: 12,
  medianPackageLpa: 6,
  lowestPackageLpa: 3,
  avgPackageLpa: 6.5,
  topCompanies: [NO_COMPANY, NO_COMPANY, NO_COMPANY],
  topJobRoles: [null, null, null],
  internshipConversionRatePercent: 50,
  ...overrides,
});

/**
 * Two-year, two-branch dataset used across the REST and dashboard tests.
 *
 *   year  branch            total placed pct  avg  highest
 *   2022  Computer Science  100   80     80   10   20
 *   2022  Civil              50   30     60    4    8
 *   2023  Computer Science  100   90     90   12   24
 *   2023  Civil              50   35     70    5    9
 */
export const makeSampleDataset = (): PlacementRecord[] => [
  makePlacementRecord({
    year: 2022,
    branch: 'Computer Science',
    totalStudents: 100,
    placedStudents: 80,
    unplacedStudents: 20,
    placementPercentage: 80,
    avgPackageLpa: 10,
    highestPackageLpa: 20,
    medianPackageLpa: 9,
    lowestPackageLpa: 5,
    topCompanies: [
      { name: 'Acme', students: 5 },
      { name: 'Globex', students: 3 },
      NO_COMPANY,
    ],
    topJobRoles: ['Developer', 'Analyst', null],
    internshipConversionRatePercent: 60,
  }),
  makePlacementRecord({
    year: 2022,
    branch: 'Civil',
    totalStudents: 50,
    placedStudents: 30,
    unplacedStudents: 20,
    placementPercentage: 60,
    avgPackageLpa: 4,
    highestPackageLpa: 8,
    medianPackageLpa: 3.5,
    lowestPackageLpa: 2,
    topCompanies: [{ name: 'Initech', students: 4 }, NO_COMPANY, NO_COMPANY],
    topJobRoles: ['Site Engineer', null, null],
    internshipConversionRatePercent: 30,
  }),
  makePlacementRecord({
    year: 2023,
    branch: 'Computer Science',
    totalStudents: 100,
    placedStudents: 90,
    unplacedStudents: 10,
    placementPercentage: 90,
    avgPackageLpa: 12,
    highestPackageLpa: 24,
    medianPackageLpa: 11,
    lowestPackageLpa: 6,
    topCompanies: [{ name: 'Acme', students: 2 }, NO_COMPANY, NO_COMPANY],
    topJobRoles: ['Developer', null, null],
    internshipConversionRatePercent: 70,
  }),
  makePlacementRecord({
    year: 2023,
    branch: 'Civil',
    totalStudents: 50,
    placedStudents: 35,
    unplacedStudents: 15,
    placementPercentage: 70,
    avgPackageLpa: 5,
    highestPackageLpa: 9,
    medianPackageLpa: 4.5,
    lowestPackageLpa: 2.5,
    topCompanies: [NO_COMPANY, NO_COMPANY, NO_COMPANY],
    topJobRoles: [null, null, null],
    internshipConversionRatePercent: 40,
  }),
];
