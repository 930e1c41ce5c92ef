/**
 * Placements Module REST Routes
 *
 * - GET  /api/v1/placements/options: filter domain
 * - POST /api/v1/placements/dashboard: metrics, KPI cards and chart data
 * - POST /api/v1/placements/report: PDF report
 * - POST /api/v1/placements/export: filtered rows as CSV
 */

import {
  DashboardResponseSchema,
  ErrorResponseSchema,
  FilterOptionsResponseSchema,
  SelectionBodySchema,
  type SelectionBody,
} from './schemas.js';
import { getHttpStatusForError, type PlacementError } from '../../core/errors.js';
import { buildDashboard } from '../../core/usecases/build-dashboard.js';
import { filterPlacements } from '../../core/usecases/filter-placements.js';
import { getFilterOptions, resolveSelection } from '../../core/usecases/resolve-selection.js';
import { exportPlacementsCsv } from '../export/csv-export.js';

import type { PlacementRepo } from '../../core/ports.js';
import type { ReportService } from '../report/report-service.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakePlacementRoutesDeps {
  placementRepo: PlacementRepo;
  reportService: ReportService;
}

export const REPORT_FILENAME = 'placement_analytics_report.pdf';
export const EXPORT_FILENAME = 'placement_data_filtered.csv';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: PlacementError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

const ERROR_RESPONSES = {
  400: ErrorResponseSchema,
  500: ErrorResponseSchema,
  503: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makePlacementRoutes = (deps: MakePlacementRoutesDeps): FastifyPluginAsync => {
  const { placementRepo, reportService } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/placements/options
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/placements/options',
      {
        schema: {
          response: { 200: FilterOptionsResponseSchema, 500: ErrorResponseSchema, 503: ErrorResponseSchema },
        },
      },
      async (_request, reply) => {
        const loaded = await placementRepo.load();
        if (loaded.isErr()) {
          return sendError(reply, loaded.error);
        }

        return reply.status(200).send({ ok: true, data: getFilterOptions(loaded.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/placements/dashboard
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: SelectionBody }>(
      '/api/v1/placements/dashboard',
      {
        schema: {
          body: SelectionBodySchema,
          response: { 200: DashboardResponseSchema, ...ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const loaded = await placementRepo.load();
        if (loaded.isErr()) {
          return sendError(reply, loaded.error);
        }

        return reply.status(200).send({ ok: true, data: buildDashboard(loaded.value, request.body) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/placements/report
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: SelectionBody }>(
      '/api/v1/placements/report',
      { schema: { body: SelectionBodySchema, response: ERROR_RESPONSES } },
      async (request, reply) => {
        const loaded = await placementRepo.load();
        if (loaded.isErr()) {
          return sendError(reply, loaded.error);
        }

        const report = reportService.generate(buildDashboard(loaded.value, request.body));
        if (report.isErr()) {
          request.log.error({ err: report.error }, 'Report rendering failed');
          return sendError(reply, report.error);
        }

        return reply
          .status(200)
          .header('content-type', report.value.contentType)
          .header('content-disposition', `attachment; filename="${REPORT_FILENAME}"`)
          .header('x-report-cache', report.value.cached ? 'hit' : 'miss')
          .send(Buffer.from(report.value.bytes));
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/placements/export
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: SelectionBody }>(
      '/api/v1/placements/export',
      { schema: { body: SelectionBodySchema, response: ERROR_RESPONSES } },
      async (request, reply) => {
        const loaded = await placementRepo.load();
        if (loaded.isErr()) {
          return sendError(reply, loaded.error);
        }

        const dataset = loaded.value;
        const selection = resolveSelection(getFilterOptions(dataset), request.body);
        const csv = exportPlacementsCsv(filterPlacements(dataset, selection));
        if (csv.isErr()) {
          return sendError(reply, csv.error);
        }

        return reply
          .status(200)
          .header('content-type', 'text/csv; charset=utf-8')
          .header('content-disposition', `attachment; filename="${EXPORT_FILENAME}"`)
          .send(csv.value);
      }
    );
  };
};
