/**
 * Placements REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { FilterSelectionInputSchema, NumericRangeSchema } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dashboard, report and export request body. An empty object selects everything.
 */
export const SelectionBodySchema = FilterSelectionInputSchema;

export type SelectionBody = Static<typeof SelectionBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const FilterOptionsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    years: Type.Array(Type.Integer(), { description: 'Descending' }),
    branches: Type.Array(Type.String()),
    packageRange: NumericRangeSchema,
    placementPctRange: NumericRangeSchema,
  }),
});

/**
 * The dashboard payload is produced by typed core code; the schema only
 * pins the envelope.
 */
export const DashboardResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Unknown(),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
