/**
 * Placement dataset errors.
 *
 * Any of these at startup is fatal: there is no dashboard without a dataset.
 */

export type PlacementParseError =
  | { type: 'EmptyFile'; message: string }
  | { type: 'MissingColumns'; message: string; columns: string[] }
  | { type: 'InvalidYear'; message: string; row: number; value: string };

export type PlacementRepoError =
  | PlacementParseError
  | { type: 'NotFound'; message: string; path: string }
  | { type: 'ReadError'; message: string; path: string }
  | { type: 'ParseError'; message: string; path: string };

export type ReportError = { type: 'RenderError'; message: string; cause?: unknown };

export type ExportError = { type: 'SerializationError'; message: string; cause?: unknown };

export type PlacementError = PlacementRepoError | ReportError | ExportError;

export const createRenderError = (cause: unknown): ReportError => ({
  type: 'RenderError',
  message: `Failed to render placement report: ${cause instanceof Error ? cause.message : String(cause)}`,
  cause,
});

export const createSerializationError = (cause: unknown): ExportError => ({
  type: 'SerializationError',
  message: `Failed to serialize placement rows: ${cause instanceof Error ? cause.message : String(cause)}`,
  cause,
});

/**
 * Maps errors to HTTP status codes.
 * Every variant is a server-side problem: the data file is static and
 * client input is validated by the route schemas.
 */
export const getHttpStatusForError = (error: PlacementError): 500 | 503 => {
  switch (error.type) {
    case 'NotFound':
    case 'ReadError':
      return 503;
    case 'ParseError':
    case 'EmptyFile':
    case 'MissingColumns':
    case 'InvalidYear':
    case 'RenderError':
    case 'SerializationError':
      return 500;
  }
};
