/**
 * TypeBox schemas for registry responses
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Dataset Schemas
// ============================================================================

export const DatasetSummarySchema = Type.Object({
  id: Type.String(),
  persistent_identifier: Type.Union([Type.String(), Type.Null()]),
});

export type DatasetSummary = Static<typeof DatasetSummarySchema>;

/** One page of `GET /datasets` */
export const DatasetListResponseSchema = Type.Object({
  count: Type.Optional(Type.Integer()),
  next: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  results: Type.Array(DatasetSummarySchema),
});

export type DatasetListResponse = Static<typeof DatasetListResponseSchema>;

/** Body of a successful create or update */
export const DatasetWriteResponseSchema = Type.Object({
  id: Type.String(),
});
