/**
 * Typebox schemas for the exporter's health endpoints.
 */

import { Type, type Static } from "@sinclair/typebox";

export const LivenessResponse = Type.Object({
  status: Type.Literal("ok"),
});

export type LivenessResponse = Static<typeof LivenessResponse>;

export const ReadinessResponse = Type.Object({
  status: Type.Union([Type.Literal("ready"), Type.Literal("no_data")]),
  hasSnapshot: Type.Boolean(),
  capturedAt: Type.Union([Type.String(), Type.Null()]),
  ageSeconds: Type.Union([Type.Number(), Type.Null()]),
  lastOutcome: Type.Union([
    Type.Literal("success"),
    Type.Literal("partial_failure"),
    Type.Literal("total_failure"),
    Type.Null(),
  ]),
});

export type ReadinessResponse = Static<typeof ReadinessResponse>;
