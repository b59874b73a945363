import type { FastifyPluginAsync } from "fastify";
import type {
  LivenessResponse as LivenessPayload,
  ReadinessResponse as ReadinessPayload,
} from "@pvc-exporter/shared";
import { LivenessResponse, ReadinessResponse } from "./health.schemas.js";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  // Process is up and serving HTTP
  app.get(
    "/healthz",
    { schema: { response: { 200: LivenessResponse } } },
    async (_request, reply) => {
      const payload: LivenessPayload = { status: "ok" };
      return reply.send(payload);
    },
  );

  // A snapshot exists and can be scraped
  app.get(
    "/readyz",
    { schema: { response: { 200: ReadinessResponse, 503: ReadinessResponse } } },
    async (_request, reply) => {
      const { snapshot, lastOutcome } = app.snapshotStore.state();

      const payload: ReadinessPayload = {
        status: snapshot ? "ready" : "no_data",
        hasSnapshot: snapshot !== null,
        capturedAt: snapshot?.capturedAt ?? null,
        ageSeconds: snapshot
          ? Math.max(0, Date.now() - Date.parse(snapshot.capturedAt)) / 1000
          : null,
        lastOutcome: lastOutcome?.kind ?? null,
      };

      return reply.status(snapshot ? 200 : 503).send(payload);
    },
  );
};
