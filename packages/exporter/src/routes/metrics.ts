/**
 * Scrape endpoint — renders the current snapshot in the Prometheus text
 * format. Reads the store only; never triggers a collection.
 *
 * Before the first snapshot is published the endpoint answers 503 with a
 * "no data" comment and the exporter's own health metrics, never with
 * zero-valued usage gauges.
 */

import type { FastifyPluginAsync } from "fastify";
import { renderExposition } from "../exposition/render.js";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /metrics
  // -------------------------------------------------------------------------
  app.get("/", async (request, reply) => {
    const result = await renderExposition(app.snapshotStore.state(), {
      logger: request.log,
    });

    return reply
      .status(result.hasData ? 200 : 503)
      .header("content-type", result.contentType)
      .send(result.body);
  });
};
