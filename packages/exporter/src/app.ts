import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";

import { SnapshotStore } from "./store/snapshot-store.js";
import type { VolumeCollector } from "./collector/volume-collector.js";
import { healthRoutes } from "./routes/health.js";
import { metricsRoutes } from "./routes/metrics.js";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Store the scrape routes read from (default: a fresh, empty store) */
  store?: SnapshotStore;
  /** Collector started when the server is ready and stopped on close */
  collector?: Pick<VolumeCollector, "start" | "stop">;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const { store: customStore, collector, ...fastifyOpts } = opts ?? {};

  const app = Fastify(fastifyOpts);

  const store = customStore ?? new SnapshotStore();
  app.decorate("snapshotStore", store);

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    // Unexpected errors — log full details, return generic message
    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({ error: "Internal server error" });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { prefix: "/metrics" });
  await app.register(healthRoutes);

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Start collecting once the server is ready; scrapes never wait on it
  app.addHook("onReady", async () => {
    collector?.start();
  });

  // Abandon any in-flight tick on close; the last snapshot stands
  app.addHook("onClose", async () => {
    collector?.stop();
  });

  return app;
}
