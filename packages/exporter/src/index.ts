import { CoreV1Api, KubeConfig } from "@kubernetes/client-node";

import { buildApp } from "./app.js";
import { loadConfig, type ExporterConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { KubeVolumeSource, VolumeCollector } from "./collector/index.js";
import { SnapshotStore } from "./store/snapshot-store.js";

const production = process.env.NODE_ENV === "production";

let config: ExporterConfig;
try {
  config = loadConfig();
} catch (err) {
  createLogger({ level: "info", production }).fatal({ err }, "invalid configuration");
  process.exit(1);
}

const logger = createLogger({ level: config.logLevel, production: config.production });

// Volume source — in-cluster service account, or the local kubeconfig
let source: KubeVolumeSource;
try {
  const kc = new KubeConfig();
  kc.loadFromDefault();
  source = new KubeVolumeSource(kc.makeApiClient(CoreV1Api), {
    ...config.source,
    logger: logger.child({ module: "volume-source" }),
  });
} catch (err) {
  logger.fatal({ err }, "failed to construct Kubernetes client");
  process.exit(1);
}

const store = new SnapshotStore();
const collector = new VolumeCollector(source, store, {
  ...config.collector,
  logger: logger.child({ module: "collector" }),
});

const app = await buildApp({ loggerInstance: logger, store, collector });

// Start
const { port, host } = config.server;

try {
  await app.listen({ port, host });
  app.log.info(
    { intervalMs: config.collector.intervalMs, claimTimeoutMs: config.collector.claimTimeoutMs },
    `PVC exporter listening on ${host}:${port}`,
  );
} catch (err) {
  app.log.fatal({ err }, "failed to start server");
  process.exit(1);
}

const shutdown = async (signal: string) => {
  app.log.info({ signal }, "shutting down");
  try {
    await app.close();
  } catch (err) {
    app.log.error({ err }, "error during shutdown");
  }
  process.exit(0);
};

process.once("SIGINT", (signal) => void shutdown(signal));
process.once("SIGTERM", (signal) => void shutdown(signal));
