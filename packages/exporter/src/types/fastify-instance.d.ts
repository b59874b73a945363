import "fastify";
import type { SnapshotStore } from "../store/snapshot-store.js";

declare module "fastify" {
  interface FastifyInstance {
    snapshotStore: SnapshotStore;
  }
}
