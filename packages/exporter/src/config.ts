/**
 * Exporter configuration, read once from the environment at startup.
 *
 * Variables are described by a Typebox schema so defaults, numeric
 * coercion and range checks live in one place. Every invalid variable is
 * reported together in a single ConfigError.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const LogLevel = Type.Union(
  [
    Type.Literal("trace"),
    Type.Literal("debug"),
    Type.Literal("info"),
    Type.Literal("warn"),
    Type.Literal("error"),
    Type.Literal("fatal"),
    Type.Literal("silent"),
  ],
  { default: "info" },
);

export type LogLevel = Static<typeof LogLevel>;

export const EnvSchema = Type.Object({
  EXPORTER_SERVER_PORT: Type.Integer({ minimum: 1, maximum: 65535, default: 9100 }),
  EXPORTER_SERVER_HOST: Type.String({ minLength: 1, default: "0.0.0.0" }),
  /** Seconds between collection ticks */
  SCAN_INTERVAL: Type.Number({ exclusiveMinimum: 0, default: 60 }),
  /** Seconds a single claim query may take */
  CLAIM_TIMEOUT: Type.Number({ exclusiveMinimum: 0, default: 10 }),
  HOST_IP: Type.Optional(Type.String({ minLength: 1 })),
  NODE_NAME: Type.Optional(Type.String({ minLength: 1 })),
  WATCH_NAMESPACES: Type.Optional(Type.String()),
  PVC_LABEL_SELECTOR: Type.Optional(Type.String()),
  MOUNT_TABLE_PATH: Type.String({ minLength: 1, default: "/proc/mounts" }),
  CONSISTENCY_TOLERANCE: Type.Number({ minimum: 0, maximum: 1, default: 0.1 }),
  LOG_LEVEL: LogLevel,
  NODE_ENV: Type.Optional(Type.String()),
});

// ---------------------------------------------------------------------------
// Resolved config
// ---------------------------------------------------------------------------

export interface ExporterConfig {
  server: {
    host: string;
    port: number;
  };
  collector: {
    intervalMs: number;
    claimTimeoutMs: number;
    consistencyTolerance: number;
  };
  source: {
    hostIp?: string;
    nodeName?: string;
    /** Namespace allow-list; undefined means every namespace */
    namespaces?: string[];
    /** Equality selector matched against PVC labels */
    labelSelector?: Record<string, string>;
    mountTablePath: string;
  };
  logLevel: LogLevel;
  production: boolean;
}

/**
 * Parse a `key=value,key2=value2` equality selector.
 * Returns a list of issues instead of throwing so they can be reported
 * alongside schema errors.
 */
export function parseLabelSelector(
  raw: string,
): { selector: Record<string, string>; issues: string[] } {
  const selector: Record<string, string> = {};
  const issues: string[] = [];

  for (const part of raw.split(",")) {
    const term = part.trim();
    if (!term) continue;
    const eq = term.indexOf("=");
    const key = eq > 0 ? term.slice(0, eq).trim() : "";
    const value = eq > 0 ? term.slice(eq + 1).trim() : "";
    if (!key || value.includes("=")) {
      issues.push(`PVC_LABEL_SELECTOR: "${term}" is not a key=value pair`);
      continue;
    }
    selector[key] = value;
  }

  return { selector, issues };
}

function splitList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Read the exporter configuration from an environment map.
 * Blank variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key]?.trim();
    if (value) raw[key] = value;
  }

  const candidate = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));

  if (!Value.Check(EnvSchema, candidate)) {
    const issues = [...Value.Errors(EnvSchema, candidate)].map(
      (e) => `${e.path.replace(/^\//, "") || "env"}: ${e.message}`,
    );
    throw new ConfigError(issues);
  }

  let labelSelector: Record<string, string> | undefined;
  if (candidate.PVC_LABEL_SELECTOR !== undefined) {
    const parsed = parseLabelSelector(candidate.PVC_LABEL_SELECTOR);
    if (parsed.issues.length > 0) throw new ConfigError(parsed.issues);
    labelSelector = Object.keys(parsed.selector).length > 0 ? parsed.selector : undefined;
  }

  return {
    server: {
      host: candidate.EXPORTER_SERVER_HOST,
      port: candidate.EXPORTER_SERVER_PORT,
    },
    collector: {
      intervalMs: Math.round(candidate.SCAN_INTERVAL * 1000),
      claimTimeoutMs: Math.round(candidate.CLAIM_TIMEOUT * 1000),
      consistencyTolerance: candidate.CONSISTENCY_TOLERANCE,
    },
    source: {
      hostIp: candidate.HOST_IP,
      nodeName: candidate.NODE_NAME,
      namespaces: splitList(candidate.WATCH_NAMESPACES),
      labelSelector,
      mountTablePath: candidate.MOUNT_TABLE_PATH,
    },
    logLevel: candidate.LOG_LEVEL,
    production: candidate.NODE_ENV === "production",
  };
}
