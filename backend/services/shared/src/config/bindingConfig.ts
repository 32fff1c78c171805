// backend/services/shared/src/config/bindingConfig.ts
/**
 * Purpose:
 * - Typed, validated runtime configuration for a service using the bind
 *   pipeline, read from an env map (process.env by default).
 *
 * Env:
 * - SERVICE_NAME                 (required)
 * - PORT                         default 4010
 * - LOG_LEVEL                    fatal|error|warn|info|debug|trace|silent, default info
 * - BIND_MAX_BODY_BYTES          default 2097152 (2 MiB)
 * - BIND_MULTIPART_MEMORY_BYTES  default 8388608 (8 MiB)
 * - BIND_JSON_STRICT             reject unknown JSON keys, default true
 * - BIND_JSON_ALLOW_TRAILING     accept bytes after the JSON value, default false
 * - BIND_NO_VARY_SEARCH          emit No-Vary-Search, default true
 *
 * Invariants:
 * - Fail fast: the first invalid variable throws, naming the variable.
 * - maxBodySize is never below multipartMemory.
 */

import { z } from "zod";
import type { LogLevel } from "../logger/Logger";

const FLAG_TRUE = new Set(["1", "true", "on", "yes"]);
const FLAG_FALSE = new Set(["0", "false", "off", "no"]);

const flag = (dflt: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v === "") return dflt;
      if (FLAG_TRUE.has(v)) return true;
      if (FLAG_FALSE.has(v)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean flag, got "${v}"` });
      return z.NEVER;
    });

const bytes = (dflt: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v === "") return dflt;
      if (!/^\d+$/.test(v) || !Number.isSafeInteger(Number(v)) || Number(v) <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive byte count, got "${v}"` });
        return z.NEVER;
      }
      return Number(v);
    });

const EnvSchema = z.object({
  SERVICE_NAME: z.string().trim().min(1, "is required"),
  PORT: z.coerce.number().int().min(0).max(65535).default(4010),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  BIND_MAX_BODY_BYTES: bytes(2 << 20),
  BIND_MULTIPART_MEMORY_BYTES: bytes(8 << 20),
  BIND_JSON_STRICT: flag(true),
  BIND_JSON_ALLOW_TRAILING: flag(false),
  BIND_NO_VARY_SEARCH: flag(true),
});

export type BindingConfig = {
  serviceName: string;
  port: number;
  logLevel: LogLevel;
  maxBodySize: number;
  multipartMemory: number;
  json: { disallowUnknownFields: boolean; disallowTrailingData: boolean };
  noVarySearch: boolean;
};

export class ConfigError extends Error {
  constructor(public readonly variable: string, detail: string) {
    super(`CONFIG_INVALID: ${variable} ${detail}`);
    this.name = "ConfigError";
  }
}

export function loadBindingConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): BindingConfig {
  const res = EnvSchema.safeParse(env);
  if (!res.success) {
    const issue = res.error.issues[0];
    const variable = issue?.path.length ? String(issue.path[0]) : "(env)";
    throw new ConfigError(variable, issue?.message ?? "is invalid");
  }

  const e = res.data;
  return {
    serviceName: e.SERVICE_NAME,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    maxBodySize: Math.max(e.BIND_MAX_BODY_BYTES, e.BIND_MULTIPART_MEMORY_BYTES),
    multipartMemory: e.BIND_MULTIPART_MEMORY_BYTES,
    json: {
      disallowUnknownFields: e.BIND_JSON_STRICT,
      disallowTrailingData: !e.BIND_JSON_ALLOW_TRAILING,
    },
    noVarySearch: e.BIND_NO_VARY_SEARCH,
  };
}
