// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 * - The root sink is a pino logger; bound handles merge their context into
 *   every entry and let pino do level filtering.
 *
 * Notes:
 * - Call setRootLogger(createRootLogger(...)) once at boot. Until then a
 *   default pino root at level "info" is used.
 * - Authorization / cookie request headers are redacted at the root.
 */

import pino, { stdTimeFunctions, type Logger as PinoLogger, type LevelWithSilent } from "pino";

type Json = Record<string, unknown>;

export type LogLevel = LevelWithSilent;

/** Public interface for bound logger handles. */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  debug(msg: string, ...rest: unknown[]): void;
  debug(obj: Json, msg?: string, ...rest: unknown[]): void;

  info(msg: string, ...rest: unknown[]): void;
  info(obj: Json, msg?: string, ...rest: unknown[]): void;

  warn(msg: string, ...rest: unknown[]): void;
  warn(obj: Json, msg?: string, ...rest: unknown[]): void;

  error(msg: string, ...rest: unknown[]): void;
  error(obj: Json, msg?: string, ...rest: unknown[]): void;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  };
}

// ────────────────────────────────────────────────────────────────────────────
// Root logger
// ────────────────────────────────────────────────────────────────────────────

export type RootLoggerOptions = {
  level: LogLevel;
  service: string;
};

export function createRootLogger(opts: RootLoggerOptions): PinoLogger {
  return pino({
    level: opts.level,
    base: { service: opts.service },
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      paths: ["req.headers.authorization", "req.headers.cookie"],
      censor: "[redacted]",
    },
  });
}

let ROOT: PinoLogger | null = null;

export function setRootLogger(logger: PinoLogger): void {
  ROOT = logger;
}

export function getRootLogger(): PinoLogger {
  if (!ROOT) ROOT = createRootLogger({ level: "info", service: "-" });
  return ROOT;
}

export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(initialCtx);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

function isJson(x: unknown): x is Json {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** Fold the overloaded (msg, meta) / (meta, msg) forms into [meta, msg]. */
function normalizeArgs(
  boundCtx: Json,
  arg1: unknown,
  arg2: unknown,
  rest: unknown[]
): [Json, string | undefined] {
  const meta: Json = { ...boundCtx };
  let msg: string | undefined;
  const extras: unknown[] = [];

  if (typeof arg1 === "string") {
    msg = arg1;
    for (const x of [arg2, ...rest]) {
      if (isJson(x)) Object.assign(meta, x);
      else if (x !== undefined) extras.push(x);
    }
  } else if (isJson(arg1)) {
    Object.assign(meta, arg1);
    if (typeof arg2 === "string") msg = arg2;
    else if (isJson(arg2)) Object.assign(meta, arg2);
    else if (arg2 !== undefined) extras.push(arg2);
    for (const x of rest) {
      if (isJson(x)) Object.assign(meta, x);
      else if (x !== undefined) extras.push(x);
    }
  } else if (arg1 !== undefined) {
    extras.push(arg1);
  }

  if (extras.length > 0) meta.extra = extras;
  return [meta, msg];
}

class BoundLogger implements IBoundLogger {
  constructor(private readonly ctx: Json = {}) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  public debug = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg] = normalizeArgs(this.ctx, arg1, arg2, rest);
    getRootLogger().debug(obj, msg);
  };

  public info = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg] = normalizeArgs(this.ctx, arg1, arg2, rest);
    getRootLogger().info(obj, msg);
  };

  public warn = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg] = normalizeArgs(this.ctx, arg1, arg2, rest);
    getRootLogger().warn(obj, msg);
  };

  public error = (arg1: unknown, arg2?: unknown, ...rest: unknown[]): void => {
    const [obj, msg] = normalizeArgs(this.ctx, arg1, arg2, rest);
    getRootLogger().error(obj, msg);
  };

  public serializeError(err: unknown) {
    if (err instanceof Error)
      return { name: err.name, message: err.message, stack: err.stack };
    return { message: String(err) };
  }
}
