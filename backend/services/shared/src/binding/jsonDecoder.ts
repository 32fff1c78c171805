// backend/services/shared/src/binding/jsonDecoder.ts
/**
 * Purpose:
 * - Decode ONE JSON value from a body into a record, through the
 *   descriptor's JSON keys.
 *
 * Rules:
 * - Leading/trailing whitespace only → nothing to decode.
 * - The document must be an object (or null, which decodes nothing).
 * - An exact key match wins; otherwise keys match case-insensitively.
 *   Unknown keys fail when `disallowUnknownFields`.
 * - Bytes after the first value fail when `disallowTrailingData`.
 * - A null member leaves its field untouched.
 * - Every member is checked before any property is assigned.
 */

import type { FieldBinding, TypeDescriptor } from "./descriptor";

export type JsonDecodeOptions = {
  disallowUnknownFields: boolean;
  disallowTrailingData: boolean;
};

export class JsonDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonDecodeError";
  }
}

const WS = new Set([" ", "\t", "\n", "\r"]);
const TOKEN_STOP = new Set([..." \t\n\r", "{", "}", "[", "]", ",", ":", '"']);

function skipWs(text: string, from: number): number {
  let i = from;
  while (i < text.length && WS.has(text[i])) i++;
  return i;
}

/** Index just past the first JSON value starting at `start` (lexical scan only). */
function endOfValue(text: string, start: number): number {
  const first = text[start];

  if (first === "{" || first === "[") {
    let depth = 0;
    let inString = false;
    for (let i = start; i < text.length; i++) {
      const c = text[i];
      if (inString) {
        if (c === "\\") i++;
        else if (c === '"') inString = false;
        continue;
      }
      if (c === '"') inString = true;
      else if (c === "{" || c === "[") depth++;
      else if (c === "}" || c === "]") {
        depth--;
        if (depth === 0) return i + 1;
      }
    }
    return text.length;
  }

  if (first === '"') {
    for (let i = start + 1; i < text.length; i++) {
      const c = text[i];
      if (c === "\\") i++;
      else if (c === '"') return i + 1;
    }
    return text.length;
  }

  let i = start;
  while (i < text.length && !TOKEN_STOP.has(text[i])) i++;
  return i === start ? start + 1 : i;
}

const foldedKeys = new WeakMap<TypeDescriptor, Map<string, ReadonlyArray<FieldBinding>>>();

function lookupMember(
  descriptor: TypeDescriptor,
  key: string
): ReadonlyArray<FieldBinding> | undefined {
  const exact = descriptor.byJsonKey.get(key);
  if (exact) return exact;

  let folded = foldedKeys.get(descriptor);
  if (!folded) {
    folded = new Map();
    for (const [k, bindings] of descriptor.byJsonKey) {
      const f = k.toLowerCase();
      if (!folded.has(f)) folded.set(f, bindings);
    }
    foldedKeys.set(descriptor, folded);
  }
  return folded.get(key.toLowerCase());
}

function jsonTypeName(v: unknown): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  return typeof v;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function mismatch(key: string, binding: FieldBinding, v: unknown): JsonDecodeError {
  const want = binding.kind === "list" ? `${binding.of ?? "string"}[]` : binding.kind;
  return new JsonDecodeError(
    `cannot unmarshal ${jsonTypeName(v)} into field "${key}" of type ${want}`
  );
}

function scalarOk(kind: string, v: unknown): boolean {
  switch (kind) {
    case "string":
      return typeof v === "string";
    case "int":
      return typeof v === "number" && Number.isSafeInteger(v);
    case "float":
      return typeof v === "number" && Number.isFinite(v);
    case "boolean":
      return typeof v === "boolean";
    default:
      return false;
  }
}

function convertMember(key: string, binding: FieldBinding, v: unknown): unknown {
  if (binding.kind === "json") return v;
  if (binding.kind === "list") {
    if (!Array.isArray(v)) throw mismatch(key, binding, v);
    const of = binding.of ?? "string";
    for (const item of v) {
      if (!scalarOk(of, item)) throw mismatch(key, binding, item);
    }
    return [...v];
  }
  if (!scalarOk(binding.kind, v)) throw mismatch(key, binding, v);
  return v;
}

/**
 * Decode `text` into `record`. Returns false when the body held no value.
 * Throws JsonDecodeError (or the SyntaxError from JSON.parse) on failure.
 */
export function decodeJson(
  descriptor: TypeDescriptor,
  text: string,
  record: object,
  opts: JsonDecodeOptions
): boolean {
  const start = skipWs(text, 0);
  if (start >= text.length) return false;

  const end = endOfValue(text, start);
  const doc: unknown = JSON.parse(text.slice(start, end));

  if (opts.disallowTrailingData && skipWs(text, end) < text.length) {
    throw new JsonDecodeError("unexpected extra data in body");
  }

  if (doc === null) return true;
  if (!isPlainObject(doc)) {
    throw new JsonDecodeError(`cannot unmarshal ${jsonTypeName(doc)} into a record`);
  }

  const staged: Array<[string, unknown]> = [];
  for (const [key, value] of Object.entries(doc)) {
    const bindings = lookupMember(descriptor, key);
    if (!bindings) {
      if (opts.disallowUnknownFields) {
        throw new JsonDecodeError(`unknown field "${key}"`);
      }
      continue;
    }
    if (value === null) continue;
    for (const b of bindings) staged.push([b.fieldRef, convertMember(key, b, value)]);
  }

  for (const [prop, value] of staged) Reflect.set(record, prop, value);
  return true;
}
