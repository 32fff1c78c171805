// backend/services/shared/src/binding/valueDecoder.ts
/**
 * Purpose:
 * - Key-based decoder shared by the path, query and form binders: a
 *   multi-map of string values → record properties, converted to each
 *   field's declared kind.
 *
 * Rules:
 * - Scalars take the LAST value under their key; an empty string leaves the
 *   property untouched.
 * - Lists convert every non-empty value, preserving order.
 * - Keys the record does not declare are ignored.
 * - file / files / json fields are never touched here.
 * - All conversions are checked first; on any failure nothing is assigned.
 */

import { DecodeError, type DecodeIssue } from "../http/errors";
import type { ScalarKind } from "./dsl/types";
import type { FieldBinding, TypeDescriptor } from "./descriptor";

export type ValueMap = ReadonlyMap<string, ReadonlyArray<string>>;

type Scalar = string | number | boolean;

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const TRUE_WORDS: ReadonlySet<string> = new Set(["1", "t", "T", "TRUE", "true", "True", "on"]);
const FALSE_WORDS: ReadonlySet<string> = new Set(["0", "f", "F", "FALSE", "false", "False"]);

/** Convert one raw string; undefined means "not convertible". */
export function convertScalar(kind: ScalarKind, raw: string): Scalar | undefined {
  switch (kind) {
    case "string":
      return raw;
    case "int": {
      if (!INT_RE.test(raw)) return undefined;
      const n = Number(raw);
      return Number.isSafeInteger(n) ? n : undefined;
    }
    case "float": {
      if (!FLOAT_RE.test(raw)) return undefined;
      const n = Number(raw);
      return Number.isFinite(n) ? n : undefined;
    }
    case "boolean":
      if (TRUE_WORDS.has(raw)) return true;
      if (FALSE_WORDS.has(raw)) return false;
      return undefined;
  }
}

function issueFor(key: string, value: string): DecodeIssue {
  return { key, value, message: `error converting value for "${key}"` };
}

function decodeField(
  binding: FieldBinding,
  values: ReadonlyArray<string>,
  issues: DecodeIssue[]
): { ok: true; value: Scalar | Scalar[] } | { ok: false } {
  const key = binding.formKey;

  if (binding.kind === "list") {
    const of = binding.of ?? "string";
    const out: Scalar[] = [];
    let failed = false;
    for (const raw of values) {
      if (raw === "") continue;
      const v = convertScalar(of, raw);
      if (v === undefined) {
        issues.push(issueFor(key, raw));
        failed = true;
        break;
      }
      out.push(v);
    }
    return failed ? { ok: false } : { ok: true, value: out };
  }

  if (
    binding.kind === "string" ||
    binding.kind === "int" ||
    binding.kind === "float" ||
    binding.kind === "boolean"
  ) {
    const raw = values.length > 0 ? values[values.length - 1] : "";
    if (raw === "") return { ok: false };
    const v = convertScalar(binding.kind, raw);
    if (v === undefined) {
      issues.push(issueFor(key, raw));
      return { ok: false };
    }
    return { ok: true, value: v };
  }

  return { ok: false };
}

/**
 * Decode `values` into `record` using the descriptor's declared keys.
 * Throws DecodeError listing every failed key.
 */
export function decodeValues(
  descriptor: TypeDescriptor,
  values: ValueMap,
  record: object
): void {
  const issues: DecodeIssue[] = [];
  const staged: Array<[string, Scalar | Scalar[]]> = [];

  for (const binding of descriptor.fields) {
    const raw = values.get(binding.formKey);
    if (raw === undefined) continue;
    const res = decodeField(binding, raw, issues);
    if (res.ok) staged.push([binding.fieldRef, res.value]);
  }

  if (issues.length > 0) throw new DecodeError(issues);

  for (const [prop, value] of staged) Reflect.set(record, prop, value);
}

/** Build a ValueMap from URLSearchParams-style pairs, keeping order. */
export function toValueMap(pairs: Iterable<[string, string]>): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const [k, v] of pairs) {
    const list = out.get(k);
    if (list) list.push(v);
    else out.set(k, [v]);
  }
  return out;
}
