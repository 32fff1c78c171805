// backend/services/shared/src/binding/dsl/field.ts
/**
 * Purpose:
 * - Field factory helpers for record classes.
 * - Returns plain objects; the descriptor builder interprets them without
 *   executing any closures.
 */

import type { FieldDescriptor, FieldTags, ScalarKind } from "./types";

function tagsOf(tags?: FieldTags): FieldTags {
  const out: FieldTags = {};
  if (tags?.form !== undefined) out.form = tags.form;
  if (tags?.json !== undefined) out.json = tags.json;
  if (tags?.path !== undefined) out.path = tags.path;
  return out;
}

export const field = {
  string(tags?: FieldTags): FieldDescriptor {
    return { kind: "string", ...tagsOf(tags) };
  },

  int(tags?: FieldTags): FieldDescriptor {
    return { kind: "int", ...tagsOf(tags) };
  },

  float(tags?: FieldTags): FieldDescriptor {
    return { kind: "float", ...tagsOf(tags) };
  },

  boolean(tags?: FieldTags): FieldDescriptor {
    return { kind: "boolean", ...tagsOf(tags) };
  },

  list(of: ScalarKind, tags?: FieldTags): FieldDescriptor {
    return { kind: "list", of, ...tagsOf(tags) };
  },

  /** Single uploaded file; the first one under the key wins. */
  file(tags?: FieldTags): FieldDescriptor {
    return { kind: "file", ...tagsOf(tags) };
  },

  /** Every uploaded file under the key, in submission order. */
  files(tags?: FieldTags): FieldDescriptor {
    return { kind: "files", ...tagsOf(tags) };
  },

  /** Opaque JSON value; only the JSON body binder fills it. */
  json(tags?: FieldTags): FieldDescriptor {
    return { kind: "json", ...tagsOf(tags) };
  },

  /** Shorthand for a field that no source may populate. */
  ignored(): FieldDescriptor {
    return { kind: "string", form: "-" };
  },
} as const;
