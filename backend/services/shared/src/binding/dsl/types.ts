// backend/services/shared/src/binding/dsl/types.ts
/**
 * Purpose:
 * - Shared types for the binding Field DSL.
 * - A record type is a class: the constructor is its identity, `new Type()`
 *   yields the zero-valued record, and `static fields` declares how each
 *   property is fed from the request.
 *
 * Tag mini-language (form / json):
 * - "key[,modifier...]": the key is everything before the first comma.
 * - "-" alone means "never bind this field".
 */

import type { ZodTypeAny } from "zod";

export type ScalarKind = "string" | "int" | "float" | "boolean";

export type FieldKind = ScalarKind | "list" | "file" | "files" | "json";

export type FieldTags = {
  /** Generic key for path / query / form sources. */
  form?: string;
  /** Key inside a JSON body. Falls back to the property name. */
  json?: string;
  /** Name of the route parameter feeding this field. */
  path?: string;
};

export type FieldDescriptor =
  | ({ kind: ScalarKind } & FieldTags)
  | ({ kind: "list"; of: ScalarKind } & FieldTags)
  | ({ kind: "file" } & FieldTags)
  | ({ kind: "files" } & FieldTags)
  | ({ kind: "json" } & FieldTags);

/** Declared fields for a record; keys are the record's property names. */
export type FieldsShape<T = unknown> = {
  readonly [K in keyof T & string]?: FieldDescriptor;
};

/**
 * What the pipeline needs from a record class.
 * `schema` is optional; when present it drives annotation-style validation.
 */
export interface BindableType<T extends object> {
  new (): T;
  readonly fields?: FieldsShape<T>;
  readonly schema?: ZodTypeAny;
}

/** Fast-path validation hook a record may implement itself. */
export interface SelfValidating {
  validate(): void | Promise<void>;
}
