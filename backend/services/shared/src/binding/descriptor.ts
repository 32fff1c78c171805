// backend/services/shared/src/binding/descriptor.ts
/**
 * Purpose:
 * - Turn a record class's static `fields` declaration into an immutable
 *   TypeDescriptor: which property is fed by which path / query / form / JSON
 *   key, which properties hold uploads, and which carry client credentials.
 *
 * Invariants:
 * - Pure: depends only on the class declaration, never on request data.
 * - Malformed entries are skipped one field at a time; the rest still binds.
 * - Declared key = form tag → json tag → property name (modifiers after the
 *   first comma stripped). "-" excludes the field from every source.
 */

import type { FieldDescriptor, FieldKind, ScalarKind } from "./dsl/types";

export const IGNORE_KEY = "-";
export const CLIENT_ID_KEY = "client_id";
export const CLIENT_SECRET_KEY = "client_secret";

export type FieldBinding = {
  /** Property name on the record. */
  readonly fieldRef: string;
  readonly kind: FieldKind;
  /** Element kind for "list" fields. */
  readonly of?: ScalarKind;
  /** Declared key used by path / query / form decoding. */
  readonly formKey: string;
  /** Key inside a JSON body; absent when the json tag is "-". */
  readonly jsonKey?: string;
  /** Route parameter name, when the field has a path tag. */
  readonly pathKey?: string;
};

export type PathField = {
  readonly fieldRef: string;
  readonly sourceKey: string;
  readonly destKey: string;
};

export type FileField = {
  readonly fieldRef: string;
  readonly formKey: string;
  readonly multiplicity: "single" | "many";
};

export type CredentialFields = {
  readonly clientIdField?: string;
  readonly clientSecretField?: string;
};

export type TypeDescriptor = {
  readonly fields: ReadonlyArray<FieldBinding>;
  readonly byJsonKey: ReadonlyMap<string, ReadonlyArray<FieldBinding>>;
  readonly pathFields: ReadonlyArray<PathField>;
  readonly fileFields: ReadonlyArray<FileField>;
  readonly credentialFields?: CredentialFields;
  readonly allKeys: ReadonlyArray<string>;
};

export const EMPTY_DESCRIPTOR: TypeDescriptor = Object.freeze({
  fields: Object.freeze([]),
  byJsonKey: new Map<string, ReadonlyArray<FieldBinding>>(),
  pathFields: Object.freeze([]),
  fileFields: Object.freeze([]),
  allKeys: Object.freeze([]),
});

const SCALAR_KINDS: ReadonlySet<string> = new Set([
  "string",
  "int",
  "float",
  "boolean",
]);
const OTHER_KINDS: ReadonlySet<string> = new Set([
  "list",
  "file",
  "files",
  "json",
]);

function isScalarKind(v: unknown): v is ScalarKind {
  return typeof v === "string" && SCALAR_KINDS.has(v);
}

function isOptionalString(v: unknown): v is string | undefined {
  return v === undefined || typeof v === "string";
}

/** Narrow one declared entry; anything that does not look like a field is skipped. */
export function isFieldDescriptor(v: unknown): v is FieldDescriptor {
  if (!v || typeof v !== "object") return false;
  const kind: unknown = Reflect.get(v, "kind");
  if (typeof kind !== "string") return false;
  if (!SCALAR_KINDS.has(kind) && !OTHER_KINDS.has(kind)) return false;
  if (kind === "list" && !isScalarKind(Reflect.get(v, "of"))) return false;
  return (
    isOptionalString(Reflect.get(v, "form")) &&
    isOptionalString(Reflect.get(v, "json")) &&
    isOptionalString(Reflect.get(v, "path"))
  );
}

/** "name,omitempty" → "name"; undefined stays undefined. */
export function tagKey(tag: string | undefined): string | undefined {
  if (tag === undefined) return undefined;
  const idx = tag.indexOf(",");
  return (idx === -1 ? tag : tag.slice(0, idx)).trim();
}

/** Declared key for path / query / form: form tag → json tag → property name. */
export function declaredKey(prop: string, fd: FieldDescriptor): string {
  const formKey = tagKey(fd.form);
  if (formKey === IGNORE_KEY) return IGNORE_KEY;
  if (formKey) return formKey;
  const jsonKey = tagKey(fd.json);
  if (jsonKey) return jsonKey;
  return prop;
}

function jsonKeyOf(prop: string, fd: FieldDescriptor): string | undefined {
  const key = tagKey(fd.json);
  if (key === IGNORE_KEY) return undefined;
  return key || prop;
}

/**
 * Build the descriptor for a record class. Non-class input, or a class
 * without a usable `fields` object, yields EMPTY_DESCRIPTOR.
 */
export function buildDescriptor(type: unknown): TypeDescriptor {
  if (typeof type !== "function") return EMPTY_DESCRIPTOR;

  const shape: unknown = Reflect.get(type, "fields");
  if (!shape || typeof shape !== "object") return EMPTY_DESCRIPTOR;

  const fields: FieldBinding[] = [];
  const pathFields: PathField[] = [];
  const fileFields: FileField[] = [];
  const keys = new Set<string>();
  let clientIdField: string | undefined;
  let clientSecretField: string | undefined;

  for (const [prop, raw] of Object.entries(shape)) {
    if (!isFieldDescriptor(raw)) continue;

    const formKey = declaredKey(prop, raw);
    if (formKey === IGNORE_KEY) continue;

    const pathKey = tagKey(raw.path) || undefined;
    const isUpload = raw.kind === "file" || raw.kind === "files";
    const binding: FieldBinding = {
      fieldRef: prop,
      kind: raw.kind,
      of: raw.kind === "list" ? raw.of : undefined,
      formKey,
      jsonKey: isUpload ? undefined : jsonKeyOf(prop, raw),
      pathKey,
    };
    fields.push(Object.freeze(binding));
    keys.add(formKey);

    if (raw.kind === "string") {
      if (clientIdField === undefined && formKey === CLIENT_ID_KEY) clientIdField = prop;
      if (clientSecretField === undefined && formKey === CLIENT_SECRET_KEY)
        clientSecretField = prop;
    }

    if (pathKey) {
      const pf: PathField = { fieldRef: prop, sourceKey: pathKey, destKey: formKey };
      pathFields.push(Object.freeze(pf));
    }

    if (isUpload) {
      const ff: FileField = {
        fieldRef: prop,
        formKey,
        multiplicity: raw.kind === "file" ? "single" : "many",
      };
      fileFields.push(Object.freeze(ff));
    }
  }

  const byJsonKey = new Map<string, FieldBinding[]>();
  for (const b of fields) {
    if (b.jsonKey === undefined) continue;
    const list = byJsonKey.get(b.jsonKey);
    if (list) list.push(b);
    else byJsonKey.set(b.jsonKey, [b]);
  }

  const credentialFields: CredentialFields | undefined =
    clientIdField !== undefined || clientSecretField !== undefined
      ? Object.freeze({ clientIdField, clientSecretField })
      : undefined;

  return Object.freeze({
    fields: Object.freeze(fields),
    byJsonKey,
    pathFields: Object.freeze(pathFields),
    fileFields: Object.freeze(fileFields),
    credentialFields,
    allKeys: Object.freeze([...keys]),
  });
}
