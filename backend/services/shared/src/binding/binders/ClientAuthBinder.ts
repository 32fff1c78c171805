// backend/services/shared/src/binding/binders/ClientAuthBinder.ts
/**
 * Purpose:
 * - OAuth-style client credentials from HTTP Basic auth.
 * - user → the `client_id` field, password → the `client_secret` field, each
 *   only when the field is still empty and the credential part is non-empty.
 *
 * Notes:
 * - Opt-in: not part of defaultBinders(). Put it after the body binder so a
 *   form-supplied client_id keeps priority.
 * - Malformed Basic credentials are ignored (no error).
 */

import type { InboundRequest } from "../../http/InboundRequest";
import type { Binder, BinderKind } from "../Binder";
import { descriptorOf } from "../DescriptorCache";

const BASIC_PREFIX = "basic ";
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export type BasicCredentials = { user: string; password: string };

/** Parse an Authorization header value; undefined when it is not usable Basic auth. */
export function parseBasicAuth(header: string): BasicCredentials | undefined {
  if (header.length < BASIC_PREFIX.length) return undefined;
  if (header.slice(0, BASIC_PREFIX.length).toLowerCase() !== BASIC_PREFIX) return undefined;

  const encoded = header.slice(BASIC_PREFIX.length);
  if (encoded.length % 4 !== 0 || !BASE64_RE.test(encoded)) return undefined;

  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  const colon = decoded.indexOf(":");
  if (colon === -1) return undefined;
  return { user: decoded.slice(0, colon), password: decoded.slice(colon + 1) };
}

function fillIfEmpty(record: object, prop: string | undefined, value: string): void {
  if (prop === undefined || value === "") return;
  const current: unknown = Reflect.get(record, prop);
  if (current === undefined || current === null || current === "") {
    Reflect.set(record, prop, value);
  }
}

export class ClientAuthBinder implements Binder {
  public name(): string {
    return "client_auth";
  }

  public kind(): BinderKind {
    return "metadata";
  }

  public matches(req: InboundRequest): boolean {
    const auth = req.header("authorization");
    return (
      auth.length >= BASIC_PREFIX.length &&
      auth.slice(0, BASIC_PREFIX.length).toLowerCase() === BASIC_PREFIX
    );
  }

  public async bind(req: InboundRequest, record: object): Promise<void> {
    const creds = parseBasicAuth(req.header("authorization"));
    if (!creds) return;

    const cf = descriptorOf(record).credentialFields;
    if (!cf) return;

    fillIfEmpty(record, cf.clientIdField, creds.user);
    fillIfEmpty(record, cf.clientSecretField, creds.password);
  }
}
